/**
 * Shape of a padstate configuration file.
 * Every key is optional; missing keys keep their defaults.
 */
export interface ConfigFile {
  profileRoot?: string;
  deviceRoot?: string;
  converterCommand?: string;
  injectorCommand?: string;
  verbose?: boolean;
}

export const ConfigFileSchema = {
  type: 'object',
  properties: {
    profileRoot: { type: 'string', minLength: 1 },
    deviceRoot: { type: 'string', minLength: 1 },
    converterCommand: { type: 'string', minLength: 1 },
    injectorCommand: { type: 'string', minLength: 1 },
    verbose: { type: 'boolean' },
  },
  required: [],
  additionalProperties: false,
};
