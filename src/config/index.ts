import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'yaml';
import Ajv from 'ajv';
import { PadstateConfig } from '../types';
import { Logger, defaultLogger } from '../core/logger';
import { ConfigFile, ConfigFileSchema } from './schema';

/**
 * Configuration file paths to search (in order), relative to the base path
 */
const CONFIG_PATHS = [
  '.config/padstate/config.yml',
  '.config/padstate/config.yaml',
  '.padstate.yml',
  '.padstate.yaml',
];

/** Explicit config file, checked before the search paths */
export const CONFIG_ENV = 'PADSTATE_CONFIG';

/** Any non-empty value turns on verbose diagnostics */
export const VERBOSE_ENV = 'DEBUG';

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<ConfigFile>(ConfigFileSchema);

/**
 * Get the default configuration
 */
export function getDefaultConfig(): PadstateConfig {
  return {
    profileRoot: path.join(os.homedir(), '.padstate'),
    deviceRoot: '/sys/class/input',
    converterCommand: 'intuos4led-img2raw',
    injectorCommand: 'xdotool',
    verbose: false,
  };
}

/**
 * Load padstate configuration from file or use defaults.
 * The environment can only raise verbosity, never lower it.
 */
export function loadConfig(
  basePath?: string,
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = defaultLogger
): PadstateConfig {
  const base = basePath || os.homedir();
  const searchPaths = CONFIG_PATHS.map((p) => path.resolve(base, p));
  const explicit = env[CONFIG_ENV];
  if (explicit) {
    searchPaths.unshift(path.resolve(expandHome(explicit)));
  }

  let config = getDefaultConfig();

  for (const configPath of searchPaths) {
    if (fs.existsSync(configPath)) {
      const parsed = readConfigFile(configPath, logger);
      if (parsed) {
        config = mergeConfig(config, parsed);
      }
      break;
    }
  }

  if (env[VERBOSE_ENV]) {
    config.verbose = true;
  }

  return config;
}

function readConfigFile(configPath: string, logger: Logger): ConfigFile | null {
  let parsed: unknown;
  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    parsed = yaml.parse(content);
  } catch (error) {
    logger.warn(`Warning: Failed to parse config at ${configPath}: ${error}`);
    return null;
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) return {};

  if (!validateConfigFile(parsed)) {
    const details = ajv.errorsText(validateConfigFile.errors, { dataVar: 'config' });
    logger.warn(`Warning: Ignoring invalid config at ${configPath}: ${details}`);
    return null;
  }

  return parsed;
}

/**
 * Overlay file settings on the defaults
 */
function mergeConfig(defaults: PadstateConfig, override: ConfigFile): PadstateConfig {
  return {
    profileRoot:
      override.profileRoot !== undefined
        ? path.resolve(expandHome(override.profileRoot))
        : defaults.profileRoot,
    deviceRoot:
      override.deviceRoot !== undefined
        ? path.resolve(expandHome(override.deviceRoot))
        : defaults.deviceRoot,
    converterCommand: override.converterCommand ?? defaults.converterCommand,
    injectorCommand: override.injectorCommand ?? defaults.injectorCommand,
    verbose: override.verbose ?? defaults.verbose,
  };
}

/**
 * Expand a leading `~` to the home directory
 */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

/**
 * Validate configuration
 */
export function validateConfig(config: PadstateConfig): string[] {
  const errors: string[] = [];

  if (!config.profileRoot || !path.isAbsolute(config.profileRoot)) {
    errors.push(`Invalid profile root: "${config.profileRoot}". Must be an absolute path.`);
  }

  if (!config.deviceRoot || !path.isAbsolute(config.deviceRoot)) {
    errors.push(`Invalid device root: "${config.deviceRoot}". Must be an absolute path.`);
  }

  if (!config.converterCommand.trim()) {
    errors.push('Converter command must not be empty.');
  }

  if (!config.injectorCommand.trim()) {
    errors.push('Injector command must not be empty.');
  }

  return errors;
}
