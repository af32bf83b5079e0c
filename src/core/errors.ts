/**
 * Conditions that abort the current invocation.
 * The CLI prints the message and exits with `exitCode`; nothing else catches these.
 */
export class FatalError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The current-state pointer exists but is not a symlink to a directory
 */
export class IntegrityError extends FatalError {}

/**
 * No current state and no `init` state to start from
 */
export class BootstrapError extends FatalError {}

/**
 * A required tool or directory is missing
 */
export class EnvironmentError extends FatalError {}
