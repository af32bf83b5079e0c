export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Diagnostics go to stderr so command output on stdout stays clean.
 * `info` is only printed in verbose mode.
 */
export class ConsoleLogger implements Logger {
  constructor(private verbose = false) {}

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  info(message: string): void {
    if (this.verbose) {
      console.error(message);
    }
  }

  warn(message: string): void {
    console.error(message);
  }

  error(message: string): void {
    console.error(message);
  }
}

export const defaultLogger = new ConsoleLogger();
