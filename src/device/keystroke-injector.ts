import { ProcessRunner } from '../types';
import { Logger, defaultLogger } from '../core/logger';

/**
 * Sends key symbols to whichever window has focus when the injector runs.
 * Modifiers held on the keyboard are released for the duration of the send.
 */
export class KeystrokeInjector {
  constructor(
    private readonly command: string,
    private readonly runner: ProcessRunner,
    private readonly logger: Logger = defaultLogger
  ) {}

  static buildArgs(keys: ReadonlyArray<string>): string[] {
    return ['getwindowfocus', 'key', '--window', '%1', '--clearmodifiers', ...keys];
  }

  async send(keys: ReadonlyArray<string>): Promise<void> {
    if (keys.length === 0) return;

    this.logger.info(`sending to active window: ${keys.join(' ')}`);
    try {
      const result = await this.runner.run(this.command, KeystrokeInjector.buildArgs(keys));
      if (result.exitCode !== 0) {
        this.logger.warn(`${this.command} exited with code ${result.exitCode}`);
      }
    } catch (error) {
      this.logger.warn(`Failed to run ${this.command}: ${error}`);
    }
  }
}
