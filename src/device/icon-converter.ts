import { ProcessRunner } from '../types';
import { Logger, defaultLogger } from '../core/logger';
import { findExecutable } from './process-runner';

/**
 * Wraps the external PNG to raw icon converter.
 *
 *   <converter> [--lefthanded] <image.png>   writes <image>.raw next to the PNG
 *   <converter> --blank <target.raw>         writes an empty icon
 *
 * Conversion failures are not errors: the caller falls back to the blank icon.
 */
export class IconConverter {
  constructor(
    private readonly command: string,
    private readonly runner: ProcessRunner,
    private readonly logger: Logger = defaultLogger,
    private readonly searchPath: string | undefined = process.env.PATH
  ) {}

  isAvailable(): boolean {
    return findExecutable(this.command, this.searchPath) !== null;
  }

  convert(png: string, lefthanded: boolean): Promise<boolean> {
    const args = lefthanded ? ['--lefthanded', png] : [png];
    return this.invoke(args, `converting ${png}`);
  }

  generateBlank(target: string): Promise<boolean> {
    return this.invoke(['--blank', target], `generating blank icon ${target}`);
  }

  private async invoke(args: string[], what: string): Promise<boolean> {
    try {
      const result = await this.runner.run(this.command, args, { quiet: true });
      if (result.exitCode !== 0) {
        this.logger.info(`${what} failed with exit code ${result.exitCode}`);
        return false;
      }
      return true;
    } catch (error) {
      this.logger.info(`${what} failed: ${error}`);
      return false;
    }
  }
}
