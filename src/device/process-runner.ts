import { spawn } from 'child_process';
import * as path from 'path';
import { ProcessResult, ProcessRunner, RunOptions } from '../types';
import { isExecutableFile } from '../core/fs-utils';

/**
 * Runs external programs through child_process.spawn.
 *
 * The child shares our stdin/stdout so hooks can talk to the terminal.
 * There is no timeout: a hung hook stalls the whole transition.
 */
export class NodeProcessRunner implements ProcessRunner {
  run(
    command: string,
    args: ReadonlyArray<string>,
    options: RunOptions = {}
  ): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        stdio: ['inherit', 'inherit', options.quiet ? 'ignore' : 'inherit'],
      });

      child.on('close', (exitCode: number | null) => {
        resolve({ exitCode: exitCode ?? 1 });
      });

      child.on('error', (err: Error) => {
        reject(err);
      });
    });
  }
}

/**
 * Locate an executable the way a shell would. Commands containing a slash
 * are checked as given; bare names are looked up on PATH.
 */
export function findExecutable(
  command: string,
  searchPath: string | undefined = process.env.PATH
): string | null {
  if (command.includes('/')) {
    const resolved = path.resolve(command);
    return isExecutableFile(resolved) ? resolved : null;
  }

  for (const dir of (searchPath ?? '').split(path.delimiter)) {
    const candidate = path.join(dir || '.', command);
    if (isExecutableFile(candidate)) {
      return path.resolve(candidate);
    }
  }

  return null;
}
