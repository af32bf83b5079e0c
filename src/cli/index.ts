#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { loadConfig, validateConfig } from '../config';
import { Machine, createMachine } from '../core';
import { EnvironmentError, FatalError } from '../core/errors';
import { Logger, defaultLogger } from '../core/logger';

export interface ProgramIO {
  /** Command output (stdout) */
  print(line: string): void;
  /** Usage and parse errors (stderr) */
  writeErr(text: string): void;
}

const consoleIO: ProgramIO = {
  print: (line) => console.log(line),
  writeErr: (text) => process.stderr.write(text),
};

export function parseButton(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError('Button must be an integer.');
  }
  return Number(value);
}

/**
 * Build the command tree. The machine is only created (and bootstrapped)
 * once a command has parsed successfully.
 */
export function createProgram(
  getMachine: () => Promise<Machine>,
  io: ProgramIO = consoleIO
): Command {
  const program = new Command();

  program
    .name('padstate')
    .description('padstate - hotkey state machine for tablets with button displays')
    .version('1.0.0')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.print(str.trimEnd()),
      writeErr: (str) => io.writeErr(str),
    });

  /**
   * Go command
   */
  program
    .command('go')
    .description('Switch to a state (/path from the profile root, path from the current state)')
    .argument('<path>', 'state to switch to')
    .action(async (spec: string) => {
      const machine = await getMachine();
      await machine.go(spec);
    });

  /**
   * Press command
   */
  program
    .command('press')
    .description('Handle a button press (0 is the ring button, 1-8 from the top)')
    .argument('<button>', 'button number', parseButton)
    .action(async (button: number) => {
      const machine = await getMachine();
      await machine.press(button);
    });

  /**
   * List command
   */
  program
    .command('list')
    .description('List the hotkeys of the current state')
    .action(async () => {
      const machine = await getMachine();
      machine.list().forEach((line) => io.print(line));
    });

  /**
   * Status command
   */
  program
    .command('status')
    .description('Show the current state')
    .action(async () => {
      const machine = await getMachine();
      const status = machine.status();

      io.print(`State:       ${status.current}`);
      io.print(`Hotkeys:     ${status.bindings}`);
      io.print(`Handedness:  ${status.lefthanded ? 'left' : 'right'}`);
      io.print(`Tablets:     ${status.devices.length}`);
      status.devices.forEach((device) => io.print(`  • ${device}`));
    });

  return program;
}

export interface CliDependencies {
  getMachine: () => Promise<Machine>;
  io?: ProgramIO;
  logger?: Logger;
}

/**
 * Run one command (arguments after the program name) and map the outcome to
 * an exit code: 0 on success, including presses that only warned; the
 * error's own code for usage and fatal errors; 1 for anything else.
 */
export async function runCli(args: string[], deps: CliDependencies): Promise<number> {
  const logger = deps.logger ?? defaultLogger;
  try {
    await createProgram(deps.getMachine, deps.io).parseAsync(args, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof FatalError) {
      logger.error(error.message);
      return error.exitCode;
    }
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

/**
 * Entry point: load the configuration and run the command in `argv`
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const config = loadConfig();
  defaultLogger.setVerbose(config.verbose);

  return runCli(argv.slice(2), {
    getMachine: async () => {
      const errors = validateConfig(config);
      if (errors.length > 0) {
        throw new EnvironmentError(errors.join('\n'));
      }
      return createMachine(config);
    },
  });
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      defaultLogger.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  );
}
