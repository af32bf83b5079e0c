import { Binding, BindingKind, PressOutcome, ProcessRunner } from '../types';
import { KeystrokeInjector } from '../device/keystroke-injector';
import { StateStore } from './state-store';
import { StateActivator } from './activator';
import { bindingsFor, loadProfileState } from './profile';
import { Logger, defaultLogger } from './logger';

export interface RouterOptions {
  store: StateStore;
  activator: StateActivator;
  runner: ProcessRunner;
  injector: KeystrokeInjector;
  selfCommand: string;
  logger?: Logger;
}

/**
 * Turns a button press into whatever the current state binds to it.
 *
 * Exactly one `N-*` entry must match. None or several is reported and
 * nothing runs.
 */
export class HotkeyRouter {
  private readonly store: StateStore;
  private readonly activator: StateActivator;
  private readonly runner: ProcessRunner;
  private readonly injector: KeystrokeInjector;
  private readonly selfCommand: string;
  private readonly logger: Logger;

  constructor(options: RouterOptions) {
    this.store = options.store;
    this.activator = options.activator;
    this.runner = options.runner;
    this.injector = options.injector;
    this.selfCommand = options.selfCommand;
    this.logger = options.logger ?? defaultLogger;
  }

  async press(button: number): Promise<PressOutcome> {
    const state = loadProfileState(this.store.requireCurrentState(), this.logger);
    const matches = bindingsFor(state, button);

    if (matches.length !== 1) {
      this.logger.warn(`${matches.length} matches found for ${button} in state: ${state.path}`);
      return { handled: false, matches: matches.length };
    }

    const binding = matches[0];
    await this.dispatch(binding);
    return { handled: true, binding };
  }

  private async dispatch(binding: Binding): Promise<void> {
    switch (binding.kind) {
      case BindingKind.Action:
        await this.runAction(binding.path);
        break;
      case BindingKind.Keystrokes:
        await this.injector.send(binding.keys);
        break;
      case BindingKind.SubState:
        await this.injector.send(binding.keys);
        await this.activator.activate(binding.path);
        break;
      case BindingKind.Marker:
        this.logger.info(`${binding.name} is a plain file, nothing to do`);
        break;
    }
  }

  private async runAction(actionPath: string): Promise<void> {
    this.logger.info(`running: ${actionPath} ${this.selfCommand}`);
    try {
      const result = await this.runner.run(actionPath, [this.selfCommand]);
      if (result.exitCode !== 0) {
        this.logger.warn(`${actionPath} exited with code ${result.exitCode}`);
      }
    } catch (error) {
      this.logger.warn(`Failed to run ${actionPath}: ${error}`);
    }
  }
}
