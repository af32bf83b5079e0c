import {
  DeviceHandle,
  MachineStatus,
  PadstateConfig,
  PressOutcome,
  ProcessRunner,
} from '../types';
import { IconConverter } from '../device/icon-converter';
import { KeystrokeInjector } from '../device/keystroke-injector';
import { NodeProcessRunner, findExecutable } from '../device/process-runner';
import { discoverDevices } from '../device/sysfs-device';
import { BootstrapError, EnvironmentError } from './errors';
import { isDirectory } from './fs-utils';
import { formatListing } from './listing';
import { Logger, defaultLogger } from './logger';
import { countBindings, loadProfileState } from './profile';
import { HotkeyRouter } from './router';
import { StateActivator } from './activator';
import { StateStore } from './state-store';

/** `list` shows entries named `<digit>-<label>` */
const LISTED_BINDING = /^\d-/;

export interface MachineOptions {
  runner?: ProcessRunner;
  /** Skip discovery and drive these devices instead */
  devices?: ReadonlyArray<DeviceHandle>;
  /** Path handed to hooks and actions; defaults to the running script */
  selfCommand?: string;
  /** PATH used to look up external tools */
  searchPath?: string;
  logger?: Logger;
}

/**
 * The assembled state machine for one invocation.
 * Every invocation starts from what is on disk; nothing is kept in memory
 * between commands.
 */
export class Machine {
  constructor(
    readonly store: StateStore,
    readonly activator: StateActivator,
    readonly router: HotkeyRouter,
    readonly devices: ReadonlyArray<DeviceHandle>,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * Start in `init` when there is no current state yet
   */
  async bootstrap(): Promise<void> {
    if (this.store.currentState() === null) {
      if (!isDirectory(this.store.initStatePath)) {
        throw new BootstrapError("No state set and no 'init' profile found.");
      }
      this.logger.info('No state set up.');
      await this.activator.activate(this.store.initStatePath);
    }

    this.store.requireCurrentState();
  }

  /**
   * Go to a state by path: `/a/b` from the profile root, `a/b` or `..`
   * from the current state
   */
  async go(spec: string): Promise<string | null> {
    const current = this.store.requireCurrentState();
    return this.activator.activate(this.store.resolvePath(current, spec));
  }

  press(button: number): Promise<PressOutcome> {
    return this.router.press(button);
  }

  /**
   * Hotkey entries of the current state, one formatted line each
   */
  list(): string[] {
    const state = loadProfileState(this.store.requireCurrentState(), this.logger);
    const paths: string[] = [];
    for (const bindings of state.bindings.values()) {
      for (const binding of bindings) {
        if (LISTED_BINDING.test(binding.name)) {
          paths.push(binding.path);
        }
      }
    }
    return formatListing(paths.sort());
  }

  status(): MachineStatus {
    const state = loadProfileState(this.store.requireCurrentState(), this.logger);
    return {
      current: state.path,
      lefthanded: this.store.isLefthanded(),
      devices: this.devices.map((d) => d.id),
      bindings: countBindings(state),
    };
  }
}

/**
 * Check prerequisites, wire the components and bootstrap the current state
 */
export async function createMachine(
  config: PadstateConfig,
  options: MachineOptions = {}
): Promise<Machine> {
  const logger = options.logger ?? defaultLogger;
  const runner = options.runner ?? new NodeProcessRunner();
  const searchPath = 'searchPath' in options ? options.searchPath : process.env.PATH;

  if (findExecutable(config.injectorCommand, searchPath) === null) {
    throw new EnvironmentError(`${config.injectorCommand} not found`);
  }

  if (!isDirectory(config.profileRoot)) {
    throw new EnvironmentError(`Profile directory does not exist: ${config.profileRoot}`);
  }

  const devices = options.devices ?? discoverDevices(config.deviceRoot);
  logger.info(`${devices.length} tablet(s) with led support found`);

  const selfCommand = options.selfCommand ?? process.argv[1] ?? 'padstate';
  const store = new StateStore(config.profileRoot);
  const converter = new IconConverter(config.converterCommand, runner, logger, searchPath);
  const injector = new KeystrokeInjector(config.injectorCommand, runner, logger);

  const activator = new StateActivator({
    store,
    devices,
    runner,
    converter,
    selfCommand,
    logger,
  });

  const router = new HotkeyRouter({
    store,
    activator,
    runner,
    injector,
    selfCommand,
    logger,
  });

  const machine = new Machine(store, activator, router, devices, logger);
  await machine.bootstrap();
  return machine;
}
