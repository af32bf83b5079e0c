import * as path from 'path';
import {
  DeviceHandle,
  MAX_ICON_BUTTON,
  MIN_ICON_BUTTON,
  ProcessRunner,
  ProfileState,
  SLOT_COUNT,
  STATUS_LED_OFF,
} from '../types';
import { INIT_HOOK, rawIconName } from '../config/profile-paths';
import { IconConverter } from '../device/icon-converter';
import { StateStore } from './state-store';
import { loadProfileState } from './profile';
import { isDirectory, isExecutableFile, isReadableFile, readFileOrNull } from './fs-utils';
import { Logger, defaultLogger } from './logger';

export interface ActivatorOptions {
  store: StateStore;
  devices: ReadonlyArray<DeviceHandle>;
  runner: ProcessRunner;
  converter: IconConverter;
  /** Path hooks receive as their first argument so they can call us back */
  selfCommand: string;
  logger?: Logger;
}

/**
 * Status LED value for a state. Lefthanded tablets count the ring LEDs
 * from the other end; "off" is never remapped.
 */
export function statusLedValue(status: number | null, lefthanded: boolean): number {
  if (status === null) return STATUS_LED_OFF;
  return lefthanded ? 3 - status : status;
}

/**
 * Driver slot (0-7) showing the icon of button 1-8
 */
export function physicalSlot(button: number, lefthanded: boolean): number {
  const slot = button - 1;
  return lefthanded ? SLOT_COUNT - 1 - slot : slot;
}

/**
 * Makes a state current and brings the tablets in line with it.
 *
 * The only writer of the `this` pointer. Activating the state that is
 * already current runs every step again, so newly added images show up.
 */
export class StateActivator {
  private readonly store: StateStore;
  private readonly devices: ReadonlyArray<DeviceHandle>;
  private readonly runner: ProcessRunner;
  private readonly converter: IconConverter;
  private readonly selfCommand: string;
  private readonly logger: Logger;

  constructor(options: ActivatorOptions) {
    this.store = options.store;
    this.devices = options.devices;
    this.runner = options.runner;
    this.converter = options.converter;
    this.selfCommand = options.selfCommand;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Switch to `target`. Anything that is not a directory is ignored, which is
   * what lets plain files act as "stay here" bindings.
   *
   * @returns the canonical path of the new state, or null if nothing happened
   */
  async activate(target: string): Promise<string | null> {
    if (!isDirectory(target)) {
      this.logger.info(`not a state, staying put: ${target}`);
      return null;
    }

    // Repoint before the hook runs: the hook may query or change state itself
    const activated = this.store.setCurrent(target);
    this.logger.info(`changing to state ${activated}`);

    await this.runInitHook(activated);

    if (this.devices.length === 0) {
      return activated;
    }

    // A hook may have moved us on; the tablets show wherever we ended up
    const state = loadProfileState(this.store.currentState() ?? activated, this.logger);
    const lefthanded = this.store.isLefthanded();

    await this.convertIcons(state, lefthanded);
    this.syncDevices(state, lefthanded);

    return activated;
  }

  private async runInitHook(statePath: string): Promise<void> {
    const initHook = path.join(statePath, INIT_HOOK);
    if (!isExecutableFile(initHook)) return;

    this.logger.info('calling initialization script');
    try {
      const result = await this.runner.run(initHook, [this.selfCommand]);
      if (result.exitCode !== 0) {
        this.logger.warn(`${initHook} exited with code ${result.exitCode}`);
      }
    } catch (error) {
      this.logger.warn(`Failed to run ${initHook}: ${error}`);
    }
  }

  /**
   * Convert every `N.png` that has no `N.raw` yet, then make sure the blank
   * icon exists. Failures only mean the blank icon is shown instead.
   */
  private async convertIcons(state: ProfileState, lefthanded: boolean): Promise<void> {
    if (!this.converter.isAvailable()) {
      this.logger.warn('icon converter not found, unable to convert images');
      return;
    }

    for (let button = MIN_ICON_BUTTON; button <= MAX_ICON_BUTTON; button++) {
      const png = state.icons.get(button)?.png;
      if (png === undefined) continue;
      if (isReadableFile(path.join(state.path, rawIconName(button)))) continue;

      this.logger.info(`converting ${button}.png to raw grayscale`);
      await this.converter.convert(png, lefthanded);
    }

    if (!isReadableFile(this.store.blankIconPath)) {
      await this.converter.generateBlank(this.store.blankIconPath);
    }
  }

  /**
   * Raw images are read after conversion, so freshly converted icons show.
   * A write a tablet refuses is warned about and the rest still go out.
   */
  private syncDevices(state: ProfileState, lefthanded: boolean): void {
    const led = statusLedValue(state.status, lefthanded);
    const blank = readFileOrNull(this.store.blankIconPath);

    const images = new Map<number, Buffer>();
    for (let button = MIN_ICON_BUTTON; button <= MAX_ICON_BUTTON; button++) {
      const image = readFileOrNull(path.join(state.path, rawIconName(button)));
      if (image !== null) {
        images.set(button, image);
      }
    }

    for (const device of this.devices) {
      this.logger.info(`setting status led to ${led}`);
      this.write(device, 'status led', () => device.setStatusLed(led));

      for (let button = MIN_ICON_BUTTON; button <= MAX_ICON_BUTTON; button++) {
        const image = images.get(button) ?? blank;
        if (image === null) continue;

        if (images.has(button)) {
          this.logger.info(`displaying icon ${button}`);
        }
        const slot = physicalSlot(button, lefthanded);
        this.write(device, `button ${slot} image`, () => device.setButtonImage(slot, image));
      }
    }
  }

  private write(device: DeviceHandle, what: string, action: () => void): void {
    try {
      action();
    } catch (error) {
      this.logger.warn(`Failed to write ${what} on ${device.id}: ${error}`);
    }
  }
}
