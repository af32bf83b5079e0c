import * as fs from 'fs';
import * as path from 'path';
import { DeviceHandle, SLOT_COUNT } from '../types';
import {
  DEVICE_INPUT_PREFIX,
  DEVICE_LED_DIR,
  STATUS_LED_ATTRIBUTE,
  buttonImageAttribute,
} from '../config/profile-paths';
import { isDirectory } from '../core/fs-utils';

/**
 * LED/OLED attributes of one tablet, exposed by the driver as files
 * under `<deviceRoot>/inputN/led/`. Writes are plain blocking writes
 * without retry; an I/O error propagates to the caller.
 */
export class SysfsDevice implements DeviceHandle {
  constructor(readonly id: string) {}

  setStatusLed(value: number): void {
    fs.writeFileSync(path.join(this.id, STATUS_LED_ATTRIBUTE), `${value}\n`);
  }

  setButtonImage(slot: number, image: Buffer): void {
    if (!Number.isInteger(slot) || slot < 0 || slot >= SLOT_COUNT) {
      throw new RangeError(`Button slot ${slot} out of range 0-${SLOT_COUNT - 1}`);
    }
    fs.writeFileSync(path.join(this.id, buttonImageAttribute(slot)), image);
  }
}

/**
 * Find every `inputN/led` directory below the device root.
 * A missing root simply means no tablets.
 */
export function discoverDevices(deviceRoot: string): SysfsDevice[] {
  let entries: string[];
  try {
    entries = fs.readdirSync(deviceRoot);
  } catch {
    return [];
  }

  return entries
    .filter((name) => name.startsWith(DEVICE_INPUT_PREFIX))
    .sort()
    .map((name) => path.join(deviceRoot, name, DEVICE_LED_DIR))
    .filter((ledDir) => isDirectory(ledDir))
    .map((ledDir) => new SysfsDevice(ledDir));
}
