/**
 * Names that make up the on-disk profile contract.
 *
 * EXTERNAL CONTRACT: profile trees are written by hand and by hook scripts.
 * Renaming any of these breaks existing profiles.
 */

/** Symlink in the profile root pointing at the active state */
export const CURRENT_POINTER = 'this';

/** State activated when no pointer exists yet */
export const INIT_STATE = 'init';

/** Presence-only marker that mirrors buttons and the status LED */
export const LEFTHANDED_MARKER = '_lefthanded';

/** Icon shown on buttons whose state has no image */
export const BLANK_ICON = 'blank.raw';

/** Per-state hook run right after the state becomes current */
export const INIT_HOOK = '_init';

/** Per-state file holding the status LED number */
export const STATUS_FILE = '_status';

/** Hotkey entries are named `<button>-<label>` */
export const BINDING_PATTERN = /^(\d+)-/;

/** Icon files are named `<button>.png` / `<button>.raw` */
export const ICON_PATTERN = /^([1-8])\.(png|raw)$/;

export function bindingPrefix(button: number): string {
  return `${button}-`;
}

export function rawIconName(button: number): string {
  return `${button}.raw`;
}

// Device attribute names (sysfs)
export const DEVICE_LED_DIR = 'led';
export const DEVICE_INPUT_PREFIX = 'input';
export const STATUS_LED_ATTRIBUTE = 'status_led_select';

export function buttonImageAttribute(slot: number): string {
  return `button${slot}_rawimg`;
}
