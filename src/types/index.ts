/**
 * Button numbering
 *
 * Button 0 sits inside the touch ring, buttons 1-8 run down the side of the
 * tablet. Only buttons 1-8 have a display; the driver numbers those slots 0-7.
 */
export const MIN_BUTTON = 0;
export const MAX_BUTTON = 8;
export const MIN_ICON_BUTTON = 1;
export const MAX_ICON_BUTTON = 8;
export const SLOT_COUNT = 8;

/**
 * Value written to the status LED attribute when a state declares no `_status`.
 */
export const STATUS_LED_OFF = -1;

/**
 * Kinds of hotkey binding a state directory can declare
 */
export enum BindingKind {
  Action = 'action', // executable file, run as a subprocess
  Keystrokes = 'keystrokes', // `N-label:keysym keysym ...`, sent to the focused window
  SubState = 'substate', // directory or symlink to one, the next state
  Marker = 'marker', // plain file, pressing it does nothing
}

interface BindingBase {
  /** Button number parsed from the `N-` prefix */
  button: number;
  /** Entry name inside the state directory */
  name: string;
  /** Absolute path of the entry (not canonicalised) */
  path: string;
}

export interface ActionBinding extends BindingBase {
  kind: BindingKind.Action;
}

export interface KeystrokeBinding extends BindingBase {
  kind: BindingKind.Keystrokes;
  keys: string[];
}

export interface SubStateBinding extends BindingBase {
  kind: BindingKind.SubState;
  /** Key symbols to send before switching; empty unless the name has a colon */
  keys: string[];
}

export interface MarkerBinding extends BindingBase {
  kind: BindingKind.Marker;
}

export type Binding = ActionBinding | KeystrokeBinding | SubStateBinding | MarkerBinding;

/**
 * Icon sources found in a state directory for one button
 */
export interface IconAssets {
  png?: string;
  raw?: string;
}

/**
 * In-memory view of one state directory.
 * Identity is the canonical path; nothing links states together in memory.
 */
export interface ProfileState {
  path: string;
  bindings: Map<number, Binding[]>;
  icons: Map<number, IconAssets>;
  initHook: string | null;
  status: number | null;
}

/**
 * One tablet exposing LED/OLED attributes
 */
export interface DeviceHandle {
  readonly id: string;
  setStatusLed(value: number): void;
  setButtonImage(slot: number, image: Buffer): void;
}

/**
 * Result of a spawned process
 */
export interface ProcessResult {
  exitCode: number;
}

export interface RunOptions {
  /** Discard the child's stderr */
  quiet?: boolean;
}

/**
 * Spawns external programs and waits for them to exit
 */
export interface ProcessRunner {
  run(command: string, args: ReadonlyArray<string>, options?: RunOptions): Promise<ProcessResult>;
}

/**
 * padstate configuration
 */
export interface PadstateConfig {
  /** Directory holding every state plus `this`, `init`, `_lefthanded`, `blank.raw` */
  profileRoot: string;
  /** Directory scanned for `inputN/led` device attribute folders */
  deviceRoot: string;
  /** PNG to raw icon converter */
  converterCommand: string;
  /** Keystroke injector (xdotool compatible) */
  injectorCommand: string;
  verbose: boolean;
}

/**
 * Outcome of a button press
 */
export type PressOutcome =
  | { handled: true; binding: Binding }
  | { handled: false; matches: number };

/**
 * Summary printed by the `status` command
 */
export interface MachineStatus {
  current: string;
  lefthanded: boolean;
  devices: string[];
  bindings: number;
}
