import * as fs from 'fs';
import * as path from 'path';
import {
  Binding,
  BindingKind,
  IconAssets,
  ProfileState,
} from '../types';
import {
  BINDING_PATTERN,
  ICON_PATTERN,
  INIT_HOOK,
  STATUS_FILE,
  bindingPrefix,
} from '../config/profile-paths';
import { Logger, defaultLogger } from './logger';
import { isExecutable, isExecutableFile, statOrNull } from './fs-utils';

/**
 * Read a state directory into a ProfileState.
 *
 * The directory is read fresh on every call. States are only ever referred to
 * by canonical path, so walking a ring of symlinked states never grows anything.
 */
export function loadProfileState(dir: string, logger: Logger = defaultLogger): ProfileState {
  const statePath = fs.realpathSync(dir);
  const bindings = new Map<number, Binding[]>();
  const icons = new Map<number, IconAssets>();

  for (const name of fs.readdirSync(statePath).sort()) {
    const entryPath = path.join(statePath, name);

    const bindingMatch = BINDING_PATTERN.exec(name);
    if (bindingMatch) {
      const button = Number(bindingMatch[1]);
      const binding = classifyBinding(entryPath, name, button);
      const list = bindings.get(button) ?? [];
      list.push(binding);
      bindings.set(button, list);
      continue;
    }

    const iconMatch = ICON_PATTERN.exec(name);
    if (iconMatch) {
      const button = Number(iconMatch[1]);
      const assets = icons.get(button) ?? {};
      if (iconMatch[2] === 'png') {
        assets.png = entryPath;
      } else {
        assets.raw = entryPath;
      }
      icons.set(button, assets);
    }
  }

  const hookPath = path.join(statePath, INIT_HOOK);
  const initHook = isExecutableFile(hookPath) ? hookPath : null;

  return {
    path: statePath,
    bindings,
    icons,
    initHook,
    status: readStatus(path.join(statePath, STATUS_FILE), logger),
  };
}

/**
 * Decide what a hotkey entry does.
 *
 * Priority: an executable file is an action and nothing else. A directory is
 * the next state; if its name also has a colon the keys are sent first. A
 * colon in any other entry means keystrokes. Everything else is a marker.
 */
export function classifyBinding(entryPath: string, name: string, button: number): Binding {
  const stat = statOrNull(entryPath);
  const isDirectory = stat !== null && stat.isDirectory();

  if (stat !== null && !isDirectory && isExecutable(entryPath)) {
    return { kind: BindingKind.Action, button, name, path: entryPath };
  }

  const colon = name.indexOf(':');
  const keys = colon >= 0 ? parseKeys(name.slice(colon + 1)) : [];

  if (isDirectory) {
    return { kind: BindingKind.SubState, button, name, path: entryPath, keys };
  }

  if (colon >= 0) {
    return { kind: BindingKind.Keystrokes, button, name, path: entryPath, keys };
  }

  return { kind: BindingKind.Marker, button, name, path: entryPath };
}

/**
 * Key symbols are separated by whitespace
 */
export function parseKeys(spec: string): string[] {
  return spec.split(/\s+/).filter((k) => k.length > 0);
}

/**
 * Entries bound to `button`, matched on the `<button>-` name prefix
 */
export function bindingsFor(state: ProfileState, button: number): Binding[] {
  const prefix = bindingPrefix(button);
  return (state.bindings.get(button) ?? []).filter((b) => b.name.startsWith(prefix));
}

/**
 * Total number of hotkey entries in a state
 */
export function countBindings(state: ProfileState): number {
  let total = 0;
  for (const list of state.bindings.values()) {
    total += list.length;
  }
  return total;
}

/**
 * `_status` holds a single number from 1 to 3
 */
export function parseStatus(content: string): number | null {
  const trimmed = content.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const value = Number(trimmed);
  return value >= 1 && value <= 3 ? value : null;
}

function readStatus(statusPath: string, logger: Logger): number | null {
  let content: string;
  try {
    content = fs.readFileSync(statusPath, 'utf-8');
  } catch {
    return null;
  }

  const value = parseStatus(content);
  if (value === null) {
    logger.warn(`Ignoring ${statusPath}: expected a number between 1 and 3`);
  }
  return value;
}
