import * as fs from 'fs';
import * as path from 'path';
import {
  BLANK_ICON,
  CURRENT_POINTER,
  INIT_STATE,
  LEFTHANDED_MARKER,
} from '../config/profile-paths';
import { IntegrityError } from './errors';
import { lstatOrNull, statOrNull } from './fs-utils';

/**
 * Owns the profile root: the state directories and the `this` pointer.
 *
 * The pointer is always either absent or a symlink to a directory. A dangling
 * symlink counts as absent, so the next start bootstraps from `init` again.
 * There is no locking; concurrent invocations race and the last writer wins.
 */
export class StateStore {
  readonly profileRoot: string;

  constructor(profileRoot: string) {
    this.profileRoot = path.resolve(profileRoot);
  }

  get pointerPath(): string {
    return path.join(this.profileRoot, CURRENT_POINTER);
  }

  get initStatePath(): string {
    return path.join(this.profileRoot, INIT_STATE);
  }

  get blankIconPath(): string {
    return path.join(this.profileRoot, BLANK_ICON);
  }

  /**
   * Canonical path of the active state, or null when there is none
   */
  currentState(): string | null {
    this.checkPointer();
    if (!fs.existsSync(this.pointerPath)) return null;
    return fs.realpathSync(this.pointerPath);
  }

  /**
   * Like currentState(), but a missing pointer is an integrity failure
   */
  requireCurrentState(): string {
    const current = this.currentState();
    if (current === null) {
      throw new IntegrityError('Invalid state');
    }
    return current;
  }

  /**
   * Repoint `this` at the given state directory (remove, then create).
   * Returns the canonical path the pointer now targets.
   */
  setCurrent(target: string): string {
    this.checkPointer();

    const canonical = fs.realpathSync(target);
    if (!fs.statSync(canonical).isDirectory()) {
      throw new IntegrityError(`Refusing to point state at non-directory: ${canonical}`);
    }

    if (lstatOrNull(this.pointerPath)) {
      fs.unlinkSync(this.pointerPath);
    }
    fs.symlinkSync(canonical, this.pointerPath);
    return canonical;
  }

  /**
   * Resolve a state spec. A leading `/` is relative to the profile root,
   * anything else relative to `base`. Existing paths come back with every
   * symlink resolved so rings collapse to the same node.
   */
  resolvePath(base: string, spec: string): string {
    const joined = spec.startsWith('/')
      ? path.join(this.profileRoot, spec.replace(/^\/+/, ''))
      : path.resolve(base, spec);

    try {
      return fs.realpathSync(joined);
    } catch {
      // Unknown target; activation will ignore it
      return path.normalize(joined);
    }
  }

  isLefthanded(): boolean {
    return fs.existsSync(path.join(this.profileRoot, LEFTHANDED_MARKER));
  }

  /**
   * Abort unless the pointer is absent, dangling, or a symlink to a directory
   */
  checkPointer(): void {
    const link = lstatOrNull(this.pointerPath);
    if (!link) return;

    if (!link.isSymbolicLink()) {
      throw new IntegrityError(`Abort: Non-symlink state found at ${this.pointerPath}`);
    }

    const target = statOrNull(this.pointerPath);
    if (target && !target.isDirectory()) {
      throw new IntegrityError(`Abort: State pointer ${this.pointerPath} does not lead to a directory`);
    }
  }
}
