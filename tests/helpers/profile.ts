// Temporary profile trees on the real filesystem

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export const PASS_SCRIPT = '#!/bin/sh\nexit 0\n';

export class ProfileFixture {
  readonly root: string;
  private readonly extraDirs: string[] = [];

  constructor() {
    // realpath so expectations match canonicalised paths (tmpdir may be a symlink)
    this.root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'padstate-profile-')));
  }

  path(...parts: string[]): string {
    return path.join(this.root, ...parts);
  }

  state(rel: string): string {
    const p = this.path(rel);
    fs.mkdirSync(p, { recursive: true });
    return p;
  }

  file(rel: string, content: string = ''): string {
    const p = this.path(rel);
    fs.mkdirSync(path.dirname(p), { recursive: true });
    fs.writeFileSync(p, content);
    return p;
  }

  executable(rel: string, script: string = PASS_SCRIPT): string {
    const p = this.file(rel, script);
    fs.chmodSync(p, 0o755);
    return p;
  }

  link(rel: string, target: string): string {
    const p = this.path(rel);
    fs.mkdirSync(path.dirname(p), { recursive: true });
    fs.symlinkSync(target, p);
    return p;
  }

  /** Where `this` points, or null when it does not exist */
  pointer(): string | null {
    try {
      return fs.readlinkSync(this.path('this'));
    } catch {
      return null;
    }
  }

  /** A directory holding fake executables, for use as PATH */
  tools(...names: string[]): string {
    const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'padstate-bin-')));
    this.extraDirs.push(dir);
    for (const name of names) {
      const p = path.join(dir, name);
      fs.writeFileSync(p, PASS_SCRIPT);
      fs.chmodSync(p, 0o755);
    }
    return dir;
  }

  cleanup(): void {
    for (const dir of [this.root, ...this.extraDirs]) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  }
}
