import * as fs from 'fs';

export function statOrNull(p: string): fs.Stats | null {
  try {
    return fs.statSync(p);
  } catch {
    return null;
  }
}

export function lstatOrNull(p: string): fs.Stats | null {
  try {
    return fs.lstatSync(p);
  } catch {
    return null;
  }
}

export function isDirectory(p: string): boolean {
  const stat = statOrNull(p);
  return stat !== null && stat.isDirectory();
}

export function isExecutable(p: string): boolean {
  try {
    fs.accessSync(p, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function isExecutableFile(p: string): boolean {
  const stat = statOrNull(p);
  return stat !== null && stat.isFile() && isExecutable(p);
}

/**
 * Read a whole file, or null when it is missing or unreadable
 */
export function readFileOrNull(p: string): Buffer | null {
  try {
    return fs.readFileSync(p);
  } catch {
    return null;
  }
}

export function isReadableFile(p: string): boolean {
  const stat = statOrNull(p);
  if (stat === null || !stat.isFile()) return false;
  try {
    fs.accessSync(p, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}
