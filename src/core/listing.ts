import * as fs from 'fs';

const PERMISSION_CHARS = ['r', 'w', 'x'];

/**
 * `ls -l` style mode string, e.g. `-rwxr-xr-x` or `lrwxrwxrwx`
 */
export function formatMode(stats: fs.Stats): string {
  let type = '-';
  if (stats.isSymbolicLink()) type = 'l';
  else if (stats.isDirectory()) type = 'd';

  let perms = '';
  for (let bit = 8; bit >= 0; bit--) {
    perms += stats.mode & (1 << bit) ? PERMISSION_CHARS[(8 - bit) % 3] : '-';
  }
  return type + perms;
}

/**
 * One line per entry: mode, size (right-aligned), path and symlink target
 */
export function formatListing(paths: ReadonlyArray<string>): string[] {
  const rows = paths.map((p) => {
    const stats = fs.lstatSync(p);
    const target = stats.isSymbolicLink() ? ` -> ${fs.readlinkSync(p)}` : '';
    return { mode: formatMode(stats), size: String(stats.size), name: p + target };
  });

  const width = Math.max(0, ...rows.map((r) => r.size.length));
  return rows.map((r) => `${r.mode} ${r.size.padStart(width)} ${r.name}`);
}
