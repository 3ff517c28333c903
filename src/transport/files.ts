/**
 * Download directory helpers
 */

import { access } from 'fs/promises';
import { basename, join } from 'path';

/**
 * Reduce a name offered by a remote peer to a plain file name
 */
export function sanitizeFileName(name: string): string {
  const base = basename(name.replace(/\\/g, '/'))
    .replace(/[\x00-\x1f]/g, '')
    .trim();
  if (base === '' || base === '.' || base === '..') return 'file';
  return base;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * First free path for `name` in `dir`: photo.png, photo (1).png, photo (2).png, ...
 */
export async function uniqueFilePath(dir: string, name: string): Promise<string> {
  if (!(await exists(join(dir, name)))) return join(dir, name);

  const dotIdx = name.lastIndexOf('.');
  const base = dotIdx > 0 ? name.slice(0, dotIdx) : name;
  const ext = dotIdx > 0 ? name.slice(dotIdx) : '';

  let counter = 1;
  let candidate = join(dir, `${base} (${counter})${ext}`);
  while (await exists(candidate)) {
    counter++;
    candidate = join(dir, `${base} (${counter})${ext}`);
  }
  return candidate;
}
