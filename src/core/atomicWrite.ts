import { closeSync, existsSync, mkdirSync, openSync, renameSync, unlinkSync, writeSync } from 'fs';
import { dirname } from 'path';

/**
 * Write `parts` to `path` through a temporary sibling file, renamed into
 * place once every byte is on disk. On failure the temporary file is removed
 * and the error rethrown; `path` is never left half-written.
 */
export function writeFileAtomic(path: string, parts: readonly Uint8Array[]): void {
  mkdirSync(dirname(path), { recursive: true });
  const tmp = `${path}.tmp-${process.pid}`;
  try {
    const fd = openSync(tmp, 'w');
    try {
      for (const part of parts) {
        let written = 0;
        while (written < part.length) {
          written += writeSync(fd, part, written, part.length - written);
        }
      }
    } finally {
      closeSync(fd);
    }
    renameSync(tmp, path);
  } catch (err) {
    if (existsSync(tmp)) unlinkSync(tmp);
    throw err;
  }
}
