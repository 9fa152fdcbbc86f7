import { chmod, readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { listFilesRec } from '../utils/fs.js';
import { getLogger } from '../utils/logger.js';

/**
 * Literal, all-occurrence replacement. No regex: module paths are full of dots.
 */
export function replaceModulePath(content: string, from: string, to: string): string {
  if (from === '') return content;
  return content.split(from).join(to);
}

/**
 * Rewrite every file under `root` whose name ends in `extension`, replacing each
 * occurrence of `from` with `to`. The match is textual, so comments and string
 * literals that mention the old path change too.
 *
 * Files are read and written as latin1 so bytes outside UTF-8 survive untouched;
 * the paths are converted the same way. Files are only written when their
 * content changed; the mode is kept. Returns the rewritten paths, relative to `root`.
 */
export async function rewriteModulePaths(root: string, from: string, to: string, extension: string): Promise<string[]> {
  const log = getLogger();
  const files = (await listFilesRec(root)).filter((p) => p.endsWith(extension));
  const rewritten: string[] = [];
  const fromBytes = asLatin1(from);
  const toBytes = asLatin1(to);

  for (const rel of files) {
    const abs = join(root, rel);
    const content = await readFile(abs, 'latin1');
    const next = replaceModulePath(content, fromBytes, toBytes);
    if (next === content) continue;

    const { mode } = await stat(abs);
    await writeFile(abs, next, 'latin1');
    await chmod(abs, mode & 0o7777);
    rewritten.push(rel);
    log.debug('rewrote module path', { file: rel });
  }

  return rewritten;
}

function asLatin1(text: string): string {
  return Buffer.from(text, 'utf8').toString('latin1');
}
