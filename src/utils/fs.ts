import { readFile, readdir, rm, rmdir, stat, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import YAML from 'yaml';

export async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function readText(path: string): Promise<string> {
  return await readFile(path, 'utf8');
}

export async function readYaml(path: string): Promise<unknown> {
  const raw = await readText(path);
  return YAML.parse(raw);
}

/**
 * Recursive delete that succeeds when the target is already gone.
 */
export async function removeTree(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Remove a single file. Returns false when there was nothing to remove;
 * any other failure propagates.
 */
export async function removeFileIfExists(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return false;
    throw err;
  }
}

/**
 * Remove a directory only if it is empty. A missing directory counts as removed.
 */
export async function removeDirIfEmpty(path: string): Promise<void> {
  try {
    await rmdir(path);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return;
    throw err;
  }
}

/**
 * List regular files under `root`, as `/`-separated paths relative to it.
 * Symlinks and other special entries are skipped.
 */
export async function listFilesRec(root: string, ignoreDirs: string[] = []): Promise<string[]> {
  const out: string[] = [];
  async function walk(rel: string) {
    const abs = join(root, rel);
    const entries = await readdir(abs, { withFileTypes: true });
    for (const e of entries) {
      if (e.isDirectory()) {
        if (ignoreDirs.includes(e.name)) continue;
        await walk(join(rel, e.name));
      } else if (e.isFile()) {
        out.push(join(rel, e.name).replaceAll('\\', '/'));
      }
    }
  }
  await walk('');
  return out.filter((p) => p.length > 0).sort();
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    return typeof err.code === 'string' ? err.code : undefined;
  }
  return undefined;
}
