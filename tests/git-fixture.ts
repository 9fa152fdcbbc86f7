import { execa } from 'execa';
import { chmod, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export async function createTempDir(prefix = 'seedling-'): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Empty repository with a pre-commit hook that never finishes on its own.
 * With `ignoreTerm` the hook (and its sleep) ignore SIGTERM.
 */
export async function createRepoWithHangingHook(dir: string, opts: { ignoreTerm?: boolean } = {}): Promise<void> {
  await execa('git', ['init'], { cwd: dir });
  const hook = join(dir, '.git', 'hooks', 'pre-commit');
  const trap = opts.ignoreTerm ? "trap '' TERM\n" : '';
  await writeFile(hook, `#!/bin/sh\n${trap}sleep 30\n`, 'utf8');
  await chmod(hook, 0o755);
}

export async function gitOutput(dir: string, args: string[]): Promise<string> {
  const res = await execa('git', args, { cwd: dir });
  return res.stdout.trim();
}

/** Small shell script standing in for an external tool. */
export async function writeFakeTool(dir: string, name: string, body: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, `#!/bin/sh\n${body}\n`, 'utf8');
  await chmod(path, 0o755);
  return path;
}
