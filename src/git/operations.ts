import { execa, ExecaError } from 'execa';

import { getLogger } from '../utils/logger.js';
import { runWithDeadline } from '../utils/process.js';

export interface GitRepo {
  repoRoot: string;
  /** Executable to invoke; `git` unless a test swaps it. */
  bin: string;
}

export function git(repoRoot: string, opts?: { bin?: string }): GitRepo {
  return { repoRoot, bin: opts?.bin ?? 'git' };
}

export class GitCommandError extends Error {
  constructor(
    message: string,
    readonly args: string[],
    readonly output: string
  ) {
    super(message);
    this.name = 'GitCommandError';
  }
}

export class CommitTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`git commit timed out after ${formatSeconds(timeoutMs)}`);
    this.name = 'CommitTimeoutError';
  }
}

async function run(repo: GitRepo, args: string[]): Promise<string> {
  getLogger().debug('git', { cwd: repo.repoRoot, args });
  try {
    const res = await execa(repo.bin, args, {
      cwd: repo.repoRoot,
      stdin: 'ignore',
      stdout: 'pipe',
      stderr: 'pipe'
    });
    return res.stdout;
  } catch (err) {
    if (err instanceof ExecaError) {
      const output = [err.stdout, err.stderr].map((s) => String(s ?? '').trim()).filter(Boolean).join('\n');
      throw new GitCommandError(err.shortMessage, args, output);
    }
    throw err;
  }
}

export async function initRepository(repo: GitRepo): Promise<void> {
  await run(repo, ['init']);
}

export async function setLocalConfig(repo: GitRepo, key: string, value: string): Promise<void> {
  await run(repo, ['config', key, value]);
}

export async function addRemote(repo: GitRepo, name: string, url: string): Promise<void> {
  await run(repo, ['remote', 'add', name, url]);
}

export async function listRemotes(repo: GitRepo): Promise<string[]> {
  const out = await run(repo, ['remote']);
  return out
    .split('\n')
    .map((s) => s.trim())
    .filter(Boolean);
}

export async function stageAll(repo: GitRepo): Promise<void> {
  await run(repo, ['add', '.']);
}

export async function getCurrentCommit(repo: GitRepo): Promise<string> {
  return (await run(repo, ['rev-parse', 'HEAD'])).trim();
}

export async function lsFiles(repo: GitRepo): Promise<string[]> {
  const out = await run(repo, ['ls-files']);
  return out
    .split('\n')
    .map((s) => s.trim())
    .filter(Boolean);
}

// A hook that ignores SIGTERM must not stretch the deadline by much.
const COMMIT_TERM_GRACE_MS = 250;

/**
 * `git commit -m <message>` bounded by `timeoutMs`.
 * Commit hooks may hang; on deadline the commit and everything it spawned is killed.
 */
export async function commitWithDeadline(repo: GitRepo, message: string, timeoutMs: number): Promise<void> {
  const args = ['commit', '-m', message];
  getLogger().debug('git (deadline)', { cwd: repo.repoRoot, args, timeoutMs });

  const res = await runWithDeadline(repo.bin, args, { cwd: repo.repoRoot, timeoutMs, termGraceMs: COMMIT_TERM_GRACE_MS });
  switch (res.kind) {
    case 'completed':
      if (res.exitCode !== 0) {
        throw new GitCommandError(`failed to create initial commit: exit code ${res.exitCode}`, args, res.output.trim());
      }
      return;
    case 'spawn_failed':
      throw new GitCommandError(`failed to create initial commit: ${res.message}`, args, '');
    case 'timeout':
      if (!res.terminated) {
        getLogger().warn('git commit did not exit after being killed', { pid: res.pid });
      }
      throw new CommitTimeoutError(res.timeoutMs);
  }
}

/**
 * Read a value from the user's global git config, or `fallback` when git is
 * missing or the key is unset.
 */
export async function readGlobalConfig(key: string, fallback: string, opts?: { bin?: string }): Promise<string> {
  try {
    const res = await execa(opts?.bin ?? 'git', ['config', '--global', key], { stdin: 'ignore', stdout: 'pipe', stderr: 'pipe' });
    return res.stdout.trim();
  } catch (err) {
    getLogger().debug('git config lookup failed', { key, error: err instanceof Error ? err.message : String(err) });
    return fallback;
  }
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  if (seconds === 1) return '1 second';
  return Number.isInteger(seconds) ? `${seconds} seconds` : `${seconds.toFixed(1)} seconds`;
}
