import { execa } from 'execa';

export interface DeadlineOptions {
  cwd: string;
  timeoutMs: number;
  env?: Record<string, string>;
  /** How long the group gets between SIGTERM and SIGKILL. */
  termGraceMs?: number;
}

export type DeadlineResult =
  | { kind: 'completed'; exitCode: number; output: string; pid?: number }
  | { kind: 'spawn_failed'; message: string }
  | { kind: 'timeout'; timeoutMs: number; pid?: number; terminated: boolean };

const TERM_GRACE_MS = 1_500;
const KILL_GRACE_MS = 2_500;

/**
 * Run a command and race it against a timer.
 *
 * The child gets its own process group so that anything it spawns (git hooks,
 * formatters) goes down with it. On deadline the group receives SIGTERM, then
 * SIGKILL, and the child is reaped before this returns.
 */
export async function runWithDeadline(file: string, args: string[], opts: DeadlineOptions): Promise<DeadlineResult> {
  const child = execa(file, args, {
    cwd: opts.cwd,
    env: opts.env,
    stdin: 'ignore',
    all: true,
    reject: false,
    detached: true
  });
  const pid = child.pid;

  let timer: NodeJS.Timeout | null = null;
  try {
    const winner = await Promise.race([
      child.then((result) => ({ done: true as const, result })),
      new Promise<{ done: false }>((resolve) => {
        timer = setTimeout(() => resolve({ done: false }), opts.timeoutMs);
      })
    ]);

    if (winner.done) {
      const { result } = winner;
      if (typeof result.exitCode !== 'number') {
        // With `reject: false` the error fields are loosely typed.
        return { kind: 'spawn_failed', message: String(result.shortMessage ?? result.message ?? `failed to start ${file}`) };
      }
      return { kind: 'completed', exitCode: result.exitCode, output: String(result.all ?? ''), pid };
    }
  } finally {
    if (timer) clearTimeout(timer);
  }

  killGroup(pid, 'SIGTERM');
  let exited = await waitForExit(child, opts.termGraceMs ?? TERM_GRACE_MS);
  if (!exited) {
    killGroup(pid, 'SIGKILL');
    exited = await waitForExit(child, KILL_GRACE_MS);
  }
  return { kind: 'timeout', timeoutMs: opts.timeoutMs, pid, terminated: exited };
}

function killGroup(pid: number | undefined, signal: NodeJS.Signals): void {
  if (!pid) return;
  try {
    process.kill(-pid, signal);
  } catch {
    // group already gone
  }
  try {
    process.kill(pid, signal);
  } catch {
    // already exited
  }
}

async function waitForExit(child: PromiseLike<unknown>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | null = null;
  try {
    return await Promise.race([
      Promise.resolve(child).then(
        () => true,
        () => true
      ),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), timeoutMs);
      })
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * True while a process with this pid can still be signalled.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
