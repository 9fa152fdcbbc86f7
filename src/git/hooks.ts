import { execa } from 'execa';

import { describeError, failed, ok, type StepOutcome } from '../core/outcome.js';
import { getLogger } from '../utils/logger.js';

export interface HookInstallerOptions {
  /** Hook manager executable; `pre-commit` unless overridden. */
  bin?: string;
}

/**
 * Install pre-commit hooks into `repoRoot` if the hook manager is on PATH.
 * A missing tool is reported without attempting the install.
 */
export async function installPreCommitHooks(repoRoot: string, opts: HookInstallerOptions = {}): Promise<StepOutcome> {
  const bin = opts.bin ?? 'pre-commit';
  const log = getLogger();

  try {
    const probe = await execa(bin, ['--version'], { cwd: repoRoot, stdin: 'ignore', stdout: 'pipe', stderr: 'pipe' });
    log.debug('hook manager found', { bin, version: probe.stdout.trim() });
  } catch {
    return failed(`${bin} not installed`);
  }

  try {
    await execa(bin, ['install'], { cwd: repoRoot, stdin: 'ignore', stdout: 'pipe', stderr: 'pipe' });
  } catch (err) {
    return failed(`${bin} install failed: ${describeError(err)}`);
  }
  return ok();
}
