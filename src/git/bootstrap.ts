import type { ProjectConfiguration, TemplateProfile } from '../core/config/types.js';
import { describeError, failed, type StepOutcome } from '../core/outcome.js';
import { getLogger } from '../utils/logger.js';
import {
  addRemote,
  CommitTimeoutError,
  commitWithDeadline,
  getCurrentCommit,
  GitCommandError,
  initRepository,
  setLocalConfig,
  stageAll,
  type GitRepo
} from './operations.js';

export const DEFAULT_COMMIT_TIMEOUT_MS = 10_000;

export interface BootstrapOptions {
  commitTimeoutMs?: number;
}

export interface BootstrapResult {
  outcome: StepOutcome;
  /** Non-fatal problems hit along the way (identity, remote). */
  warnings: string[];
  commit?: string;
}

export function initialCommitMessage(projectName: string, templateName: string): string {
  return `feat: initialize ${projectName} project\n\nGenerated from ${templateName}`;
}

/**
 * Create the repository, set identity, add the remote, stage and commit.
 *
 * Only `init`, `add` and `commit` can fail the step; identity and remote
 * problems become warnings. Nothing here throws.
 */
export async function bootstrapRepository(
  repo: GitRepo,
  config: ProjectConfiguration,
  profile: TemplateProfile,
  opts: BootstrapOptions = {}
): Promise<BootstrapResult> {
  const log = getLogger();
  const warnings: string[] = [];

  try {
    await initRepository(repo);
  } catch (err) {
    return { outcome: failed(`failed to initialize git: ${describeGitError(err)}`), warnings };
  }

  const identity: Array<[string, string]> = [
    ['user.name', config.authorName],
    ['user.email', config.authorEmail]
  ];
  for (const [key, value] of identity) {
    try {
      await setLocalConfig(repo, key, value);
    } catch (err) {
      warnings.push(`Failed to set git ${key}: ${describeGitError(err)}`);
    }
  }

  if (config.gitRemote !== '') {
    try {
      await addRemote(repo, 'origin', config.gitRemote);
    } catch (err) {
      warnings.push(`Failed to add git remote: ${describeGitError(err)}`);
    }
  }

  try {
    await stageAll(repo);
  } catch (err) {
    return { outcome: failed(`failed to stage files: ${describeGitError(err)}`), warnings };
  }

  const timeoutMs = opts.commitTimeoutMs ?? DEFAULT_COMMIT_TIMEOUT_MS;
  try {
    await commitWithDeadline(repo, initialCommitMessage(config.projectName, profile.templateName), timeoutMs);
  } catch (err) {
    if (err instanceof CommitTimeoutError) {
      return { outcome: { status: 'timeout', reason: err.message, timeoutMs: err.timeoutMs }, warnings };
    }
    return { outcome: failed(describeGitError(err)), warnings };
  }

  let commit: string | undefined;
  try {
    commit = await getCurrentCommit(repo);
  } catch (err) {
    log.debug('could not resolve HEAD after commit', { error: describeError(err) });
  }

  return { outcome: { status: 'ok' }, warnings, commit };
}

function describeGitError(err: unknown): string {
  if (err instanceof GitCommandError && err.output) {
    return `${err.message} (output: ${err.output})`;
  }
  return describeError(err);
}
