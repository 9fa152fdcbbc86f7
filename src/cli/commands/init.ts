import { resolve } from 'node:path';

import { configurationFromAnswers, loadAnswersFile } from '../../core/config/answers.js';
import { gatherProjectConfiguration, type PromptSession } from '../../core/config/collector.js';
import { resolvePromptDefaults, type IdentityLookup } from '../../core/config/defaults.js';
import { loadTemplateProfile } from '../../core/config/profile.js';
import type { ProjectConfiguration, TemplateProfile } from '../../core/config/types.js';
import { initializeProject, type InitializeResult, type InitStep } from '../../core/initializer.js';
import { describeError, isProblem, type StepOutcome } from '../../core/outcome.js';
import { bootstrapRepository } from '../../git/bootstrap.js';
import { installPreCommitHooks } from '../../git/hooks.js';
import { git, readGlobalConfig } from '../../git/operations.js';
import { getLogger } from '../../utils/logger.js';
import { detectVersionSync } from '../../utils/version.js';
import { removeInitializer } from '../../workspace/artifacts.js';
import { installCliCancellation } from '../cancel.js';
import { resolveCommitTimeoutMs } from '../commit-timeout.js';
import { configurationSummary, nextSteps } from '../ui/branding.js';
import { formatMs } from '../ui/format.js';
import { openPromptSession, PromptCancelledError } from '../ui/prompts.js';
import { getRenderer, type Renderer } from '../ui/renderer.js';
import type { SpinnerHandle } from '../ui/spinner.js';

export interface InitCommandOptions {
  /** Template checkout to initialize; the working directory by default. */
  root?: string;
  /** YAML answers file; when set no question is asked. */
  answersFile?: string;
  skipGit?: boolean;
  skipHooks?: boolean;
  /** Prompt transport; opened on stdin when omitted. */
  session?: PromptSession;
  identity?: IdentityLookup;
  gitBin?: string;
  hookBin?: string;
  commitTimeoutMs?: number;
  templatesDir?: string;
  now?: Date;
}

export interface InitCommandResult {
  ok: boolean;
  /** The user declined the confirmation; nothing was changed. */
  cancelled?: boolean;
  /** The user interrupted a prompt (Ctrl+C). */
  interrupted?: boolean;
  result?: InitializeResult;
  config?: ProjectConfiguration;
  errors?: string;
}

export async function runInitCommand(opts: InitCommandOptions = {}): Promise<InitCommandResult> {
  const r = getRenderer();
  const log = getLogger();
  const root = resolve(opts.root ?? process.cwd());
  const cancellation = installCliCancellation({
    onCancel: () => r.warn('Cancellation requested. Stopping...'),
  });
  const ownedSession = opts.session || opts.answersFile ? null : openPromptSession();
  const steps = stepProgress(r);

  try {
    // ── Step 0: Profile + Brand ──────────────────────────────────────────────
    const profile = await loadTemplateProfile(root);
    r.welcome(detectVersionSync() ?? '0.0.0', profile.templateName);
    r.blank();

    // ── Step 1: Configuration ────────────────────────────────────────────────
    const identity: IdentityLookup = opts.identity ?? ((key, fallback) => readGlobalConfig(key, fallback, { bin: opts.gitBin }));
    const defaults = await resolvePromptDefaults(root, profile, identity);

    let config: ProjectConfiguration;
    if (opts.answersFile) {
      const answers = await loadAnswersFile(resolve(opts.answersFile));
      config = configurationFromAnswers(answers, defaults);
      for (const line of configurationSummary(config)) r.text(line);
      r.blank();
    } else {
      const session = opts.session ?? ownedSession;
      if (!session) throw new Error('no prompt session available');
      const collected = await gatherProjectConfiguration(session, defaults, { summarize: configurationSummary });
      if (collected.status === 'declined') {
        r.warn('Initialization cancelled');
        return { ok: true, cancelled: true, config: collected.config };
      }
      config = collected.config;
    }
    log.debug('configuration confirmed', { config });

    // ── Step 2: Template mutation (required) ─────────────────────────────────
    r.blank();
    let result: InitializeResult;
    try {
      result = await initializeProject(root, config, profile, {
        onStep: (step) => steps.start(stepLabel(step, profile)),
        templatesDir: opts.templatesDir,
        now: opts.now,
      });
      steps.finish(true);
    } catch (err) {
      steps.finish(false);
      throw err;
    }

    // ── Step 3: Version control (advisory) ───────────────────────────────────
    if (opts.skipGit || process.env.SKIP_GIT_INIT) {
      r.info('Skipping git initialization');
    } else {
      await bootstrapGit(r, root, config, profile, opts);
    }

    // ── Step 4: Hooks (advisory) ─────────────────────────────────────────────
    if (!opts.skipHooks) {
      const hooks = await installPreCommitHooks(root, { bin: opts.hookBin });
      if (isProblem(hooks)) {
        r.warn(`Failed to set up pre-commit hooks: ${hooks.reason}`, 'You can set them up later with: pre-commit install');
      } else {
        r.stepDone('Pre-commit hooks installed');
      }
    }

    // ── Step 5: Remove the template's own initializer (advisory) ─────────────
    const removal = await removeInitializer(root, profile);
    warnOnProblem(r, removal, `You can remove it manually: rm ${profile.initializerFiles.join(' ')}`);

    r.blank();
    r.success('Project initialized successfully!');
    r.nextSteps(nextSteps(config));
    return { ok: true, result, config };
  } catch (err) {
    if (err instanceof PromptCancelledError) {
      return { ok: false, interrupted: true, errors: err.message };
    }
    log.debug('init failed', { error: describeError(err) });
    return { ok: false, errors: describeError(err) };
  } finally {
    cancellation.dispose();
    ownedSession?.close();
  }
}

async function bootstrapGit(
  r: Renderer,
  root: string,
  config: ProjectConfiguration,
  profile: TemplateProfile,
  opts: InitCommandOptions
): Promise<void> {
  const spinner = r.spinner('Initializing git repository...');
  const started = Date.now();
  const boot = await bootstrapRepository(git(root, { bin: opts.gitBin }), config, profile, {
    commitTimeoutMs: opts.commitTimeoutMs ?? resolveCommitTimeoutMs(),
  });

  if (isProblem(boot.outcome)) {
    spinner.stop();
    for (const warning of boot.warnings) r.warn(warning);
    r.warn(`Git setup incomplete: ${boot.outcome.reason}`, 'Continuing without git initialization...');
    return;
  }

  spinner.succeed(`Git repository initialized (${formatMs(Date.now() - started)})`);
  for (const warning of boot.warnings) r.warn(warning);
  if (boot.commit) r.commitSuccess(boot.commit);
}

function warnOnProblem(r: Renderer, outcome: StepOutcome, hint: string): void {
  if (isProblem(outcome)) r.warn(outcome.reason, hint);
}

function stepLabel(step: InitStep, profile: TemplateProfile): string {
  switch (step) {
    case 'manifest':
      return `Updating ${profile.manifestFile}`;
    case 'imports':
      return 'Updating import paths';
    case 'prune':
      return 'Removing unwanted components';
    case 'artifacts':
      return 'Cleaning up template artifacts';
    case 'readme':
      return 'Generating README';
  }
}

/** One spinner per step; starting the next step completes the previous one. */
function stepProgress(r: Renderer) {
  let current: SpinnerHandle | undefined;
  return {
    start(label: string) {
      current?.succeed();
      current = r.spinner(label);
    },
    finish(ok: boolean) {
      if (ok) current?.succeed();
      else current?.fail();
      current = undefined;
    },
  };
}
