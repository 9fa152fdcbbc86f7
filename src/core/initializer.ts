import { resolve } from 'node:path';

import { regenerateDocsPages } from '../templates/docs.js';
import { generateReadme } from '../templates/readme.js';
import { getLogger } from '../utils/logger.js';
import { cleanupTemplateArtifacts } from '../workspace/artifacts.js';
import { writeModuleManifest } from '../workspace/manifest.js';
import { pruneComponents } from '../workspace/pruner.js';
import { rewriteModulePaths } from '../workspace/rewriter.js';
import type { ProjectConfiguration, TemplateProfile } from './config/types.js';
import { describeError } from './outcome.js';

export type InitStep = 'manifest' | 'imports' | 'prune' | 'artifacts' | 'readme';

export class InitializationError extends Error {
  constructor(
    readonly step: InitStep,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'InitializationError';
  }
}

export interface InitializeOptions {
  /** Called before each step starts. */
  onStep?: (step: InitStep) => void;
  templatesDir?: string;
  now?: Date;
}

export interface InitializeResult {
  manifestPath: string;
  rewrittenFiles: string[];
  prunedDirectories: string[];
  removedArtifacts: string[];
  docsPages: string[];
  readmePath: string;
}

/**
 * Apply a confirmed configuration to the template checkout at `root`.
 *
 * Every step here is required: the first failure stops the run and is
 * rethrown as an `InitializationError` naming the step. Nothing is rolled back.
 */
export async function initializeProject(
  root: string,
  config: ProjectConfiguration,
  profile: TemplateProfile,
  opts: InitializeOptions = {}
): Promise<InitializeResult> {
  const projectRoot = resolve(root);
  const log = getLogger();

  const step = async <T>(id: InitStep, label: string, fn: () => Promise<T>): Promise<T> => {
    opts.onStep?.(id);
    log.debug('init step', { step: id, root: projectRoot });
    try {
      return await fn();
    } catch (err) {
      throw new InitializationError(id, `failed to ${label}: ${describeError(err)}`, { cause: err });
    }
  };

  const manifestPath = await step('manifest', `update ${profile.manifestFile}`, () =>
    writeModuleManifest(projectRoot, config, profile)
  );

  const rewrittenFiles = await step('imports', 'update import paths', () =>
    rewriteModulePaths(projectRoot, profile.placeholderModulePath, config.modulePath, profile.sourceExtension)
  );

  const prunedDirectories = await step('prune', 'remove unwanted components', () => pruneComponents(projectRoot, config));

  const { removedArtifacts, docsPages } = await step('artifacts', 'clean up template artifacts', async () => {
    const removed = await cleanupTemplateArtifacts(projectRoot, config, profile);
    const pages = config.enableDocs
      ? await regenerateDocsPages(projectRoot, config, profile, { templatesDir: opts.templatesDir, now: opts.now })
      : [];
    return { removedArtifacts: removed, docsPages: pages };
  });

  const readmePath = await step('readme', 'generate README', () =>
    generateReadme(projectRoot, config, profile, { templatesDir: opts.templatesDir, now: opts.now })
  );

  return { manifestPath, rewrittenFiles, prunedDirectories, removedArtifacts, docsPages, readmePath };
}
