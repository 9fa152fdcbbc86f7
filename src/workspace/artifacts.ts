import { join } from 'node:path';

import type { ProjectConfiguration, TemplateProfile } from '../core/config/types.js';
import { describeError, failed, ok, type StepOutcome } from '../core/outcome.js';
import { removeDirIfEmpty, removeFileIfExists } from '../utils/fs.js';
import { getLogger } from '../utils/logger.js';

/**
 * Files that only exist to test the template itself, plus the end-to-end
 * tests of components that were declined (when the e2e suite is kept).
 */
export function templateArtifactFiles(config: ProjectConfiguration, profile: TemplateProfile): string[] {
  const files = [...profile.selfTestFiles];
  if (config.enableE2eTests) {
    if (!config.enableCli) files.push(profile.componentTestFiles.cli);
    if (!config.enableServer) files.push(profile.componentTestFiles.server);
    if (!config.enableWorker) files.push(profile.componentTestFiles.worker);
  }
  return files;
}

/**
 * Remove template-only files. Missing files are skipped.
 * Returns the files that were actually removed.
 */
export async function cleanupTemplateArtifacts(
  root: string,
  config: ProjectConfiguration,
  profile: TemplateProfile
): Promise<string[]> {
  const removed: string[] = [];
  for (const rel of templateArtifactFiles(config, profile)) {
    try {
      if (await removeFileIfExists(join(root, rel))) removed.push(rel);
    } catch (err) {
      throw new Error(`failed to remove ${rel}: ${describeError(err)}`);
    }
  }
  getLogger().debug('removed template artifacts', { removed });
  return removed;
}

/**
 * Delete the template's own initializer once it has done its job, and its
 * directory if nothing else is left in it.
 */
export async function removeInitializer(root: string, profile: TemplateProfile): Promise<StepOutcome> {
  for (const rel of profile.initializerFiles) {
    try {
      await removeFileIfExists(join(root, rel));
    } catch (err) {
      return failed(`failed to remove ${rel}: ${describeError(err)}`);
    }
  }
  try {
    await removeDirIfEmpty(join(root, profile.initializerDir));
  } catch (err) {
    getLogger().debug('initializer directory kept', { dir: profile.initializerDir, error: describeError(err) });
  }
  return ok();
}
