import type { z } from 'zod';

import { readYaml } from '../../utils/fs.js';
import { defaultModulePath, type PromptDefaults } from './defaults.js';
import { formatIssues } from './profile.js';
import { COMPONENT_DEFAULTS, ProjectConfiguration } from './types.js';
import { assertValidModulePath, assertValidProjectName, ConfigurationError } from './validation.js';

/**
 * Pre-recorded answers for non-interactive runs. Every field is optional and
 * falls back to the same default the prompt would have offered.
 */
export const AnswersFile = ProjectConfiguration.partial().strict();
export type AnswersFile = z.infer<typeof AnswersFile>;

/**
 * Build a configuration from answers without asking anything. Name and module
 * path get the same validation as the interactive flow.
 */
export function configurationFromAnswers(answers: AnswersFile, defaults: PromptDefaults): ProjectConfiguration {
  const text = (value: string | undefined, fallback: string) => {
    const trimmed = value?.trim() ?? '';
    return trimmed === '' ? fallback : trimmed;
  };

  const projectName = text(answers.projectName, defaults.projectName);
  assertValidProjectName(projectName);
  const modulePath = text(answers.modulePath, defaultModulePath(projectName));
  assertValidModulePath(modulePath);

  return Object.freeze({
    projectName,
    modulePath,
    description: text(answers.description, defaults.description),
    authorName: text(answers.authorName, defaults.authorName),
    authorEmail: text(answers.authorEmail, defaults.authorEmail),
    license: text(answers.license, defaults.license),
    enableCli: answers.enableCli ?? COMPONENT_DEFAULTS.enableCli,
    enableServer: answers.enableServer ?? COMPONENT_DEFAULTS.enableServer,
    enableWorker: answers.enableWorker ?? COMPONENT_DEFAULTS.enableWorker,
    enableDocs: answers.enableDocs ?? COMPONENT_DEFAULTS.enableDocs,
    enableE2eTests: answers.enableE2eTests ?? COMPONENT_DEFAULTS.enableE2eTests,
    gitRemote: answers.gitRemote?.trim() ?? ''
  });
}

export async function loadAnswersFile(path: string): Promise<AnswersFile> {
  let raw: unknown;
  try {
    raw = await readYaml(path);
  } catch (err) {
    throw new ConfigurationError(`cannot read answers file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = AnswersFile.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`invalid answers file ${path}: ${formatIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}
