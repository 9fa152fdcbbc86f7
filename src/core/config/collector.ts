import { defaultModulePath, type PromptDefaults } from './defaults.js';
import { COMPONENT_DEFAULTS, type ProjectConfiguration } from './types.js';
import { assertValidModulePath, assertValidProjectName } from './validation.js';

/**
 * One question at a time over some input channel.
 */
export interface PromptSession {
  /**
   * Show `question` and return the raw answer, or null when no answer can be
   * read (closed or broken input). Callers treat null as "use the default".
   */
  ask(question: string): Promise<string | null>;
  /** Print a line that is not a question. */
  say(line: string): void;
}

export type CollectResult =
  | { status: 'confirmed'; config: ProjectConfiguration }
  | { status: 'declined'; config: ProjectConfiguration };

export interface CollectOptions {
  /** Lines shown before the confirmation; defaults to a plain-text summary. */
  summarize?: (config: ProjectConfiguration) => string[];
}

export async function promptWithDefault(session: PromptSession, question: string, defaultValue: string): Promise<string> {
  const answer = await session.ask(`${question} [${defaultValue}]`);
  if (answer === null) return defaultValue;
  const trimmed = answer.trim();
  return trimmed === '' ? defaultValue : trimmed;
}

export async function promptBool(session: PromptSession, question: string, defaultValue: boolean): Promise<boolean> {
  const answer = await session.ask(`${question} [${defaultValue ? 'Y/n' : 'y/N'}]`);
  if (answer === null) return defaultValue;
  const normalized = answer.trim().toLowerCase();
  if (normalized === '') return defaultValue;
  return normalized === 'y' || normalized === 'yes';
}

export async function promptOptional(session: PromptSession, question: string): Promise<string> {
  const answer = await session.ask(question);
  return answer === null ? '' : answer.trim();
}

/**
 * Ask for the whole project configuration, validating the name and module path
 * as soon as they are entered. Validation failures throw `ConfigurationError`
 * and no further question is asked. The last question is the confirmation.
 */
export async function gatherProjectConfiguration(
  session: PromptSession,
  defaults: PromptDefaults,
  opts: CollectOptions = {}
): Promise<CollectResult> {
  const projectName = await promptWithDefault(session, 'Project name', defaults.projectName);
  assertValidProjectName(projectName);

  const modulePath = await promptWithDefault(session, 'Go module path', defaultModulePath(projectName));
  assertValidModulePath(modulePath);

  const description = await promptWithDefault(session, 'Project description', defaults.description);
  const authorName = await promptWithDefault(session, 'Author name', defaults.authorName);
  const authorEmail = await promptWithDefault(session, 'Author email', defaults.authorEmail);
  const license = await promptWithDefault(session, 'License', defaults.license);

  session.say('');
  session.say('Components to include:');
  const enableCli = await promptBool(session, 'Include CLI application', COMPONENT_DEFAULTS.enableCli);
  const enableServer = await promptBool(session, 'Include HTTP server', COMPONENT_DEFAULTS.enableServer);
  const enableWorker = await promptBool(session, 'Include background worker', COMPONENT_DEFAULTS.enableWorker);
  const enableDocs = await promptBool(session, 'Include documentation setup', COMPONENT_DEFAULTS.enableDocs);
  const enableE2eTests = await promptBool(session, 'Include E2E tests', COMPONENT_DEFAULTS.enableE2eTests);

  const gitRemote = await promptOptional(session, 'Git remote URL (optional)');

  const config: ProjectConfiguration = Object.freeze({
    projectName,
    modulePath,
    description,
    authorName,
    authorEmail,
    license,
    enableCli,
    enableServer,
    enableWorker,
    enableDocs,
    enableE2eTests,
    gitRemote
  });

  session.say('');
  for (const line of (opts.summarize ?? plainSummary)(config)) session.say(line);
  session.say('');

  const proceed = await promptBool(session, 'Proceed with initialization?', false);
  return { status: proceed ? 'confirmed' : 'declined', config };
}

export function plainSummary(config: ProjectConfiguration): string[] {
  return [
    'Configuration Summary:',
    `  Project Name: ${config.projectName}`,
    `  Module Path:  ${config.modulePath}`,
    `  Description:  ${config.description}`,
    `  Author:       ${config.authorName} <${config.authorEmail}>`,
    `  License:      ${config.license}`,
    `  Components:   CLI=${config.enableCli} Server=${config.enableServer} Worker=${config.enableWorker} Docs=${config.enableDocs} E2E=${config.enableE2eTests}`,
    ...(config.gitRemote ? [`  Git Remote:   ${config.gitRemote}`] : [])
  ];
}
