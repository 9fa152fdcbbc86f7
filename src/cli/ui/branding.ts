import chalk from 'chalk';

import type { ProjectConfiguration } from '../../core/config/types.js';
import { drawBox, keyValue } from './format.js';
import { theme } from './theme.js';

// ── Brand Identity ──────────────────────────────────────────────────────────

const LOGO = `  ${chalk.bold('seedling')}`;

export function brandLine(version: string): string {
  return `${LOGO} ${theme.dim(`v${version}`)} ${theme.dim('—')} ${theme.dim('project initialization')}`;
}

/**
 * Banner for `seedling init`, naming the template being customized.
 */
export function welcomeBanner(version: string, templateName: string): string {
  return [brandLine(version), `  ${theme.dim(`Initializing a project from ${templateName}`)}`].join('\n');
}

/**
 * Collected configuration, shown right before the confirmation question.
 */
export function configurationSummary(config: ProjectConfiguration): string[] {
  const flag = (v: boolean) => (v ? theme.enabled : theme.disabled);
  const lines = [
    keyValue('Project Name', config.projectName),
    keyValue('Module Path', config.modulePath),
    keyValue('Description', config.description),
    keyValue('Author', `${config.authorName} <${config.authorEmail}>`),
    keyValue('License', config.license),
    keyValue('Git Remote', config.gitRemote || theme.dim('(none)')),
    '',
    theme.bold('Components'),
    keyValue('CLI', flag(config.enableCli)),
    keyValue('Server', flag(config.enableServer)),
    keyValue('Worker', flag(config.enableWorker)),
    keyValue('Docs', flag(config.enableDocs)),
    keyValue('E2E Tests', flag(config.enableE2eTests)),
  ];
  return drawBox('Configuration Summary', lines).split('\n');
}

/**
 * Suggestions printed after a successful run.
 */
export function nextSteps(config: ProjectConfiguration): string[] {
  const steps = [
    'Review the generated files',
    "Run 'make setup' to install development tools",
    "Run 'make check' to verify everything works",
  ];
  if (config.enableDocs) steps.push('Update documentation in docs/ to match your project');
  steps.push('Start coding!');
  return steps.map((s, i) => `${i + 1}. ${s}`);
}
