import type { ProjectConfiguration, TemplateProfile } from '../core/config/types.js';
import type { TemplateContext } from './engine.js';

export interface ContextOptions {
  now?: Date;
}

/**
 * Everything the project templates can reference: the configuration's own
 * fields plus a few pre-rendered fragments that depend on several flags.
 */
export function buildTemplateContext(
  config: ProjectConfiguration,
  profile: TemplateProfile,
  opts: ContextOptions = {}
): TemplateContext {
  return {
    projectName: config.projectName,
    modulePath: config.modulePath,
    description: config.description,
    authorName: config.authorName,
    authorEmail: config.authorEmail,
    license: config.license,
    gitRemote: config.gitRemote,
    enableCli: config.enableCli,
    enableServer: config.enableServer,
    enableWorker: config.enableWorker,
    enableDocs: config.enableDocs,
    enableE2eTests: config.enableE2eTests,
    templateName: profile.templateName,
    templateUrl: profile.templateUrl,
    languageVersion: profile.languageVersion,
    year: String((opts.now ?? new Date()).getUTCFullYear()),
    runCommands: runCommands(config),
    componentDescription: componentDescription(config),
    testingFeatures: config.enableE2eTests ? ', and E2E' : '',
    documentationFeature: config.enableDocs
      ? '\n- **📚 Documentation** - Hugo-powered static site with auto-generated API docs'
      : ''
  };
}

/**
 * `make run-*` lines for the enabled apps, indented for a fenced block inside a list.
 */
export function runCommands(config: ProjectConfiguration): string {
  const commands: string[] = [];
  if (config.enableCli) commands.push('make run-cli      # Run CLI application');
  if (config.enableServer) commands.push('make run-server   # Run HTTP server');
  if (config.enableWorker) commands.push('make run-worker   # Run background worker');

  if (commands.length === 0) return 'go run ./...';
  return commands.map((c) => `   ${c}\n`).join('');
}

export function componentDescription(config: ProjectConfiguration): string {
  const components: string[] = [];
  if (config.enableCli) components.push('**CLI Application** - Command-line interface with flags and subcommands');
  if (config.enableServer) components.push('**HTTP Server** - REST API with graceful shutdown and health checks');
  if (config.enableWorker) components.push('**Background Worker** - Long-running process with signal handling');

  if (components.length === 0) {
    return 'This project provides a foundation for building Go applications with clean architecture patterns.';
  }
  if (components.length === 1) {
    return `This project includes:\n\n- ${components[0]}`;
  }
  return `This project includes multiple components:\n\n${components.map((c) => `- ${c}\n`).join('')}`;
}
