import { Command } from 'commander';

import { Logger, setLogger } from '../utils/logger.js';
import { detectVersionSync } from '../utils/version.js';
import { runInitCommand } from './commands/init.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

interface GlobalFlags {
  verbose?: boolean;
  quiet?: boolean;
}

interface InitFlags {
  root?: string;
  answers?: string;
  skipGit?: boolean;
  skipHooks?: boolean;
}

export function buildCli(): Command {
  const program = new Command();
  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('seedling')
    .description('Turn a fresh copy of the Go service template into your own project')
    .version(version, '-v, --version');

  program
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (no formatting)');

  program.hook('preAction', (thisCommand) => {
    const o = thisCommand.opts<GlobalFlags>();
    const verbose = !!o.verbose;
    const quiet = !!o.quiet;
    process.env.SEEDLING_VERBOSE = verbose ? '1' : '0';
    process.env.SEEDLING_QUIET = quiet ? '1' : '0';
    setLogger(new Logger({ level: verbose ? 'debug' : 'warn', json: quiet }));
    createRenderer({ quiet });
  });

  program
    .command('init')
    .description('Customize the template checkout: module path, components, README, git')
    .option('--root <dir>', 'Template checkout to initialize (default: current directory)')
    .option('--answers <file>', 'YAML file with pre-recorded answers (no prompts)')
    .option('--skip-git', 'Do not create the git repository or the initial commit')
    .option('--skip-hooks', 'Do not install pre-commit hooks')
    .action(async (opts: InitFlags) => {
      const res = await runInitCommand({
        root: opts.root,
        answersFile: opts.answers,
        skipGit: !!opts.skipGit,
        skipHooks: !!opts.skipHooks,
      });
      if (res.ok) return;

      const r = getRenderer();
      if (res.interrupted) {
        r.warn('Cancelled.');
        process.exitCode = 130;
        return;
      }
      r.error('Init failed', res.errors ?? 'unknown error', 'Try running with --verbose for more details.');
      process.exitCode = 1;
    });

  return program;
}

await buildCli().parseAsync(process.argv);
