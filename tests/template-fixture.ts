import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import type { ProjectConfiguration } from '../src/core/config/types.js';

export const PLACEHOLDER = 'github.com/your-org/go-template-project';

/** A cut-down copy of the Go service template, enough for every step to find its files. */
export const TEMPLATE_FILES: Readonly<Record<string, string>> = {
  'go.mod': `module ${PLACEHOLDER}\n\ngo 1.22\n\nrequire github.com/spf13/cobra v1.8.0\n`,
  'README.md': '# go-template-project\n',
  Makefile: 'build:\n\tgo build ./...\n',
  'cmd/cli/main.go': `package main\n\nimport "${PLACEHOLDER}/internal/app"\n\nfunc main() { app.Run() }\n`,
  'cmd/server/main.go': `package main\n\nimport (\n\t"${PLACEHOLDER}/internal/config"\n\t"${PLACEHOLDER}/internal/handlers"\n)\n\nfunc main() { handlers.Serve(config.Load()) }\n`,
  'cmd/worker/main.go': `package main\n\nimport "${PLACEHOLDER}/internal/app"\n\nfunc main() { app.Run() }\n`,
  'internal/app/app.go': `// Package app is the core of ${PLACEHOLDER}.\npackage app\n\nfunc Run() {}\n`,
  'internal/config/config.go': 'package config\n\ntype Config struct{}\n\nfunc Load() Config { return Config{} }\n',
  'internal/handlers/health.go': 'package handlers\n\nfunc Serve(_ any) {}\n',
  'docs/hugo.toml': 'title = "go-template-project"\n',
  'docs/content/_index.md': '# go-template-project\n',
  'docs/content/docs/getting-started.md': '# Getting Started\n',
  'tests/e2e/init_e2e_test.go': `package e2e\n\n// exercises ${PLACEHOLDER}/scripts/init.go\n`,
  'tests/e2e/cli_e2e_test.go': 'package e2e\n',
  'tests/e2e/server_e2e_test.go': 'package e2e\n',
  'tests/e2e/worker_e2e_test.go': 'package e2e\n',
  'scripts/init.go': `package main\n\n// rewrites ${PLACEHOLDER}\nfunc main() {}\n`
};

/**
 * Write the template into `<tmp>/<name>/` so the default project name
 * (the directory's basename) is predictable.
 */
export async function createTemplateCheckout(name = 'example-project'): Promise<string> {
  const parent = await mkdtemp(join(tmpdir(), 'seedling-tpl-'));
  const root = join(parent, name);
  for (const [rel, content] of Object.entries(TEMPLATE_FILES)) {
    const path = join(root, rel);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf8');
  }
  return root;
}

export function makeConfig(overrides: Partial<ProjectConfiguration> = {}): ProjectConfiguration {
  return {
    projectName: 'example-project',
    modulePath: 'github.com/example/example-project',
    description: 'An example service',
    authorName: 'Test Author',
    authorEmail: 'author@example.com',
    license: 'MIT',
    enableCli: true,
    enableServer: false,
    enableWorker: false,
    enableDocs: true,
    enableE2eTests: false,
    gitRemote: '',
    ...overrides
  };
}
