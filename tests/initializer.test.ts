import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import { defaultTemplateProfile } from '../src/core/config/profile.js';
import { initializeProject, InitializationError, type InitStep } from '../src/core/initializer.js';
import { fileExists, listFilesRec } from '../src/utils/fs.js';
import { renderModuleManifest } from '../src/workspace/manifest.js';
import { createTempDir } from './git-fixture.js';
import { createTemplateCheckout, makeConfig, PLACEHOLDER } from './template-fixture.js';

const profile = defaultTemplateProfile();
const now = new Date('2026-03-01T12:00:00Z');

describe('initializeProject', () => {
  it('turns the template into example-project with CLI and docs only', async () => {
    const root = await createTemplateCheckout();
    const config = makeConfig();
    const steps: InitStep[] = [];

    const result = await initializeProject(root, config, profile, { now, onStep: (s) => steps.push(s) });

    expect(steps).toEqual(['manifest', 'imports', 'prune', 'artifacts', 'readme']);

    expect(await readFile(join(root, 'go.mod'), 'utf8')).toBe(renderModuleManifest('github.com/example/example-project', '1.23'));
    expect(await readFile(join(root, 'cmd/cli/main.go'), 'utf8')).toBe(
      'package main\n\nimport "github.com/example/example-project/internal/app"\n\nfunc main() { app.Run() }\n'
    );

    for (const gone of ['cmd/server', 'internal/handlers', 'cmd/worker', 'tests']) {
      expect(await fileExists(join(root, gone))).toBe(false);
    }
    for (const kept of ['cmd/cli', 'docs', 'internal/app', 'internal/config']) {
      expect(await fileExists(join(root, kept))).toBe(true);
    }

    const readme = await readFile(join(root, 'README.md'), 'utf8');
    expect(readme.startsWith('# example-project\n')).toBe(true);

    expect(result.prunedDirectories).toEqual(['cmd/server', 'internal/handlers', 'cmd/worker', 'tests']);
    expect(result.rewrittenFiles).toEqual([
      'cmd/cli/main.go',
      'cmd/server/main.go',
      'cmd/worker/main.go',
      'internal/app/app.go',
      'scripts/init.go',
      'tests/e2e/init_e2e_test.go'
    ]);
    // The e2e tree was already pruned, so there was nothing left to clean.
    expect(result.removedArtifacts).toEqual([]);
    expect(result.docsPages).toEqual(['docs/content/_index.md', 'docs/content/docs/getting-started.md']);
    expect(result.readmePath).toBe(join(root, 'README.md'));

    // Nothing still mentions the placeholder module path.
    for (const rel of await listFilesRec(root)) {
      if (rel.endsWith('.go') || rel === 'go.mod') {
        expect(await readFile(join(root, rel), 'utf8')).not.toContain(PLACEHOLDER);
      }
    }
  });

  it('keeps e2e tests for enabled components only', async () => {
    const root = await createTemplateCheckout();
    const result = await initializeProject(root, makeConfig({ enableE2eTests: true, enableWorker: true }), profile, { now });

    expect(result.removedArtifacts).toEqual(['tests/e2e/init_e2e_test.go', 'tests/e2e/server_e2e_test.go']);
    expect(await fileExists(join(root, 'tests/e2e/cli_e2e_test.go'))).toBe(true);
    expect(await fileExists(join(root, 'tests/e2e/worker_e2e_test.go'))).toBe(true);
  });

  it('leaves docs alone when docs are declined', async () => {
    const root = await createTemplateCheckout();
    const result = await initializeProject(root, makeConfig({ enableDocs: false }), profile, { now });

    expect(result.docsPages).toEqual([]);
    expect(await fileExists(join(root, 'docs'))).toBe(false);
  });

  it('names the failing step', async () => {
    const root = await createTemplateCheckout();
    await rm(join(root, 'go.mod'));
    await mkdir(join(root, 'go.mod'));

    const err = await initializeProject(root, makeConfig(), profile, { now }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InitializationError);
    expect(err).toMatchObject({ step: 'manifest' });
    expect(err instanceof Error ? err.message : '').toMatch(/^failed to update go\.mod: /);
    // Later steps never ran.
    expect(await fileExists(join(root, 'cmd/server'))).toBe(true);
  });

  it('stops at the README step when the template does not parse', async () => {
    const root = await createTemplateCheckout();
    const templatesDir = await createTempDir();
    await writeFile(join(templatesDir, 'readme.md.tmpl'), '{{#if enableCli}}\n# {{projectName}}\n', 'utf8');

    const err = await initializeProject(root, makeConfig({ enableDocs: false }), profile, { now, templatesDir }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(InitializationError);
    expect(err).toMatchObject({ step: 'readme' });
    expect(err instanceof Error ? err.message : '').toBe(
      'failed to generate README: readme.md.tmpl:1: {{#if enableCli}} is never closed'
    );
  });

  it('stops at the README step when the README cannot be written', async () => {
    const root = await createTemplateCheckout();
    await rm(join(root, 'README.md'), { force: true });
    await mkdir(join(root, 'README.md'));

    const err = await initializeProject(root, makeConfig(), profile, { now }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InitializationError);
    expect(err).toMatchObject({ step: 'readme' });
    expect(err instanceof Error ? err.message : '').toMatch(/^failed to generate README: .*EISDIR/);
  });
});
