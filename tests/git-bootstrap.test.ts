import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import { defaultTemplateProfile } from '../src/core/config/profile.js';
import { bootstrapRepository, initialCommitMessage } from '../src/git/bootstrap.js';
import { installPreCommitHooks } from '../src/git/hooks.js';
import { CommitTimeoutError, git, listRemotes, lsFiles } from '../src/git/operations.js';
import { fileExists } from '../src/utils/fs.js';
import { createRepoWithHangingHook, createTempDir, gitOutput, writeFakeTool } from './git-fixture.js';
import { makeConfig } from './template-fixture.js';

const profile = defaultTemplateProfile();

async function projectDir(): Promise<string> {
  const dir = await createTempDir('seedling-git-');
  await writeFile(join(dir, 'go.mod'), 'module github.com/example/example-project\n', 'utf8');
  await writeFile(join(dir, 'main.go'), 'package main\n', 'utf8');
  return dir;
}

describe('bootstrapRepository', () => {
  it('creates the repository and the initial commit', async () => {
    const dir = await projectDir();
    const repo = git(dir);

    const res = await bootstrapRepository(repo, makeConfig({ gitRemote: 'https://example.com/team/example-project.git' }), profile);

    expect(res.outcome).toEqual({ status: 'ok' });
    expect(res.warnings).toEqual([]);
    expect(res.commit).toMatch(/^[0-9a-f]{40}$/);
    expect(await listRemotes(repo)).toEqual(['origin']);
    expect(await lsFiles(repo)).toEqual(['go.mod', 'main.go']);
    expect(await gitOutput(dir, ['log', '-1', '--format=%B'])).toBe(
      'feat: initialize example-project project\n\nGenerated from go-template-project'
    );
    expect(await gitOutput(dir, ['log', '-1', '--format=%an <%ae>'])).toBe('Test Author <author@example.com>');
  });

  it('adds no remote when none is configured', async () => {
    const dir = await projectDir();
    const res = await bootstrapRepository(git(dir), makeConfig(), profile);

    expect(res.outcome.status).toBe('ok');
    expect(await listRemotes(git(dir))).toEqual([]);
  });

  it('fails without throwing when git is missing', async () => {
    const dir = await projectDir();
    const res = await bootstrapRepository(git(dir, { bin: 'seedling-no-such-git' }), makeConfig(), profile);

    expect(res.outcome.status).toBe('failed');
    expect(res.outcome.status === 'failed' ? res.outcome.reason : '').toMatch(/^failed to initialize git: /);
    expect(res.commit).toBeUndefined();
  });

  it('gives up on a commit whose hook hangs', async () => {
    const dir = await projectDir();
    await createRepoWithHangingHook(dir);

    const started = Date.now();
    const res = await bootstrapRepository(git(dir), makeConfig(), profile, { commitTimeoutMs: 1_000 });
    const elapsed = Date.now() - started;

    expect(res.outcome).toEqual({ status: 'timeout', reason: 'git commit timed out after 1 second', timeoutMs: 1_000 });
    expect(elapsed).toBeLessThan(8_000);
    expect(res.commit).toBeUndefined();
  });

  it('kills a hook that ignores SIGTERM shortly after the deadline', async () => {
    const dir = await projectDir();
    await createRepoWithHangingHook(dir, { ignoreTerm: true });

    const started = Date.now();
    const res = await bootstrapRepository(git(dir), makeConfig(), profile, { commitTimeoutMs: 1_000 });
    const elapsed = Date.now() - started;

    expect(res.outcome).toEqual({ status: 'timeout', reason: 'git commit timed out after 1 second', timeoutMs: 1_000 });
    expect(elapsed).toBeGreaterThanOrEqual(1_000);
    expect(elapsed).toBeLessThan(2_400);
  });

  it('formats the commit message', () => {
    expect(initialCommitMessage('ledger', 'go-template-project')).toBe(
      'feat: initialize ledger project\n\nGenerated from go-template-project'
    );
    expect(new CommitTimeoutError(10_000).message).toBe('git commit timed out after 10 seconds');
  });
});

describe('installPreCommitHooks', () => {
  it('reports a missing hook manager without trying to install', async () => {
    const dir = await createTempDir();
    expect(await installPreCommitHooks(dir, { bin: 'seedling-no-such-pre-commit' })).toEqual({
      status: 'failed',
      reason: 'seedling-no-such-pre-commit not installed'
    });
  });

  it('installs through the hook manager', async () => {
    const dir = await createTempDir();
    const bin = await writeFakeTool(dir, 'fake-pre-commit', 'if [ "$1" = "install" ]; then touch installed; fi\necho "fake 1.0"');

    expect(await installPreCommitHooks(dir, { bin })).toEqual({ status: 'ok' });
    expect(await fileExists(join(dir, 'installed'))).toBe(true);
  });

  it('reports a failed install', async () => {
    const dir = await createTempDir();
    const bin = await writeFakeTool(dir, 'broken-pre-commit', 'if [ "$1" = "--version" ]; then echo "fake 1.0"; exit 0; fi\nexit 1');

    const res = await installPreCommitHooks(dir, { bin });
    expect(res.status).toBe('failed');
    const reason = res.status === 'failed' ? res.reason : '';
    expect(reason.startsWith(`${bin} install failed: `)).toBe(true);
  });
});
