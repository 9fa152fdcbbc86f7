import { describe, expect, it } from 'vitest';

import { configurationSummary, nextSteps } from '../src/cli/ui/branding.js';
import { formatMs, padRight, stripAnsi } from '../src/cli/ui/format.js';
import { makeConfig } from './template-fixture.js';

describe('nextSteps', () => {
  it('mentions the docs only when docs are enabled', () => {
    expect(nextSteps(makeConfig({ enableDocs: false }))).toEqual([
      '1. Review the generated files',
      "2. Run 'make setup' to install development tools",
      "3. Run 'make check' to verify everything works",
      '4. Start coding!'
    ]);
    expect(nextSteps(makeConfig({ enableDocs: true }))).toEqual([
      '1. Review the generated files',
      "2. Run 'make setup' to install development tools",
      "3. Run 'make check' to verify everything works",
      '4. Update documentation in docs/ to match your project',
      '5. Start coding!'
    ]);
  });
});

describe('configurationSummary', () => {
  it('boxes every field', () => {
    const plain = configurationSummary(makeConfig()).map(stripAnsi);
    const width = plain[0].length;

    expect(plain[0].startsWith('╭─── Configuration Summary ')).toBe(true);
    expect(plain.every((line) => line.length === width)).toBe(true);
    expect(plain.some((line) => line.includes('Module Path   github.com/example/example-project'))).toBe(true);
    expect(plain.some((line) => line.includes('Git Remote    (none)'))).toBe(true);
    expect(plain.some((line) => line.includes('Server        no'))).toBe(true);
  });
});

describe('format helpers', () => {
  it('formats durations', () => {
    expect(formatMs(124)).toBe('124ms');
    expect(formatMs(3_200)).toBe('3.2s');
    expect(formatMs(102_000)).toBe('1m 42s');
  });

  it('pads labels', () => {
    expect(padRight('CLI', 6)).toBe('CLI   ');
    expect(padRight('Description', 4)).toBe('Description');
  });
});
