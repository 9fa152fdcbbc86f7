import { describe, expect, it } from 'vitest';

import { parseTemplate, render, renderTemplate, TemplateError } from '../src/templates/engine.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('template rendering', () => {
  it('substitutes text fields', () => {
    expect(render('Hello {{ name }}, from {{place}}!', 't', { name: 'Ada', place: 'here' })).toBe('Hello Ada, from here!');
  });

  it('keeps or drops inline conditional text', () => {
    const src = 'x{{#if on}}y{{/if}}z';
    expect(render(src, 't', { on: true })).toBe('xyz');
    expect(render(src, 't', { on: false })).toBe('xz');
  });

  it('removes whole lines around standalone block tags', () => {
    const src = 'a\n{{#if on}}\nb\n{{/if}}\nc\n';
    expect(render(src, 't', { on: true })).toBe('a\nb\nc\n');
    expect(render(src, 't', { on: false })).toBe('a\nc\n');
  });

  it('treats indented standalone tags the same way', () => {
    expect(render('a\n  {{#if on}}  \nb\n  {{/if}}\nc', 't', { on: false })).toBe('a\nc');
  });

  it('uses non-empty strings as true', () => {
    const src = '{{#if remote}}clone {{remote}}{{/if}}{{#unless remote}}no remote{{/unless}}';
    expect(render(src, 't', { remote: 'git@example.com:r.git' })).toBe('clone git@example.com:r.git');
    expect(render(src, 't', { remote: '' })).toBe('no remote');
  });

  it('nests blocks', () => {
    const src = '{{#if a}}A{{#unless b}}-not-b{{/unless}}{{/if}}';
    expect(render(src, 't', { a: true, b: false })).toBe('A-not-b');
    expect(render(src, 't', { a: true, b: true })).toBe('A');
    expect(render(src, 't', { a: false, b: false })).toBe('');
  });

  it('parses once and renders with different contexts', () => {
    const template = parseTemplate('{{#if on}}on{{/if}}{{#unless on}}off{{/unless}}', 't');
    expect(renderTemplate(template, { on: true })).toBe('on');
    expect(renderTemplate(template, { on: false })).toBe('off');
  });

  it('leaves single braces alone', () => {
    expect(render('func main() { run() }', 't', {})).toBe('func main() { run() }');
  });
});

describe('template errors', () => {
  it('rejects unknown fields with the line number', () => {
    const err = thrown(() => render('ok\n{{missing}}', 'readme.md.tmpl', {}));
    expect(err).toBeInstanceOf(TemplateError);
    expect(err).toMatchObject({ message: 'readme.md.tmpl:2: unknown field "missing"', templateName: 'readme.md.tmpl', line: 2 });
  });

  it('rejects a flag used as text', () => {
    expect(() => render('{{on}}', 't', { on: true })).toThrow('t:1: {{on}} is a flag, not a text field');
  });

  it('rejects an unknown condition', () => {
    expect(() => render('{{#if ghost}}x{{/if}}', 't', {})).toThrow('t:1: unknown field "ghost"');
  });

  it('rejects a block that is never closed', () => {
    expect(() => parseTemplate('line1\n{{#if on}}\nbody', 't')).toThrow('t:2: {{#if on}} is never closed');
  });

  it('rejects a stray close tag', () => {
    expect(() => parseTemplate('{{/if}}', 't')).toThrow('t:1: unexpected {{/if}}');
  });

  it('rejects mismatched close tags', () => {
    expect(() => parseTemplate('{{#if a}}\n{{/unless}}', 't')).toThrow('t:2: {{/unless}} closes {{#if}} opened on line 1');
  });

  it('rejects malformed tags', () => {
    expect(() => parseTemplate('{{#if}}', 't')).toThrow('t:1: malformed tag {{#if}}');
    expect(() => parseTemplate('{{two words}}', 't')).toThrow('t:1: malformed tag {{two words}}');
  });

  it('rejects an unterminated tag', () => {
    expect(() => parseTemplate('a\nb {{name', 't')).toThrow('t:2: unterminated tag');
  });
});
