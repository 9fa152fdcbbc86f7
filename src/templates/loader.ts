import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { parseTemplate, type Template } from './engine.js';

export type TemplateId = 'readme' | 'docs-index' | 'docs-getting-started';

const TEMPLATE_FILES: Record<TemplateId, string> = {
  readme: 'readme.md.tmpl',
  'docs-index': 'docs-index.md.tmpl',
  'docs-getting-started': 'docs-getting-started.md.tmpl'
};

let _templatesDir: string | null = null;

/**
 * Locate the shipped `templates/` directory. Works from the sources (src/templates/)
 * and from the bundle (dist/cli.js) by walking up from this module.
 */
export function resolveTemplatesDir(): string {
  if (_templatesDir) return _templatesDir;

  let current = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 6; i++) {
    const candidate = resolve(current, 'templates');
    if (existsSync(join(candidate, TEMPLATE_FILES.readme))) {
      _templatesDir = candidate;
      return candidate;
    }
    const parent = resolve(current, '..');
    if (parent === current) break;
    current = parent;
  }
  throw new Error(`templates directory not found above ${fileURLToPath(import.meta.url)}`);
}

export async function loadTemplate(id: TemplateId, templatesDir: string = resolveTemplatesDir()): Promise<Template> {
  const file = TEMPLATE_FILES[id];
  const source = await readFile(join(templatesDir, file), 'utf8');
  return parseTemplate(source, file);
}
