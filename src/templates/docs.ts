import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { ProjectConfiguration, TemplateProfile } from '../core/config/types.js';
import { fileExists } from '../utils/fs.js';
import { getLogger } from '../utils/logger.js';
import { renderTemplate } from './engine.js';
import { loadTemplate, type TemplateId } from './loader.js';
import type { RenderOptions } from './readme.js';
import { buildTemplateContext } from './sections.js';

/**
 * Rewrite the docs landing pages so they describe the new project instead of
 * the template. Pages the template does not ship are left alone.
 * Returns the pages written, relative to `root`.
 */
export async function regenerateDocsPages(
  root: string,
  config: ProjectConfiguration,
  profile: TemplateProfile,
  opts: RenderOptions = {}
): Promise<string[]> {
  const pages: Array<[TemplateId, string]> = [
    ['docs-index', profile.docsPages.index],
    ['docs-getting-started', profile.docsPages.gettingStarted]
  ];
  const ctx = buildTemplateContext(config, profile, opts);
  const written: string[] = [];

  for (const [id, rel] of pages) {
    const path = join(root, rel);
    if (!(await fileExists(path))) continue;
    const template = await loadTemplate(id, opts.templatesDir);
    await writeFile(path, renderTemplate(template, ctx), 'utf8');
    written.push(rel);
    getLogger().debug('rewrote docs page', { page: rel });
  }

  return written;
}
