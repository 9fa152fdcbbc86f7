import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { ProjectConfiguration, TemplateProfile } from '../core/config/types.js';
import { README_FILE } from '../workspace/layout.js';
import { getLogger } from '../utils/logger.js';
import { renderTemplate } from './engine.js';
import { loadTemplate } from './loader.js';
import { buildTemplateContext, type ContextOptions } from './sections.js';

export interface RenderOptions extends ContextOptions {
  templatesDir?: string;
}

export async function renderReadme(
  config: ProjectConfiguration,
  profile: TemplateProfile,
  opts: RenderOptions = {}
): Promise<string> {
  const template = await loadTemplate('readme', opts.templatesDir);
  return renderTemplate(template, buildTemplateContext(config, profile, opts));
}

/**
 * Render the project README and write it over whatever README the template had.
 * Template and write errors propagate: this step is not optional.
 */
export async function generateReadme(
  root: string,
  config: ProjectConfiguration,
  profile: TemplateProfile,
  opts: RenderOptions = {}
): Promise<string> {
  const content = await renderReadme(config, profile, opts);
  const path = join(root, README_FILE);
  await writeFile(path, content, 'utf8');
  getLogger().debug('wrote README', { path, bytes: content.length });
  return path;
}
