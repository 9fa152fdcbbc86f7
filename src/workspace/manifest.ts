import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { ProjectConfiguration, TemplateProfile } from '../core/config/types.js';
import { getLogger } from '../utils/logger.js';

export function renderModuleManifest(modulePath: string, languageVersion: string): string {
  return `module ${modulePath}

go ${languageVersion}

require (
\t// Runtime dependencies will be added as needed
)
`;
}

/**
 * Replace the module manifest with a fresh one for the new module path.
 * Whatever the template declared before (dependencies included) is dropped.
 */
export async function writeModuleManifest(
  root: string,
  config: ProjectConfiguration,
  profile: TemplateProfile
): Promise<string> {
  const path = join(root, profile.manifestFile);
  await writeFile(path, renderModuleManifest(config.modulePath, profile.languageVersion), { encoding: 'utf8', mode: 0o644 });
  getLogger().debug('wrote module manifest', { path, modulePath: config.modulePath });
  return path;
}
