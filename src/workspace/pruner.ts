import { join } from 'node:path';

import { COMPONENT_FLAGS, ComponentId, type ProjectConfiguration } from '../core/config/types.js';
import { removeTree } from '../utils/fs.js';
import { getLogger } from '../utils/logger.js';
import { COMPONENT_DIRECTORIES } from './layout.js';

export function declinedComponents(config: ProjectConfiguration): ComponentId[] {
  return ComponentId.options.filter((id) => !config[COMPONENT_FLAGS[id]]);
}

/**
 * Delete the directories of every component the configuration turns off.
 * Missing directories are fine, so running this twice changes nothing.
 * Returns the directories targeted (relative to `root`).
 */
export async function pruneComponents(root: string, config: ProjectConfiguration): Promise<string[]> {
  const log = getLogger();
  const targets = declinedComponents(config).flatMap((id) => COMPONENT_DIRECTORIES[id]);
  for (const rel of targets) {
    await removeTree(join(root, rel));
    log.debug('pruned component directory', { dir: rel });
  }
  return targets;
}
