import type { ComponentId } from '../core/config/types.js';

/**
 * Directories each optional component owns, relative to the project root.
 * Declining a component deletes all of them.
 */
export const COMPONENT_DIRECTORIES: Readonly<Record<ComponentId, readonly string[]>> = {
  cli: ['cmd/cli'],
  server: ['cmd/server', 'internal/handlers'],
  worker: ['cmd/worker'],
  docs: ['docs'],
  // Coarse on purpose: the whole test tree goes, whatever else lives in it.
  e2e: ['tests']
};

export const README_FILE = 'README.md';

export const PROFILE_FILE = '.seedling.yaml';
