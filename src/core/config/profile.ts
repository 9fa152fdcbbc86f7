import { join } from 'node:path';

import { fileExists, readYaml } from '../../utils/fs.js';
import { PROFILE_FILE } from '../../workspace/layout.js';
import { TemplateProfile } from './types.js';
import { ConfigurationError } from './validation.js';

export function defaultTemplateProfile(): TemplateProfile {
  return TemplateProfile.parse({});
}

/**
 * Load the template profile for `root`: built-in defaults, overridden field by
 * field by `.seedling.yaml` when the template ships one.
 */
export async function loadTemplateProfile(root: string): Promise<TemplateProfile> {
  const path = join(root, PROFILE_FILE);
  if (!(await fileExists(path))) return defaultTemplateProfile();

  let raw: unknown;
  try {
    raw = await readYaml(path);
  } catch (err) {
    throw new ConfigurationError(`${PROFILE_FILE}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = TemplateProfile.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`${PROFILE_FILE}: ${formatIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

export function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}
