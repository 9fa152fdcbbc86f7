import { basename, resolve } from 'node:path';

import { readGlobalConfig } from '../../git/operations.js';
import { DEFAULT_AUTHOR_EMAIL, DEFAULT_AUTHOR_NAME, DEFAULT_LICENSE, type TemplateProfile } from './types.js';

/** Looks up a user-level VCS setting, answering `fallback` on any failure. */
export type IdentityLookup = (key: string, fallback: string) => Promise<string>;

export interface PromptDefaults {
  projectName: string;
  description: string;
  authorName: string;
  authorEmail: string;
  license: string;
}

export function defaultModulePath(projectName: string): string {
  return `github.com/your-org/${projectName}`;
}

export async function resolvePromptDefaults(
  root: string,
  profile: TemplateProfile,
  lookup: IdentityLookup = readGlobalConfig
): Promise<PromptDefaults> {
  const [authorName, authorEmail] = await Promise.all([
    lookup('user.name', DEFAULT_AUTHOR_NAME),
    lookup('user.email', DEFAULT_AUTHOR_EMAIL)
  ]);
  return {
    projectName: basename(resolve(root)),
    description: `A Go application built from ${profile.templateName}`,
    authorName,
    authorEmail,
    license: DEFAULT_LICENSE
  };
}
