import { MODULE_PATH_PATTERN, PROJECT_NAME_PATTERN } from './types.js';

/** Raised when collected configuration is unusable; always before any file is touched. */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function isValidProjectName(name: string): boolean {
  return name.length > 0 && PROJECT_NAME_PATTERN.test(name);
}

export function isValidModulePath(path: string): boolean {
  return MODULE_PATH_PATTERN.test(path);
}

export function assertValidProjectName(name: string): void {
  if (!isValidProjectName(name)) {
    throw new ConfigurationError('invalid project name: must contain only letters, numbers, and hyphens', 'projectName');
  }
}

export function assertValidModulePath(path: string): void {
  if (!isValidModulePath(path)) {
    throw new ConfigurationError('invalid module path format', 'modulePath');
  }
}
