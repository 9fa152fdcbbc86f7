import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Version of the installed tool, read from the nearest package.json above this
 * module. Works from both `src/` and the bundled `dist/`.
 */
export function detectVersionSync(): string | null {
  try {
    let current = dirname(fileURLToPath(import.meta.url));
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
        if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
          return parsed.version;
        }
        return null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}
