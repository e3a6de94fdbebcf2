import { fileURLToPath } from 'node:url';
import { join } from 'node:path';

/**
 * Absolute path into the repository's data/ directory.
 * Resolves the same from src/ (tests) and dist/ (built).
 */
export function dataPath(...segments: string[]): string {
  return join(fileURLToPath(new URL('../../data/', import.meta.url)), ...segments);
}
