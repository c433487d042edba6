/**
 * Locates the Handlebars asset directories shipped with this package.
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

/** `packages/report/<name>`, one level above both `src/` and `dist/` */
export function assetDir(name: 'prompts' | 'templates'): string {
  return path.resolve(moduleDir, '..', name);
}
