/**
 * Side-effect import: populates process.env from .env.local, then .env.
 *
 * Existing variables win (override: false), so values exported by the shell or
 * a service manager are never replaced by a file. Import this before anything
 * that reads process.env at module load:
 *
 *   import './load-env';
 */

import { config } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

export const ENV_FILES = ['.env.local', '.env'] as const;

export function loadEnv(cwd: string = process.cwd()): string[] {
  const loaded: string[] = [];
  for (const file of ENV_FILES) {
    const path = resolve(cwd, file);
    if (existsSync(path)) {
      config({ path, override: false });
      loaded.push(path);
    }
  }
  return loaded;
}

loadEnv();
