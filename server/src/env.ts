/**
 * Environment variable loader
 *
 * Import before any module that reads environment variables. Loads, without
 * overriding variables already set:
 *   1. Project root .env file
 *   2. Server-specific .env file (server/.env)
 */

import { config } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { existsSync } from 'fs';

const currentDir = dirname(fileURLToPath(import.meta.url));

// Compiled code lives in <root>/dist, sources in <root>/server/src
const isCompiledCode = currentDir.split(/[\\/]/).includes('dist');
const projectRoot = isCompiledCode ? resolve(currentDir, '..') : resolve(currentDir, '..', '..');
const serverDir = resolve(projectRoot, 'server');

const envPaths = [
  resolve(projectRoot, '.env'),
  resolve(serverDir, '.env'),
];

let loadedFrom: string | null = null;

for (const envPath of envPaths) {
  if (existsSync(envPath)) {
    const result = config({ path: envPath, override: false });
    if (result.parsed && !loadedFrom) {
      loadedFrom = envPath;
    }
  }
}

export { loadedFrom };
