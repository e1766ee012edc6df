/**
 * Environment variable loader
 *
 * This file MUST be imported before any other modules that depend on environment variables.
 * It loads variables from the project's .env file. Variables already present in the
 * process environment take precedence.
 */

import { config } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { existsSync } from 'fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// src/ and dist/ both sit directly under the project root
const projectRoot = resolve(__dirname, '..');
const envPath = resolve(projectRoot, '.env');

let loadedFrom: string | null = null;

if (existsSync(envPath)) {
  const result = config({ path: envPath, override: false });
  if (result.parsed) {
    loadedFrom = envPath;
  }
}

export { loadedFrom };
