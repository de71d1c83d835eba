/**
 * .env loading
 *
 * First found wins:
 * 1. DOC_INTAKE_ENV_FILE (explicit override)
 * 2. CWD/.env (project-local)
 * 3. Package root/.env (development and built layouts)
 *
 * @module server/env
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export function envFileCandidates(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string[] {
  return [
    env.DOC_INTAKE_ENV_FILE,
    path.resolve(cwd, '.env'),
    // src/server -> package root; dist/src/server -> package root
    path.resolve(__dirname, '..', '..', '.env'),
    path.resolve(__dirname, '..', '..', '..', '.env'),
  ].filter((p): p is string => typeof p === 'string' && p.length > 0);
}

/**
 * Load the first .env file that exists. Variables already set win.
 *
 * @returns Path of the loaded file, or null if none was found
 */
export function loadEnvFile(env: NodeJS.ProcessEnv = process.env): string | null {
  for (const envPath of envFileCandidates(env)) {
    if (fs.existsSync(envPath)) {
      const result = dotenv.config({ path: envPath });
      if (result.error) {
        throw result.error;
      }
      console.error(`[Config] Loaded ${envPath}`);
      return envPath;
    }
  }
  return null;
}
