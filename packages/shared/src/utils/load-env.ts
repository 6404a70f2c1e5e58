/**
 * Utility to load .env file from project root
 * Works from any package directory
 */

import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';

/**
 * Find the closest directory holding `fileName`, walking up from `startPath`
 */
export function findProjectRoot(startPath: string, fileName = '.env'): string | null {
  let current = resolve(startPath);

  for (;;) {
    if (existsSync(join(current, fileName))) {
      return current;
    }
    const parent = resolve(current, '..');
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

export interface LoadEnvOptions {
  /** Directory to start searching from (defaults to this module's location) */
  startDir?: string;
  /** Env file name */
  fileName?: string;
}

/**
 * Load environment variables from the project root .env file
 *
 * @returns path of the file loaded, or null when dotenv fell back to the working directory
 */
export function loadEnvFromRoot(options: LoadEnvOptions = {}): string | null {
  const fileName = options.fileName ?? '.env';
  const startDir = options.startDir ?? dirname(fileURLToPath(import.meta.url));

  const projectRoot = findProjectRoot(startDir, fileName);

  if (projectRoot) {
    const envPath = join(projectRoot, fileName);
    dotenv.config({ path: envPath });
    return envPath;
  }

  dotenv.config();
  return null;
}
