import { existsSync } from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { logger } from './logger.js';

/**
 * Find the project root directory by searching upward for a package.json
 * @param startDir - Directory to start searching from
 * @returns Path to project root, or null if not found
 */
export function findProjectRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  const root = path.parse(current).root;

  while (current !== root) {
    if (existsSync(path.join(current, 'package.json'))) {
      return current;
    }
    current = path.dirname(current);
  }

  return null;
}

/**
 * Load .env files in cascading order (local overrides global)
 * Priority: process.env > cwd/.env > project root/.env
 *
 * Uses dotenv with override: false, so earlier loaded files take precedence
 *
 * @returns Array of successfully loaded .env file paths
 */
export function loadEnvFiles(cwd: string): string[] {
  const loadedFiles: string[] = [];
  const envFilePaths = [path.join(path.resolve(cwd), '.env')];

  const projectRoot = findProjectRoot(cwd);
  if (projectRoot) {
    const rootEnv = path.join(projectRoot, '.env');
    if (!envFilePaths.includes(rootEnv)) {
      envFilePaths.push(rootEnv);
    }
  }

  for (const envPath of envFilePaths) {
    if (!existsSync(envPath)) continue;

    const result = dotenv.config({ path: envPath, override: false, quiet: true });
    if (result.error) {
      // Keep loading the remaining files
      logger.warn(`Failed to load ${envPath}: ${result.error.message}`);
      continue;
    }
    loadedFiles.push(envPath);
  }

  return loadedFiles;
}
