#!/usr/bin/env node
/**
 * rigcheck CLI
 *
 * Entry point for the rigcheck command-line interface.
 */

import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';

import { config } from 'dotenv';

import { runCli } from '../src/cli/index.js';
import { errorMessage } from '../src/errors.js';

/**
 * Env file names to search for (in order of priority).
 */
const ENV_FILE_NAMES = ['.env', '.env.local'];

/**
 * Search up the directory tree for an env file.
 * Similar to how git searches for .git directory.
 */
function findEnvFile(startDir: string): string | null {
  let currentDir = startDir;

  while (true) {
    for (const fileName of ENV_FILE_NAMES) {
      const envPath = join(currentDir, fileName);
      if (existsSync(envPath)) {
        return envPath;
      }
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Load the nearest .env file, searching up from the working directory.
 * Connection config values of the form `$VAR` resolve against it.
 */
function loadEnvFile(): void {
  const foundEnvPath = findEnvFile(process.cwd());
  if (foundEnvPath) {
    config({ path: foundEnvPath });
    return;
  }

  // Default dotenv behavior (cwd)
  config();
}

loadEnvFile();
runCli().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
