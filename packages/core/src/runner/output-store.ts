/**
 * Output Store
 *
 * Files written under the run's log directory: saved command outputs and
 * the results files.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';

import { COMMAND_OUTPUT_DIR, CURRENT_LOG_DIR_PREFIX } from '../constants.js';
import { sanitizeFileName } from '../helpers/utils.js';

export class OutputStore {
  readonly logDir: string;
  readonly commandOutputDir: string;

  constructor(logDir: string) {
    this.logDir = resolve(logDir);
    this.commandOutputDir = join(this.logDir, COMMAND_OUTPUT_DIR);
  }

  /**
   * File a step's command output is saved to.
   *
   * @example
   * store.commandOutputPath('TC-1', 'step_2', 'Read CPU temp');
   * // <logDir>/command_outputs/TC-1_step_2_Read_CPU_temp.txt
   */
  commandOutputPath(scenarioId: string, stepId: string, stepName: string): string {
    return join(this.commandOutputDir, `${scenarioId}_${stepId}_${sanitizeFileName(stepName)}.txt`);
  }

  saveCommandOutput(scenarioId: string, stepId: string, stepName: string, output: string): string {
    const path = this.commandOutputPath(scenarioId, stepId, stepName);
    mkdirSync(this.commandOutputDir, { recursive: true });
    writeFileSync(path, output, 'utf-8');
    return path;
  }

  /**
   * Map a `current_log_dir/...` path into this run's command output directory.
   * Returns undefined for paths without the prefix.
   */
  resolveLogPath(path: string): string | undefined {
    if (path === CURRENT_LOG_DIR_PREFIX) return this.commandOutputDir;
    if (!path.startsWith(`${CURRENT_LOG_DIR_PREFIX}/`)) return undefined;
    return join(this.commandOutputDir, path.slice(CURRENT_LOG_DIR_PREFIX.length + 1));
  }

  /**
   * Write a JSON file under the log directory.
   */
  writeJson(fileName: string, data: unknown): string {
    const path = join(this.logDir, fileName);
    mkdirSync(this.logDir, { recursive: true });
    writeFileSync(path, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
    return path;
  }
}
