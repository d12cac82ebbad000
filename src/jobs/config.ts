/**
 * Run System Configuration
 *
 * Where per-run log files go. An empty RUN_LOG_DIR turns them off.
 */

import { env } from '../config/env';

export interface RunConfig {
  logBase: string | null; // Base directory for run logs
}

export function getRunConfig(): RunConfig {
  const logBase = env.RUN_LOG_DIR.trim();
  return {
    logBase: logBase || null,
  };
}
