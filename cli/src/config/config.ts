import { join } from 'path';
import { z } from 'zod';
import { formatIssues } from '@shelfwise/shared';
import { LOG_LEVEL_NAMES, type LogLevel } from '../utils/logger.js';

export const DEFAULT_DATA_DIR = './.shelfwise';

const EnvSchema = z.object({
  SHELFWISE_EXPORT_FILE: z.string().min(1).optional(),
  SHELFWISE_DATA_DIR: z.string().min(1).default(DEFAULT_DATA_DIR),
  LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).optional(),
});

export interface AppConfig {
  exportFile?: string;
  dataDir: string;
  snapshotFile: string;
  historyFile: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Read configuration from the environment. `debug` forces the debug log level.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  options: { debug?: boolean } = {}
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const { SHELFWISE_EXPORT_FILE, SHELFWISE_DATA_DIR, LOG_LEVEL } = parsed.data;
  return {
    exportFile: SHELFWISE_EXPORT_FILE,
    dataDir: SHELFWISE_DATA_DIR,
    snapshotFile: join(SHELFWISE_DATA_DIR, 'catalog.json'),
    historyFile: join(SHELFWISE_DATA_DIR, 'history.json'),
    logLevel: options.debug ? 'debug' : LOG_LEVEL ?? 'warn',
  };
}

export function requireExportFile(config: AppConfig): string {
  if (!config.exportFile) {
    throw new ConfigError('SHELFWISE_EXPORT_FILE must point to a library export file');
  }
  return config.exportFile;
}
