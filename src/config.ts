import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  logsDir: string;
  logLevel: LogLevel;
}

function defaultLogsDir(): string {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  return path.join(moduleDir, '..', 'logs');
}

const envSchema = z.object({
  BLAME_PORCELAIN_LOG_DIR: z.string().min(1).optional().catch(undefined),
  BLAME_PORCELAIN_LOG_LEVEL: z.enum(LOG_LEVELS).optional().catch(undefined),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    logsDir: parsed.BLAME_PORCELAIN_LOG_DIR ?? defaultLogsDir(),
    logLevel: parsed.BLAME_PORCELAIN_LOG_LEVEL ?? 'info',
  };
}
