import { z } from 'zod';
import { InvalidArgumentError } from './types';

const flag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no'])
  .transform(value => value === '1' || value === 'true' || value === 'yes');

export const AdbConfigSchema = z.object({
  ADB_BINARY: z.string().min(1).default('adb'),
  ADB_DEBUG: flag.default('false'),
  ADB_SINGLETON: flag.default('false'),
  ADB_RESTART_SERVER: flag.default('false'),
  ADB_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  ADB_DEVICE: z.string().min(1).optional(),
});

const FLAG_KEYS = new Set(['ADB_DEBUG', 'ADB_SINGLETON', 'ADB_RESTART_SERVER']);

export interface AdbConfig {
  binary: string;
  debug: boolean;
  singleton: boolean;
  // Restart the adb server once before the first connect
  restartServer: boolean;
  timeoutMs?: number;
  // Address to connect to when the server starts
  device?: string;
}

// Reads configuration from environment variables; empty values count as unset
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AdbConfig {
  const source: Record<string, string> = {};
  for (const key of Object.keys(AdbConfigSchema.shape)) {
    const value = env[key]?.trim();
    if (value) {
      source[key] = FLAG_KEYS.has(key) ? value.toLowerCase() : value;
    }
  }

  const parsed = AdbConfigSchema.safeParse(source);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue.path.join('.');
    throw new InvalidArgumentError(`Invalid ${variable}: ${issue.message}`, source[variable]);
  }

  return {
    binary: parsed.data.ADB_BINARY,
    debug: parsed.data.ADB_DEBUG,
    singleton: parsed.data.ADB_SINGLETON,
    restartServer: parsed.data.ADB_RESTART_SERVER,
    timeoutMs: parsed.data.ADB_TIMEOUT_MS,
    device: parsed.data.ADB_DEVICE,
  };
}
