import * as path from 'path';

export type StorageDriver = 'supabase' | 'memory';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  storageDriver: StorageDriver;
  supabaseUrl?: string;
  supabaseKey?: string;
  intentsPath: string;
}

export const APP_CONFIG = Symbol('APP_CONFIG');

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function readDriver(value: string | undefined, hasSupabase: boolean): StorageDriver {
  if (!value) return hasSupabase ? 'supabase' : 'memory';
  const driver = value.trim().toLowerCase();
  if (driver === 'supabase' || driver === 'memory') return driver;
  throw new ConfigError(`Unknown STORAGE_DRIVER "${value}" (expected "supabase" or "memory")`);
}

/**
 * Builds the typed configuration from environment variables.
 * Call after dotenv has populated process.env.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = Number(env.PORT ?? 3000);
  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigError(`PORT must be a positive integer, got "${env.PORT}"`);
  }

  const supabaseUrl = env.SUPABASE_URL || undefined;
  const supabaseKey = env.SUPABASE_KEY || undefined;
  const storageDriver = readDriver(env.STORAGE_DRIVER, Boolean(supabaseUrl && supabaseKey));

  if (storageDriver === 'supabase' && (!supabaseUrl || !supabaseKey)) {
    throw new ConfigError('STORAGE_DRIVER=supabase needs SUPABASE_URL and SUPABASE_KEY');
  }

  return {
    port,
    nodeEnv: env.NODE_ENV || 'development',
    storageDriver,
    supabaseUrl,
    supabaseKey,
    intentsPath: path.resolve(env.INTENTS_PATH || path.join('data', 'intents.json')),
  };
}
