import * as dotenv from 'dotenv';
import { Logger } from '../utils/logger.js';
import { MAX_TIMEOUT_MS } from '../utils/timeouts.js';

dotenv.config();

export interface AppConfig {
  proxy: {
    host: string;
    port: number;
  };
  upstream: {
    timeout: number;
    userAgent: string;
  };
  governor: {
    capacityPerHost: number;
    acquireTimeout: number;
  };
  playlist: {
    variantLimit: number;
  };
  orchestrator: {
    deadline: number;
  };
}

type Env = Record<string, string | undefined>;

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const logger = new Logger('Config');

function readInt(env: Env, name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    logger.warn(`Invalid value for ${name}, using default`, { value: raw, default: fallback });
    return fallback;
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    proxy: {
      host: env.PROXY_HOST || '127.0.0.1',
      port: readInt(env, 'PROXY_PORT', 0, 0, 65535)
    },
    upstream: {
      timeout: readInt(env, 'UPSTREAM_TIMEOUT_MS', 15000, 1, MAX_TIMEOUT_MS),
      userAgent: env.UPSTREAM_USER_AGENT || DEFAULT_USER_AGENT
    },
    governor: {
      capacityPerHost: readInt(env, 'GOVERNOR_CAPACITY', 6, 1),
      acquireTimeout: readInt(env, 'GOVERNOR_ACQUIRE_TIMEOUT_MS', 30000, 1, MAX_TIMEOUT_MS)
    },
    playlist: {
      variantLimit: readInt(env, 'VARIANT_LIMIT', 3, 1)
    },
    orchestrator: {
      deadline: readInt(env, 'GATHER_DEADLINE_MS', 10000, 1, MAX_TIMEOUT_MS)
    }
  };
}

export const config: AppConfig = loadConfig();
