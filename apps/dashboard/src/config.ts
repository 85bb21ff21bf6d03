import { DEFAULT_MODEL, DEFAULT_TEMPERATURE } from '@townsquare/career-ideas';
import type { LevelWithSilent } from 'pino';

export interface DashboardConfig {
  host: string;
  port: number;
  sessionIdleMs: number;
  maxBodyBytes: number;
  geocoder: {
    enabled: boolean;
    baseUrl: string;
    userAgent: string;
  };
  languageModel: {
    apiKey?: string;
    model: string;
    temperature: number;
  };
  logging: {
    level: LevelWithSilent;
    service: string;
  };
}

type Env = Record<string, string | undefined>;

const DEFAULT_HOST = '127.0.0.1';
const DEFAULT_PORT = 3000;
const DEFAULT_SESSION_IDLE_MINUTES = 60;
const DEFAULT_MAX_BODY_BYTES = 1_048_576;
const DEFAULT_GEOCODER_URL = 'https://nominatim.openstreetmap.org';
const DEFAULT_GEOCODER_USER_AGENT = 'townsquare-community-map';
const MAX_TEMPERATURE = 2;
const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const DEFAULT_SERVICE_NAME = 'townsquare-dashboard';

const LOG_LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function readStringEnv(env: Env, name: string, fallback: string): string {
  return env[name]?.trim() || fallback;
}

function readIntEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return Math.floor(parsed);
}

function readBoolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }

  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }

  return fallback;
}

function readTemperatureEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > MAX_TEMPERATURE) {
    return fallback;
  }

  return parsed;
}

function readLogLevelEnv(env: Env, name: string): LevelWithSilent {
  const raw = env[name]?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? DEFAULT_LOG_LEVEL;
}

export function readDashboardConfig(env: Env = process.env): DashboardConfig {
  return {
    host: readStringEnv(env, 'HOST', DEFAULT_HOST),
    port: readIntEnv(env, 'PORT', DEFAULT_PORT),
    sessionIdleMs: readIntEnv(env, 'SESSION_IDLE_MINUTES', DEFAULT_SESSION_IDLE_MINUTES) * 60_000,
    maxBodyBytes: readIntEnv(env, 'MAX_BODY_BYTES', DEFAULT_MAX_BODY_BYTES),
    geocoder: {
      enabled: readBoolEnv(env, 'GEOCODER_ENABLED', true),
      baseUrl: readStringEnv(env, 'GEOCODER_URL', DEFAULT_GEOCODER_URL),
      userAgent: readStringEnv(env, 'GEOCODER_USER_AGENT', DEFAULT_GEOCODER_USER_AGENT),
    },
    languageModel: {
      apiKey: env.OPENAI_API_KEY?.trim() || undefined,
      model: readStringEnv(env, 'OPENAI_MODEL', DEFAULT_MODEL),
      temperature: readTemperatureEnv(env, 'OPENAI_TEMPERATURE', DEFAULT_TEMPERATURE),
    },
    logging: {
      level: readLogLevelEnv(env, 'LOG_LEVEL'),
      service: readStringEnv(env, 'LOG_SERVICE_NAME', DEFAULT_SERVICE_NAME),
    },
  };
}
