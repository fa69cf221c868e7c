export const APP_CONFIG = Symbol('APP_CONFIG');

export interface AppConfig {
  port: number;
  databaseUrl: string;
  sessionSecret: string;
  sessionMaxAgeMs: number;
  production: boolean;
}

const DEFAULT_PORT = 8000;
const DEFAULT_SESSION_MAX_AGE_MS = 14 * 24 * 60 * 60 * 1000;
const DEV_SESSION_SECRET = 'dev-session-secret';

function parsePositiveInt(
  name: string,
  raw: string | undefined,
  fallback: number,
): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadAppConfig(env: NodeJS.ProcessEnv): AppConfig {
  const production = env.NODE_ENV === 'production';
  const databaseUrl = env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('Missing DATABASE_URL');
  }

  const sessionSecret = env.SESSION_SECRET || DEV_SESSION_SECRET;
  if (production && sessionSecret === DEV_SESSION_SECRET) {
    throw new Error('SESSION_SECRET must be set in production');
  }

  return {
    port: parsePositiveInt('PORT', env.PORT, DEFAULT_PORT),
    databaseUrl,
    sessionSecret,
    sessionMaxAgeMs: parsePositiveInt(
      'SESSION_MAX_AGE_MS',
      env.SESSION_MAX_AGE_MS,
      DEFAULT_SESSION_MAX_AGE_MS,
    ),
    production,
  };
}
