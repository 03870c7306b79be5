/**
 * Environment configuration.
 * Read once at startup; a missing or malformed value fails fast.
 */

const DEFAULT_SESSION_TIME_SECONDS = 86_400; // 24 hours

export interface AppConfig {
  jwt: {
    secret: string;
    sessionTimeSeconds: number;
  };
  supabase: {
    url: string;
    serviceRoleKey: string;
  } | null;
  axiom: {
    apiToken: string;
    dataset: string;
  } | null;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const secret = env.JWT_SECRET;
  if (!secret) {
    throw new Error('Missing required environment variable: JWT_SECRET');
  }

  return {
    jwt: {
      secret,
      sessionTimeSeconds: parseSessionTime(env.JWT_SESSION_TIME),
    },
    supabase:
      env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY
        ? { url: env.SUPABASE_URL, serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY }
        : null,
    axiom:
      env.AXIOM_API_KEY && env.AXIOM_DATASET
        ? { apiToken: env.AXIOM_API_KEY, dataset: env.AXIOM_DATASET }
        : null,
  };
}

function parseSessionTime(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_SESSION_TIME_SECONDS;

  const seconds = Number(raw);
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new Error(`JWT_SESSION_TIME must be a positive integer (seconds), got "${raw}"`);
  }
  return seconds;
}
