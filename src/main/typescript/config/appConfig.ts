/**
 * INPUT: environment variables (.env loaded by index.ts)
 * OUTPUT: AppConfig (credential, model, cost controls, session lifetime)
 * POS: config module, single source of runtime settings
 */

/** Sample value shipped in .env.example; treated as "no credential" */
export const PLACEHOLDER_API_KEY = 'your-anthropic-api-key-here';

export const DEFAULT_MODEL = 'claude-sonnet-4-6';

export interface AppConfig {
  apiKey: string | null;
  modelName: string;
  rateLimitDelayMs: number;
  maxCacheSize: number;
  generationTimeoutMs: number;
  sessionTtlMs: number;
  port: number;
}

type Env = Record<string, string | undefined>;

/** Missing, blank or placeholder keys all count as unconfigured */
export function normalizeApiKey(raw: string | undefined): string | null {
  const key = raw?.trim();
  if (!key || key === PLACEHOLDER_API_KEY) return null;
  return key;
}

function readPositiveNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
}

function readPositiveInteger(env: Env, name: string, fallback: number): number {
  const value = readPositiveNumber(env, name, fallback);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be a whole number, got "${env[name]}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    apiKey: normalizeApiKey(env['ANTHROPIC_API_KEY']),
    modelName: env['MODEL_NAME']?.trim() || DEFAULT_MODEL,
    rateLimitDelayMs: readPositiveNumber(env, 'RATE_LIMIT_DELAY_SECONDS', 2) * 1000,
    maxCacheSize: readPositiveInteger(env, 'MAX_CACHE_SIZE', 100),
    generationTimeoutMs: readPositiveInteger(env, 'GENERATION_TIMEOUT_MS', 30_000),
    sessionTtlMs: readPositiveNumber(env, 'SESSION_TTL_MINUTES', 30) * 60 * 1000,
    port: readPositiveInteger(env, 'PORT', 3000),
  };
}

let cached: AppConfig | null = null;

/** Process-wide config, read once on first use */
export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
