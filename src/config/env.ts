import dotenv from 'dotenv';

dotenv.config();

/**
 * Parse a whole, non-negative number. Throws on anything else, so a typo
 * never turns into NaN.
 */
export function parseNonNegativeInt(raw: string, name: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

const int = (source: NodeJS.ProcessEnv, name: string, fallback: string): number =>
  parseNonNegativeInt(source[name] || fallback, name);

/**
 * Build the settings object from an environment record
 */
export function readEnv(source: NodeJS.ProcessEnv = process.env) {
  return {
    NODE_ENV: source.NODE_ENV || 'development',

    // Database
    MONGODB_URI: source.MONGODB_URI || 'mongodb://localhost:27017/starcrawl',

    // GitHub
    GITHUB_TOKEN: source.GITHUB_TOKEN,
    GITHUB_API_URL: source.GITHUB_API_URL || 'https://api.github.com/graphql',
    GITHUB_PAGE_SIZE: int(source, 'GITHUB_PAGE_SIZE', '100'), // GitHub caps search pages at 100
    GITHUB_REQUEST_TIMEOUT: int(source, 'GITHUB_REQUEST_TIMEOUT', '30000'), // 30s

    // Crawl
    CRAWL_TARGET: int(source, 'CRAWL_TARGET', '100000'),
    MAX_CONCURRENCY: int(source, 'MAX_CONCURRENCY', '15'),
    CHUNK_MULTIPLIER: int(source, 'CHUNK_MULTIPLIER', '4'), // chunk = concurrency × multiplier
    RATE_LIMIT_LOW_WATER: int(source, 'RATE_LIMIT_LOW_WATER', '20'),
    RATE_LIMIT_COOLDOWN_MS: int(source, 'RATE_LIMIT_COOLDOWN_MS', '60000'), // 1 minute
    RATE_LIMIT_SLEEP_MS: int(source, 'RATE_LIMIT_SLEEP_MS', '60000'), // on explicit RATE_LIMITED

    // Resilience
    MAX_RETRIES: int(source, 'MAX_RETRIES', '5'),
    RETRY_BACKOFF_BASE: int(source, 'RETRY_BACKOFF_BASE', '1000'), // 1s, 2s, 4s, 8s, 16s

    // Circuit Breaker
    CIRCUIT_BREAKER_ENABLED: source.CIRCUIT_BREAKER_ENABLED === 'true', // Default false
    CIRCUIT_BREAKER_TIMEOUT: int(source, 'CIRCUIT_BREAKER_TIMEOUT', '45000'),
    CIRCUIT_BREAKER_ERROR_THRESHOLD: int(source, 'CIRCUIT_BREAKER_ERROR_THRESHOLD', '50'), // 50%
    CIRCUIT_BREAKER_RESET_TIMEOUT: int(source, 'CIRCUIT_BREAKER_RESET_TIMEOUT', '30000'),
    CIRCUIT_BREAKER_MIN_REQUESTS: int(source, 'CIRCUIT_BREAKER_MIN_REQUESTS', '5'),

    // Export
    EXPORT_FILE: source.EXPORT_FILE || 'star_counts.csv',
  } as const;
}

export type Env = ReturnType<typeof readEnv>;

export const env = readEnv();

export default env;
