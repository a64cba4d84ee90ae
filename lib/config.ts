// Centralized runtime configuration for timeouts, concurrency, resolver and history settings.
// Values are read from env with sane defaults and can be overridden in tests.

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
}

// Like envInt but accepts 0 (used where 0 means "disabled").
function envCount(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : fallback;
}

function envBool(name: string, fallback: boolean): boolean {
  const v = process.env[name]?.trim().toLowerCase();
  if (!v) return fallback;
  return v === '1' || v === 'true' || v === 'yes';
}

function envList(name: string, fallback: string[]): string[] {
  const v = process.env[name];
  if (!v) return fallback;
  return v.split(',').map((s) => s.trim()).filter(Boolean);
}

function envPath(name: string): string | null {
  const v = process.env[name]?.trim();
  return v ? v : null;
}

export function loadConfig() {
  return {
    HTTP_TIMEOUT_MS: envInt('HTTP_TIMEOUT_MS', 8000),
    DNS_TIMEOUT_MS: envInt('DNS_TIMEOUT_MS', 3000),
    DNS_SERVERS: envList('DNS_SERVERS', []),

    CRTSH: {
      URL: process.env.CRTSH_URL || 'https://crt.sh/',
      TIMEOUT_MS: envInt('CRTSH_TIMEOUT_MS', 20_000),
      USER_AGENT: process.env.CRTSH_USER_AGENT || 'subdomain-radar/1.0',
    },

    CONCURRENCY: {
      RESOLVER: envInt('RESOLVER_CONCURRENCY', 100),
      PROBE: envInt('PROBE_CONCURRENCY', 20),
      // per upstream host (crt.sh)
      SOURCE: envInt('SOURCE_CONCURRENCY', 2),
    },

    BRUTEFORCE: {
      WORDS: envList('BRUTEFORCE_WORDS', ['www', 'api', 'dev', 'mail', 'staging', 'test']),
      EXTRA_WORDLIST: envPath('BRUTEFORCE_EXTRA_WORDLIST'),
      SECLISTS_WORDLIST: envPath('SECLISTS_WORDLIST'),
      SECLISTS_MIN_WORDS: envCount('SECLISTS_MIN_WORDS', 500),
    },

    MASSDNS: {
      BIN: envPath('MASSDNS_BIN'),
      RESOLVERS_FILE: process.env.MASSDNS_RESOLVERS_FILE || 'resolvers.txt',
      BATCH_SIZE: envInt('MASSDNS_BATCH_SIZE', 400),
      TIMEOUT_MS: envInt('MASSDNS_TIMEOUT_MS', 120_000),
    },

    HISTORY: {
      ENABLED: envBool('ENABLE_HISTORY', true),
      RECENT_LIMIT: envInt('RECENT_SCANS_LIMIT', 50),
      PER_DOMAIN_LIMIT: envInt('PER_DOMAIN_HISTORY_LIMIT', 10),
    },

    RATE_LIMIT: {
      REQUESTS: envCount('RATE_LIMIT_REQUESTS', 60),
      WINDOW_MS: envInt('RATE_LIMIT_WINDOW_MS', 60_000),
      MAX_KEYS: envInt('RATE_LIMIT_MAX_KEYS', 10_000),
      TRUST_X_FORWARDED_FOR: envBool('TRUST_X_FORWARDED_FOR', false),
    },

    STREAM_BUFFER: envInt('STREAM_BUFFER', 64),
    REDIS_URL: envPath('REDIS_URL'),
    CACHE_KEY_PREFIX: process.env.CACHE_KEY_PREFIX || 'v1:',
    PORT: envInt('PORT', 8000),
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const CONFIG: AppConfig = loadConfig();

export default CONFIG;
