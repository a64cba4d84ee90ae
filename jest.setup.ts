/**
 * Jest setup file.
 * Keeps tests off real infrastructure: no Redis, no configured massdns, quiet logs.
 */

process.env.LOG_LEVEL = 'silent';
delete process.env.REDIS_URL;
delete process.env.MASSDNS_BIN;
delete process.env.DNS_SERVERS;
delete process.env.SOURCE_CONCURRENCY;

export {};
