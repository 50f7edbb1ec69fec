/**
 * Environment-driven settings. Nothing here is read at import time; callers
 * pass the result of loadConfig() to whatever needs it.
 */

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_PROXY_URL = 'https://bbproxy.meyerstk.com';
export const DEFAULT_DATA_DIR = './data';
export const DEFAULT_DOWNLOADER = 'aria2c';
export const DEFAULT_B2_ENDPOINT = 'https://s3.us-west-004.backblazeb2.com';

export interface B2Settings {
  endpoint: string;
  region: string;
  applicationKeyId?: string;
  applicationKey?: string;
  bucket?: string;
}

export interface SquallConfig {
  logLevel: LogLevel;
  proxyUrl: string;
  dataDir: string;
  downloader: string;
  b2: B2Settings;
}

export interface B2Credentials {
  applicationKeyId: string;
  applicationKey: string;
}

type Env = Record<string, string | undefined>;

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const level = nonEmpty(value)?.toLowerCase();
  if (level === undefined) return 'info';
  if (!isLogLevel(level)) {
    throw new Error(`Invalid LOG_LEVEL '${value}'. Expected one of: ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

export function stripTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * B2 S3 endpoints look like https://s3.<region>.backblazeb2.com.
 */
export function regionFromEndpoint(endpoint: string): string {
  const host = new URL(endpoint).hostname;
  const match = host.match(/^s3\.([a-z0-9-]+)\.backblazeb2\.com$/);
  return match ? match[1] : 'us-east-1';
}

export function loadConfig(env: Env = process.env): SquallConfig {
  const endpoint = stripTrailingSlashes(nonEmpty(env.B2_S3_ENDPOINT) ?? DEFAULT_B2_ENDPOINT);

  const b2: B2Settings = { endpoint, region: regionFromEndpoint(endpoint) };
  const keyId = nonEmpty(env.B2_APPLICATION_KEY_ID);
  const key = nonEmpty(env.B2_APPLICATION_KEY);
  const bucket = nonEmpty(env.B2_BUCKET_NAME);
  if (keyId) b2.applicationKeyId = keyId;
  if (key) b2.applicationKey = key;
  if (bucket) b2.bucket = bucket;

  return Object.freeze({
    logLevel: parseLogLevel(env.LOG_LEVEL),
    proxyUrl: stripTrailingSlashes(nonEmpty(env.SQUALL_PROXY_URL) ?? DEFAULT_PROXY_URL),
    dataDir: nonEmpty(env.SQUALL_DATA_DIR) ?? DEFAULT_DATA_DIR,
    downloader: nonEmpty(env.SQUALL_DOWNLOADER) ?? DEFAULT_DOWNLOADER,
    b2: Object.freeze(b2),
  });
}

export function requireB2Credentials(config: SquallConfig): B2Credentials {
  const { applicationKeyId, applicationKey } = config.b2;
  if (!applicationKeyId || !applicationKey) {
    const missing = [
      !applicationKeyId && 'B2_APPLICATION_KEY_ID',
      !applicationKey && 'B2_APPLICATION_KEY',
    ].filter(Boolean);
    throw new Error(`Bucket credentials not set. Missing: ${missing.join(', ')}`);
  }
  return { applicationKeyId, applicationKey };
}
