/**
 * Turns bucket-relative object keys into fetchable URLs.
 */
import { DEFAULT_PROXY_URL, stripTrailingSlashes } from './config.js';

/**
 * Without a bucket the locators are taken to be absolute already and come back
 * unchanged. With one, every locator is a bare key rewritten to
 * `<proxyUrl>/file/<bucket>/<key>`.
 */
export function resolve(
  locators: readonly string[],
  bucket?: string | null,
  proxyUrl: string = DEFAULT_PROXY_URL
): string[] {
  if (!bucket) {
    return [...locators];
  }
  const base = stripTrailingSlashes(proxyUrl);
  return locators.map((locator) => `${base}/file/${bucket}/${locator}`);
}

/** Public AWS open-data object, e.g. the NOAA GOES buckets. */
export function s3ObjectUrl(bucket: string, key: string): string {
  return `https://${bucket}.s3.amazonaws.com/${key.replace(/^\/+/, '')}`;
}

export function isAbsoluteUrl(locator: string): boolean {
  if (!/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(locator)) {
    return false;
  }
  try {
    new URL(locator);
    return true;
  } catch {
    return false;
  }
}
