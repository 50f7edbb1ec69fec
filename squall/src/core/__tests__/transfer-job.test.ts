/**
 * Tests for locator resolution and job construction.
 */
import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { isTransferError } from '../errors.js';
import { isAbsoluteUrl, resolve, s3ObjectUrl } from '../locator-resolver.js';
import { TransferJob } from '../transfer-job.js';

// ============================================================================
// Locator resolution
// ============================================================================

describe('resolve', () => {
  it('returns locators unchanged without a bucket', () => {
    const locators = ['https://example.org/a.zip', 'https://example.org/b.zip'];

    const resolved = resolve(locators);

    expect(resolved).toEqual(locators);
    expect(resolved).not.toBe(locators);
    expect(resolve(locators, null)).toEqual(locators);
    expect(resolve(locators, '')).toEqual(locators);
  });

  it('rewrites keys through the bucket proxy', () => {
    expect(resolve(['a/b.nc', 'c.nc'], 'TestBucket')).toEqual([
      'https://bbproxy.meyerstk.com/file/TestBucket/a/b.nc',
      'https://bbproxy.meyerstk.com/file/TestBucket/c.nc',
    ]);
  });

  it('accepts a custom proxy with trailing slashes', () => {
    expect(resolve(['k.bin'], 'b', 'https://proxy.test//')).toEqual(['https://proxy.test/file/b/k.bin']);
  });

  it('preserves length and order', () => {
    const keys = ['z', 'a', 'm', 'a'];

    expect(resolve(keys, 'b').map((url) => url.split('/').pop())).toEqual(keys);
  });
});

describe('s3ObjectUrl', () => {
  it('builds a virtual-hosted object URL', () => {
    expect(s3ObjectUrl('noaa-goes16', '/ABI-L2-MCMIPC/2019/001/00/file.nc')).toBe(
      'https://noaa-goes16.s3.amazonaws.com/ABI-L2-MCMIPC/2019/001/00/file.nc'
    );
  });
});

describe('isAbsoluteUrl', () => {
  it('accepts scheme-qualified URLs only', () => {
    expect(isAbsoluteUrl('https://example.org/a')).toBe(true);
    expect(isAbsoluteUrl('ftp://example.org/a')).toBe(true);
    expect(isAbsoluteUrl('example.org/a')).toBe(false);
    expect(isAbsoluteUrl('/abs/path')).toBe(false);
    expect(isAbsoluteUrl('mailto:someone@example.org')).toBe(false);
  });
});

// ============================================================================
// TransferJob
// ============================================================================

describe('TransferJob', () => {
  it('derives one target per locator from the URL path basename', () => {
    const job = TransferJob.create(
      ['https://zenodo.org/records/1/files/tornet_2013.tar.gz?download=1', 'https://example.org/a/b/c.nc'],
      { outputDir: '/data/out' }
    );

    expect(job.targets).toEqual(['/data/out/tornet_2013.tar.gz', '/data/out/c.nc']);
    expect(job.size).toBe(2);
    expect(job.destinationDir).toBe('/data/out');
    expect(job.explicitDestination).toBe(true);
    expect(job.extract).toBe(true);
  });

  it('decodes percent-escapes in the file name', () => {
    expect(TransferJob.targetFor('https://example.org/dir/my%20file.csv', '/d')).toBe('/d/my file.csv');
    expect(TransferJob.targetFor('https://example.org/dir/bad%zzname.csv', '/d')).toBe('/d/bad%zzname.csv');
  });

  it('defaults to the working directory', () => {
    const job = TransferJob.create(['https://example.org/a.zip'], { extract: false });

    expect(job.destinationDir).toBe(process.cwd());
    expect(job.explicitDestination).toBe(false);
    expect(job.targets).toEqual([join(process.cwd(), 'a.zip')]);
    expect(job.extract).toBe(false);
  });

  it('resolves bucket keys before deriving targets', () => {
    const job = TransferJob.create(['2019/scan.nc'], { bucket: 'B', outputDir: '/o', proxyUrl: 'https://p.test' });

    expect(job.locators).toEqual(['https://p.test/file/B/2019/scan.nc']);
    expect(job.targets).toEqual(['/o/scan.nc']);
  });

  it('keeps duplicate locators', () => {
    const job = TransferJob.create(['https://e.org/x.bin', 'https://e.org/x.bin'], { outputDir: '/o' });

    expect(job.targets).toEqual(['/o/x.bin', '/o/x.bin']);
  });

  it('rejects relative locators when no bucket is given', () => {
    let caught: unknown;
    try {
      TransferJob.create(['https://e.org/ok.bin', 'not-a-url'], { outputDir: '/o' });
    } catch (err) {
      caught = err;
    }

    expect(isTransferError(caught, 'INVALID_LOCATOR')).toBe(true);
    expect(caught).toMatchObject({ locator: 'not-a-url' });
  });

  it('is frozen', () => {
    const job = TransferJob.create(['https://e.org/x.bin'], { outputDir: '/o' });

    expect(Object.isFrozen(job)).toBe(true);
    expect(Object.isFrozen(job.locators)).toBe(true);
    expect(Object.isFrozen(job.targets)).toBe(true);
  });
});
