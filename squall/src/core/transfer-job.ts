/**
 * One download batch: resolved locators, where they land, and whether the
 * results get extracted. Jobs are frozen on creation and do no I/O.
 */
import { basename, join, posix } from 'node:path';
import { InvalidLocatorError } from './errors.js';
import { isAbsoluteUrl, resolve } from './locator-resolver.js';

export interface TransferJobOptions {
  /** Treat locators as object keys in this bucket. */
  bucket?: string | null;
  /** Destination directory. Unset means the current working directory. */
  outputDir?: string | null;
  extract?: boolean;
  proxyUrl?: string;
}

/** Malformed percent-escapes are kept as they appear in the URL. */
function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export class TransferJob {
  readonly locators: readonly string[];
  readonly destinationDir: string;
  /** Whether an output directory was given explicitly. */
  readonly explicitDestination: boolean;
  readonly extract: boolean;
  /** Expected local path for each locator, in locator order. */
  readonly targets: readonly string[];

  private constructor(locators: string[], destinationDir: string, explicitDestination: boolean, extract: boolean) {
    this.locators = Object.freeze(locators);
    this.destinationDir = destinationDir;
    this.explicitDestination = explicitDestination;
    this.extract = extract;
    this.targets = Object.freeze(locators.map((locator) => TransferJob.targetFor(locator, destinationDir)));
    Object.freeze(this);
  }

  static create(locators: readonly string[], options: TransferJobOptions = {}): TransferJob {
    const resolved = resolve(locators, options.bucket, options.proxyUrl);

    for (const locator of resolved) {
      if (!isAbsoluteUrl(locator)) {
        throw new InvalidLocatorError(locator);
      }
    }

    const explicit = Boolean(options.outputDir);
    const destinationDir = options.outputDir ? options.outputDir : process.cwd();
    return new TransferJob(resolved, destinationDir, explicit, options.extract ?? true);
  }

  /**
   * Local path a locator downloads to: the last segment of the URL path
   * (query string dropped, percent-escapes decoded) under `dir`.
   */
  static targetFor(locator: string, dir: string): string {
    const pathname = new URL(locator).pathname;
    const name = decodeSegment(posix.basename(pathname));
    return join(dir, basename(name));
  }

  get size(): number {
    return this.locators.length;
  }
}
