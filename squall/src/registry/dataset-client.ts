/**
 * Dataset-aware front end to the download engine.
 */
import { DownloadEngine, type DownloadOptions } from '../core/download-engine.js';
import { s3ObjectUrl } from '../core/locator-resolver.js';
import type { DatasetDefinition } from './datasets.js';

export interface DatasetClientOptions {
  engine?: DownloadEngine;
  /** Overrides the definition's default output directory */
  outputDir?: string;
}

export interface DatasetDownloadOptions extends Omit<DownloadOptions, 'bucket'> {
  /** Only fetch the first archive (default true) */
  partial?: boolean;
  outputDir?: string;
  extract?: boolean;
}

export class DatasetClient {
  readonly definition: DatasetDefinition;
  readonly outputDir: string;
  private readonly engine: DownloadEngine;

  constructor(definition: DatasetDefinition, options: DatasetClientOptions = {}) {
    this.definition = definition;
    this.engine = options.engine ?? new DownloadEngine();
    this.outputDir = options.outputDir ?? definition.defaultOutputDir;
  }

  /**
   * Download the dataset's archives. A partial download fetches only the first
   * one, which is enough to exercise a training pipeline.
   */
  async download(options: DatasetDownloadOptions = {}): Promise<string[]> {
    const { partial = true, outputDir, extract = true, ...rest } = options;
    const known = this.definition.knownLocators;
    if (known.length === 0) {
      throw new Error(`Dataset '${this.definition.id}' has no archives to download`);
    }

    const locators = partial ? known.slice(0, 1) : [...known];
    return this.engine.download(locators, outputDir ?? this.outputDir, extract, rest);
  }

  /** Fetch the catalog file as-is and return its local path. */
  async downloadCatalog(outputDir?: string): Promise<string> {
    const { catalogUrl } = this.definition;
    if (!catalogUrl) {
      throw new Error(`Dataset '${this.definition.id}' has no catalog`);
    }
    const [path] = await this.engine.download([catalogUrl], outputDir ?? this.outputDir, false);
    return path;
  }

  /**
   * Fetch one object from a public S3 bucket. `bucket` is either a region key
   * of the definition's public buckets (e.g. "east") or a bucket name.
   */
  async downloadObject(key: string, bucket: string, outputDir?: string): Promise<string> {
    const bucketName = this.definition.publicBuckets?.[bucket] ?? bucket;
    const [path] = await this.engine.download(
      [s3ObjectUrl(bucketName, key)],
      outputDir ?? this.outputDir,
      false
    );
    return path;
  }

  /** Download objects from the definition's managed bucket by key. */
  async downloadFromBucket(
    keys: readonly string[],
    options: Omit<DatasetDownloadOptions, 'partial'> = {}
  ): Promise<string[]> {
    const { bucket } = this.definition;
    if (!bucket) {
      throw new Error(`Dataset '${this.definition.id}' has no managed bucket`);
    }
    const { outputDir, extract = true, ...rest } = options;
    return this.engine.download(keys, outputDir ?? this.outputDir, extract, { ...rest, bucket });
  }
}
