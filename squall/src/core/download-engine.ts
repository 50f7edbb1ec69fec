/**
 * Bulk downloader built on an external multi-connection worker (aria2c).
 *
 * One call = one TransferJob: the locators go into a temporary input file,
 * the worker fetches them with fixed parallelism, its console output is read
 * line by line for completion markers, and the finished files are optionally
 * extracted. Parallelism and retries belong to the worker; this module only
 * orchestrates it.
 */
import { execFile, spawn } from 'node:child_process';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createInterface, type Interface } from 'node:readline';
import { promisify } from 'node:util';
import { extractWithReport, type ExtractionReport, type Extractor } from './archive-extractor.js';
import { DEFAULT_DOWNLOADER, DEFAULT_PROXY_URL } from './config.js';
import {
  DependencyMissingError,
  DownloadAbortedError,
  DownloadFailedError,
  errorMessage,
} from './errors.js';
import { getDefaultLogger, type Logger } from './logger.js';
import {
  ARIA2_PROGRESS_SOURCE,
  ProgressCounter,
  type ProgressCallback,
  type ProgressSource,
} from './progress-source.js';
import { TransferJob } from './transfer-job.js';

const execFileAsync = promisify(execFile);

// ============================================================================
// Worker policy
// ============================================================================

/** Files fetched at once (-j). */
export const CONCURRENT_DOWNLOADS = 3;
/** Connections per server for one file (-x). */
export const CONNECTIONS_PER_FILE = 16;
/** Pieces each file is split into (-s). */
export const SPLITS_PER_FILE = 16;

export const DESCRIPTOR_FILE_NAME = 'locators.txt';

export const DEFAULT_KILL_GRACE_MS = 5000;

// ============================================================================
// Types
// ============================================================================

export type ExecutableLocator = (name: string, env: NodeJS.ProcessEnv) => Promise<string | null>;

export interface DownloadEngineOptions {
  /** Worker executable name or path. */
  dependency?: string;
  /** Environment for the lookup and the worker process. */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  progressSource?: ProgressSource;
  locateExecutable?: ExecutableLocator;
  extractor?: Extractor;
  /** Proxy used for bucket-relative locators. */
  proxyUrl?: string;
  /** Parent directory for the per-call descriptor directory. */
  tempRoot?: string;
  /** How long a stopped worker gets to exit after SIGTERM before SIGKILL. */
  killGraceMs?: number;
}

export interface DownloadOptions {
  bucket?: string | null;
  onProgress?: ProgressCallback;
  onExtractProgress?: ProgressCallback;
  signal?: AbortSignal;
  /** Kill the worker after this many milliseconds. Unset means no limit. */
  timeoutMs?: number;
}

export interface TransferResult {
  /** Final local paths: extracted members, or the raw downloads. */
  files: string[];
  /** Expected raw download paths, in locator order. */
  targets: string[];
  /** Completion markers observed. */
  completed: number;
  extraction?: ExtractionReport;
}

interface WorkerExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

// ============================================================================
// Executable lookup
// ============================================================================

export const whichExecutable: ExecutableLocator = async (name, env) => {
  try {
    const { stdout } = await execFileAsync('which', [name], { env });
    const path = stdout.trim().split('\n')[0];
    return path ? path : null;
  } catch {
    // Non-zero exit when nothing matches; ENOENT when `which` itself is absent.
    return null;
  }
};

export function buildWorkerArgs(descriptorPath: string, outputDir?: string): string[] {
  const args = [
    '-j',
    String(CONCURRENT_DOWNLOADS),
    '-x',
    String(CONNECTIONS_PER_FILE),
    '-s',
    String(SPLITS_PER_FILE),
    '-i',
    descriptorPath,
  ];
  if (outputDir) {
    args.push('-d', outputDir);
  }
  return args;
}

// ============================================================================
// Engine
// ============================================================================

export class DownloadEngine {
  readonly dependency: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;
  private readonly progressSource: ProgressSource;
  private readonly locateExecutable: ExecutableLocator;
  private readonly extractor: Extractor;
  private readonly proxyUrl: string;
  private readonly tempRoot: string;
  private readonly killGraceMs: number;

  constructor(options: DownloadEngineOptions = {}) {
    this.dependency = options.dependency ?? DEFAULT_DOWNLOADER;
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? getDefaultLogger();
    this.progressSource = options.progressSource ?? ARIA2_PROGRESS_SOURCE;
    this.locateExecutable = options.locateExecutable ?? whichExecutable;
    this.extractor = options.extractor ?? extractWithReport;
    this.proxyUrl = options.proxyUrl ?? DEFAULT_PROXY_URL;
    this.tempRoot = options.tempRoot ?? tmpdir();
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  }

  /**
   * Download `locators` into outputDir (or the working directory) and return
   * the local paths, extracted when `extract` is set.
   */
  async download(
    locators: readonly string[],
    outputDir?: string | null,
    extract = true,
    options: DownloadOptions = {}
  ): Promise<string[]> {
    const executable = await this.requireDependency();
    const job = TransferJob.create(locators, {
      bucket: options.bucket,
      outputDir,
      extract,
      proxyUrl: this.proxyUrl,
    });
    const result = await this.execute(executable, job, options);
    return result.files;
  }

  /** Run a prepared job and return the full result. */
  async run(job: TransferJob, options: Omit<DownloadOptions, 'bucket'> = {}): Promise<TransferResult> {
    const executable = await this.requireDependency();
    return this.execute(executable, job, options);
  }

  /** Resolve the worker executable or throw DependencyMissingError. */
  async requireDependency(): Promise<string> {
    const path = await this.locateExecutable(this.dependency, this.env);
    if (!path) {
      const error = new DependencyMissingError(this.dependency);
      this.logger.error(error.message);
      throw error;
    }
    this.logger.debug(`Dependency '${this.dependency}' found at ${path}`);
    return path;
  }

  private async execute(executable: string, job: TransferJob, options: DownloadOptions): Promise<TransferResult> {
    if (options.signal?.aborted) {
      throw new DownloadAbortedError('aborted', { cause: options.signal.reason });
    }
    if (job.size === 0) {
      return { files: [], targets: [], completed: 0 };
    }

    await mkdir(job.destinationDir, { recursive: true });

    const counter = new ProgressCounter(this.progressSource, job.size, options.onProgress);
    const tempDir = await mkdtemp(join(this.tempRoot, 'squall-'));

    try {
      const descriptor = join(tempDir, DESCRIPTOR_FILE_NAME);
      await writeFile(descriptor, job.locators.map((locator) => `${locator}\n`).join(''));
      this.logger.debug(`Locator file written to ${descriptor}`);

      const args = buildWorkerArgs(descriptor, job.explicitDestination ? job.destinationDir : undefined);
      this.logger.info(`Downloading ${job.size} file(s) into ${job.destinationDir}`);
      this.logger.debug(`Running ${executable} ${args.join(' ')}`);

      await this.runWorker(executable, args, counter, options);
    } finally {
      await rm(tempDir, { recursive: true, force: true });
      this.logger.debug(`Temporary directory ${tempDir} removed`);
    }

    this.logger.info(`Downloads completed (${counter.completedCount}/${job.size} reported)`);

    const targets = [...job.targets];
    if (!job.extract) {
      return { files: targets, targets, completed: counter.completedCount };
    }

    const extraction = await this.extractor(targets, job.destinationDir, {
      logger: this.logger,
      onProgress: options.onExtractProgress,
    });
    return { files: extraction.files, targets, completed: counter.completedCount, extraction };
  }

  /**
   * Spawn the worker and read stdout and stderr as they are produced, one
   * line at a time. Resolves once the process has exited and both streams
   * are drained.
   */
  private async runWorker(
    executable: string,
    args: string[],
    counter: ProgressCounter,
    options: DownloadOptions
  ): Promise<void> {
    const child = spawn(executable, args, { env: this.env, stdio: ['ignore', 'pipe', 'pipe'] });

    const state: {
      abortReason: 'timeout' | 'aborted' | null;
      killTimer?: NodeJS.Timeout;
      closeTimer?: NodeJS.Timeout;
    } = { abortReason: null };

    const readers: Interface[] = [child.stdout, child.stderr].map((input) =>
      createInterface({ input, crlfDelay: Infinity })
    );
    // Output is drained until the worker exits, even after a stop request,
    // so a worker printing its shutdown summary never blocks on a full pipe.
    const output = Promise.all(
      readers.map(async (reader) => {
        for await (const line of reader) {
          this.logger.debug(line.trim());
          if (!state.abortReason) counter.offer(line);
        }
      })
    );

    const exited = new Promise<WorkerExit>((resolve, reject) => {
      child.once('error', reject);
      child.once('exit', (code, signal) => {
        if (state.abortReason) {
          // Descendants of a stopped worker may still hold the pipes open.
          state.closeTimer = setTimeout(() => {
            for (const reader of readers) reader.close();
            child.stdout.destroy();
            child.stderr.destroy();
          }, this.killGraceMs);
        }
        resolve({ code, signal });
      });
    });

    const stop = (reason: 'timeout' | 'aborted'): void => {
      if (state.abortReason) return;
      state.abortReason = reason;
      this.logger.warn(`Stopping downloader (${reason})`);
      child.kill('SIGTERM');
      state.killTimer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          this.logger.warn(`Downloader ignored SIGTERM for ${this.killGraceMs}ms, sending SIGKILL`);
          child.kill('SIGKILL');
        }
      }, this.killGraceMs);
    };
    const onAbort = (): void => stop('aborted');
    options.signal?.addEventListener('abort', onAbort, { once: true });
    // The signal may have fired while the input file was being written.
    if (options.signal?.aborted) stop('aborted');
    const timer =
      options.timeoutMs !== undefined ? setTimeout(() => stop('timeout'), options.timeoutMs) : undefined;

    try {
      const [exit, drained] = await Promise.allSettled([exited, output]);

      if (state.abortReason) {
        throw new DownloadAbortedError(state.abortReason, { cause: options.signal?.reason });
      }
      if (exit.status === 'rejected') {
        this.logger.error(`Downloader could not be started: ${errorMessage(exit.reason)}`);
        throw new DownloadFailedError(null, null, { cause: exit.reason });
      }
      if (drained.status === 'rejected') {
        throw drained.reason;
      }

      const { code, signal } = exit.value;
      if (code !== 0) {
        const error = new DownloadFailedError(code, signal);
        this.logger.error(error.message);
        throw error;
      }
    } finally {
      if (timer) clearTimeout(timer);
      if (state.killTimer) clearTimeout(state.killTimer);
      if (state.closeTimer) clearTimeout(state.closeTimer);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}
