/**
 * Error taxonomy for transfers.
 *
 * Download and upload failures are hard: they are thrown and abort the call.
 * Extraction failures are soft: the extractor records them in its report and
 * carries on with the next file.
 */

/** Stable transfer error codes. */
export type TransferErrorCode =
  | 'DEPENDENCY_MISSING'
  | 'INVALID_LOCATOR'
  | 'DOWNLOAD_FAILED'
  | 'DOWNLOAD_ABORTED'
  | 'EXTRACTION_FAILED'
  | 'UPLOAD_FAILED';

export class TransferError extends Error {
  readonly code: TransferErrorCode;
  override readonly cause?: unknown;

  constructor(code: TransferErrorCode, message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'TransferError';
    this.code = code;
    if (options && 'cause' in options) {
      this.cause = options.cause;
    }
  }
}

export class DependencyMissingError extends TransferError {
  readonly dependency: string;

  constructor(dependency: string) {
    super(
      'DEPENDENCY_MISSING',
      `Missing dependency: '${dependency}' was not found on PATH. ` +
        'The lookup runs `which`, so a missing `which` reports the same way. ' +
        'Install it (e.g. apt install aria2 or brew install aria2) and try again.'
    );
    this.name = 'DependencyMissingError';
    this.dependency = dependency;
  }
}

export class InvalidLocatorError extends TransferError {
  readonly locator: string;

  constructor(locator: string) {
    super('INVALID_LOCATOR', `Locator is not an absolute URL: ${locator}`);
    this.name = 'InvalidLocatorError';
    this.locator = locator;
  }
}

export class DownloadFailedError extends TransferError {
  /** Null when the worker was terminated by a signal. */
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;

  constructor(exitCode: number | null, signal: NodeJS.Signals | null = null, options?: { cause?: unknown }) {
    const detail =
      exitCode !== null ? `exit status ${exitCode}` : signal !== null ? `signal ${signal}` : 'no exit status (not started)';
    super('DOWNLOAD_FAILED', `Downloader failed with ${detail}`, options);
    this.name = 'DownloadFailedError';
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

export class DownloadAbortedError extends TransferError {
  readonly reason: 'timeout' | 'aborted';

  constructor(reason: 'timeout' | 'aborted', options?: { cause?: unknown }) {
    super(
      'DOWNLOAD_ABORTED',
      reason === 'timeout' ? 'Download timed out' : 'Download was aborted',
      options
    );
    this.name = 'DownloadAbortedError';
    this.reason = reason;
  }
}

export class ExtractionFailedError extends TransferError {
  readonly file: string;

  constructor(file: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('EXTRACTION_FAILED', `Failed to extract ${file}${detail}`, options);
    this.name = 'ExtractionFailedError';
    this.file = file;
  }
}

export class UploadFailedError extends TransferError {
  /** Local file being uploaded when the failure happened, if any. */
  readonly file?: string;

  constructor(message: string, options?: { file?: string; cause?: unknown }) {
    super('UPLOAD_FAILED', message, options);
    this.name = 'UploadFailedError';
    if (options?.file !== undefined) {
      this.file = options.file;
    }
  }
}

export function isTransferError(err: unknown, code?: TransferErrorCode): err is TransferError {
  return err instanceof TransferError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
