export {
  DownloadEngine,
  buildWorkerArgs,
  whichExecutable,
  CONCURRENT_DOWNLOADS,
  CONNECTIONS_PER_FILE,
  SPLITS_PER_FILE,
  DEFAULT_KILL_GRACE_MS,
  type DownloadEngineOptions,
  type DownloadOptions,
  type ExecutableLocator,
  type TransferResult,
} from './core/download-engine.js';
export {
  extract,
  extractWithReport,
  extractZip,
  extractTarGz,
  memberPath,
  detectArchiveFormat,
  type ArchiveFormat,
  type ExtractOptions,
  type ExtractionReport,
  type ExtractionFailure,
  type Extractor,
} from './core/archive-extractor.js';
export { TransferJob, type TransferJobOptions } from './core/transfer-job.js';
export { resolve, s3ObjectUrl, isAbsoluteUrl } from './core/locator-resolver.js';
export {
  ARIA2_COMPLETION_MARKER,
  ARIA2_PROGRESS_SOURCE,
  markerProgressSource,
  ProgressCounter,
  type ProgressCallback,
  type ProgressEvent,
  type ProgressSource,
} from './core/progress-source.js';
export * from './core/errors.js';
export { createLogger, getDefaultLogger, type Logger, type LoggerOptions, type LogMeta } from './core/logger.js';
export {
  loadConfig,
  requireB2Credentials,
  DEFAULT_PROXY_URL,
  type B2Credentials,
  type B2Settings,
  type LogLevel,
  type SquallConfig,
} from './core/config.js';
export { DATASETS, GOES, TORNET, getDataset, getDatasetIds, type DatasetDefinition } from './registry/datasets.js';
export { DatasetClient, type DatasetClientOptions, type DatasetDownloadOptions } from './registry/dataset-client.js';
export {
  BucketUploader,
  createS3Client,
  type BucketUploaderOptions,
  type ClientFactory,
  type ObjectStoreClient,
} from './storage/bucket-uploader.js';
export { deleteFiles, type DeleteOptions } from './storage/local-files.js';
