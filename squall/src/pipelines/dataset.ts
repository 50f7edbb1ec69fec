/**
 * Fetch one of the registered datasets.
 *
 * Usage:
 *   node --import tsx squall/src/pipelines/dataset.ts <dataset> [--full] [--catalog] [--output <dir>]
 *
 * By default only the first archive is fetched; --full fetches all of them.
 * --catalog fetches the dataset's catalog CSV instead.
 */
import 'dotenv/config';
import { DownloadEngine } from '../core/download-engine.js';
import { loadConfig } from '../core/config.js';
import { createLogger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { DatasetClient } from '../registry/dataset-client.js';
import { getDataset, getDatasetIds, type DatasetDefinition } from '../registry/datasets.js';

const datasetId = process.argv[2];
const flags = process.argv.slice(3);

function usage(): never {
  console.error('Usage: dataset.ts <dataset> [--full] [--catalog] [--output <dir>]');
  console.error(`Datasets: ${getDatasetIds().join(', ')}`);
  process.exit(1);
}

const definition = datasetId ? getDataset(datasetId) : undefined;
if (!definition) usage();

const outputIndex = flags.indexOf('--output');
const outputDir = outputIndex >= 0 ? flags[outputIndex + 1] : undefined;
if (outputIndex >= 0 && !outputDir) usage();

async function main(definition: DatasetDefinition) {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const engine = new DownloadEngine({ dependency: config.downloader, proxyUrl: config.proxyUrl, logger });
  const client = new DatasetClient(definition, { engine, outputDir });

  logger.info(`${definition.name} initialized at ${client.outputDir}`);

  if (flags.includes('--catalog')) {
    const catalog = await client.downloadCatalog();
    logger.info(`Catalog saved to ${catalog}`);
    return;
  }

  const full = flags.includes('--full');
  logger.info(full ? 'Downloading full dataset' : 'Downloading first archive only');
  const files = await client.download({
    partial: !full,
    onProgress: ({ completedCount, totalCount }) => logger.info(`Downloaded ${completedCount}/${totalCount}`),
  });
  logger.info(`Done: ${files.length} file(s) in ${client.outputDir}`);
}

main(definition).catch((err) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
