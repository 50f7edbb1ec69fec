/**
 * Download a list of URLs (or bucket keys) and extract any archives.
 *
 * Usage:
 *   node --import tsx squall/src/pipelines/download.ts [--bucket <name>] [--output <dir>] [--no-extract] <locator...>
 *
 * Examples:
 *   node --import tsx squall/src/pipelines/download.ts --output data https://example.org/sample.tar.gz
 *   node --import tsx squall/src/pipelines/download.ts --bucket TornadoPrediction-GOES goes.csv
 */
import 'dotenv/config';
import { DownloadEngine } from '../core/download-engine.js';
import { loadConfig } from '../core/config.js';
import { createLogger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';

interface CliArgs {
  bucket?: string;
  output?: string;
  extract: boolean;
  locators: string[];
}

function usage(): never {
  console.error('Usage: download.ts [--bucket <name>] [--output <dir>] [--no-extract] <locator...>');
  console.error('Options:');
  console.error('  --bucket      Treat locators as object keys in this bucket (fetched via the proxy)');
  console.error('  --output      Destination directory (default: current directory)');
  console.error('  --no-extract  Keep archives as downloaded');
  process.exit(1);
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  const result: CliArgs = { extract: true, locators: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--bucket':
        result.bucket = args[++i];
        break;
      case '--output':
        result.output = args[++i];
        break;
      case '--no-extract':
        result.extract = false;
        break;
      case '--help':
        usage();
      default:
        if (arg.startsWith('--')) {
          console.error(`Unknown option: ${arg}`);
          usage();
        }
        result.locators.push(arg);
    }
  }

  if (result.locators.length === 0) usage();
  return result;
}

async function main() {
  const args = parseArgs();
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const engine = new DownloadEngine({ dependency: config.downloader, proxyUrl: config.proxyUrl, logger });

  const files = await engine.download(args.locators, args.output, args.extract, {
    bucket: args.bucket,
    onProgress: ({ completedCount, totalCount }) => logger.info(`Downloaded ${completedCount}/${totalCount}`),
    onExtractProgress: ({ completedCount, totalCount }) => logger.info(`Processed ${completedCount}/${totalCount}`),
  });

  for (const file of files) {
    console.log(file);
  }
  logger.info(`Done: ${files.length} file(s)`);
}

main().catch((err) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
