/**
 * Upload local files to the managed bucket.
 *
 * Usage:
 *   B2_APPLICATION_KEY_ID=... B2_APPLICATION_KEY=... \
 *     node --import tsx squall/src/pipelines/upload.ts [--bucket <name>] [--delete] <file...>
 *
 * The bucket defaults to B2_BUCKET_NAME. --delete removes the local copies
 * after a successful upload.
 */
import 'dotenv/config';
import { loadConfig, requireB2Credentials } from '../core/config.js';
import { createLogger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { BucketUploader } from '../storage/bucket-uploader.js';
import { deleteFiles } from '../storage/local-files.js';

const args = process.argv.slice(2);
const files: string[] = [];
let bucketArg: string | undefined;
let removeAfter = false;

for (let i = 0; i < args.length; i++) {
  const arg = args[i];
  if (arg === '--bucket') {
    bucketArg = args[++i];
  } else if (arg === '--delete') {
    removeAfter = true;
  } else {
    files.push(arg);
  }
}

async function main() {
  const config = loadConfig();
  const bucket = bucketArg ?? config.b2.bucket;
  if (!bucket || files.length === 0) {
    console.error('Usage: upload.ts [--bucket <name>] [--delete] <file...>');
    process.exit(1);
  }

  const logger = createLogger({ level: config.logLevel });
  const uploader = new BucketUploader({ endpoint: config.b2.endpoint, region: config.b2.region, logger });
  await uploader.upload(files, bucket, requireB2Credentials(config));

  if (removeAfter) {
    await deleteFiles(files, { logger });
  }
}

main().catch((err) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
