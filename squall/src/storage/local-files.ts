/**
 * Best-effort local cleanup.
 */
import { unlink } from 'node:fs/promises';
import { errorMessage } from '../core/errors.js';
import { getDefaultLogger, type Logger } from '../core/logger.js';

export interface DeleteOptions {
  logger?: Logger;
}

/**
 * Remove each file, warning about any that cannot be removed. Returns the
 * paths that were actually deleted.
 */
export async function deleteFiles(files: readonly string[], options: DeleteOptions = {}): Promise<string[]> {
  const logger = options.logger ?? getDefaultLogger();
  const deleted: string[] = [];

  logger.info('Deleting specified files...');
  for (const file of files) {
    try {
      await unlink(file);
      deleted.push(file);
      logger.debug(`Deleted file: ${file}`);
    } catch (err) {
      logger.warn(`Failed to delete file '${file}': ${errorMessage(err)}`);
    }
  }

  return deleted;
}
