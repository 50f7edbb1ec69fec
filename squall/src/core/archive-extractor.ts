/**
 * Post-download archive handling.
 *
 * `.zip` and `.tar.gz`/`.tgz` files are unpacked into the output directory and
 * then removed; everything else passes through untouched. A file that fails
 * to extract is logged and left out of the result while the rest of the batch
 * carries on, so callers spot partial failure from a shorter list.
 */
import { closeSync, createReadStream, mkdirSync, openSync, writeSync } from 'node:fs';
import { mkdir, rm, unlink } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, resolve as resolvePath, sep } from 'node:path';
import { Unzip, UnzipInflate, type UnzipFile } from 'fflate';
import { x as untar } from 'tar';
import { ExtractionFailedError, errorMessage } from './errors.js';
import { getDefaultLogger, type Logger } from './logger.js';
import type { ProgressCallback } from './progress-source.js';

export type ArchiveFormat = 'zip' | 'tar.gz';

export interface ExtractOptions {
  logger?: Logger;
  /** Called once per input file, whatever its outcome. */
  onProgress?: ProgressCallback;
}

export interface ExtractionFailure {
  file: string;
  error: ExtractionFailedError;
}

export interface ExtractionReport {
  /** Extracted members and pass-through files, in input order. */
  files: string[];
  /** Input paths that were extracted or passed through. */
  succeeded: string[];
  failed: ExtractionFailure[];
}

// Local file header, or the end record of an empty archive.
const ZIP_SIGNATURES = [
  [0x50, 0x4b, 0x03, 0x04],
  [0x50, 0x4b, 0x05, 0x06],
];

const TAR_FILE_TYPES = new Set(['File', 'OldFile', 'ContiguousFile']);

export function detectArchiveFormat(file: string): ArchiveFormat | null {
  if (file.endsWith('.zip')) return 'zip';
  if (file.endsWith('.tar.gz') || file.endsWith('.tgz')) return 'tar.gz';
  return null;
}

function isWithin(outputDir: string, target: string): boolean {
  const rel = relative(resolvePath(outputDir), resolvePath(target));
  return !(rel === '..' || rel.startsWith('..' + sep) || isAbsolute(rel));
}

/**
 * Resolve an archive member name under outputDir, refusing names that would
 * land outside it. Names that merely start with dots (`..notes.txt`) are fine.
 */
export function memberPath(outputDir: string, name: string): string {
  const target = join(outputDir, name);
  if (!isWithin(outputDir, target)) {
    throw new Error(`Archive member escapes output directory: ${name}`);
  }
  return target;
}

async function removeAll(paths: readonly string[]): Promise<void> {
  await Promise.all(paths.map((path) => rm(path, { force: true })));
}

/**
 * Stream a zip from disk through fflate, writing each member as its bytes are
 * inflated. Returns every member path in archive order, directories included.
 * On failure the members written so far are removed again.
 */
export async function extractZip(file: string, outputDir: string): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });

  const targets: string[] = [];
  const written: string[] = [];
  const open = new Map<string, number>();

  const unzip = new Unzip((entry: UnzipFile) => {
    const target = memberPath(outputDir, entry.name);
    targets.push(target);
    if (entry.name.endsWith('/')) {
      mkdirSync(target, { recursive: true });
      return;
    }
    mkdirSync(dirname(target), { recursive: true });
    const fd = openSync(target, 'w');
    open.set(target, fd);
    written.push(target);
    entry.ondata = (err, chunk, final) => {
      if (err) throw err;
      writeSync(fd, chunk);
      if (final) {
        closeSync(fd);
        open.delete(target);
      }
    };
    entry.start();
  });
  unzip.register(UnzipInflate);

  try {
    let first = true;
    for await (const chunk of createReadStream(file)) {
      if (!(chunk instanceof Uint8Array)) throw new Error('Unexpected string chunk from zip stream');
      if (first) {
        // Unzip skips bytes it does not recognise, so check the magic up front.
        if (!ZIP_SIGNATURES.some((magic) => magic.every((byte, i) => chunk[i] === byte))) {
          throw new Error('Invalid zip data');
        }
        first = false;
      }
      unzip.push(chunk);
    }
    if (first) throw new Error('Invalid zip data');
    unzip.push(new Uint8Array(0), true);
    if (open.size > 0) {
      throw new Error(`Unexpected end of zip archive in ${[...open.keys()].join(', ')}`);
    }
  } catch (err) {
    for (const fd of open.values()) closeSync(fd);
    open.clear();
    await removeAll(written);
    throw err;
  }
  return targets;
}

/**
 * Unpack a gzip-compressed tar with node-tar. Directories are created, links
 * and device entries skipped; only regular files are returned. A member that
 * would land outside outputDir fails the archive; on any failure the files
 * already written are removed.
 */
export async function extractTarGz(file: string, outputDir: string, logger?: Logger): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });

  const extracted: string[] = [];
  const unsafe: string[] = [];

  const unpacked = untar({
    file,
    cwd: outputDir,
    strict: true,
    filter: (path, entry) => {
      const target = join(outputDir, path);
      if (!isWithin(outputDir, target)) {
        unsafe.push(path);
        return false;
      }
      if (!('type' in entry)) return true;
      if (TAR_FILE_TYPES.has(entry.type)) {
        extracted.push(target);
        return true;
      }
      if (entry.type === 'Directory') return true;
      logger?.debug(`Skipping ${entry.type} member ${path}`);
      return false;
    },
  });
  try {
    await unpacked;
  } catch (err) {
    await removeAll(extracted);
    throw err;
  }

  if (unsafe.length > 0) {
    await removeAll(extracted);
    throw new Error(`Archive member escapes output directory: ${unsafe[0]}`);
  }
  return extracted;
}

/**
 * Extract every recognised archive in `files` into outputDir and report what
 * happened to each input.
 */
export async function extractWithReport(
  files: readonly string[],
  outputDir: string,
  options: ExtractOptions = {}
): Promise<ExtractionReport> {
  const logger = options.logger ?? getDefaultLogger();
  const report: ExtractionReport = { files: [], succeeded: [], failed: [] };
  let processed = 0;

  for (const file of files) {
    const format = detectArchiveFormat(file);
    try {
      if (format === null) {
        report.files.push(file);
      } else {
        const members =
          format === 'zip' ? await extractZip(file, outputDir) : await extractTarGz(file, outputDir, logger);
        await unlink(file);
        report.files.push(...members);
        logger.info(`Extracted and deleted: ${file}`, { members: members.length });
      }
      report.succeeded.push(file);
    } catch (err) {
      const error = new ExtractionFailedError(file, { cause: err });
      report.failed.push({ file, error });
      logger.error(`Failed to extract ${file}: ${errorMessage(err)}`);
    }

    processed += 1;
    options.onProgress?.({ completedCount: processed, totalCount: files.length });
  }

  return report;
}

/**
 * Extract and return the resulting paths. Failed archives are dropped from the
 * result; use extractWithReport() to see which ones.
 */
export async function extract(
  files: readonly string[],
  outputDir: string,
  options: ExtractOptions = {}
): Promise<string[]> {
  const report = await extractWithReport(files, outputDir, options);
  return report.files;
}

/** Function-typed seam so the engine can be given a different extractor. */
export type Extractor = (
  files: readonly string[],
  outputDir: string,
  options?: ExtractOptions
) => Promise<ExtractionReport>;
