import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Logger } from '../../core/logger.js';
import { deleteFiles } from '../local-files.js';

let workDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'squall-delete-'));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

function recordingLogger() {
  const warnings: string[] = [];
  const logger: Logger = {
    error: () => {},
    warn: (message) => warnings.push(message),
    info: () => {},
    debug: () => {},
  };
  return { logger, warnings };
}

describe('deleteFiles', () => {
  it('removes each file and returns the removed paths', async () => {
    const a = join(workDir, 'a.nc');
    const b = join(workDir, 'b.nc');
    await writeFile(a, 'a');
    await writeFile(b, 'b');
    const { logger, warnings } = recordingLogger();

    const deleted = await deleteFiles([a, b], { logger });

    expect(deleted).toEqual([a, b]);
    expect(existsSync(a)).toBe(false);
    expect(existsSync(b)).toBe(false);
    expect(warnings).toEqual([]);
  });

  it('warns about missing files and carries on', async () => {
    const missing = join(workDir, 'gone.nc');
    const present = join(workDir, 'here.nc');
    await writeFile(present, 'x');
    const { logger, warnings } = recordingLogger();

    const deleted = await deleteFiles([missing, present], { logger });

    expect(deleted).toEqual([present]);
    expect(existsSync(present)).toBe(false);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].startsWith(`Failed to delete file '${missing}': ENOENT`)).toBe(true);
  });

  it('does nothing for an empty list', async () => {
    const { logger } = recordingLogger();

    expect(await deleteFiles([], { logger })).toEqual([]);
  });
});
