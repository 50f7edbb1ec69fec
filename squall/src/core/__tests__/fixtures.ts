/**
 * Shared fixtures for core tests: temp directories, a stand-in downloader
 * script and an in-memory logger.
 */
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Logger, LogMeta } from '../logger.js';

// ============================================================================
// Temp directories
// ============================================================================

export async function makeTempDir(prefix = 'squall-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

// ============================================================================
// Logger
// ============================================================================

export interface LogEntry {
  level: 'error' | 'warn' | 'info' | 'debug';
  message: string;
  meta?: LogMeta;
}

export function createMemoryLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const record = (level: LogEntry['level']) => (message: string, meta?: LogMeta) => {
    entries.push(meta ? { level, message, meta } : { level, message });
  };
  return {
    entries,
    logger: {
      error: record('error'),
      warn: record('warn'),
      info: record('info'),
      debug: record('debug'),
    },
  };
}

// ============================================================================
// Stand-in downloader
// ============================================================================

export interface FakeWorkerOptions {
  /** Number of "Download complete:" lines to print */
  completions: number;
  exitCode?: number;
  /** Lines printed before the completions (alternating stdout/stderr) */
  noise?: string[];
  /** Pause between the completions and exit, keeping the shell alive */
  pauseSeconds?: number;
  /** Replace the shell with a long sleep (for timeout tests) */
  hangSeconds?: number;
  /**
   * Keep running until signalled. 'summary' answers SIGTERM with this many
   * lines of output before exiting; 'ignore' survives SIGTERM.
   */
  onTerm?: { action: 'summary'; lines: number } | { action: 'ignore' };
  /** Completion marker text */
  marker?: string;
}

export interface FakeWorker {
  binDir: string;
  path: string;
  /** Arguments the worker was called with, one per line */
  argsFile: string;
  /** Copy of the -i input file */
  inputCopy: string;
  /** Written just before the worker exits */
  exitedFile: string;
  env: NodeJS.ProcessEnv;
}

/**
 * Write an executable shell script named `aria2c` into a fresh directory and
 * return an environment whose PATH finds it first.
 */
export async function installFakeWorker(options: FakeWorkerOptions): Promise<FakeWorker> {
  const binDir = await makeTempDir('squall-bin-');
  const path = join(binDir, 'aria2c');
  const argsFile = join(binDir, 'args.txt');
  const inputCopy = join(binDir, 'input.txt');
  const exitedFile = join(binDir, 'exited');
  const marker = options.marker ?? 'Download complete:';

  const lines: string[] = [
    '#!/bin/sh',
    `printf '%s\\n' "$@" > '${argsFile}'`,
    'while [ $# -gt 0 ]; do',
    `  if [ "$1" = "-i" ]; then cp "$2" '${inputCopy}'; fi`,
    '  shift',
    'done',
  ];
  (options.noise ?? []).forEach((line, i) => {
    lines.push(i % 2 === 0 ? `echo '${line}'` : `echo '${line}' >&2`);
  });
  for (let i = 1; i <= options.completions; i++) {
    const target = i % 2 === 0 ? ' >&2' : '';
    lines.push(`echo '[#${i}] ${marker} /tmp/file${i}.bin'${target}`);
  }
  if (options.onTerm?.action === 'summary') {
    // Each line carries the completion marker; none of them may be counted.
    lines.push(
      `trap 'i=0; while [ $i -lt ${options.onTerm.lines} ]; do ` +
        `echo "[NOTICE] shutdown summary $i: ${marker} /data/partial-$i.bin status=INPR"; i=$((i+1)); done; ` +
        `kill $SLEEPER 2>/dev/null; exit 7' TERM`
    );
  } else if (options.onTerm?.action === 'ignore') {
    lines.push(`trap 'echo "ignoring TERM"' TERM`);
  }
  if (options.onTerm) {
    lines.push('while true; do sleep 1 >/dev/null 2>&1 & SLEEPER=$!; wait $SLEEPER; done');
  }
  if (options.hangSeconds !== undefined) {
    lines.push(`exec sleep ${options.hangSeconds}`);
  }
  if (options.pauseSeconds !== undefined) {
    lines.push(`sleep ${options.pauseSeconds}`);
  }
  lines.push(`touch '${exitedFile}'`);
  lines.push(`exit ${options.exitCode ?? 0}`);

  await writeFile(path, lines.join('\n') + '\n', { mode: 0o755 });

  return {
    binDir,
    path,
    argsFile,
    inputCopy,
    exitedFile,
    env: { ...process.env, PATH: `${binDir}:${process.env.PATH ?? '/usr/bin:/bin'}` },
  };
}
