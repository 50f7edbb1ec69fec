/**
 * Completion detection for downloader output.
 *
 * aria2c has no machine-readable progress stream, so completions are read off
 * its human-readable console output. Keeping the rule behind this interface
 * means a change in the worker's wording touches one place.
 */

export interface ProgressEvent {
  completedCount: number;
  totalCount: number;
}

export type ProgressCallback = (event: ProgressEvent) => void;

export interface ProgressSource {
  readonly name: string;
  /** True when the line reports that one file finished. */
  isCompletion(line: string): boolean;
}

export const ARIA2_COMPLETION_MARKER = 'Download complete:';

export function markerProgressSource(marker: string, name = `marker(${marker})`): ProgressSource {
  return {
    name,
    isCompletion: (line) => line.includes(marker),
  };
}

export const ARIA2_PROGRESS_SOURCE: ProgressSource = markerProgressSource(
  ARIA2_COMPLETION_MARKER,
  'aria2c'
);

/**
 * Counts completions for one job. Markers past the job size are ignored so
 * completedCount never exceeds totalCount.
 */
export class ProgressCounter {
  private completed = 0;

  constructor(
    private readonly source: ProgressSource,
    readonly totalCount: number,
    private readonly onProgress?: ProgressCallback
  ) {}

  get completedCount(): number {
    return this.completed;
  }

  /** Returns true when the line advanced the count. */
  offer(line: string): boolean {
    if (!this.source.isCompletion(line) || this.completed >= this.totalCount) {
      return false;
    }
    this.completed += 1;
    this.onProgress?.({ completedCount: this.completed, totalCount: this.totalCount });
    return true;
  }
}
