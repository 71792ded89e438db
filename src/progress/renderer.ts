import { formatBytes, formatDuration } from './format.js';
import { logger } from '../utils/logger.js';

type WriteCallback = (error?: Error | null) => void;

/**
 * Anything with a `write` method; `process.stderr` in production. Streams that
 * report failures as `'error'` events should also expose `on`/`off`.
 */
export interface StatusStream {
  write(chunk: string, callback?: WriteCallback): unknown;
  on?(event: 'error', listener: (error: Error) => void): unknown;
  off?(event: 'error', listener: (error: Error) => void): unknown;
}

export interface DownloadProgress {
  bytesDownloaded: number;
  totalBytes?: number;
  percent?: number;
  bytesPerSecond: number;
  elapsedSeconds: number;
  estimatedTimeRemaining?: number;
}

export interface ProgressInput {
  downloaded: number;
  total?: number;
  speed: number;
  elapsedSeconds: number;
}

export function describeProgress({ downloaded, total, speed, elapsedSeconds }: ProgressInput): DownloadProgress {
  const elapsed = Math.floor(elapsedSeconds);

  if (total === undefined) {
    return { bytesDownloaded: downloaded, bytesPerSecond: speed, elapsedSeconds: elapsed };
  }

  // A server can send more than it advertised: percent may pass 100, the ETA stays at 0
  const remaining = Math.max(total - downloaded, 0);
  return {
    bytesDownloaded: downloaded,
    totalBytes: total,
    percent: total > 0 ? (downloaded / total) * 100 : 100,
    bytesPerSecond: speed,
    elapsedSeconds: elapsed,
    estimatedTimeRemaining: speed === 0 ? 0 : Math.floor(remaining / speed),
  };
}

export function formatStatusLine(progress: DownloadProgress): string {
  const downloaded = formatBytes(progress.bytesDownloaded);
  const speed = formatBytes(progress.bytesPerSecond, true);
  const elapsed = formatDuration(progress.elapsedSeconds);

  if (progress.totalBytes === undefined) {
    return `Total: ${downloaded} Speed: ${speed} Elapsed: ${elapsed}`;
  }

  const percent = Math.round(progress.percent ?? 0).toFixed(0).padStart(3);
  const eta = formatDuration(progress.estimatedTimeRemaining ?? 0);
  return `${downloaded} / ${formatBytes(progress.totalBytes)} (${percent}%) ${speed} in ${elapsed} ETA: ${eta}`;
}

/**
 * Draws the status line in place: each redraw blanks the previous line and
 * returns to column 0 before writing.
 *
 * Write failures are discarded on purpose, whether `write` throws or the
 * stream reports them later as an `'error'` event (EPIPE on a closed stderr).
 * A broken terminal must not fail a download that is otherwise going fine.
 * Once the stream has failed nothing more is written to it.
 */
export class ProgressRenderer {
  private lastWidth?: number;
  private pendingWrites = 0;
  private listening = false;
  private closed = false;
  private broken = false;

  constructor(private readonly stream: StatusStream) {
    if (typeof stream.on === 'function') {
      stream.on('error', this.onStreamError);
      this.listening = true;
    }
  }

  get renderedWidth(): number | undefined {
    return this.lastWidth;
  }

  draw(line: string): void {
    if (this.lastWidth !== undefined) {
      this.write(`${' '.repeat(this.lastWidth)}\r`);
    }
    this.write(line);
    this.lastWidth = Array.from(line).length;
  }

  /** Move to column 0 without advancing, so the next draw overwrites. */
  rewind(): void {
    this.write('\r');
  }

  /** Leave the current line on screen and move below it. */
  finish(): void {
    this.write('\n');
    this.close();
  }

  /**
   * Stop drawing. The error listener is detached once the writes already
   * queued have completed; it stays on a stream that has failed, because
   * Node emits the `'error'` event after the failed write's callback.
   */
  close(): void {
    this.closed = true;
    this.release();
  }

  private write(chunk: string): void {
    if (this.broken || this.closed) {
      return;
    }

    this.pendingWrites++;
    try {
      this.stream.write(chunk, this.onWritten);
    } catch (error) {
      this.pendingWrites--;
      logger().debug('Status write failed', { error });
    }
  }

  private readonly onWritten = (error?: Error | null): void => {
    this.pendingWrites--;
    if (error) {
      this.broken = true;
      logger().debug('Status write failed', { error });
    }
    this.release();
  };

  private readonly onStreamError = (error: Error): void => {
    this.broken = true;
    logger().debug('Status stream failed', { error });
  };

  private release(): void {
    if (!this.listening || !this.closed || this.broken || this.pendingWrites > 0) {
      return;
    }
    this.stream.off?.('error', this.onStreamError);
    this.listening = false;
  }
}
