import { ReaderOptions, ResponseStream, TransferState } from './types.js';
import { isInterrupted } from './errors.js';
import { ThroughputSampler, DEFAULT_SPEED_SAMPLES } from '../progress/sampler.js';
import { ProgressRenderer, DownloadProgress, describeProgress, formatStatusLine } from '../progress/renderer.js';
import { Clock, systemClock } from '../utils/clock.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_CHUNK_SIZE = 8192;
export const DEFAULT_TICK_INTERVAL = 1000;

/** Upper bound on the up-front allocation; an advertised length is only a hint. */
export const MAX_PRESIZE = 8 * 1024 * 1024;

/**
 * Growable byte buffer, pre-sized when the final length is known.
 */
class ByteAccumulator {
  private data: Buffer;
  private length = 0;

  constructor(capacity: number) {
    this.data = Buffer.allocUnsafe(Math.min(capacity, MAX_PRESIZE));
  }

  append(source: Uint8Array, count: number): void {
    const needed = this.length + count;
    if (needed > this.data.length) {
      const grown = Buffer.allocUnsafe(Math.max(needed, this.data.length * 2));
      this.data.copy(grown, 0, 0, this.length);
      this.data = grown;
    }
    this.data.set(source.subarray(0, count), this.length);
    this.length = needed;
  }

  /** The bytes written so far, never sharing a larger backing store. */
  toBuffer(): Buffer {
    if (this.length === this.data.length) {
      return this.data;
    }
    const exact = Buffer.allocUnsafeSlow(this.length);
    this.data.copy(exact, 0, 0, this.length);
    return exact;
  }
}

/**
 * Reads a response body to the end while keeping a status line up to date.
 *
 * The line is redrawn once per tick (one second by default) with the total so
 * far, the average speed over the last few seconds and, when the length is
 * known, the percentage and ETA. Interrupted reads are retried without limit;
 * any other read error is rethrown as is and the last drawn line stays on
 * screen.
 */
export class StreamingReader {
  private readonly source: ResponseStream;
  private readonly renderer: ProgressRenderer;
  private readonly sampler: ThroughputSampler;
  private readonly clock: Clock;
  private readonly chunkSize: number;
  private readonly tickInterval: number;
  private readonly onProgress?: (progress: DownloadProgress) => void;

  private totalDownloaded = 0;
  private readonly startTime: number;
  private lastTickTime?: number;

  constructor(source: ResponseStream, options: ReaderOptions = {}) {
    this.source = source;
    this.renderer = new ProgressRenderer(options.statusStream ?? process.stderr);
    this.sampler = new ThroughputSampler(options.speedSamples ?? DEFAULT_SPEED_SAMPLES, source.contentLength);
    this.clock = options.clock ?? systemClock;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.tickInterval = options.tickInterval ?? DEFAULT_TICK_INTERVAL;
    this.onProgress = options.onProgress;
    this.startTime = this.clock.now();

    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
      throw new RangeError(`Chunk size must be a positive integer, got ${this.chunkSize}`);
    }
  }

  get state(): TransferState {
    return {
      totalDownloaded: this.totalDownloaded,
      downloadedThisWindow: this.sampler.pendingBytes,
      samples: this.sampler.samples(),
      startTime: this.startTime,
      lastTickTime: this.lastTickTime,
      lastRenderedWidth: this.renderer.renderedWidth,
    };
  }

  /**
   * Read the body to the end. However the loop exits, the body is closed and
   * the renderer lets go of the status stream.
   */
  async download(): Promise<Buffer> {
    try {
      return await this.readAll();
    } finally {
      this.renderer.close();
      await this.closeSource();
    }
  }

  private async readAll(): Promise<Buffer> {
    const chunk = new Uint8Array(this.chunkSize);
    const output = new ByteAccumulator(this.source.contentLength ?? this.chunkSize);
    let interrupts = 0;

    for (;;) {
      let read: number;
      try {
        read = await this.source.read(chunk);
      } catch (error) {
        if (isInterrupted(error)) {
          interrupts++;
          continue;
        }
        logger().debug('Body read failed', { totalDownloaded: this.totalDownloaded, error });
        throw error;
      }

      if (read === 0) {
        break;
      }

      output.append(chunk, read);
      this.totalDownloaded += read;
      this.sampler.record(read);

      const now = this.clock.now();
      // The tick clock starts with the first chunk, not with the request
      const lastTick = this.lastTickTime ?? now;
      this.lastTickTime = lastTick;

      if (now - lastTick >= this.tickInterval) {
        this.sampler.commit();
        this.render();
        this.renderer.rewind();
        this.lastTickTime = this.clock.now();
      }
    }

    this.render();
    this.renderer.finish();

    logger().debug('Body read complete', { totalDownloaded: this.totalDownloaded, interrupts });
    return output.toBuffer();
  }

  // A failure to close must not replace the result or the error already on its way out
  private async closeSource(): Promise<void> {
    try {
      await this.source.close?.();
    } catch (error) {
      logger().debug('Closing body failed', { error });
    }
  }

  private render(): void {
    const progress = describeProgress({
      downloaded: this.totalDownloaded,
      total: this.source.contentLength,
      speed: this.sampler.speed(),
      elapsedSeconds: (this.clock.now() - this.startTime) / 1000,
    });

    this.renderer.draw(formatStatusLine(progress));
    this.onProgress?.(progress);
  }
}
