import type { Clock } from '../utils/clock.js';
import type { DownloadProgress, StatusStream } from '../progress/renderer.js';

export type { DownloadProgress, StatusStream };

/**
 * A body that can be read in chunks. `read` fills at most `buffer.length`
 * bytes from the start of `buffer` and resolves the count, 0 meaning the end.
 * `close` releases the connection; the reader calls it however it finishes.
 */
export interface ResponseStream {
  readonly contentLength?: number;
  read(buffer: Uint8Array): Promise<number>;
  close?(): Promise<void>;
}

export interface DownloadRequest {
  url: string;
  certPath?: string;
}

/** Trusted roots for HTTPS, computed once at startup. */
export interface TrustConfig {
  readonly ca?: readonly string[];
}

export interface HttpFetcherOptions {
  userAgent: string;
  trust?: TrustConfig;
}

export interface HttpFetcher {
  fetch(url: string): Promise<ResponseStream>;
}

export interface ReaderOptions {
  statusStream?: StatusStream;
  clock?: Clock;
  chunkSize?: number;
  speedSamples?: number;
  tickInterval?: number;
  onProgress?: (progress: DownloadProgress) => void;
}

export interface TransferState {
  totalDownloaded: number;
  downloadedThisWindow: number;
  samples: readonly number[];
  startTime: number;
  lastTickTime?: number;
  lastRenderedWidth?: number;
}
