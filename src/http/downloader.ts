import { HttpFetcher, ReaderOptions } from './types.js';
import { NodeFetchFetcher } from './fetcher.js';
import { loadTrustConfig } from './certificate.js';
import { StreamingReader } from './reader.js';
import { getConfig } from '../config/index.js';
import type { Config } from '../config/types.js';
import { logger } from '../utils/logger.js';

export class ProgressDownloader {
  constructor(
    private readonly fetcher: HttpFetcher,
    private readonly defaults: ReaderOptions = {}
  ) {}

  /**
   * Download `url` into memory, drawing progress on the status stream.
   */
  async download(url: string, options: ReaderOptions = {}): Promise<Buffer> {
    const startTime = Date.now();
    logger().info('Starting download', { url });

    try {
      const body = await this.fetcher.fetch(url);
      const reader = new StreamingReader(body, { ...this.defaults, ...options });
      const data = await reader.download();

      logger().info('Download completed', { url, size: data.length, duration: Date.now() - startTime });
      return data;
    } catch (error) {
      logger().error('Download failed', { url, error });
      throw error;
    }
  }
}

/**
 * Build a downloader from configuration. The certificate, if any, is read
 * here and nowhere else, so call this once and reuse the result.
 */
export function createDownloader(config: Config['download'] = getConfig().download): ProgressDownloader {
  const fetcher = new NodeFetchFetcher({
    userAgent: config.userAgent,
    trust: loadTrustConfig(config.certPath),
  });

  return new ProgressDownloader(fetcher, {
    chunkSize: config.chunkSize,
    speedSamples: config.speedSamples,
    tickInterval: config.tickInterval,
  });
}

let defaultDownloader: ProgressDownloader | undefined;

/**
 * Download with the process configuration. The downloader, and with it the
 * certificate, is built on the first call and shared by every later one.
 */
export async function downloadWithProgress(url: string, options?: ReaderOptions): Promise<Buffer> {
  if (!defaultDownloader) {
    defaultDownloader = createDownloader();
  }
  return defaultDownloader.download(url, options);
}
