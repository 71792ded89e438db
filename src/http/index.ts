export * from './types.js';
export * from './errors.js';
export { BodyReader, parseContentLength } from './body.js';
export { loadTrustConfig } from './certificate.js';
export { NodeFetchFetcher, createAgent, createHttpFetcher } from './fetcher.js';
export { StreamingReader, DEFAULT_CHUNK_SIZE, DEFAULT_TICK_INTERVAL, MAX_PRESIZE } from './reader.js';
export { ProgressDownloader, createDownloader, downloadWithProgress } from './downloader.js';
