import fetch, { Response } from 'node-fetch';
import { Agent as HttpsAgent } from 'https';
import type { Agent } from 'http';
import { getProxyForUrl } from 'proxy-from-env';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { HttpProxyAgent } from 'http-proxy-agent';
import { HttpFetcher, HttpFetcherOptions, ResponseStream, TrustConfig } from './types.js';
import { BodyReader, parseContentLength } from './body.js';
import { NotFoundError, TransferError } from './errors.js';
import { logger } from '../utils/logger.js';

/**
 * Pick the agent for a request: a proxy agent when the environment names a
 * proxy for this URL, and the custom trust roots for HTTPS targets.
 * Returns undefined when Node's global agent will do.
 */
export function createAgent(target: URL, trust: TrustConfig = {}): Agent | undefined {
  const proxy = getProxyForUrl(target.href);
  const ca = trust.ca ? [...trust.ca] : undefined;

  if (target.protocol === 'https:') {
    if (proxy) {
      return new HttpsProxyAgent(proxy, { ca });
    }
    return ca ? new HttpsAgent({ ca }) : undefined;
  }

  return proxy ? new HttpProxyAgent(proxy) : undefined;
}

export class NodeFetchFetcher implements HttpFetcher {
  private readonly userAgent: string;
  private readonly trust: TrustConfig;

  constructor(options: HttpFetcherOptions) {
    this.userAgent = options.userAgent;
    this.trust = options.trust ?? {};
  }

  /**
   * Send a single GET and classify the status. The body is not read here.
   */
  async fetch(url: string): Promise<ResponseStream> {
    logger().debug('Sending request', { url });

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: { 'User-Agent': this.userAgent },
        agent: (parsedUrl) => createAgent(parsedUrl, this.trust),
        // Keep the body as sent so Content-Length matches what is read
        compress: false,
      });
    } catch (error) {
      logger().debug('Request failed', { url, error });
      throw new TransferError(url, { cause: error });
    }

    if (!response.ok) {
      response.body?.resume();
      logger().debug('Request rejected', { url, status: response.status });
      if (response.status === 404) {
        throw new NotFoundError(url);
      }
      throw new TransferError(url, { status: response.status, statusText: response.statusText });
    }

    const contentLength = parseContentLength(response.headers.get('content-length'));
    logger().debug('Response received', { url, status: response.status, contentLength });

    return new BodyReader(response.body, contentLength);
  }
}

export function createHttpFetcher(options: HttpFetcherOptions): HttpFetcher {
  return new NodeFetchFetcher(options);
}
