import { readFileSync } from 'fs';
import { X509Certificate } from 'crypto';
import { rootCertificates } from 'tls';
import type { TrustConfig } from './types.js';
import { logger } from '../utils/logger.js';

const DEFAULT_TRUST: TrustConfig = Object.freeze({});

/**
 * Build the trust configuration for HTTPS requests. A readable, parseable PEM
 * certificate at `certPath` is trusted in addition to Node's bundled roots.
 *
 * This never throws: if the file is missing or is not a certificate, the
 * default roots are used and the problem is only logged at debug level.
 * Call it once at startup and hand the result to the fetcher.
 */
export function loadTrustConfig(certPath?: string): TrustConfig {
  if (!certPath) {
    return DEFAULT_TRUST;
  }

  let pem: string;
  try {
    pem = readFileSync(certPath, 'utf-8');
    new X509Certificate(pem);
  } catch (error) {
    logger().debug('Ignoring custom certificate', { certPath, error });
    return DEFAULT_TRUST;
  }

  logger().debug('Loaded custom certificate', { certPath });
  return Object.freeze({ ca: Object.freeze([...rootCertificates, pem]) });
}
