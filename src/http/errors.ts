export type DownloadErrorCode = 'NOT_FOUND' | 'TRANSFER_FAILED';

/**
 * Base class for failures raised before the body is read.
 */
export class DownloadError extends Error {
  readonly code: DownloadErrorCode;
  readonly url: string;

  constructor(code: DownloadErrorCode, url: string, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'DownloadError';
    this.code = code;
    this.url = url;
  }
}

export class NotFoundError extends DownloadError {
  constructor(url: string) {
    super('NOT_FOUND', url, `Not found: ${url}`);
    this.name = 'NotFoundError';
  }
}

type TransferFailure = { status: number; statusText?: string } | { cause: unknown };

function describeFailure(details: TransferFailure): string {
  if ('status' in details) {
    return details.statusText ? `HTTP ${details.status} ${details.statusText}` : `HTTP ${details.status}`;
  }
  const reason = details.cause instanceof Error ? details.cause.message : String(details.cause);
  return `Request failed: ${reason}`;
}

/**
 * Non-2xx status other than 404, or a request that never got a response.
 * Exactly one of `status` and `cause` is set.
 */
export class TransferError extends DownloadError {
  readonly status?: number;

  constructor(url: string, details: TransferFailure) {
    super('TRANSFER_FAILED', url, describeFailure(details), {
      cause: 'cause' in details ? details.cause : undefined,
    });
    this.name = 'TransferError';
    this.status = 'status' in details ? details.status : undefined;
  }
}

export function isDownloadError(error: unknown): error is DownloadError {
  return error instanceof DownloadError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isTransferError(error: unknown): error is TransferError {
  return error instanceof TransferError;
}

/**
 * A read that was interrupted before any data arrived. The reader retries these.
 */
export function isInterrupted(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EINTR';
}
