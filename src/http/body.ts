import type { ResponseStream } from './types.js';

/**
 * Adapts a Node.js readable body to chunked reads into a caller-owned buffer.
 * Bytes that do not fit are kept for the next read.
 */
export class BodyReader implements ResponseStream {
  private readonly chunks: AsyncIterator<string | Buffer>;
  private pending: Buffer = Buffer.alloc(0);

  constructor(
    body: AsyncIterable<string | Buffer> | null,
    readonly contentLength?: number
  ) {
    this.chunks = (body ?? noBody())[Symbol.asyncIterator]();
  }

  async read(buffer: Uint8Array): Promise<number> {
    if (buffer.length === 0) {
      return 0;
    }

    while (this.pending.length === 0) {
      const next = await this.chunks.next();
      if (next.done) {
        return 0;
      }
      this.pending = typeof next.value === 'string' ? Buffer.from(next.value) : next.value;
    }

    const count = this.pending.copy(buffer, 0, 0, Math.min(buffer.length, this.pending.length));
    this.pending = this.pending.subarray(count);
    return count;
  }

  /** Stop reading; for a Node.js stream this destroys it and frees the socket. */
  async close(): Promise<void> {
    this.pending = Buffer.alloc(0);
    await this.chunks.return?.();
  }
}

async function* noBody(): AsyncGenerator<Buffer> {
  // Responses such as 204 carry no body at all
}

/** Parse a Content-Length header; anything but a non-negative integer is unknown. */
export function parseContentLength(header: string | null): number | undefined {
  if (header === null || !/^\d+$/.test(header.trim())) {
    return undefined;
  }
  const length = Number(header.trim());
  return Number.isSafeInteger(length) ? length : undefined;
}
