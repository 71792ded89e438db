import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer, Server } from 'http';
import { Agent as HttpsAgent } from 'https';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { HttpProxyAgent } from 'http-proxy-agent';
import {
  NodeFetchFetcher,
  NotFoundError,
  StreamingReader,
  TransferError,
  createAgent,
  ResponseStream,
} from '../src/http/index.js';

const PROXY_VARIABLES = [
  'http_proxy',
  'HTTP_PROXY',
  'https_proxy',
  'HTTPS_PROXY',
  'all_proxy',
  'ALL_PROXY',
  'no_proxy',
  'NO_PROXY',
  'npm_config_proxy',
  'npm_config_http_proxy',
  'npm_config_https_proxy',
  'npm_config_no_proxy',
];

const body = Buffer.alloc(3072, 'z');

async function listen(server: Server): Promise<string> {
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return `http://127.0.0.1:${address.port}`;
}

async function close(server: Server): Promise<void> {
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
}

async function readBody(stream: ResponseStream): Promise<Buffer> {
  return new StreamingReader(stream, { statusStream: { write: () => true } }).download();
}

describe('NodeFetchFetcher', () => {
  let savedEnv: Record<string, string | undefined>;
  let server: Server;
  let serverUrl: string;
  let requests: string[];
  let fetcher: NodeFetchFetcher;

  beforeEach(async () => {
    savedEnv = {};
    for (const name of PROXY_VARIABLES) {
      savedEnv[name] = process.env[name];
      delete process.env[name];
    }

    requests = [];
    fetcher = new NodeFetchFetcher({ userAgent: 'download-tracker-test/1.0' });

    server = createServer((req, res) => {
      const url = req.url ?? '/';
      requests.push(url);

      if (url === '/file.bin') {
        res.writeHead(200, { 'Content-Type': 'application/octet-stream', 'Content-Length': String(body.length) });
        res.end(body);
      } else if (url === '/no-length') {
        res.writeHead(200, { 'Content-Type': 'text/plain' });
        res.write('first ');
        res.end('second');
      } else if (url === '/agent') {
        res.writeHead(200, { 'Content-Type': 'text/plain' });
        res.end(req.headers['user-agent'] ?? '');
      } else if (url === '/error') {
        res.writeHead(500, { 'Content-Type': 'text/plain' });
        res.end('Server Error');
      } else if (url === '/unavailable') {
        res.writeHead(503, { 'Content-Type': 'text/plain' });
        res.end('Try later');
      } else {
        res.writeHead(404);
        res.end('Not Found');
      }
    });

    serverUrl = await listen(server);
  });

  afterEach(async () => {
    await close(server);
    for (const name of PROXY_VARIABLES) {
      const value = savedEnv[name];
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  it('should hand back the body with its advertised length', async () => {
    const stream = await fetcher.fetch(`${serverUrl}/file.bin`);

    expect(stream.contentLength).toBe(3072);
    expect((await readBody(stream)).equals(body)).toBe(true);
  });

  it('should report an unknown length when the server sends none', async () => {
    const stream = await fetcher.fetch(`${serverUrl}/no-length`);

    expect(stream.contentLength).toBeUndefined();
    expect((await readBody(stream)).toString()).toBe('first second');
  });

  it('should identify itself with the configured user agent', async () => {
    const stream = await fetcher.fetch(`${serverUrl}/agent`);
    expect((await readBody(stream)).toString()).toBe('download-tracker-test/1.0');
  });

  it('should raise NotFoundError for 404', async () => {
    await expect(fetcher.fetch(`${serverUrl}/missing`)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should raise TransferError carrying the status for other failures', async () => {
    const failure = fetcher.fetch(`${serverUrl}/error`);

    await expect(failure).rejects.toBeInstanceOf(TransferError);
    await expect(failure).rejects.toMatchObject({ code: 'TRANSFER_FAILED', status: 500 });
    await expect(fetcher.fetch(`${serverUrl}/unavailable`)).rejects.toThrow('HTTP 503 Service Unavailable');
  });

  it('should send exactly one request without retrying', async () => {
    await expect(fetcher.fetch(`${serverUrl}/error`)).rejects.toThrow(TransferError);
    expect(requests).toEqual(['/error']);
  });

  it('should wrap connection failures in TransferError', async () => {
    const closed = createServer();
    const closedUrl = await listen(closed);
    await close(closed);

    const error: unknown = await fetcher.fetch(`${closedUrl}/file.bin`).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransferError);
    if (error instanceof TransferError) {
      expect(error.status).toBeUndefined();
      expect(error.cause).toBeInstanceOf(Error);
    }
  });

  it('should wrap an unusable URL in TransferError', async () => {
    await expect(fetcher.fetch('not a url')).rejects.toBeInstanceOf(TransferError);
  });
});

describe('createAgent', () => {
  let savedEnv: Record<string, string | undefined>;

  beforeEach(() => {
    savedEnv = {};
    for (const name of PROXY_VARIABLES) {
      savedEnv[name] = process.env[name];
      delete process.env[name];
    }
  });

  afterEach(() => {
    for (const name of PROXY_VARIABLES) {
      const value = savedEnv[name];
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  it('should leave plain requests to the global agent', () => {
    expect(createAgent(new URL('https://example.test/file'))).toBeUndefined();
    expect(createAgent(new URL('http://example.test/file'), { ca: ['pem'] })).toBeUndefined();
  });

  it('should route HTTPS through the proxy named for it', () => {
    process.env.HTTPS_PROXY = 'http://proxy.test:3128';

    const agent = createAgent(new URL('https://example.test/file'));

    expect(agent).toBeInstanceOf(HttpsProxyAgent);
    if (agent instanceof HttpsProxyAgent) {
      expect(agent.proxy.href).toBe('http://proxy.test:3128/');
    }
  });

  it('should route HTTP through the proxy named for it', () => {
    process.env.http_proxy = 'http://proxy.test:8080';

    const agent = createAgent(new URL('http://example.test/file'));

    expect(agent).toBeInstanceOf(HttpProxyAgent);
    if (agent instanceof HttpProxyAgent) {
      expect(agent.proxy.href).toBe('http://proxy.test:8080/');
    }
  });

  it('should bypass the proxy for hosts in NO_PROXY', () => {
    process.env.HTTPS_PROXY = 'http://proxy.test:3128';
    process.env.NO_PROXY = 'example.test';

    expect(createAgent(new URL('https://example.test/file'))).toBeUndefined();
  });

  it('should trust the custom roots for direct HTTPS requests', () => {
    const agent = createAgent(new URL('https://example.test/file'), { ca: ['root-a', 'root-b'] });

    expect(agent).toBeInstanceOf(HttpsAgent);
    if (agent instanceof HttpsAgent) {
      expect(agent.options.ca).toEqual(['root-a', 'root-b']);
    }
  });
});
