/**
 * Routing tests for the composite application. Adapters are stubs that
 * answer with their own name and the sub-path they received.
 */

import { vi, describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { IncomingMessage, ServerResponse } from 'node:http';

vi.mock('../../src/utils/logger.js', () => ({
  logDebug: vi.fn(),
  logError: vi.fn(),
  toLoggable: vi.fn((e: unknown) => e),
}));

import { CompositeApp, resolveMount, type Mount } from '../../src/server/app.js';
import { createCodeAnalysisRegistry } from '../../src/registry/code-analysis.js';
import type { TransportAdapter } from '../../src/transport/types.js';
import { logError } from '../../src/utils/logger.js';

function stubAdapter(name: string, mountPath: string): TransportAdapter {
  return {
    name,
    mode: 'sse',
    mountPath,
    registry: createCodeAnalysisRegistry(),
    open: vi.fn(async () => {}),
    close: vi.fn(async () => {}),
    handleRequest: vi.fn(async (_req: IncomingMessage, res: ServerResponse, subPath: string) => {
      if (subPath === '/explode') throw new Error('adapter failure');
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ adapter: name, subPath }));
    }),
  };
}

const code = stubAdapter('code', '/code');
const docker = stubAdapter('docker', '/docker');
const mounts: Mount[] = [
  { prefix: '/code', adapter: code },
  { prefix: '/docker', adapter: docker },
];

describe('resolveMount', () => {
  it('should map the bare prefix to "/"', () => {
    expect(resolveMount(mounts, '/code')).toEqual({ mount: mounts[0], subPath: '/' });
  });

  it('should strip the prefix from nested paths', () => {
    expect(resolveMount(mounts, '/docker/messages/')).toEqual({ mount: mounts[1], subPath: '/messages/' });
  });

  it('should only match whole path segments', () => {
    expect(resolveMount(mounts, '/codebase')).toBeUndefined();
    expect(resolveMount(mounts, '/dockerfile/x')).toBeUndefined();
  });

  it('should not match paths outside every prefix', () => {
    expect(resolveMount(mounts, '/')).toBeUndefined();
    expect(resolveMount(mounts, '/other/code')).toBeUndefined();
  });
});

describe('CompositeApp mount validation', () => {
  it('should reject overlapping prefixes', () => {
    expect(() => new CompositeApp('sse', [
      { prefix: '/tools', adapter: code },
      { prefix: '/tools/docker', adapter: docker },
    ])).toThrow('Mount prefixes "/tools" and "/tools/docker" overlap');
  });

  it('should reject duplicate prefixes', () => {
    expect(() => new CompositeApp('sse', [
      { prefix: '/code', adapter: code },
      { prefix: '/code', adapter: docker },
    ])).toThrow(/overlap/);
  });

  it('should reject a prefix with a trailing slash', () => {
    expect(() => new CompositeApp('sse', [{ prefix: '/code/', adapter: code }])).toThrow(/Invalid mount prefix "\/code\/"/);
  });
});

describe('CompositeApp over HTTP', () => {
  const app = new CompositeApp('stream-http', mounts);
  let baseUrl: string;

  beforeAll(async () => {
    const port = await app.listen(0, '127.0.0.1');
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    await app.close();
  });

  it('should answer the health probe with the transport', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', transport: 'stream-http' });
  });

  it('should route /code requests only to the code adapter', async () => {
    const res = await fetch(`${baseUrl}/code/`);

    expect(await res.json()).toEqual({ adapter: 'code', subPath: '/' });
    expect(docker.handleRequest).not.toHaveBeenCalled();
  });

  it('should route /docker requests only to the docker adapter', async () => {
    vi.mocked(code.handleRequest).mockClear();

    const res = await fetch(`${baseUrl}/docker/messages/?sessionId=abc`);

    expect(await res.json()).toEqual({ adapter: 'docker', subPath: '/messages/' });
    expect(code.handleRequest).not.toHaveBeenCalled();
  });

  it('should return 404 outside every prefix', async () => {
    const res = await fetch(`${baseUrl}/nonexistent`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not Found' });
  });

  it('should answer 500 when an adapter throws before responding', async () => {
    const res = await fetch(`${baseUrl}/code/explode`);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Internal Server Error' });
    expect(logError).toHaveBeenCalledWith('Unhandled error serving /code/explode', expect.any(Error));
  });
});
