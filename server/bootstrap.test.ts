import type http from 'node:http';
import request from 'supertest';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { startService, type RunningService } from './bootstrap';
import { StartupFailureError } from './errors';
import { silentLogger } from './logger';
import { FakeModelHandle, makePng } from './testUtils';

const config = {
  port: 0,
  host: '127.0.0.1',
  maxFileSize: 1024 * 1024,
  corsOrigins: '*' as const,
  shutdownTimeoutMs: 2000
};

describe('startService', () => {
  let service: RunningService | null = null;

  afterEach(async () => {
    await service?.shutdown('test');
    service = null;
  });

  it('serves a degraded health check while the model loads, then becomes ready', async () => {
    const model = new FakeModelHandle();
    model.holdLoad();
    const seen: { server?: http.Server } = {};

    const starting = startService({
      config,
      model,
      logger: silentLogger,
      onListening: (server) => {
        seen.server = server;
      }
    });

    const server = await vi.waitFor(() => {
      if (!seen.server) {
        throw new Error('not listening yet');
      }
      return seen.server;
    });

    const early = await request(server).get('/health');
    expect(early.status).toBe(200);
    expect(early.body).toEqual({ status: 'degraded', modelLoaded: false });

    const rejected = await request(server)
      .post('/api/remove-bg')
      .attach('file', await makePng(4, 4), { filename: 'a.png', contentType: 'image/png' });
    expect(rejected.status).toBe(503);

    model.finishLoad();
    service = await starting;

    const ready = await request(service.server).get('/health');
    expect(ready.body).toEqual({ status: 'ok', modelLoaded: true });
    expect(service.port).toBeGreaterThan(0);
  });

  it('closes the server and fails when the model cannot load', async () => {
    const model = new FakeModelHandle();
    model.failWith = new Error('weights unavailable');
    const seen: { server?: http.Server } = {};

    const starting = startService({
      config,
      model,
      logger: silentLogger,
      onListening: (server) => {
        seen.server = server;
      }
    });

    await expect(starting).rejects.toBeInstanceOf(StartupFailureError);
    await expect(starting).rejects.toThrow('Failed to load model fake');
    expect(seen.server?.listening).toBe(false);
  });

  it('lets in-flight requests finish before releasing the model', async () => {
    const model = new FakeModelHandle();
    model.delayMs = 100;
    const running = await startService({ config, model, logger: silentLogger });

    const pending = request(running.server)
      .post('/api/remove-bg')
      .attach('file', await makePng(8, 8), { filename: 'slow.png', contentType: 'image/png' })
      .then((res) => res);
    await vi.waitFor(() => expect(model.calls).toBe(1));

    const first = running.shutdown('SIGTERM');
    const second = running.shutdown('SIGTERM');
    expect(second).toBe(first);

    const res = await pending;
    await first;
    expect(res.status).toBe(200);
    expect(model.released).toBe(true);
    expect(running.server.listening).toBe(false);
  });
});
