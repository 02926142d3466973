import { describe, it, expect } from 'vitest';
import { createApp } from './app.js';
import { createStubDeps } from './test-helpers.js';

describe('createApp', () => {
  const app = createApp(createStubDeps());

  it('should report health', async () => {
    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', version: '0.1.0', gateway: { lastMinute: 0, lastHour: 0 } });
  });

  it('should assign a request id when the caller sends none', async () => {
    const res = await app.request('/health');

    expect(res.headers.get('X-Request-Id')).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should echo the caller request id', async () => {
    const res = await app.request('/health', { headers: { 'X-Request-Id': 'trace-42' } });

    expect(res.headers.get('X-Request-Id')).toBe('trace-42');
  });

  it('should publish the OpenAPI document with every route', async () => {
    const res = await app.request('/openapi.json');
    const spec = (await res.json()) as { openapi: string; info: { title: string }; paths: Record<string, unknown> };

    expect(res.status).toBe(200);
    expect(spec.openapi).toBe('3.1.0');
    expect(spec.info.title).toBe('Quarry API');
    expect(Object.keys(spec.paths).sort()).toEqual(['/entities/index', '/entities/search', '/health', '/research']);
  });
});
