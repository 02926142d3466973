import { vi } from 'vitest';
import { validateGatewayConfig } from '@quarry/schemas/src/validators.js';
import { createResourceGateway } from '@quarry/core/src/gateway/resource-gateway.js';
import type { AppDeps } from './app.js';

/** Service stubs plus a real gateway whose fetch is never called. */
export function createStubDeps(): AppDeps {
  return {
    agent: { run: vi.fn() },
    entityResolver: { search: vi.fn() },
    contentIndexer: { index: vi.fn() },
    gateway: createResourceGateway(validateGatewayConfig({}), { fetchFn: vi.fn() }),
  };
}

export function jsonPost(body: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}
