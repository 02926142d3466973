import { validateGatewayConfig } from '@quarry/schemas/src/validators.js';
import { createResourceGateway } from '@quarry/core/src/gateway/resource-gateway.js';
import type { AppDeps } from '@quarry/api/src/app.js';
import { createApp } from '@quarry/api/src/app.js';

const unused = (): Promise<never> => Promise.reject(new Error('not available while generating the OpenAPI document'));

const deps: AppDeps = {
  agent: { run: unused },
  entityResolver: { search: unused },
  contentIndexer: { index: unused },
  gateway: createResourceGateway(validateGatewayConfig({})),
};

const doc = createApp(deps).getOpenAPI31Document({
  openapi: '3.1.0',
  info: {
    title: 'Quarry API',
    version: '0.1.0',
    description: 'Schema-driven research agent with entity resolution and content indexing',
  },
  servers: [{ url: 'http://localhost:3000', description: 'Local development' }],
});

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');
