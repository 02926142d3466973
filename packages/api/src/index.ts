import { serve } from '@hono/node-server';
import { loadConfig } from '@quarry/schemas/src/config-loader.js';
import { createResearchRuntime } from '@quarry/core/src/infrastructure/research-runtime.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);
  const configDir = process.env['QUARRY_CONFIG_DIR'] ?? 'config';

  const config = await loadConfig(configDir);
  const runtime = await createResearchRuntime({ config });

  const app = createApp(runtime);

  log.info({ port, configDir }, 'Starting Quarry API server');

  serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Quarry API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
