import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { loadConfig } from '@quarry/schemas/src/config-loader.js';
import { ExtractionSchemaSchema } from '@quarry/schemas/src/research.schema.js';
import { createResearchRuntime } from '@quarry/core/src/infrastructure/research-runtime.js';
import type { ExtractionSchema } from '@quarry/shared/src/types/research.types.js';

const DEFAULT_SCHEMA: ExtractionSchema = {
  type: 'object',
  properties: {
    summary: { type: 'string', description: 'Short summary of the topic' },
    keyFacts: { type: 'array', items: { type: 'string' }, description: 'Notable facts with dates' },
  },
  required: ['summary'],
};

async function readSchema(path: string | undefined): Promise<ExtractionSchema> {
  if (!path) {
    return DEFAULT_SCHEMA;
  }
  const raw = JSON.parse(await readFile(resolve(path), 'utf-8')) as unknown;
  return ExtractionSchemaSchema.parse(raw);
}

async function main(): Promise<void> {
  const topic = process.argv[2];
  if (!topic) {
    console.error('Usage: run-research <topic> [schema.json]');
    process.exit(1);
  }

  const configDir = process.env['QUARRY_CONFIG_DIR'] ?? resolve(process.cwd(), 'config');
  const extractionSchema = await readSchema(process.argv[3]);

  console.log('=== Quarry Research Runner ===\n');
  console.log(`Topic: ${topic}`);
  console.log(`Config directory: ${configDir}`);
  console.log(`Mock LLM: ${process.env['QUARRY_MOCK_LLM'] === 'true' ? 'yes' : 'no'}\n`);

  const startTime = Date.now();
  const config = await loadConfig(configDir);
  const runtime = await createResearchRuntime({ config });

  console.log(`Search provider: ${runtime.searchClient.provider}`);
  console.log(`Loop bound: ${String(config.research.maxLoops)} (${config.research.reflectionPolicy})\n`);

  const result = await runtime.agent.run({ topic, extractionSchema });
  const elapsed = Date.now() - startTime;

  console.log('--- Trail ---');
  for (const message of result.messages) {
    switch (message.role) {
      case 'human':
        console.log(`  [human] ${message.content.slice(0, 120)}`);
        break;
      case 'model':
        console.log(`  [model] ${message.toolCalls.map((call) => `${call.name}(${JSON.stringify(call.args)})`).join(', ') || message.content.slice(0, 120)}`);
        break;
      case 'tool':
        console.log(`  [${message.record.toolName}${message.record.isError ? ' error' : ''}] ${message.record.result.slice(0, 120)}`);
        break;
    }
  }

  if (result.verdict) {
    console.log('\n--- Verdict ---');
    console.log(`  Satisfactory: ${result.verdict.isSatisfactory ? 'yes' : 'no'}`);
    for (const reason of result.verdict.reasons) {
      console.log(`    - ${reason}`);
    }
  }

  console.log('\n--- Result ---');
  console.log(`  Status: ${result.status}`);
  console.log(`  Iterations: ${String(result.iterations)}`);
  console.log(JSON.stringify(result.info, null, 2));
  console.log(`\nCompleted in ${String(elapsed)}ms`);
}

main().catch((error: unknown) => {
  console.error('Research run failed:', error);
  process.exit(1);
});
