import { resolve } from 'node:path';
import { loadConfig } from '@quarry/schemas/src/config-loader.js';
import { createKnowledgeServices } from '@quarry/core/src/infrastructure/research-runtime.js';

async function main(): Promise<void> {
  const name = process.argv[2];
  if (!name) {
    console.error('Usage: index-entity <name>');
    process.exit(1);
  }

  const configDir = process.env['QUARRY_CONFIG_DIR'] ?? resolve(process.cwd(), 'config');
  const config = await loadConfig(configDir);
  const services = createKnowledgeServices(config.gateway);

  console.log('=== Quarry Entity Indexer ===\n');

  const resolved = await services.entityResolver.search(name);
  if (resolved.error) {
    console.error(`Resolution failed: ${resolved.error}`);
    for (const suggestion of resolved.searchSuggestions) {
      console.error(`  - ${suggestion}`);
    }
    process.exit(1);
  }

  console.log(`--- Candidates for "${resolved.searchTerm}" (${String(resolved.totalResults)}) ---`);
  for (const candidate of resolved.results) {
    console.log(
      `  ${candidate.entityId}  ${candidate.name}  [${candidate.matchTier} ${candidate.confidence.toFixed(2)}]  ${candidate.description}`,
    );
  }
  for (const suggestion of resolved.searchSuggestions) {
    console.log(`  hint: ${suggestion}`);
  }

  const best = resolved.results[0];
  const result = await services.contentIndexer.index(best?.name ?? name, best?.entityId);

  console.log(`\n--- Index (${result.status}, confidence ${result.confidence.toFixed(2)}) ---`);
  if (result.error) {
    console.log(`  Error: ${result.error}`);
  }
  const groups = [
    ['Profile', result.primaryPages],
    ['Releases', result.releasePages],
    ['Tracks', result.trackPages],
  ] as const;
  for (const [label, pages] of groups) {
    console.log(`  ${label}: ${String(pages.length)}`);
    for (const page of pages) {
      console.log(`    - ${page.title} (${String(page.wordCount)} words) ${page.url}`);
    }
  }

  const usage = services.gateway.usage();
  console.log(`\nGateway requests: ${String(usage.lastMinute)} in the last minute, ${String(usage.lastHour)} in the last hour`);
}

main().catch((error: unknown) => {
  console.error('Indexing failed:', error);
  process.exit(1);
});
