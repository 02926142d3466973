import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError } from '@quarry/shared/src/utils/errors.js';
import { validateGatewayConfig, validateResearchConfig } from './validators.js';
import type { GatewayConfig } from './gateway.schema.js';
import type { ResearchConfig } from './research.schema.js';

export interface AppConfig {
  readonly gateway: GatewayConfig;
  readonly research: ResearchConfig;
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

export async function loadConfig(configDir: string): Promise<AppConfig> {
  const gatewayPath = join(configDir, 'gateway.json');
  const researchPath = join(configDir, 'research.json');

  const [gatewayRaw, researchRaw] = await Promise.all([
    readJsonFile(gatewayPath),
    readJsonFile(researchPath),
  ]);

  const gateway = validateGatewayConfig(gatewayRaw);
  const research = validateResearchConfig(researchRaw);

  return { gateway, research };
}

export function defaultConfig(): AppConfig {
  return {
    gateway: validateGatewayConfig({}),
    research: validateResearchConfig({}),
  };
}
