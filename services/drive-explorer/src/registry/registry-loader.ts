import { readFileSync } from 'node:fs';
import { load } from 'js-yaml';
import { type RegistryConfig, RegistryConfigSchema } from './registry.schema';

export function loadRegistry(registryFile: string): RegistryConfig {
  try {
    const fileContent = readFileSync(registryFile, 'utf-8');
    return RegistryConfigSchema.parse(load(fileContent) ?? {});
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`Failed to load or validate registry from ${registryFile}: ${error.message}`, {
        cause: error,
      });
    }
    throw error;
  }
}
