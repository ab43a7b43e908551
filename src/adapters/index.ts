import { SourceAdapter } from '../types/adapter';
import { ConfigurationError } from '../types/errors';
import { dailyStar } from './daily-star';
import { prothomAlo } from './prothom-alo';

const registry = new Map<string, SourceAdapter>([
  [dailyStar.key, dailyStar],
  [prothomAlo.key, prothomAlo]
]);

export function getAdapter(name: string): SourceAdapter {
  const adapter = registry.get(name.toLowerCase());
  if (!adapter) {
    throw new ConfigurationError(
      `Unknown source: ${name}. Available sources: ${listAdapterNames().join(', ')}`
    );
  }
  return adapter;
}

export function listAdapterNames(): string[] {
  return Array.from(registry.keys());
}

export function registerAdapter(adapter: SourceAdapter): void {
  registry.set(adapter.key.toLowerCase(), adapter);
}

export { dailyStar, prothomAlo };
