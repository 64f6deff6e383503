import { UnknownProviderError } from '@alertline/core';
import { LocalProvider, type LocalProviderOptions } from './local.js';
import type { IntelligenceProvider } from './provider.js';

export type ProviderFactory = () => IntelligenceProvider;

export class ProviderRegistry {
  private factories: Map<string, ProviderFactory> = new Map();

  register(name: string, factory: ProviderFactory): void {
    if (this.factories.has(name)) {
      throw new Error(`Provider ${name} is already registered`);
    }
    this.factories.set(name, factory);
  }

  /**
   * @throws UnknownProviderError
   */
  get(name: string): IntelligenceProvider {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new UnknownProviderError(name, this.getNames());
    }
    return factory();
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  getNames(): string[] {
    return Array.from(this.factories.keys());
  }
}

export function createDefaultProviderRegistry(local: LocalProviderOptions = {}): ProviderRegistry {
  const registry = new ProviderRegistry();
  registry.register('local', () => new LocalProvider(local));
  return registry;
}
