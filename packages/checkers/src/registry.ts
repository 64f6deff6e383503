import { UnknownCheckerError } from '@alertline/core';
import type { Checker, ThresholdOptions } from './checker.js';
import { CpuChecker } from './checkers/cpu.js';
import { DiskChecker } from './checkers/disk.js';
import { MemoryChecker } from './checkers/memory.js';

export type CheckerFactory = () => Checker;

export interface CheckerRegistryOptions {
  /** Disable every checker */
  skipAll?: boolean;
  /** Checker names to disable (case-insensitive) */
  skip?: readonly string[];
}

/**
 * Checker registry - maps checker names to factories.
 *
 * A skipped checker stays registered, so `get` still resolves it for an
 * explicit request; only `getEnabledNames` leaves it out.
 */
export class CheckerRegistry {
  private factories: Map<string, CheckerFactory> = new Map();
  private readonly skipAll: boolean;
  private readonly skip: Set<string>;

  constructor(options: CheckerRegistryOptions = {}) {
    this.skipAll = options.skipAll ?? false;
    this.skip = new Set((options.skip ?? []).map((name) => name.toLowerCase()));
  }

  register(name: string, factory: CheckerFactory): void {
    if (this.factories.has(name)) {
      throw new Error(`Checker ${name} is already registered`);
    }
    this.factories.set(name, factory);
  }

  /**
   * @throws UnknownCheckerError
   */
  get(name: string): Checker {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new UnknownCheckerError(name, this.getNames());
    }
    return factory();
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  getNames(): string[] {
    return Array.from(this.factories.keys());
  }

  isEnabled(name: string): boolean {
    return !this.skipAll && this.has(name) && !this.skip.has(name.toLowerCase());
  }

  /**
   * Registered names minus the skipped ones, in registration order
   */
  getEnabledNames(): string[] {
    return this.getNames().filter((name) => this.isEnabled(name));
  }
}

export interface DefaultCheckersOptions extends CheckerRegistryOptions, ThresholdOptions {
  diskPath?: string;
}

/**
 * Registry with the built-in cpu, memory and disk checkers
 */
export function createDefaultCheckerRegistry(options: DefaultCheckersOptions = {}): CheckerRegistry {
  const registry = new CheckerRegistry(options);
  const thresholds: ThresholdOptions = {
    warningThreshold: options.warningThreshold,
    criticalThreshold: options.criticalThreshold,
  };

  registry.register('cpu', () => new CpuChecker(thresholds));
  registry.register('memory', () => new MemoryChecker(thresholds));
  registry.register('disk', () => new DiskChecker({ ...thresholds, path: options.diskPath }));

  return registry;
}
