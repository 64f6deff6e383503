import { UnknownDriverError } from '../errors.js';
import { AlertmanagerDriver } from './alertmanager.js';
import { DatadogDriver } from './datadog.js';
import type { SourceDriver } from './driver.js';
import { GenericDriver } from './generic.js';
import { GrafanaDriver } from './grafana.js';
import { NewRelicDriver } from './newrelic.js';
import { OpsgenieDriver } from './opsgenie.js';
import { PagerDutyDriver } from './pagerduty.js';
import { ZabbixDriver } from './zabbix.js';

export type DriverFactory = () => SourceDriver;

interface DriverEntry {
  name: string;
  factory: DriverFactory;
  catchAll: boolean;
}

/**
 * Ordered registry of source drivers.
 *
 * Registration order is the detection order: `detect` asks each non-catch-all
 * driver in turn and the first whose `validate` accepts the payload wins.
 * There is no scoring between overlapping predicates, so a payload that
 * happens to satisfy an earlier driver's shape check is attributed to it.
 */
export class DriverRegistry {
  private entries: DriverEntry[] = [];

  /**
   * Register a driver factory
   *
   * @param options.catchAll - Tried only after every other driver declines
   */
  register(name: string, factory: DriverFactory, options: { catchAll?: boolean } = {}): void {
    if (this.has(name)) {
      throw new Error(`Driver ${name} is already registered`);
    }
    const catchAll = options.catchAll ?? false;
    if (catchAll && this.entries.some((entry) => entry.catchAll)) {
      throw new Error('Only one catch-all driver can be registered');
    }
    this.entries.push({ name, factory, catchAll });
  }

  /**
   * Instantiate a driver by name
   *
   * @throws UnknownDriverError
   */
  get(name: string): SourceDriver {
    const entry = this.entries.find((e) => e.name === name);
    if (!entry) {
      throw new UnknownDriverError(name, this.getNames());
    }
    return entry.factory();
  }

  has(name: string): boolean {
    return this.entries.some((entry) => entry.name === name);
  }

  /**
   * Driver names in registration order
   */
  getNames(): string[] {
    return this.entries.map((entry) => entry.name);
  }

  /**
   * Auto-detect the driver for a payload, or `undefined` when none accepts it
   */
  detect(payload: unknown): SourceDriver | undefined {
    for (const entry of this.entries) {
      if (entry.catchAll) continue;
      const driver = entry.factory();
      if (driver.validate(payload)) {
        return driver;
      }
    }

    const fallback = this.entries.find((entry) => entry.catchAll);
    if (fallback) {
      const driver = fallback.factory();
      if (driver.validate(payload)) {
        return driver;
      }
    }

    return undefined;
  }
}

/**
 * Registry with the built-in drivers in detection order
 */
export function createDefaultDriverRegistry(): DriverRegistry {
  const registry = new DriverRegistry();

  registry.register('alertmanager', () => new AlertmanagerDriver());
  registry.register('grafana', () => new GrafanaDriver());
  registry.register('pagerduty', () => new PagerDutyDriver());
  registry.register('datadog', () => new DatadogDriver());
  registry.register('newrelic', () => new NewRelicDriver());
  registry.register('opsgenie', () => new OpsgenieDriver());
  registry.register('zabbix', () => new ZabbixDriver());
  registry.register('generic', () => new GenericDriver(), { catchAll: true });

  return registry;
}
