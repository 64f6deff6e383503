import { UnknownNotifyDriverError, type Logger } from '@alertline/core';
import type { NotifyDriver } from './driver.js';
import { SlackNotifyDriver } from './drivers/slack.js';
import { WebhookNotifyDriver } from './drivers/webhook.js';

export class NotifyDriverRegistry {
  private drivers: Map<string, NotifyDriver> = new Map();

  register(driver: NotifyDriver): void {
    if (this.drivers.has(driver.name)) {
      throw new Error(`Notify driver ${driver.name} is already registered`);
    }
    this.drivers.set(driver.name, driver);
  }

  /**
   * @throws UnknownNotifyDriverError
   */
  get(name: string): NotifyDriver {
    const driver = this.drivers.get(name);
    if (!driver) {
      throw new UnknownNotifyDriverError(name, this.getNames());
    }
    return driver;
  }

  has(name: string): boolean {
    return this.drivers.has(name);
  }

  getNames(): string[] {
    return Array.from(this.drivers.keys());
  }
}

export interface NotifyRegistryOptions {
  timeoutMs?: number;
  signingSecret?: string;
  logger?: Logger;
}

export function createDefaultNotifyDriverRegistry(options: NotifyRegistryOptions = {}): NotifyDriverRegistry {
  const registry = new NotifyDriverRegistry();
  registry.register(new WebhookNotifyDriver(options));
  registry.register(new SlackNotifyDriver(options));
  return registry;
}
