export * from './message.js';
export type { DeliveryResult, NotifyDriver } from './driver.js';
export * from './signing.js';
export * from './drivers/webhook.js';
export * from './drivers/slack.js';
export * from './registry.js';
