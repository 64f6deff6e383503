import { ChannelDeliveryError, errorMessage, silentLogger, type Logger } from '@alertline/core';
import type { DeliveryResult, NotificationMessage, NotifyDriverRegistry } from '@alertline/notify';
import { listChannels, type Db, type NotificationChannel } from '@alertline/store';
import { beginNode, type NodeConfig, type NodeContext, type NodeHandler, type NodeResult } from '../node.js';
import { buildPipelineNotification } from '../summary.js';

export interface NotifyNodeOptions {
  db: Db;
  drivers: NotifyDriverRegistry;
  logger?: Logger;
}

interface Delivery {
  channel: string;
  driver: string;
  success: boolean;
  messageId?: string;
  error?: string;
}

function requestedDrivers(config: NodeConfig): string[] {
  const list = config['drivers'];
  if (Array.isArray(list)) {
    return list.filter((name): name is string => typeof name === 'string').map((name) => name.toLowerCase());
  }
  const single = config['driver'];
  return typeof single === 'string' && single !== '' ? [single.toLowerCase()] : [];
}

/**
 * Sends one summary of the run to every selected notification channel
 */
export class NotifyNode implements NodeHandler {
  readonly type = 'notify';
  private readonly logger: Logger;

  constructor(private readonly options: NotifyNodeOptions) {
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Active channels of the requested drivers, else the first active channel
   */
  selectChannels(drivers: readonly string[]): NotificationChannel[] {
    const matching = listChannels(this.options.db, { activeOnly: true, drivers });
    if (matching.length > 0) return matching;
    return listChannels(this.options.db, { activeOnly: true }).slice(0, 1);
  }

  async execute(context: NodeContext, config: NodeConfig): Promise<NodeResult> {
    const { result, finish } = beginNode(this.type, config);

    const channels = this.selectChannels(requestedDrivers(config));
    if (channels.length === 0) {
      result.errors.push('No active notification channels configured');
      result.output = { deliveries: [] };
      return finish();
    }

    const message = buildPipelineNotification(context);
    const deliveries: Delivery[] = [];

    for (const channel of channels) {
      const outcome = await this.deliver(channel, message);
      const delivery: Delivery = { channel: channel.name, driver: channel.driver, success: outcome.success };
      if (outcome.messageId) delivery.messageId = outcome.messageId;
      if (outcome.error) delivery.error = outcome.error;
      deliveries.push(delivery);

      this.logger.info(
        { traceId: context.traceId, channel: channel.name, driver: channel.driver, success: outcome.success },
        'Notification attempted',
      );
    }

    const succeeded = deliveries.filter((delivery) => delivery.success).length;
    if (succeeded === 0) {
      for (const delivery of deliveries) {
        result.errors.push(new ChannelDeliveryError(delivery.channel, delivery.error ?? 'unknown error').message);
      }
    }

    result.output = {
      title: message.title,
      severity: message.severity,
      channelsAttempted: deliveries.length,
      channelsSucceeded: succeeded,
      deliveries,
    };
    return finish();
  }

  private async deliver(
    channel: NotificationChannel,
    message: NotificationMessage,
  ): Promise<DeliveryResult> {
    try {
      const driver = this.options.drivers.get(channel.driver.toLowerCase());
      return await driver.send(message, channel.config);
    } catch (error) {
      return { success: false, error: errorMessage(error), metadata: {} };
    }
  }

  validateConfig(config: NodeConfig): string[] {
    const errors: string[] = [];
    const list = config['drivers'];
    if (list !== undefined && (!Array.isArray(list) || !list.every((name) => typeof name === 'string'))) {
      errors.push("'drivers' must be a list of driver names");
    }
    if (config['driver'] !== undefined && typeof config['driver'] !== 'string') {
      errors.push("'driver' must be a string");
    }
    for (const name of requestedDrivers(config)) {
      if (!this.options.drivers.has(name)) errors.push(`Unknown notify driver: ${name}`);
    }
    return errors;
  }
}
