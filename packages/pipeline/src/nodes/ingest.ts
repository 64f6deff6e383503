import { asString, isRecord, silentLogger, type Logger } from '@alertline/core';
import type { AlertLifecycleEngine } from '@alertline/lifecycle';
import { findLatestAlertSince } from '@alertline/store';
import { beginNode, type NodeConfig, type NodeContext, type NodeHandler, type NodeResult } from '../node.js';

/**
 * Runs the trigger payload through the lifecycle engine
 */
export class IngestNode implements NodeHandler {
  readonly type = 'ingest';
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly engine: AlertLifecycleEngine,
    options: { logger?: Logger; now?: () => Date } = {},
  ) {
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? (() => new Date());
  }

  async execute(context: NodeContext, config: NodeConfig): Promise<NodeResult> {
    const { result, finish } = beginNode(this.type, config);

    // Triggers either wrap the webhook body as `payload` or are the body
    const payload = context.payload['payload'] ?? context.payload;
    if (!isRecord(payload)) {
      result.errors.push('Ingest payload must be a JSON object');
      return finish();
    }

    const driverName =
      asString(config['driver']) || asString(context.payload['driver']) || this.engine.drivers.detect(payload)?.name;

    const since = this.now();
    const processed = this.engine.processWebhook(payload, driverName);

    result.errors.push(...processed.errors);
    result.output = {
      source: driverName ?? context.source,
      alertsCreated: processed.alertsCreated,
      alertsUpdated: processed.alertsUpdated,
      alertsResolved: processed.alertsResolved,
      alertsRefired: processed.alertsRefired,
      incidentsCreated: processed.incidentsCreated,
      incidentsUpdated: processed.incidentsUpdated,
      incidentsResolved: processed.incidentsResolved,
    };

    // Most recent alert written by this call, not necessarily the only one
    const latest = findLatestAlertSince(this.engine.db, since);
    if (latest) {
      result.output['alertFingerprint'] = latest.fingerprint;
      result.output['severity'] = latest.severity;
      if (latest.incidentId !== null) {
        result.output['incidentId'] = latest.incidentId;
      }
    }

    this.logger.info({ traceId: context.traceId, ...result.output }, 'Ingest node processed payload');
    return finish();
  }

  validateConfig(config: NodeConfig): string[] {
    const driver = config['driver'];
    if (driver === undefined) return [];
    if (typeof driver !== 'string') return ["'driver' must be a string"];
    return this.engine.drivers.has(driver) ? [] : [`Unknown driver: ${driver}`];
  }
}
