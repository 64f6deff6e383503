import {
  ProviderTimeoutError,
  errorMessage,
  silentLogger,
  type Logger,
} from '@alertline/core';
import {
  MAX_TIMEOUT_MS,
  toRecommendationRecord,
  withTimeout,
  type AnalysisSubject,
  type IntelligenceProvider,
  type ProviderRegistry,
  type Recommendation,
} from '@alertline/intelligence';
import { getIncident, listAlerts, type Db } from '@alertline/store';
import { beginNode, type NodeConfig, type NodeContext, type NodeHandler, type NodeResult } from '../node.js';

export interface IntelligenceNodeOptions {
  providers: ProviderRegistry;
  db: Db;
  /** Provider used when the node config names none (default: local) */
  defaultProvider?: string;
  /** Deadline for one provider call (default: 1000) */
  timeoutMs?: number;
  /** Skip the provider and return a canned recommendation */
  fastPath?: boolean;
  logger?: Logger;
}

function fastPathRecommendation(incidentId: number | null): Recommendation {
  return {
    type: 'general',
    priority: 'low',
    title: 'Analysis skipped',
    description: 'Fast-path mode returns a fixed recommendation without calling the provider.',
    details: { fastPath: true },
    actions: ['Review the incident manually'],
    incidentId,
  };
}

/**
 * Runs an analysis provider against the run's incident under a deadline
 */
export class IntelligenceNode implements NodeHandler {
  readonly type = 'intelligence';
  private readonly logger: Logger;

  constructor(private readonly options: IntelligenceNodeOptions) {
    this.logger = options.logger ?? silentLogger();
  }

  async execute(context: NodeContext, config: NodeConfig): Promise<NodeResult> {
    const { result, finish } = beginNode(this.type, config);
    const providerName =
      typeof config['provider'] === 'string' ? config['provider'] : this.options.defaultProvider ?? 'local';

    let provider: IntelligenceProvider;
    try {
      provider = this.options.providers.get(providerName);
    } catch (error) {
      result.errors.push(errorMessage(error));
      return finish();
    }

    if (config['fastPath'] === true || (config['fastPath'] !== false && this.options.fastPath === true)) {
      const recommendation = fastPathRecommendation(context.incidentId);
      result.output = {
        provider: providerName,
        fastPath: true,
        recommendations: [recommendation],
        summary: recommendation.title,
        probableCause: recommendation.description,
      };
      return finish();
    }

    const timeoutMs =
      typeof config['timeoutMs'] === 'number' ? config['timeoutMs'] : this.options.timeoutMs ?? 1000;
    const subject = this.loadSubject(context.incidentId);

    let recommendations: Recommendation[] = [];
    result.output = { provider: providerName };
    try {
      const raw = await withTimeout(
        provider.run(subject),
        timeoutMs,
        () => new ProviderTimeoutError(providerName, timeoutMs),
      );
      recommendations = raw.map(toRecommendationRecord);
    } catch (error) {
      if (error instanceof ProviderTimeoutError) {
        this.logger.warn({ traceId: context.traceId, provider: providerName, timeoutMs }, 'Provider timed out');
        result.output['timedOut'] = true;
      } else {
        this.logger.warn({ traceId: context.traceId, provider: providerName, error: errorMessage(error) }, 'Provider failed');
        result.output['providerError'] = errorMessage(error);
      }
    }

    result.output['recommendations'] = recommendations;
    const [first] = recommendations;
    if (first) {
      result.output['summary'] = first.title;
      result.output['probableCause'] = first.description;
    }

    return finish();
  }

  private loadSubject(incidentId: number | null): AnalysisSubject | undefined {
    if (incidentId === null) return undefined;
    const incident = getIncident(this.options.db, incidentId);
    if (!incident) return undefined;
    return {
      id: incident.id,
      title: incident.title,
      description: incident.description,
      metadata: incident.metadata,
      alerts: listAlerts(this.options.db, { incidentId }).map((alert) => ({
        name: alert.name,
        description: alert.description,
      })),
    };
  }

  validateConfig(config: NodeConfig): string[] {
    const errors: string[] = [];
    const provider = config['provider'];
    if (provider !== undefined && (typeof provider !== 'string' || !this.options.providers.has(provider))) {
      errors.push(`Unknown provider: ${String(provider)}`);
    }
    const timeoutMs = config['timeoutMs'];
    if (
      timeoutMs !== undefined &&
      (typeof timeoutMs !== 'number' || !(timeoutMs > 0) || timeoutMs > MAX_TIMEOUT_MS)
    ) {
      errors.push(`'timeoutMs' must be a positive number no greater than ${MAX_TIMEOUT_MS}`);
    }
    return errors;
  }
}
