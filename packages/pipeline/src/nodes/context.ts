import { errorMessage, silentLogger, type JsonObject, type Logger } from '@alertline/core';
import { runChecker, type Checker, type CheckerRegistry } from '@alertline/checkers';
import type { Db } from '@alertline/store';
import { beginNode, type NodeConfig, type NodeContext, type NodeHandler, type NodeResult } from '../node.js';

export interface ContextNodeOptions {
  checkers: CheckerRegistry;
  /** Records a check run per checker when given */
  db?: Db;
  hostname?: string;
  logger?: Logger;
}

/**
 * Gathers system health by running checkers
 */
export class ContextNode implements NodeHandler {
  readonly type = 'context';
  private readonly logger: Logger;

  constructor(private readonly options: ContextNodeOptions) {
    this.logger = options.logger ?? silentLogger();
  }

  async execute(context: NodeContext, config: NodeConfig): Promise<NodeResult> {
    const { result, finish } = beginNode(this.type, config);
    const requested = config['checkers'];
    const names = Array.isArray(requested)
      ? requested.filter((name): name is string => typeof name === 'string')
      : this.options.checkers.getEnabledNames();

    const checks: JsonObject[] = [];
    for (const name of names) {
      let checker: Checker;
      try {
        checker = this.options.checkers.get(name);
      } catch (error) {
        result.errors.push(errorMessage(error));
        continue;
      }

      const check = await runChecker(checker, {
        traceId: context.traceId,
        logger: this.logger,
        ...(this.options.db ? { db: this.options.db } : {}),
        ...(this.options.hostname ? { hostname: this.options.hostname } : {}),
      });
      checks.push({
        checkerName: check.checkerName,
        status: check.status,
        message: check.message,
        metrics: check.metrics,
        error: check.error ?? null,
      });
    }

    const passed = checks.filter((check) => check.status === 'ok').length;
    result.output = {
      checks,
      checksRun: checks.length,
      checksPassed: passed,
      checksFailed: checks.length - passed,
    };

    this.logger.info({ traceId: context.traceId, checksRun: checks.length, passed }, 'Context node ran checks');
    return finish();
  }

  validateConfig(config: NodeConfig): string[] {
    const checkers = config['checkers'];
    if (checkers === undefined || checkers === 'all') return [];
    if (!Array.isArray(checkers) || !checkers.every((name) => typeof name === 'string')) {
      return ["'checkers' must be \"all\" or a list of checker names"];
    }
    return [];
  }
}
