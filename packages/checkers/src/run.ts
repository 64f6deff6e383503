import { hostname as osHostname } from 'node:os';
import { performance } from 'node:perf_hooks';
import { errorMessage, silentLogger, type Logger } from '@alertline/core';
import { insertCheckRun, type Db } from '@alertline/store';
import type { Checker, CheckResult } from './checker.js';

export interface RunCheckerOptions {
  /** When given, a `check_runs` audit row is written */
  db?: Db;
  traceId?: string;
  hostname?: string;
  logger?: Logger;
}

/**
 * Run one checker, time it and record the outcome.
 *
 * Never rejects: a throwing checker yields an `unknown` result, and a failed
 * audit write is logged and otherwise ignored.
 */
export async function runChecker(checker: Checker, options: RunCheckerOptions = {}): Promise<CheckResult> {
  const logger = options.logger ?? silentLogger();
  const start = performance.now();

  let result: CheckResult;
  try {
    result = await checker.check();
  } catch (error) {
    const message = errorMessage(error);
    logger.warn({ checker: checker.name, error: message }, 'Checker threw');
    result = {
      status: 'unknown',
      message: `Check failed: ${message}`,
      metrics: {},
      checkerName: checker.name,
      error: message,
    };
  }

  const durationMs = performance.now() - start;

  if (options.db) {
    try {
      insertCheckRun(options.db, {
        checkerName: checker.name,
        hostname: options.hostname ?? osHostname(),
        status: result.status,
        message: result.message,
        metrics: result.metrics,
        error: result.error ?? null,
        durationMs,
        traceId: options.traceId ?? null,
      });
    } catch (error) {
      logger.warn({ checker: checker.name, error: errorMessage(error) }, 'Failed to record check run');
    }
  }

  logger.debug({ checker: checker.name, status: result.status, durationMs }, 'Check complete');
  return result;
}
