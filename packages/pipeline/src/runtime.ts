import { hostname as osHostname } from 'node:os';
import { createDefaultCheckerRegistry, type CheckerRegistry } from '@alertline/checkers';
import { parseCsv, type AlertlineConfig } from '@alertline/config';
import { silentLogger, type Logger } from '@alertline/core';
import { createDefaultProviderRegistry, type ProviderRegistry } from '@alertline/intelligence';
import { AlertLifecycleEngine, CheckAlertBridge, IncidentManager } from '@alertline/lifecycle';
import { createDefaultNotifyDriverRegistry, type NotifyDriverRegistry } from '@alertline/notify';
import type { Db } from '@alertline/store';
import { PipelineExecutor } from './executor.js';
import { createDefaultNodeRegistry, type NodeRegistry } from './registry.js';

/**
 * Everything the entry points need, wired from one configuration
 */
export interface Runtime {
  config: AlertlineConfig;
  db: Db;
  engine: AlertLifecycleEngine;
  incidents: IncidentManager;
  checkers: CheckerRegistry;
  checkBridge: CheckAlertBridge;
  providers: ProviderRegistry;
  notifyDrivers: NotifyDriverRegistry;
  nodes: NodeRegistry;
  executor: PipelineExecutor;
}

export function createRuntime(config: AlertlineConfig, db: Db, logger: Logger = silentLogger()): Runtime {
  const hostname = config.lifecycle.hostname ?? osHostname();

  const engine = new AlertLifecycleEngine(db, {
    autoCreateIncidents: config.lifecycle.autoCreateIncidents,
    autoResolveIncidents: config.lifecycle.autoResolveIncidents,
    refireResolvedAlerts: config.lifecycle.refireResolvedAlerts,
    logger: logger.child({ component: 'lifecycle' }),
  });

  const checkers = createDefaultCheckerRegistry({
    skipAll: config.checkers.skipAll,
    skip: parseCsv(config.checkers.skip),
    warningThreshold: config.checkers.warningThreshold,
    criticalThreshold: config.checkers.criticalThreshold,
    diskPath: config.checkers.diskPath,
  });
  const providers = createDefaultProviderRegistry({ diskPath: config.checkers.diskPath });
  const notifyDrivers = createDefaultNotifyDriverRegistry({
    timeoutMs: config.notify.timeoutMs,
    signingSecret: config.notify.signingSecret,
    logger: logger.child({ component: 'notify' }),
  });

  const nodes = createDefaultNodeRegistry({
    engine,
    checkers,
    providers,
    notifyDrivers,
    hostname,
    intelligence: config.intelligence,
    logger: logger.child({ component: 'pipeline' }),
  });

  return {
    config,
    db,
    engine,
    incidents: new IncidentManager(db, { logger }),
    checkers,
    checkBridge: new CheckAlertBridge(engine, { checkers, hostname, logger }),
    providers,
    notifyDrivers,
    nodes,
    executor: new PipelineExecutor(db, nodes, { logger }),
  };
}
