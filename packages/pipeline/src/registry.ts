import { UnknownNodeTypeError, type Logger } from '@alertline/core';
import type { CheckerRegistry } from '@alertline/checkers';
import type { ProviderRegistry } from '@alertline/intelligence';
import type { AlertLifecycleEngine } from '@alertline/lifecycle';
import type { NotifyDriverRegistry } from '@alertline/notify';
import type { NodeHandler } from './node.js';
import { ContextNode } from './nodes/context.js';
import { IngestNode } from './nodes/ingest.js';
import { IntelligenceNode } from './nodes/intelligence.js';
import { NotifyNode } from './nodes/notify.js';
import { TransformNode } from './nodes/transform.js';

export class NodeRegistry {
  private handlers: Map<string, NodeHandler> = new Map();

  register(handler: NodeHandler): void {
    if (this.handlers.has(handler.type)) {
      throw new Error(`Node type ${handler.type} is already registered`);
    }
    this.handlers.set(handler.type, handler);
  }

  /**
   * @throws UnknownNodeTypeError
   */
  get(type: string): NodeHandler {
    const handler = this.handlers.get(type);
    if (!handler) {
      throw new UnknownNodeTypeError(type, this.getTypes());
    }
    return handler;
  }

  has(type: string): boolean {
    return this.handlers.has(type);
  }

  getTypes(): string[] {
    return Array.from(this.handlers.keys());
  }
}

export interface NodeDependencies {
  engine: AlertLifecycleEngine;
  checkers: CheckerRegistry;
  providers: ProviderRegistry;
  notifyDrivers: NotifyDriverRegistry;
  intelligence?: { defaultProvider?: string; timeoutMs?: number; fastPath?: boolean };
  hostname?: string;
  logger?: Logger;
}

export function createDefaultNodeRegistry(deps: NodeDependencies): NodeRegistry {
  const db = deps.engine.db;
  const logger = deps.logger;
  const registry = new NodeRegistry();

  registry.register(new IngestNode(deps.engine, { ...(logger ? { logger } : {}) }));
  registry.register(
    new ContextNode({
      checkers: deps.checkers,
      db,
      ...(deps.hostname ? { hostname: deps.hostname } : {}),
      ...(logger ? { logger } : {}),
    }),
  );
  registry.register(
    new IntelligenceNode({ providers: deps.providers, db, ...deps.intelligence, ...(logger ? { logger } : {}) }),
  );
  registry.register(new NotifyNode({ db, drivers: deps.notifyDrivers, ...(logger ? { logger } : {}) }));
  registry.register(new TransformNode());

  return registry;
}
