import { performance } from 'node:perf_hooks';
import { asString, type JsonObject } from '@alertline/core';

export const NODE_TYPES = ['ingest', 'context', 'intelligence', 'notify', 'transform'] as const;
export type BuiltinNodeType = (typeof NODE_TYPES)[number];

/**
 * Run-scoped state threaded through every node of one pipeline run
 */
export interface NodeContext {
  readonly traceId: string;
  readonly runId: string;
  /** Set by the executor once an ingest node reports one */
  incidentId: number | null;
  /** Trigger payload the run was started with */
  readonly payload: JsonObject;
  /** Output of each executed node, keyed by node id, in execution order */
  readonly previousOutputs: Record<string, JsonObject>;
  /** Node type of each entry in `previousOutputs` */
  readonly nodeTypes: Record<string, string>;
  readonly environment: string;
  readonly source: string;
}

export interface NodeResult {
  nodeId: string;
  nodeType: string;
  output: JsonObject;
  errors: string[];
  durationMs: number;
  skipped: boolean;
  skipReason: string | null;
}

/** Node config; the executor adds the node's `id` */
export type NodeConfig = JsonObject;

/**
 * One pipeline stage.
 *
 * Expected failures go into `errors`; `execute` rejects only on faults the
 * node did not anticipate.
 */
export interface NodeHandler {
  readonly type: string;

  execute(context: NodeContext, config: NodeConfig): Promise<NodeResult>;

  /** Configuration problems; empty when valid */
  validateConfig(config: NodeConfig): string[];
}

/**
 * Start timing a node; `finish` stamps the duration
 */
export function beginNode(type: string, config: NodeConfig): { result: NodeResult; finish: () => NodeResult } {
  const start = performance.now();
  const result: NodeResult = {
    nodeId: asString(config['id'], type),
    nodeType: type,
    output: {},
    errors: [],
    durationMs: 0,
    skipped: false,
    skipReason: null,
  };
  return {
    result,
    finish: () => {
      result.durationMs = performance.now() - start;
      return result;
    },
  };
}

/**
 * Output of the most recent executed node of a type
 */
export function latestOutput(context: NodeContext, type: string): JsonObject | undefined {
  let latest: JsonObject | undefined;
  for (const [nodeId, output] of Object.entries(context.previousOutputs)) {
    if (context.nodeTypes[nodeId] === type) latest = output;
  }
  return latest;
}
