import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import { errorMessage, silentLogger, type JsonObject, type Logger } from '@alertline/core';
import { finishPipelineRun, insertPipelineRun, type Db, type PipelineRunStatus } from '@alertline/store';
import {
  PipelineDefinitionError,
  conditionNode,
  nodeConfig,
  type PipelineDefinition,
  type PipelineNode,
} from './definition.js';
import type { NodeContext, NodeResult } from './node.js';
import type { NodeRegistry } from './registry.js';

export interface PipelineTrigger {
  payload: JsonObject;
  source?: string;
  environment?: string;
  traceId?: string;
  incidentId?: number | null;
}

export interface PipelineRunResult {
  traceId: string;
  runId: string;
  definition: string;
  status: Exclude<PipelineRunStatus, 'running'>;
  incidentId: number | null;
  executedNodes: string[];
  skippedNodes: string[];
  nodeResults: Record<string, NodeResult>;
  durationMs: number;
  error: string | null;
}

function skipReason(node: PipelineNode, results: Readonly<Record<string, NodeResult>>): string | null {
  for (const ref of node.skipIfErrors) {
    if ((results[ref]?.errors.length ?? 0) > 0) {
      return `${ref} reported errors`;
    }
  }
  if (node.skipIfCondition) {
    const ref = conditionNode(node.skipIfCondition);
    if ((results[ref]?.errors.length ?? 0) > 0) {
      return `condition ${node.skipIfCondition} is true`;
    }
  }
  return null;
}

function duplicateNodeIds(definition: PipelineDefinition): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const node of definition.nodes) {
    if (seen.has(node.id)) duplicates.add(node.id);
    seen.add(node.id);
  }
  return [...duplicates];
}

/**
 * Runs a pipeline definition's nodes one after another.
 *
 * A failing required node stops the run; a failing optional node is logged
 * and the run continues. Every run is recorded in `pipeline_runs`.
 */
export class PipelineExecutor {
  private readonly logger: Logger;

  constructor(
    private readonly db: Db,
    private readonly registry: NodeRegistry,
    options: { logger?: Logger } = {},
  ) {
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * @throws PipelineDefinitionError when two nodes share an id; results are
   * keyed by node id, so the run is refused before anything is recorded
   */
  async run(definition: PipelineDefinition, trigger: PipelineTrigger): Promise<PipelineRunResult> {
    const duplicates = duplicateNodeIds(definition);
    if (duplicates.length > 0) {
      throw new PipelineDefinitionError(duplicates.map((id) => `Duplicate node id: ${id}`));
    }

    const start = performance.now();
    const context: NodeContext = {
      traceId: trigger.traceId ?? randomUUID(),
      runId: randomUUID(),
      incidentId: trigger.incidentId ?? null,
      payload: trigger.payload,
      previousOutputs: {},
      nodeTypes: {},
      environment: trigger.environment ?? 'development',
      source: trigger.source ?? 'unknown',
    };
    const log = this.logger.child({ traceId: context.traceId, runId: context.runId, pipeline: definition.name });

    insertPipelineRun(this.db, {
      runId: context.runId,
      traceId: context.traceId,
      definition: definition.name,
      source: context.source,
      environment: context.environment,
      incidentId: context.incidentId,
    });

    const nodeResults: Record<string, NodeResult> = {};
    const executedNodes: string[] = [];
    const skippedNodes: string[] = [];
    let status: PipelineRunResult['status'] = 'completed';
    let error: string | null = null;

    for (const node of definition.nodes) {
      const reason = skipReason(node, nodeResults);
      if (reason !== null) {
        log.info({ nodeId: node.id, reason }, 'Skipping node');
        skippedNodes.push(node.id);
        nodeResults[node.id] = {
          nodeId: node.id,
          nodeType: node.type,
          output: {},
          errors: [],
          durationMs: 0,
          skipped: true,
          skipReason: reason,
        };
        continue;
      }

      const result = await this.executeNode(definition, node, context);
      nodeResults[node.id] = result;
      executedNodes.push(node.id);
      context.previousOutputs[node.id] = result.output;
      context.nodeTypes[node.id] = node.type;

      const incidentId = result.output['incidentId'];
      if (node.type === 'ingest' && typeof incidentId === 'number') {
        context.incidentId = incidentId;
      }

      if (result.errors.length > 0) {
        if (node.required) {
          status = 'failed';
          error = `Node ${node.id} failed: ${result.errors.join('; ')}`;
          log.warn({ nodeId: node.id, errors: result.errors }, 'Required node failed; stopping');
          break;
        }
        log.warn({ nodeId: node.id, errors: result.errors }, 'Optional node failed; continuing');
      }
    }

    const durationMs = performance.now() - start;
    finishPipelineRun(this.db, context.runId, {
      status,
      incidentId: context.incidentId,
      executedNodes,
      skippedNodes,
      error,
      durationMs,
    });

    log.info({ status, executedNodes, skippedNodes, durationMs: Math.round(durationMs) }, 'Pipeline run finished');

    return {
      traceId: context.traceId,
      runId: context.runId,
      definition: definition.name,
      status,
      incidentId: context.incidentId,
      executedNodes,
      skippedNodes,
      nodeResults,
      durationMs,
      error,
    };
  }

  /**
   * Faults a node did not anticipate become an error entry on its result
   */
  private async executeNode(definition: PipelineDefinition, node: PipelineNode, context: NodeContext): Promise<NodeResult> {
    const start = performance.now();
    try {
      const handler = this.registry.get(node.type);
      const result = await handler.execute(context, nodeConfig(definition, node));
      return { ...result, nodeId: node.id };
    } catch (error) {
      this.logger.error({ traceId: context.traceId, nodeId: node.id, error: errorMessage(error) }, 'Node raised');
      return {
        nodeId: node.id,
        nodeType: node.type,
        output: {},
        errors: [`${node.type} node error: ${errorMessage(error)}`],
        durationMs: performance.now() - start,
        skipped: false,
        skipReason: null,
      };
    }
  }
}
