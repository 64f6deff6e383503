import { z } from 'zod';
import { AlertlineError } from '@alertline/core';
import type { NodeRegistry } from './registry.js';

const HAS_ERRORS_SUFFIX = '.has_errors';

export const pipelineNodeSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  config: z.record(z.unknown()).default({}),
  /** A failing required node stops the run */
  required: z.boolean().default(true),
  /** Skip when any of these nodes reported errors */
  skipIfErrors: z.array(z.string()).default([]),
  /** `<nodeId>.has_errors` */
  skipIfCondition: z
    .string()
    .refine((value) => value.endsWith(HAS_ERRORS_SUFFIX) && value.length > HAS_ERRORS_SUFFIX.length, {
      message: 'must have the form <nodeId>.has_errors',
    })
    .optional(),
});
export type PipelineNode = z.infer<typeof pipelineNodeSchema>;

export const pipelineDefinitionSchema = z.object({
  name: z.string().min(1),
  version: z.string().default('1'),
  description: z.string().optional(),
  /** Base config per node type, under each node's own config */
  defaults: z.record(z.record(z.unknown())).default({}),
  nodes: z.array(pipelineNodeSchema).min(1, 'Pipeline has no nodes defined'),
});
export type PipelineDefinition = z.infer<typeof pipelineDefinitionSchema>;
export type PipelineDefinitionInput = z.input<typeof pipelineDefinitionSchema>;

export class PipelineDefinitionError extends AlertlineError {
  constructor(readonly problems: readonly string[]) {
    super('INVALID_DEFINITION', `Invalid pipeline definition:\n  - ${problems.join('\n  - ')}`);
  }
}

/**
 * Node id named by a `<nodeId>.has_errors` condition
 */
export function conditionNode(condition: string): string {
  return condition.slice(0, -HAS_ERRORS_SUFFIX.length);
}

export function nodeConfig(definition: PipelineDefinition, node: PipelineNode): Record<string, unknown> {
  return { ...definition.defaults[node.type], ...node.config, id: node.id };
}

/**
 * Structural problems the schema cannot see; empty when the definition is runnable
 */
export function validateDefinition(definition: PipelineDefinition, registry: NodeRegistry): string[] {
  const problems: string[] = [];
  const seen = new Set<string>();

  for (const node of definition.nodes) {
    if (seen.has(node.id)) {
      problems.push(`Duplicate node id: ${node.id}`);
    }

    for (const ref of [...node.skipIfErrors, ...(node.skipIfCondition ? [conditionNode(node.skipIfCondition)] : [])]) {
      if (!seen.has(ref)) {
        problems.push(`Node ${node.id}: skip rule references ${ref}, which does not run before it`);
      }
    }
    seen.add(node.id);

    if (!registry.has(node.type)) {
      problems.push(`Node ${node.id} has unknown type: ${node.type}. Available: ${registry.getTypes().join(', ')}`);
      continue;
    }

    for (const error of registry.get(node.type).validateConfig(nodeConfig(definition, node))) {
      problems.push(`Node ${node.id}: ${error}`);
    }
  }

  return problems;
}

/**
 * Parse and validate an untrusted definition
 *
 * @throws PipelineDefinitionError
 */
export function parseDefinition(input: unknown, registry: NodeRegistry): PipelineDefinition {
  const parsed = pipelineDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    throw new PipelineDefinitionError(
      parsed.error.errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message)),
    );
  }

  const problems = validateDefinition(parsed.data, registry);
  if (problems.length > 0) {
    throw new PipelineDefinitionError(problems);
  }
  return parsed.data;
}
