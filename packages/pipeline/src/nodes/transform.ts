import { asString, getPath, isRecord } from '@alertline/core';
import { beginNode, type NodeConfig, type NodeContext, type NodeHandler, type NodeResult } from '../node.js';

interface FieldFilter {
  field: string;
  equals: unknown;
}

function readFilter(config: NodeConfig): FieldFilter | undefined {
  const filter = config['filter'];
  if (isRecord(filter) && typeof filter['field'] === 'string') {
    return { field: filter['field'], equals: filter['equals'] };
  }
  // Shorthand for filtering recommendations by priority
  if (typeof config['filterPriority'] === 'string') {
    return { field: 'priority', equals: config['filterPriority'] };
  }
  return undefined;
}

function matches(value: unknown, expected: unknown): boolean {
  if (typeof value === 'string' && typeof expected === 'string') {
    return value.toLowerCase() === expected.toLowerCase();
  }
  return value === expected;
}

/**
 * Reshapes a prior node's output: extract a path, filter a list, remap fields
 */
export class TransformNode implements NodeHandler {
  readonly type = 'transform';

  async execute(context: NodeContext, config: NodeConfig): Promise<NodeResult> {
    const { result, finish } = beginNode(this.type, config);
    const sourceNode = asString(config['sourceNode']);

    const source = context.previousOutputs[sourceNode];
    if (source === undefined) {
      result.errors.push(`Source node ${sourceNode} has no output`);
      return finish();
    }

    const mapping = config['mapping'];
    if (isRecord(mapping)) {
      const mapped: Record<string, unknown> = {};
      for (const [target, path] of Object.entries(mapping)) {
        mapped[target] = getPath(source, asString(path));
      }
      result.output = { sourceNode, transformed: mapped };
      return finish();
    }

    let data: unknown = typeof config['extract'] === 'string' ? getPath(source, config['extract']) : source;

    const filter = readFilter(config);
    if (filter && Array.isArray(data)) {
      data = data.filter((item) => isRecord(item) && matches(getPath(item, filter.field), filter.equals));
    }

    result.output = { sourceNode, transformed: data ?? null };
    return finish();
  }

  validateConfig(config: NodeConfig): string[] {
    const errors: string[] = [];
    if (typeof config['sourceNode'] !== 'string' || config['sourceNode'] === '') {
      errors.push("'sourceNode' is required");
    }
    if (config['extract'] !== undefined && typeof config['extract'] !== 'string') {
      errors.push("'extract' must be a dot path");
    }
    const mapping = config['mapping'];
    if (mapping !== undefined && (!isRecord(mapping) || !Object.values(mapping).every((p) => typeof p === 'string'))) {
      errors.push("'mapping' must map field names to dot paths");
    }
    const filter = config['filter'];
    if (filter !== undefined && !(isRecord(filter) && typeof filter['field'] === 'string')) {
      errors.push("'filter' must have a string 'field'");
    }
    return errors;
  }
}
