export * from './node.js';
export * from './definition.js';
export * from './executor.js';
export * from './registry.js';
export { buildPipelineNotification } from './summary.js';
export { IngestNode } from './nodes/ingest.js';
export { ContextNode, type ContextNodeOptions } from './nodes/context.js';
export { IntelligenceNode, type IntelligenceNodeOptions } from './nodes/intelligence.js';
export { NotifyNode, type NotifyNodeOptions } from './nodes/notify.js';
export { TransformNode } from './nodes/transform.js';
export * from './runtime.js';
