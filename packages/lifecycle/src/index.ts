export * from './result.js';
export { groupingKeyFor } from './grouping.js';
export { AlertLifecycleEngine, AUTO_RESOLVE_SUMMARY, type LifecycleEngineOptions } from './engine.js';
export * from './incidentManager.js';
export * from './checkBridge.js';
