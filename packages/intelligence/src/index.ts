export * from './recommendation.js';
export type { AnalysisSubject, IntelligenceProvider } from './provider.js';
export * from './local.js';
export * from './registry.js';
export { MAX_TIMEOUT_MS, withTimeout } from './timeout.js';
