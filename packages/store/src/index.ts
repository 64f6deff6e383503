export { initDb, MIGRATIONS, type Db } from './db.js';
export * from './alertStore.js';
export * from './incidentStore.js';
export * from './channelStore.js';
export * from './checkRunStore.js';
export * from './pipelineRunStore.js';
