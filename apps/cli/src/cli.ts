#!/usr/bin/env node
import { loadConfigWithDefaults } from '@alertline/config';
import { createLogger, errorMessage } from '@alertline/core';
import { createRuntime, type Runtime } from '@alertline/pipeline';
import { initDb } from '@alertline/store';
import { createProgram } from './program.js';

let runtime: Runtime | null = null;

function getRuntime(): Runtime {
  if (!runtime) {
    const config = loadConfigWithDefaults(process.env);
    const logger = createLogger({
      level: config.logging.level,
      format: config.logging.format,
      name: 'alertline-cli',
      destination: 2,
    });
    runtime = createRuntime(config, initDb(config.store.dbPath), logger);
  }
  return runtime;
}

createProgram({ runtime: getRuntime })
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  })
  .finally(() => {
    runtime?.db.close();
  });
