import { type AlertlineConfig, alertlineConfigSchema } from './schema.js';

/**
 * Fast-path analysis defaults to on under CI and in the test environment
 */
function resolveFastPath(env: NodeJS.ProcessEnv): string | undefined {
  if (env.INTELLIGENCE_FAST_PATH !== undefined) {
    return env.INTELLIGENCE_FAST_PATH;
  }
  if ((env.CI !== undefined && env.CI !== '' && env.CI !== 'false') || env.NODE_ENV === 'test') {
    return 'true';
  }
  return undefined;
}

/**
 * Load and validate configuration from environment variables
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws Error if validation fails
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AlertlineConfig {
  const rawConfig = {
    api: {
      port: env.API_PORT,
      host: env.API_HOST,
      webhookSecret: env.WEBHOOK_SECRET || undefined,
    },
    store: {
      dbPath: env.DB_PATH,
    },
    lifecycle: {
      autoCreateIncidents: env.AUTO_CREATE_INCIDENTS,
      autoResolveIncidents: env.AUTO_RESOLVE_INCIDENTS,
      refireResolvedAlerts: env.REFIRE_RESOLVED_ALERTS,
      hostname: env.ALERT_HOSTNAME || undefined,
    },
    checkers: {
      skipAll: env.CHECKERS_SKIP_ALL,
      skip: env.CHECKERS_SKIP,
      warningThreshold: env.CHECKERS_WARNING_THRESHOLD,
      criticalThreshold: env.CHECKERS_CRITICAL_THRESHOLD,
      diskPath: env.CHECKERS_DISK_PATH,
    },
    intelligence: {
      defaultProvider: env.INTELLIGENCE_PROVIDER,
      timeoutMs: env.INTELLIGENCE_TIMEOUT_MS,
      fastPath: resolveFastPath(env),
    },
    notify: {
      timeoutMs: env.NOTIFY_TIMEOUT_MS,
      signingSecret: env.NOTIFY_SIGNING_SECRET || undefined,
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
    },
    nodeEnv: env.NODE_ENV,
  };

  const result = alertlineConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

/**
 * Load configuration with graceful defaults for development
 * Falls back to a local database file if DB_PATH is not provided
 */
export function loadConfigWithDefaults(env: NodeJS.ProcessEnv = process.env): AlertlineConfig {
  const defaults: NodeJS.ProcessEnv = {
    DB_PATH: './data/alertline.db',
    ...env,
  };

  return loadConfig(defaults);
}
