import { describe, it, expect } from 'vitest';
import {
  alertlineConfigSchema,
  checkersConfigSchema,
  loadConfig,
  loadConfigWithDefaults,
  parseCsv,
} from '../src/index.js';

describe('config schema', () => {
  it('validates a complete valid configuration', () => {
    const config = {
      api: { port: 3000, host: '0.0.0.0' },
      store: { dbPath: '/tmp/alertline.db' },
      lifecycle: { autoCreateIncidents: true, autoResolveIncidents: true },
      checkers: { skipAll: false, skip: 'cpu', warningThreshold: 70, criticalThreshold: 90 },
      intelligence: { defaultProvider: 'local', timeoutMs: 1000, fastPath: false },
      notify: { timeoutMs: 5000 },
      logging: { level: 'info', format: 'pretty' },
      nodeEnv: 'development',
    };

    const result = alertlineConfigSchema.safeParse(config);
    expect(result.success).toBe(true);
  });

  it('rejects a warning threshold above the critical threshold', () => {
    const result = checkersConfigSchema.safeParse({ warningThreshold: 95, criticalThreshold: 90 });
    expect(result.success).toBe(false);
  });

  it('rejects a short webhook secret', () => {
    const result = alertlineConfigSchema.safeParse({
      api: { webhookSecret: 'too-short' },
      store: { dbPath: 'x.db' },
      lifecycle: {},
      checkers: {},
      intelligence: {},
      notify: {},
      logging: {},
    });
    expect(result.success).toBe(false);
  });
});

describe('loadConfig', () => {
  it('applies defaults for optional fields', () => {
    const config = loadConfig({ DB_PATH: '/tmp/a.db' });

    expect(config.api.port).toBe(3000);
    expect(config.api.host).toBe('0.0.0.0');
    expect(config.api.webhookSecret).toBeUndefined();
    expect(config.lifecycle.autoCreateIncidents).toBe(true);
    expect(config.lifecycle.autoResolveIncidents).toBe(true);
    expect(config.lifecycle.refireResolvedAlerts).toBe(true);
    expect(config.checkers.warningThreshold).toBe(70);
    expect(config.checkers.criticalThreshold).toBe(90);
    expect(config.intelligence.timeoutMs).toBe(1000);
    expect(config.intelligence.fastPath).toBe(false);
    expect(config.logging.level).toBe('info');
    expect(config.nodeEnv).toBe('development');
  });

  it('reads "false" as false for boolean flags', () => {
    const config = loadConfig({
      DB_PATH: '/tmp/a.db',
      AUTO_CREATE_INCIDENTS: 'false',
      AUTO_RESOLVE_INCIDENTS: '0',
      CHECKERS_SKIP_ALL: 'true',
    });

    expect(config.lifecycle.autoCreateIncidents).toBe(false);
    expect(config.lifecycle.autoResolveIncidents).toBe(false);
    expect(config.checkers.skipAll).toBe(true);
  });

  it('coerces numeric values', () => {
    const config = loadConfig({
      DB_PATH: '/tmp/a.db',
      API_PORT: '8080',
      INTELLIGENCE_TIMEOUT_MS: '250',
    });

    expect(config.api.port).toBe(8080);
    expect(config.intelligence.timeoutMs).toBe(250);
  });

  it('turns the analysis fast path on under CI', () => {
    expect(loadConfig({ DB_PATH: 'a.db', CI: 'true' }).intelligence.fastPath).toBe(true);
    expect(loadConfig({ DB_PATH: 'a.db', NODE_ENV: 'test' }).intelligence.fastPath).toBe(true);
    expect(
      loadConfig({ DB_PATH: 'a.db', CI: 'true', INTELLIGENCE_FAST_PATH: 'false' }).intelligence.fastPath,
    ).toBe(false);
  });

  it('throws a readable error listing invalid fields', () => {
    expect(() => loadConfig({ DB_PATH: 'a.db', API_PORT: '70000' })).toThrow(
      /Configuration validation failed:\n {2}- api\.port:/,
    );
  });

  it('throws when the database path is missing', () => {
    expect(() => loadConfig({})).toThrow(/store\.dbPath/);
  });

  it('falls back to a local database file', () => {
    const config = loadConfigWithDefaults({});
    expect(config.store.dbPath).toBe('./data/alertline.db');
  });
});

describe('parseCsv', () => {
  it('splits, trims and lowercases entries', () => {
    expect(parseCsv(' CPU, disk ,,memory ')).toEqual(['cpu', 'disk', 'memory']);
  });

  it('returns an empty list for blank input', () => {
    expect(parseCsv('')).toEqual([]);
    expect(parseCsv('   ')).toEqual([]);
  });
});
