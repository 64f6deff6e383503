import { z } from 'zod';

/**
 * Boolean parsed from an environment string.
 *
 * `z.coerce.boolean()` treats any non-empty string as true, so "false" and "0"
 * are mapped explicitly.
 */
const envBooleanSchema = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (['false', '0', 'no', 'off', ''].includes(normalized)) return false;
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  return value;
}, z.boolean());

/**
 * Log level enumeration
 */
export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);
export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Log format enumeration
 */
export const logFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof logFormatSchema>;

/**
 * API server configuration
 */
export const apiConfigSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  host: z.string().default('0.0.0.0'),
  /** HMAC secret required on inbound webhooks when set (minimum 32 characters) */
  webhookSecret: z.string().min(32).optional(),
});
export type ApiConfig = z.infer<typeof apiConfigSchema>;

/**
 * Persistence configuration
 */
export const storeConfigSchema = z.object({
  /** SQLite database file */
  dbPath: z.string().min(1),
});
export type StoreConfig = z.infer<typeof storeConfigSchema>;

/**
 * Alert and incident lifecycle behaviour
 */
export const lifecycleConfigSchema = z.object({
  /** Open or join an incident when a critical/warning alert is first seen */
  autoCreateIncidents: envBooleanSchema.default(true),

  /** Resolve incidents once none of their alerts are firing */
  autoResolveIncidents: envBooleanSchema.default(true),

  /** A resolved alert that fires again goes back to firing */
  refireResolvedAlerts: envBooleanSchema.default(true),

  /** Hostname stamped on checker alerts (default: os.hostname()) */
  hostname: z.string().min(1).optional(),
});
export type LifecycleConfig = z.infer<typeof lifecycleConfigSchema>;

/**
 * Health checker configuration
 */
export const checkersConfigSchema = z.object({
  /** Disable every checker */
  skipAll: envBooleanSchema.default(false),

  /** Checker names to skip (CSV string) */
  skip: z.string().default(''),

  /** Usage percentage at which a checker reports warning */
  warningThreshold: z.coerce.number().min(0).max(100).default(70),

  /** Usage percentage at which a checker reports critical */
  criticalThreshold: z.coerce.number().min(0).max(100).default(90),

  /** Filesystem path inspected by the disk checker */
  diskPath: z.string().default('/'),
}).refine(
  (data) => data.warningThreshold <= data.criticalThreshold,
  { message: 'CHECKERS_WARNING_THRESHOLD must not exceed CHECKERS_CRITICAL_THRESHOLD' },
);
export type CheckersConfig = z.infer<typeof checkersConfigSchema>;

/**
 * Analysis provider configuration
 */
export const intelligenceConfigSchema = z.object({
  /** Provider used when a pipeline node does not name one */
  defaultProvider: z.string().min(1).default('local'),

  /** Deadline for a single provider call */
  timeoutMs: z.coerce.number().int().min(10).max(60000).default(1000),

  /** Return a canned recommendation instead of calling the provider */
  fastPath: envBooleanSchema.default(false),
});
export type IntelligenceConfig = z.infer<typeof intelligenceConfigSchema>;

/**
 * Outbound notification configuration
 */
export const notifyConfigSchema = z.object({
  /** Request timeout in milliseconds */
  timeoutMs: z.coerce.number().int().min(100).max(60000).default(10000),

  /** HMAC secret for signing webhook deliveries (minimum 32 characters) */
  signingSecret: z.string().min(32).optional(),
});
export type NotifyConfig = z.infer<typeof notifyConfigSchema>;

/**
 * Logging configuration
 */
export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  format: logFormatSchema.default('pretty'),
});
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;

/**
 * Complete alertline configuration
 */
export const alertlineConfigSchema = z.object({
  api: apiConfigSchema,
  store: storeConfigSchema,
  lifecycle: lifecycleConfigSchema,
  checkers: checkersConfigSchema,
  intelligence: intelligenceConfigSchema,
  notify: notifyConfigSchema,
  logging: loggingConfigSchema,
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
});
export type AlertlineConfig = z.infer<typeof alertlineConfigSchema>;

/**
 * Parse a CSV list into trimmed, lowercased entries
 */
export function parseCsv(csv: string): string[] {
  if (!csv || csv.trim() === '') return [];
  return csv.split(',').map((s) => s.trim().toLowerCase()).filter((s) => s.length > 0);
}
