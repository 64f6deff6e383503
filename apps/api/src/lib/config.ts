import { loadConfigWithDefaults, type AlertlineConfig } from '@alertline/config';

let configInstance: AlertlineConfig | null = null;

/**
 * Process-wide configuration, loaded from the environment on first use
 */
export function getConfig(): AlertlineConfig {
  if (!configInstance) {
    configInstance = loadConfigWithDefaults(process.env);
  }
  return configInstance;
}
