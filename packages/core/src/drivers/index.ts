export * from './driver.js';
export * from './registry.js';
export { AlertmanagerDriver, effectiveEndsAt } from './alertmanager.js';
export { GrafanaDriver } from './grafana.js';
export { PagerDutyDriver } from './pagerduty.js';
export { DatadogDriver } from './datadog.js';
export { NewRelicDriver } from './newrelic.js';
export { OpsgenieDriver, opsgeniePrioritySeverity } from './opsgenie.js';
export { ZabbixDriver, zabbixSeverity } from './zabbix.js';
export { GenericDriver } from './generic.js';
