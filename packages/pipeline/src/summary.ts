import { asArray, asRecord, asString, type JsonObject } from '@alertline/core';
import { highestPriority, toRecommendationRecord, type RecommendationPriority } from '@alertline/intelligence';
import { createNotificationMessage, type NotificationMessage, type NotifySeverity } from '@alertline/notify';
import { latestOutput, type NodeContext } from './node.js';

const PRIORITY_SEVERITY: Readonly<Record<RecommendationPriority, NotifySeverity>> = {
  critical: 'critical',
  high: 'warning',
  medium: 'warning',
  low: 'info',
};

const STATUS_RANK: Readonly<Record<string, number>> = { ok: 0, unknown: 1, warning: 2, critical: 3 };

const SECTION_SEPARATOR = '\n\n---\n\n';

function count(output: JsonObject, key: string): number {
  const value = output[key];
  return typeof value === 'number' ? value : 0;
}

function worstCheckStatus(checks: unknown[]): string | undefined {
  let worst: string | undefined;
  for (const check of checks) {
    const status = asString(asRecord(check)['status']);
    if (!(status in STATUS_RANK)) continue;
    if (worst === undefined || (STATUS_RANK[status] ?? 0) > (STATUS_RANK[worst] ?? 0)) worst = status;
  }
  return worst;
}

function ingestSection(output: JsonObject): string {
  const lines = ['**Ingest Summary**', `- source: ${asString(output['source'], 'unknown')}`];
  if (output['incidentId'] !== undefined) lines.push(`- incident: #${asString(output['incidentId'])}`);
  if (output['severity'] !== undefined) lines.push(`- severity: ${asString(output['severity'])}`);
  lines.push(
    `- alerts created: ${count(output, 'alertsCreated')}`,
    `- alerts updated: ${count(output, 'alertsUpdated')}`,
    `- alerts resolved: ${count(output, 'alertsResolved')}`,
    `- incidents created: ${count(output, 'incidentsCreated')}`,
  );
  return lines.join('\n');
}

function checkSection(output: JsonObject): string {
  const lines = [
    '**Check Summary**',
    `- checks run: ${count(output, 'checksRun')}`,
    `- passed: ${count(output, 'checksPassed')}`,
    `- failed: ${count(output, 'checksFailed')}`,
  ];
  for (const check of asArray(output['checks']).map(asRecord)) {
    if (check['status'] === 'ok') continue;
    lines.push(`- [${asString(check['status'])}] ${asString(check['checkerName'])}: ${asString(check['message'])}`);
  }
  return lines.join('\n');
}

function intelligenceSection(output: JsonObject): string {
  const recommendations = asArray(output['recommendations']).map(toRecommendationRecord);
  const lines = ['**Intelligence Summary**'];
  if (output['summary'] !== undefined) lines.push(`- summary: ${asString(output['summary'])}`);
  if (output['probableCause'] !== undefined) lines.push(`- probable cause: ${asString(output['probableCause'])}`);
  if (output['timedOut'] === true) lines.push('- provider timed out');
  lines.push(`- recommendations: ${recommendations.length}`);
  for (const rec of recommendations) {
    lines.push(`- [${rec.priority}] ${rec.title}${rec.description ? `: ${rec.description}` : ''}`);
  }
  return lines.join('\n');
}

function genericSection(nodeId: string, output: JsonObject): string {
  return `**${nodeId}**\n\`\`\`\n${JSON.stringify(output, null, 2)}\n\`\`\``;
}

function headline(context: NodeContext): { title: string; severity: NotifySeverity } {
  const intelligence = latestOutput(context, 'intelligence');
  const summary = intelligence ? asString(intelligence['summary']) : '';
  if (intelligence && summary) {
    const priority = highestPriority(asArray(intelligence['recommendations']).map(toRecommendationRecord));
    return { title: summary, severity: PRIORITY_SEVERITY[priority ?? 'low'] };
  }

  const checks = latestOutput(context, 'context');
  const worst = checks ? worstCheckStatus(asArray(checks['checks'])) : undefined;
  if (checks && worst) {
    const failed = count(checks, 'checksFailed');
    const run = count(checks, 'checksRun');
    return {
      title: failed > 0 ? `${failed} of ${run} health checks failing` : `All ${run} health checks passing`,
      severity: worst === 'critical' ? 'critical' : worst === 'ok' ? 'success' : 'warning',
    };
  }

  const ingest = latestOutput(context, 'ingest');
  const severity = ingest ? asString(ingest['severity']) : '';
  if (ingest && severity) {
    return {
      title: `Alert received from ${asString(ingest['source'], 'unknown source')}`,
      severity: severity === 'critical' || severity === 'warning' ? severity : 'info',
    };
  }

  return { title: 'Pipeline notification', severity: 'info' };
}

/**
 * One message summarizing every node that ran before the notify node
 */
export function buildPipelineNotification(context: NodeContext): NotificationMessage {
  const sections: string[] = [];
  for (const [nodeId, output] of Object.entries(context.previousOutputs)) {
    switch (context.nodeTypes[nodeId]) {
      case 'ingest':
        sections.push(ingestSection(output));
        break;
      case 'context':
        sections.push(checkSection(output));
        break;
      case 'intelligence':
        sections.push(intelligenceSection(output));
        break;
      case 'notify':
        break;
      default:
        sections.push(genericSection(nodeId, output));
    }
  }

  const { title, severity } = headline(context);
  return createNotificationMessage({
    title,
    message: sections.length > 0 ? sections.join(SECTION_SEPARATOR) : 'No pipeline output',
    severity,
    tags: { traceId: context.traceId, runId: context.runId, environment: context.environment },
    context: {
      source: context.source,
      incidentId: context.incidentId,
    },
  });
}
