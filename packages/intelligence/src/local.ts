import { statfs } from 'node:fs/promises';
import { cpus, freemem, loadavg, totalmem } from 'node:os';
import { asString } from '@alertline/core';
import type { AnalysisSubject, IntelligenceProvider } from './provider.js';
import type { Recommendation, RecommendationPriority } from './recommendation.js';

/**
 * Point-in-time resource usage the local provider reasons over
 */
export interface SystemSnapshot {
  memoryPercent: number;
  /** One-minute load per core, in percent */
  cpuPercent: number;
  cpuCount: number;
  /** Used percentage of the inspected path, or null when it cannot be read */
  diskPercent: number | null;
}

export type IncidentKind = 'memory' | 'disk' | 'cpu' | 'unknown';

const MEMORY_KEYWORDS = ['memory', 'ram', 'oom', 'out of memory', 'mem', 'swap'];
const DISK_KEYWORDS = ['disk', 'storage', 'space', 'filesystem', 'inode', 'quota'];
const CPU_KEYWORDS = ['cpu', 'load', 'processor', 'compute'];

/** Usage above which the general scan reports a resource */
const PRESSURE_PERCENT = 70;

async function readSnapshot(path: string): Promise<SystemSnapshot> {
  const total = totalmem();
  const cores = cpus().length;
  const [load1 = 0] = loadavg();

  let diskPercent: number | null = null;
  try {
    const stats = await statfs(path);
    const used = stats.blocks - stats.bfree;
    const usable = used + stats.bavail;
    diskPercent = usable > 0 ? (used / usable) * 100 : null;
  } catch {
    diskPercent = null;
  }

  return {
    memoryPercent: total > 0 ? ((total - freemem()) / total) * 100 : 0,
    cpuPercent: cores > 0 ? (load1 / cores) * 100 : 0,
    cpuCount: cores,
    diskPercent,
  };
}

/**
 * Classify an incident by keywords in its title, description and alerts
 */
export function detectIncidentKind(subject: AnalysisSubject): IncidentKind {
  const parts = [subject.title, subject.description];
  for (const alert of subject.alerts ?? []) {
    parts.push(alert.name, alert.description);
  }
  const text = parts.join(' ').toLowerCase();

  if (MEMORY_KEYWORDS.some((keyword) => text.includes(keyword))) return 'memory';
  if (DISK_KEYWORDS.some((keyword) => text.includes(keyword))) return 'disk';
  if (CPU_KEYWORDS.some((keyword) => text.includes(keyword))) return 'cpu';
  return 'unknown';
}

function pressurePriority(percent: number): RecommendationPriority {
  if (percent > 90) return 'critical';
  if (percent > 80) return 'high';
  if (percent > 70) return 'medium';
  return 'low';
}

export interface LocalProviderOptions {
  /** Path measured for disk recommendations when the incident names none (default "/") */
  diskPath?: string;
  /** Snapshot source, replaced in tests */
  snapshot?: (diskPath: string) => Promise<SystemSnapshot>;
}

/**
 * Rule-based provider that needs no external service.
 *
 * With an incident it picks the resource the incident is about; without one
 * it reports every resource above 70% usage.
 */
export class LocalProvider implements IntelligenceProvider {
  readonly name = 'local';
  readonly description = 'Local heuristics over memory, disk and CPU usage';

  private readonly diskPath: string;
  private readonly snapshot: (diskPath: string) => Promise<SystemSnapshot>;

  constructor(options: LocalProviderOptions = {}) {
    this.diskPath = options.diskPath ?? '/';
    this.snapshot = options.snapshot ?? readSnapshot;
  }

  async run(subject?: AnalysisSubject): Promise<Recommendation[]> {
    if (!subject) {
      return this.getRecommendations();
    }

    const kind = detectIncidentKind(subject);
    switch (kind) {
      case 'memory': {
        const system = await this.snapshot(this.diskPath);
        return [this.memoryRecommendation(system, subject.id)];
      }
      case 'disk': {
        const path = asString(subject.metadata['path']) || this.diskPath;
        const system = await this.snapshot(path);
        return [this.diskRecommendation(system, path, subject.id)];
      }
      case 'cpu': {
        const system = await this.snapshot(this.diskPath);
        return [this.cpuRecommendation(system, subject.id)];
      }
      case 'unknown':
        return this.getRecommendations();
    }
  }

  /**
   * Recommendations for the current system state alone
   */
  async getRecommendations(): Promise<Recommendation[]> {
    const system = await this.snapshot(this.diskPath);
    const recommendations: Recommendation[] = [];

    if (system.memoryPercent > PRESSURE_PERCENT) {
      recommendations.push(this.memoryRecommendation(system, null));
    }
    if (system.diskPercent !== null && system.diskPercent > PRESSURE_PERCENT) {
      recommendations.push(this.diskRecommendation(system, this.diskPath, null));
    }

    return recommendations;
  }

  private memoryRecommendation(system: SystemSnapshot, incidentId: number | null): Recommendation {
    return {
      type: 'memory',
      priority: pressurePriority(system.memoryPercent),
      title: 'High Memory Usage Detected',
      description: `Memory usage is at ${system.memoryPercent.toFixed(1)}%.`,
      details: { memory_percent: Math.round(system.memoryPercent * 10) / 10 },
      actions: [
        'Identify the processes holding the most resident memory',
        'Restart services with known memory leaks',
        'Review swap usage and OOM killer activity',
      ],
      incidentId,
    };
  }

  private diskRecommendation(system: SystemSnapshot, path: string, incidentId: number | null): Recommendation {
    const percent = system.diskPercent;
    return {
      type: 'disk',
      priority: percent === null ? 'low' : pressurePriority(percent),
      title: 'High Disk Usage Detected',
      description:
        percent === null
          ? `Disk usage of ${path} could not be read.`
          : `Filesystem holding ${path} is ${percent.toFixed(1)}% full.`,
      details: { path, disk_percent: percent === null ? null : Math.round(percent * 10) / 10 },
      actions: [
        `Find the largest directories under ${path}`,
        'Rotate or compress old log files',
        'Clear package manager and temporary file caches',
      ],
      incidentId,
    };
  }

  private cpuRecommendation(system: SystemSnapshot, incidentId: number | null): Recommendation {
    const percent = system.cpuPercent;
    return {
      type: 'cpu',
      priority: percent > 90 ? 'critical' : percent > 80 ? 'high' : 'medium',
      title: 'High CPU Usage Detected',
      description: `Load per core is ${percent.toFixed(1)}% across ${system.cpuCount} cores.`,
      details: { cpu_percent: Math.round(percent * 10) / 10, cpu_count: system.cpuCount },
      actions: [
        'Check for runaway processes or infinite loops',
        'Consider process priority adjustments (nice/renice)',
        'Review cron jobs and scheduled tasks',
      ],
      incidentId,
    };
  }
}
