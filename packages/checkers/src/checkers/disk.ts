import { statfs } from 'node:fs/promises';
import { errorMessage } from '@alertline/core';
import { BaseChecker, round, type CheckResult, type ThresholdOptions } from '../checker.js';

/**
 * Subset of `fs.StatsFs` the checker reads
 */
export interface FsStats {
  bsize: number;
  blocks: number;
  bfree: number;
  bavail: number;
}

export interface DiskCheckerOptions extends ThresholdOptions {
  /** Mount point or any path on the filesystem to measure (default "/") */
  path?: string;
}

const GIB = 1024 ** 3;

/**
 * Used space of one filesystem, computed the way `df` does: blocks reserved
 * for root count as neither used nor available.
 */
export class DiskChecker extends BaseChecker {
  readonly name = 'disk';
  readonly path: string;

  constructor(
    options: DiskCheckerOptions = {},
    private readonly readStats: (path: string) => Promise<FsStats> = (path) => statfs(path),
  ) {
    super(options);
    this.path = options.path ?? '/';
  }

  async check(): Promise<CheckResult> {
    try {
      const stats = await this.readStats(this.path);
      const used = stats.blocks - stats.bfree;
      const usable = used + stats.bavail;
      if (usable <= 0) {
        return this.errorResult(`No usable blocks on ${this.path}`);
      }

      const percent = round((used / usable) * 100);
      const totalGb = round((stats.blocks * stats.bsize) / GIB, 2);
      const freeGb = round((stats.bavail * stats.bsize) / GIB, 2);

      return this.makeResult(this.determineStatus(percent), `Disk ${this.path}: ${percent.toFixed(1)}% used (${freeGb.toFixed(1)} GB free)`, {
        path: this.path,
        disk_percent: percent,
        disk_total_gb: totalGb,
        disk_free_gb: freeGb,
      });
    } catch (error) {
      return this.errorResult(errorMessage(error));
    }
  }
}
