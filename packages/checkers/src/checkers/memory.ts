import { freemem, totalmem } from 'node:os';
import { errorMessage } from '@alertline/core';
import { BaseChecker, round, type CheckResult, type ThresholdOptions } from '../checker.js';

export interface MemorySample {
  totalBytes: number;
  freeBytes: number;
}

const GIB = 1024 ** 3;

function readMemory(): MemorySample {
  return { totalBytes: totalmem(), freeBytes: freemem() };
}

export class MemoryChecker extends BaseChecker {
  readonly name = 'memory';

  constructor(
    options: ThresholdOptions = {},
    private readonly sample: () => MemorySample = readMemory,
  ) {
    super(options);
  }

  async check(): Promise<CheckResult> {
    try {
      const { totalBytes, freeBytes } = this.sample();
      if (totalBytes <= 0) {
        return this.errorResult('Total memory reported as zero');
      }
      const usedBytes = totalBytes - freeBytes;
      const percent = round((usedBytes / totalBytes) * 100);
      const totalGb = round(totalBytes / GIB, 2);
      const usedGb = round(usedBytes / GIB, 2);

      return this.makeResult(
        this.determineStatus(percent),
        `Memory usage: ${percent.toFixed(1)}% (${usedGb.toFixed(1)}/${totalGb.toFixed(1)} GB)`,
        {
          memory_percent: percent,
          memory_total_gb: totalGb,
          memory_used_gb: usedGb,
          memory_available_gb: round(freeBytes / GIB, 2),
        },
      );
    } catch (error) {
      return this.errorResult(errorMessage(error));
    }
  }
}
