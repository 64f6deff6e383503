import { cpus, loadavg } from 'node:os';
import { errorMessage } from '@alertline/core';
import { BaseChecker, round, type CheckResult, type ThresholdOptions } from '../checker.js';

export interface CpuSample {
  /** One-minute load average */
  load1: number;
  cores: number;
}

function readCpu(): CpuSample {
  const [load1 = 0] = loadavg();
  return { load1, cores: cpus().length };
}

/**
 * CPU pressure as the one-minute load average per core, in percent
 */
export class CpuChecker extends BaseChecker {
  readonly name = 'cpu';

  constructor(
    options: ThresholdOptions = {},
    private readonly sample: () => CpuSample = readCpu,
  ) {
    super(options);
  }

  async check(): Promise<CheckResult> {
    try {
      const { load1, cores } = this.sample();
      if (cores <= 0) {
        return this.errorResult('No CPU cores reported');
      }
      const percent = round((load1 / cores) * 100);
      return this.makeResult(this.determineStatus(percent), `CPU usage: ${percent.toFixed(1)}% (load ${load1.toFixed(2)} on ${cores} cores)`, {
        cpu_percent: percent,
        load_1m: round(load1, 2),
        cpu_count: cores,
      });
    } catch (error) {
      return this.errorResult(errorMessage(error));
    }
  }
}
