import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { initDb, listCheckRuns, type Db } from '@alertline/store';
import {
  BaseChecker,
  CheckerRegistry,
  CpuChecker,
  DiskChecker,
  MemoryChecker,
  createDefaultCheckerRegistry,
  runChecker,
  type Checker,
  type CheckResult,
} from '../src/index.js';

class FixedChecker extends BaseChecker {
  readonly name = 'fixed';

  constructor(private readonly value: number) {
    super({ warningThreshold: 50, criticalThreshold: 80 });
  }

  async check(): Promise<CheckResult> {
    return this.makeResult(this.determineStatus(this.value), `value ${this.value}`, { value: this.value });
  }
}

const GIB = 1024 ** 3;

describe('BaseChecker', () => {
  it('classifies values against inclusive thresholds', () => {
    const checker = new FixedChecker(0);
    expect(checker.determineStatus(49.9)).toBe('ok');
    expect(checker.determineStatus(50)).toBe('warning');
    expect(checker.determineStatus(79.9)).toBe('warning');
    expect(checker.determineStatus(80)).toBe('critical');
  });

  it('defaults to 70/90 thresholds', () => {
    const checker = new CpuChecker();
    expect(checker.warningThreshold).toBe(70);
    expect(checker.criticalThreshold).toBe(90);
  });
});

describe('built-in checkers', () => {
  it('cpu reports load per core as a percentage', async () => {
    const checker = new CpuChecker({}, () => ({ load1: 3, cores: 4 }));
    const result = await checker.check();

    expect(result.status).toBe('warning');
    expect(result.checkerName).toBe('cpu');
    expect(result.metrics).toEqual({ cpu_percent: 75, load_1m: 3, cpu_count: 4 });
    expect(result.message).toBe('CPU usage: 75.0% (load 3.00 on 4 cores)');
  });

  it('cpu turns a sampler failure into unknown', async () => {
    const checker = new CpuChecker({}, () => {
      throw new Error('no /proc');
    });
    const result = await checker.check();

    expect(result.status).toBe('unknown');
    expect(result.error).toBe('no /proc');
    expect(result.message).toBe('Check failed: no /proc');
  });

  it('memory reports used percentage', async () => {
    const checker = new MemoryChecker({}, () => ({ totalBytes: 8 * GIB, freeBytes: 2 * GIB }));
    const result = await checker.check();

    expect(result.status).toBe('warning');
    expect(result.metrics).toEqual({
      memory_percent: 75,
      memory_total_gb: 8,
      memory_used_gb: 6,
      memory_available_gb: 2,
    });
  });

  it('disk computes usage excluding reserved blocks', async () => {
    // 1000 blocks, 100 free of which 50 are available to users
    const checker = new DiskChecker({ path: '/data' }, async () => ({
      bsize: 4096,
      blocks: 1000,
      bfree: 100,
      bavail: 50,
    }));
    const result = await checker.check();

    // used 900 of 950 usable
    expect(result.metrics['disk_percent']).toBe(94.7);
    expect(result.metrics['path']).toBe('/data');
    expect(result.status).toBe('critical');
  });

  it('disk reports unknown when the path cannot be read', async () => {
    const checker = new DiskChecker({ path: '/missing' }, async () => {
      throw new Error('ENOENT');
    });
    const result = await checker.check();
    expect(result.status).toBe('unknown');
    expect(result.error).toBe('ENOENT');
  });
});

describe('CheckerRegistry', () => {
  it('registers the built-ins in order', () => {
    const registry = createDefaultCheckerRegistry();
    expect(registry.getNames()).toEqual(['cpu', 'memory', 'disk']);
    expect(registry.getEnabledNames()).toEqual(['cpu', 'memory', 'disk']);
  });

  it('honours skip lists case-insensitively', () => {
    const registry = createDefaultCheckerRegistry({ skip: ['Memory'] });
    expect(registry.getEnabledNames()).toEqual(['cpu', 'disk']);
    expect(registry.isEnabled('memory')).toBe(false);
    // Explicit lookup still works
    expect(registry.get('memory').name).toBe('memory');
  });

  it('skipAll disables everything', () => {
    const registry = createDefaultCheckerRegistry({ skipAll: true });
    expect(registry.getEnabledNames()).toEqual([]);
  });

  it('throws UnknownCheckerError with the available names', () => {
    const registry = createDefaultCheckerRegistry();
    expect(() => registry.get('gpu')).toThrow('Unknown checker: gpu. Available: cpu, memory, disk');
  });

  it('rejects duplicate registrations', () => {
    const registry = new CheckerRegistry();
    registry.register('fixed', () => new FixedChecker(1));
    expect(() => registry.register('fixed', () => new FixedChecker(2))).toThrow(
      'Checker fixed is already registered',
    );
  });
});

describe('runChecker', () => {
  let db: Db;

  beforeEach(() => {
    db = initDb(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('records a check run with the trace id', async () => {
    const result = await runChecker(new FixedChecker(90), { db, traceId: 'trace-1', hostname: 'web-1' });

    expect(result.status).toBe('critical');
    const [run] = listCheckRuns(db);
    expect(run?.checkerName).toBe('fixed');
    expect(run?.hostname).toBe('web-1');
    expect(run?.status).toBe('critical');
    expect(run?.traceId).toBe('trace-1');
    expect(run?.metrics).toEqual({ value: 90 });
  });

  it('converts a rejecting checker into an unknown result', async () => {
    const broken: Checker = {
      name: 'broken',
      check: () => Promise.reject(new Error('boom')),
    };
    const result = await runChecker(broken, { db });

    expect(result).toEqual({
      status: 'unknown',
      message: 'Check failed: boom',
      metrics: {},
      checkerName: 'broken',
      error: 'boom',
    });
    expect(listCheckRuns(db)[0]?.error).toBe('boom');
  });

  it('still returns the result when the audit write fails', async () => {
    db.close();
    const result = await runChecker(new FixedChecker(10), { db });
    expect(result.status).toBe('ok');
    db = initDb(':memory:');
  });
});
