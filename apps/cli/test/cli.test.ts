import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Checker } from '@alertline/checkers';
import { loadConfig } from '@alertline/config';
import { createRuntime, type Runtime } from '@alertline/pipeline';
import { initDb, listChannels, listIncidents } from '@alertline/store';
import { createProgram, type CliIo } from '../src/program.js';

const alertmanagerPayload = JSON.stringify({
  receiver: 'ops',
  status: 'firing',
  alerts: [
    {
      status: 'firing',
      fingerprint: 'fp-disk',
      labels: { alertname: 'DiskFull', severity: 'warning' },
      annotations: { summary: 'Disk at 85%' },
      startsAt: '2026-01-01T00:00:00Z',
    },
  ],
});

class FixedChecker implements Checker {
  constructor(
    readonly name: string,
    private readonly status: 'ok' | 'critical',
  ) {}

  async check() {
    return { status: this.status, message: `${this.name} is ${this.status}`, metrics: {}, checkerName: this.name };
  }
}

// eslint-disable-next-line no-control-regex
const ANSI = /\u001b\[[0-9;]*m/g;

/**
 * Captures output with color codes stripped
 */
class MemoryIo implements CliIo {
  stdout: string[] = [];
  stderr: string[] = [];
  exitCode = 0;

  constructor(private readonly files: Record<string, string>) {}

  out(line: string): void {
    this.stdout.push(line.replace(ANSI, ''));
  }

  err(line: string): void {
    this.stderr.push(line.replace(ANSI, ''));
  }

  readFile(path: string): string {
    const content = this.files[path];
    if (content === undefined) throw new Error(`ENOENT: ${path}`);
    return content;
  }

  setExitCode(code: number): void {
    this.exitCode = code;
  }
}

describe('CLI', () => {
  let runtime: Runtime;
  let io: MemoryIo;

  const run = async (...args: string[]): Promise<void> => {
    await createProgram({ runtime: () => runtime, io }).exitOverride().parseAsync(args, { from: 'user' });
  };

  beforeEach(() => {
    const config = loadConfig({ NODE_ENV: 'test', DB_PATH: ':memory:' });
    runtime = createRuntime(config, initDb(':memory:'));
    runtime.checkers.register('always-ok', () => new FixedChecker('always-ok', 'ok'));
    runtime.checkers.register('always-down', () => new FixedChecker('always-down', 'critical'));
    io = new MemoryIo({
      'am.json': alertmanagerPayload,
      'list.json': '[1, 2]',
      'pipeline.json': JSON.stringify({ name: 'ingest-only', nodes: [{ id: 'ingest', type: 'ingest' }] }),
      'broken.json': JSON.stringify({ name: 'broken', nodes: [{ id: 'x', type: 'bogus' }] }),
    });
  });

  afterEach(() => {
    runtime.db.close();
  });

  it('lists drivers in detection order', async () => {
    await run('drivers');

    expect(io.stdout).toEqual([
      '  - alertmanager',
      '  - grafana',
      '  - pagerduty',
      '  - datadog',
      '  - newrelic',
      '  - opsgenie',
      '  - zabbix',
      '  - generic',
    ]);
  });

  it('detects the driver for a payload file', async () => {
    await run('detect', 'am.json');

    expect(io.stdout).toEqual(['alertmanager']);
    expect(io.exitCode).toBe(0);
  });

  it('fails detection on a payload that is not an object', async () => {
    await run('detect', 'list.json');

    expect(io.stderr).toEqual(['list.json must contain a JSON object']);
    expect(io.exitCode).toBe(1);
  });

  it('ingests a payload file', async () => {
    await run('ingest', 'am.json');

    expect(io.stdout).toContain('  Alerts created:     1');
    expect(io.stdout).toContain('  Incidents created:  1');
    expect(listIncidents(runtime.db)).toHaveLength(1);
  });

  it('reports an unknown driver', async () => {
    await run('ingest', 'am.json', '--driver', 'nagios');

    expect(io.stderr[0]).toMatch(/^UNKNOWN_DRIVER: Unknown driver: nagios\./);
    expect(io.exitCode).toBe(1);
  });

  it('runs named checkers and raises alerts for failures', async () => {
    await run('check', 'always-ok', 'always-down');

    expect(io.stdout).toEqual([
      '  [ok] always-ok: always-ok is ok',
      '  [critical] always-down: always-down is critical',
      '',
      '1 check(s) not ok',
    ]);
    expect(io.exitCode).toBe(1);
    expect(listIncidents(runtime.db)).toHaveLength(1);
  });

  it('only reports with --no-alert', async () => {
    await run('check', 'always-down', '--no-alert');

    expect(listIncidents(runtime.db)).toHaveLength(0);
  });

  it('runs a pipeline definition', async () => {
    await run('pipeline', 'pipeline.json', '--payload', 'am.json');

    expect(io.stdout.at(-1)).toBe('Pipeline completed');
    expect(io.exitCode).toBe(0);
  });

  it('prints definition problems', async () => {
    await run('pipeline', 'broken.json');

    expect(io.stderr).toEqual([
      'Invalid pipeline definition:',
      '  - Node x has unknown type: bogus. Available: ingest, context, intelligence, notify, transform',
    ]);
    expect(io.exitCode).toBe(1);
  });

  it('lists incidents by status', async () => {
    await run('ingest', 'am.json');
    io.stdout = [];

    await run('incidents', '--status', 'open');

    expect(io.stdout).toHaveLength(1);
    expect(io.stdout[0]).toMatch(/^ {2}#1 \[warning\] open /);
  });

  it('rejects an unknown incident status', async () => {
    await run('incidents', '--status', 'snoozed');

    expect(io.stderr).toEqual(['Unknown incident status: snoozed']);
  });

  describe('channels', () => {
    it('adds a validated channel', async () => {
      await run(
        'channels',
        'add',
        'ops',
        'webhook',
        '--config',
        JSON.stringify({ url: 'https://hooks.example.com/alerts' })
      );
      await run('channels', 'list');

      expect(io.stdout).toEqual(['Channel ops added', '  ops (webhook) [active]']);
      expect(listChannels(runtime.db)[0]?.config).toEqual({ url: 'https://hooks.example.com/alerts' });
    });

    it('refuses an invalid configuration', async () => {
      await run('channels', 'add', 'chat', 'slack', '--config', JSON.stringify({ webhookUrl: 'https://example.com' }));

      expect(io.stderr).toEqual(['Invalid slack configuration']);
      expect(listChannels(runtime.db)).toHaveLength(0);
    });

    it('refuses a duplicate name', async () => {
      const config = JSON.stringify({ url: 'https://hooks.example.com/alerts' });
      await run('channels', 'add', 'ops', 'webhook', '--config', config);
      await run('channels', 'add', 'ops', 'webhook', '--config', config);

      expect(io.stderr).toEqual(['Channel ops already exists']);
    });
  });
});
