import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import pc from 'picocolors';
import { runChecker, type CheckResult } from '@alertline/checkers';
import { errorMessage, isRecord, type JsonObject } from '@alertline/core';
import { PipelineDefinitionError, parseDefinition, type PipelineDefinition, type Runtime } from '@alertline/pipeline';
import { getChannelByName, insertChannel, listChannels, listIncidents, isIncidentStatus } from '@alertline/store';

/**
 * Where commands write and how they report failure
 */
export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  readFile(path: string): string;
  setExitCode(code: number): void;
}

export const processIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  readFile: (path) => readFileSync(path, 'utf-8'),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

export interface ProgramOptions {
  /** Called once per command; the runtime is built lazily so `--help` needs no database */
  runtime: () => Runtime;
  io?: CliIo;
}

const STATUS_COLORS: Record<CheckResult['status'], (text: string) => string> = {
  ok: pc.green,
  warning: pc.yellow,
  critical: pc.red,
  unknown: pc.gray,
};

function readJsonObject(io: CliIo, path: string): JsonObject {
  const parsed: unknown = JSON.parse(io.readFile(path));
  if (!isRecord(parsed)) {
    throw new Error(`${path} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Build the command tree
 */
export function createProgram(options: ProgramOptions): Command {
  const io = options.io ?? processIo;
  const program = new Command();

  program
    .name('alertline')
    .description('Alert ingestion, incident lifecycle and pipeline tools')
    .version('0.1.0')
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  const fail = (message: string): void => {
    io.err(pc.red(message));
    io.setExitCode(1);
  };

  /**
   * Drivers command - lists source drivers in detection order
   */
  program
    .command('drivers')
    .description('List source drivers in detection order')
    .action(() => {
      for (const name of options.runtime().engine.drivers.getNames()) {
        io.out(`  - ${name}`);
      }
    });

  /**
   * Detect command - shows which driver would parse a payload
   */
  program
    .command('detect')
    .description('Show which source driver accepts a payload file')
    .argument('<file>', 'JSON payload')
    .action((file: string) => {
      try {
        const payload = readJsonObject(io, file);
        const driver = options.runtime().engine.drivers.detect(payload);
        if (!driver) {
          fail('No driver matched the payload');
          return;
        }
        io.out(driver.name);
      } catch (err) {
        fail(errorMessage(err));
      }
    });

  /**
   * Ingest command - applies a payload file to the alert store
   */
  program
    .command('ingest')
    .description('Ingest a webhook payload from a file')
    .argument('<file>', 'JSON payload')
    .option('-d, --driver <name>', 'Source driver (default: detect)')
    .action((file: string, opts: { driver?: string }) => {
      let payload: JsonObject;
      try {
        payload = readJsonObject(io, file);
      } catch (err) {
        fail(errorMessage(err));
        return;
      }

      const result = options.runtime().engine.processWebhook(payload, opts.driver);
      if (result.rejection) {
        fail(`${result.rejection.code}: ${result.rejection.message}`);
        return;
      }

      const summary = result.toJSON();
      io.out(pc.bold('\nIngest Summary\n'));
      io.out(`  Alerts created:     ${summary.alertsCreated}`);
      io.out(`  Alerts updated:     ${summary.alertsUpdated}`);
      io.out(`  Alerts resolved:    ${summary.alertsResolved}`);
      io.out(`  Alerts refired:     ${summary.alertsRefired}`);
      io.out(`  Incidents created:  ${summary.incidentsCreated}`);
      io.out(`  Incidents resolved: ${summary.incidentsResolved}`);
      for (const error of summary.errors) {
        io.err(pc.yellow(`  ! ${error}`));
      }
      if (summary.hasErrors) io.setExitCode(1);
    });

  /**
   * Check command - runs health checkers and feeds results into the lifecycle
   */
  program
    .command('check')
    .description('Run health checkers (default: every enabled checker)')
    .argument('[names...]', 'Checker names')
    .option('--no-alert', 'Report only; do not raise or resolve checker alerts')
    .action(async (names: string[], opts: { alert: boolean }) => {
      const runtime = options.runtime();
      const selected = names.length > 0 ? names : runtime.checkers.getEnabledNames();
      let failing = 0;

      for (const name of selected) {
        let result: CheckResult;
        try {
          result = await runChecker(runtime.checkers.get(name), {
            db: runtime.db,
            hostname: runtime.checkBridge.hostname,
          });
        } catch (err) {
          fail(errorMessage(err));
          continue;
        }

        const color = STATUS_COLORS[result.status];
        io.out(`  ${color(`[${result.status}]`)} ${result.checkerName}: ${result.message}`);
        if (result.status !== 'ok') failing++;

        if (opts.alert) {
          const processed = runtime.checkBridge.processCheckResult(result);
          for (const error of processed.errors) {
            io.err(pc.yellow(`  ! ${name}: ${error}`));
          }
        }
      }

      io.out('');
      io.out(failing === 0 ? pc.green('All checks passing') : pc.red(`${failing} check(s) not ok`));
      if (failing > 0) io.setExitCode(1);
    });

  /**
   * Pipeline command - runs a definition file against a payload
   */
  program
    .command('pipeline')
    .description('Run a pipeline definition')
    .argument('<definition>', 'Pipeline definition JSON file')
    .option('-p, --payload <file>', 'Trigger payload JSON file')
    .option('-s, --source <name>', 'Trigger source label')
    .action(async (definitionFile: string, opts: { payload?: string; source?: string }) => {
      const runtime = options.runtime();

      let definition: PipelineDefinition;
      let payload: JsonObject = {};
      try {
        definition = parseDefinition(readJsonObject(io, definitionFile), runtime.nodes);
        if (opts.payload) payload = readJsonObject(io, opts.payload);
      } catch (err) {
        if (err instanceof PipelineDefinitionError) {
          io.err(pc.red('Invalid pipeline definition:'));
          for (const problem of err.problems) io.err(pc.red(`  - ${problem}`));
          io.setExitCode(1);
          return;
        }
        fail(errorMessage(err));
        return;
      }

      const result = await runtime.executor.run(definition, {
        payload,
        source: opts.source,
        environment: runtime.config.nodeEnv,
      });

      io.out(pc.bold(`\nPipeline ${result.definition} (${result.runId})\n`));
      for (const node of definition.nodes) {
        const nodeResult = result.nodeResults[node.id];
        if (!nodeResult) {
          io.out(`  ${pc.gray('-')} ${node.id} ${pc.gray('not run')}`);
        } else if (nodeResult.skipped) {
          io.out(`  ${pc.gray('-')} ${node.id} ${pc.gray(`skipped: ${nodeResult.skipReason ?? ''}`)}`);
        } else if (nodeResult.errors.length > 0) {
          io.out(`  ${pc.red('✗')} ${node.id} ${pc.red(nodeResult.errors.join('; '))}`);
        } else {
          io.out(`  ${pc.green('✓')} ${node.id} ${pc.gray(`${nodeResult.durationMs.toFixed(1)}ms`)}`);
        }
      }

      io.out('');
      if (result.status === 'completed') {
        io.out(pc.green(pc.bold('Pipeline completed')));
      } else {
        fail(result.error ?? 'Pipeline failed');
      }
    });

  /**
   * Incidents command - lists incidents, newest first
   */
  program
    .command('incidents')
    .description('List incidents')
    .option('--status <status>', 'open, acknowledged, resolved or closed')
    .action((opts: { status?: string }) => {
      const status = opts.status;
      if (status !== undefined && !isIncidentStatus(status)) {
        fail(`Unknown incident status: ${status}`);
        return;
      }
      const incidents = listIncidents(options.runtime().db, status ? { statuses: [status] } : {});
      if (incidents.length === 0) {
        io.out(pc.gray('No incidents'));
        return;
      }
      for (const incident of incidents) {
        io.out(`  #${incident.id} [${incident.severity}] ${incident.status} ${incident.title}`);
      }
    });

  const channels = program.command('channels').description('Manage notification channels');

  channels
    .command('list')
    .description('List notification channels')
    .action(() => {
      const list = listChannels(options.runtime().db);
      if (list.length === 0) {
        io.out(pc.gray('No channels configured'));
        return;
      }
      for (const channel of list) {
        const state = channel.isActive ? pc.green('active') : pc.gray('inactive');
        io.out(`  ${channel.name} (${channel.driver}) [${state}]`);
      }
    });

  channels
    .command('add')
    .description('Add a notification channel')
    .argument('<name>', 'Channel name')
    .argument('<driver>', 'Notify driver, e.g. webhook or slack')
    .option('-c, --config <json>', 'Driver configuration as JSON', '{}')
    .option('--description <text>', 'Free-form description', '')
    .action((name: string, driverName: string, opts: { config: string; description: string }) => {
      const runtime = options.runtime();
      try {
        const driver = runtime.notifyDrivers.get(driverName.toLowerCase());
        const config: unknown = JSON.parse(opts.config);
        if (!isRecord(config) || !driver.validateConfig(config)) {
          fail(`Invalid ${driver.name} configuration`);
          return;
        }
        if (getChannelByName(runtime.db, name)) {
          fail(`Channel ${name} already exists`);
          return;
        }
        insertChannel(runtime.db, { name, driver: driver.name, config, description: opts.description });
        io.out(pc.green(`Channel ${name} added`));
      } catch (err) {
        fail(errorMessage(err));
      }
    });

  return program;
}
