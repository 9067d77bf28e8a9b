/**
 * vlanplan CLI
 *
 *   vlanplan [--config network_plan.yaml] [--dry-run | --export deploy.sh]
 *            [--probe-timeout ms] [--verbose]
 *
 * Without flags the plan is applied to this device through `uci`.
 */

import { parseArgs } from 'util';
import {
  DEFAULT_PROBE_TIMEOUT_MS,
  Logger,
  OfflineCommandQuery,
  Orchestrator,
  RecordingSink,
  RunError,
  ScriptExportSink,
  ShellCommandQuery,
  UciExecutor,
} from './network';
import type { CommandQuery, ConfigSink, LogLevel, RunLog, RunSummary } from './network';

export const DEFAULT_PLAN_PATH = 'network_plan.yaml';

export interface CliOptions {
  config: string;
  dryRun: boolean;
  exportPath?: string;
  probeTimeoutMs: number;
  verbose: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c', default: DEFAULT_PLAN_PATH },
      'dry-run': { type: 'boolean', default: false },
      export: { type: 'string', short: 'e' },
      'probe-timeout': { type: 'string' },
      verbose: { type: 'boolean', short: 'v', default: false },
    },
    strict: true,
  });

  const timeout = values['probe-timeout'] === undefined
    ? DEFAULT_PROBE_TIMEOUT_MS
    : Number.parseInt(values['probe-timeout'], 10);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new TypeError(`--probe-timeout must be a positive integer, got '${values['probe-timeout']}'`);
  }

  return {
    config: values.config ?? DEFAULT_PLAN_PATH,
    dryRun: values['dry-run'] ?? false,
    exportPath: values.export,
    probeTimeoutMs: timeout,
    verbose: values.verbose ?? false,
  };
}

export function formatLog(log: RunLog): string {
  const level = log.level === 'info' ? '' : `${log.level.toUpperCase()} `;
  return `[${log.source}] ${level}${log.message}`;
}

export function formatWifiTable(summary: RunSummary): string[] {
  if (summary.wifi.length === 0) return [];
  const ssidWidth = Math.max(4, ...summary.wifi.map(w => w.ssid.length));
  const passWidth = Math.max(8, ...summary.wifi.map(w => w.password.length));
  const row = (a: string, b: string, c: string) => `${a.padEnd(ssidWidth)}  ${b.padEnd(passWidth)}  ${c}`;
  return [
    row('SSID', 'PASSWORD', 'ROLE'),
    ...summary.wifi.map(w => row(w.ssid, w.password, w.role)),
  ];
}

export function main(argv: string[] = process.argv.slice(2)): number {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    return 2;
  }

  const logger = new Logger();
  const minLevel: LogLevel = options.verbose ? 'debug' : 'info';
  logger.subscribe(log => {
    const line = formatLog(log);
    if (log.level === 'warn' || log.level === 'error') console.error(line);
    else console.log(line);
  }, { level: minLevel });

  // --export never probes: the script targets another device
  const offline = options.dryRun || options.exportPath !== undefined;
  const query: CommandQuery = offline
    ? new OfflineCommandQuery()
    : new ShellCommandQuery({ timeoutMs: options.probeTimeoutMs });

  let sink: ConfigSink;
  let recorder: RecordingSink | undefined;
  let exporter: ScriptExportSink | undefined;
  if (options.exportPath !== undefined) {
    exporter = new ScriptExportSink(logger);
    sink = exporter;
  } else if (options.dryRun) {
    recorder = new RecordingSink(logger);
    sink = recorder;
  } else {
    sink = new UciExecutor(logger);
  }

  try {
    const summary = new Orchestrator({ query, sink, logger }).run(options.config);

    if (exporter && options.exportPath !== undefined) {
      exporter.writeScript(options.exportPath);
    }
    if (recorder) {
      for (const line of recorder.getLines()) console.log(line);
    }
    for (const line of formatWifiTable(summary)) console.log(line);
    if (!offline) console.log('apply with: /etc/init.d/network restart');
    return 0;
  } catch (err) {
    if (err instanceof RunError) {
      logger.error('cli', 'run:failed', err.message, { kind: err.kind });
      return 1;
    }
    throw err;
  }
}
