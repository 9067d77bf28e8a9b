/**
 * ConfigSink - Where generated configuration goes
 *
 * Bridge modes and configurators only ever emit through four additive
 * operations; they never read back or delete. Each sink turns those
 * operations into `uci` commands and decides what to do with them:
 *
 *   RecordingSink     keep them in memory (dry-run, tests)
 *   ScriptExportSink  keep them and write a deployable #!/bin/sh script
 *   UciExecutor       run them on this device (see UciExecutor.ts)
 */

import { writeFileSync } from 'fs';
import { ExportWriteError } from '../core/errors';
import { Logger } from '../core/Logger';

export interface ConfigSink {
  /** `set('network', 'lan', 'interface')` declares a named section */
  set(path: string, field: string, value: string): void;
  addListItem(path: string, field: string, value: string): void;
  /** Adds an anonymous section; returns "<subsystem>.@<type>[-1]" */
  addSection(subsystem: string, sectionType: string): string;
  commit(subsystem: string): void;
}

// ─── uci command model ───────────────────────────────────────────────

export type UciCommand =
  | { op: 'set'; target: string; value: string }
  | { op: 'add_list'; target: string; value: string }
  | { op: 'add'; subsystem: string; sectionType: string }
  | { op: 'commit'; subsystem: string };

export function lastSectionHandle(subsystem: string, sectionType: string): string {
  return `${subsystem}.@${sectionType}[-1]`;
}

/** Single-quote a value for a POSIX shell */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Render a command as it would be typed after `uci` */
export function renderCommand(cmd: UciCommand): string {
  switch (cmd.op) {
    case 'set':
      return `set ${cmd.target}=${shellQuote(cmd.value)}`;
    case 'add_list':
      return `add_list ${cmd.target}=${shellQuote(cmd.value)}`;
    case 'add':
      return `add ${cmd.subsystem} ${cmd.sectionType}`;
    case 'commit':
      return `commit ${cmd.subsystem}`;
  }
}

/** argv for the uci binary (no shell quoting needed) */
export function commandArgs(cmd: UciCommand): string[] {
  switch (cmd.op) {
    case 'set':
      return ['set', `${cmd.target}=${cmd.value}`];
    case 'add_list':
      return ['add_list', `${cmd.target}=${cmd.value}`];
    case 'add':
      return ['add', cmd.subsystem, cmd.sectionType];
    case 'commit':
      return ['commit', cmd.subsystem];
  }
}

// ─── Base ────────────────────────────────────────────────────────────

export abstract class UciSink implements ConfigSink {
  protected readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  set(path: string, field: string, value: string): void {
    this.emit({ op: 'set', target: `${path}.${field}`, value });
  }

  addListItem(path: string, field: string, value: string): void {
    this.emit({ op: 'add_list', target: `${path}.${field}`, value });
  }

  addSection(subsystem: string, sectionType: string): string {
    this.emit({ op: 'add', subsystem, sectionType });
    return lastSectionHandle(subsystem, sectionType);
  }

  commit(subsystem: string): void {
    this.emit({ op: 'commit', subsystem });
  }

  private emit(cmd: UciCommand): void {
    this.logger.debug('uci', 'uci:command', `uci ${renderCommand(cmd)}`);
    this.apply(cmd);
  }

  protected abstract apply(cmd: UciCommand): void;
}

// ─── Recording (dry-run) ─────────────────────────────────────────────

export class RecordingSink extends UciSink {
  private readonly commands: UciCommand[] = [];

  protected apply(cmd: UciCommand): void {
    this.commands.push(cmd);
  }

  getCommands(): UciCommand[] {
    return [...this.commands];
  }

  /** Commands rendered as full shell lines ("uci set ...") */
  getLines(): string[] {
    return this.commands.map(c => `uci ${renderCommand(c)}`);
  }

  /** Subsystems committed so far, in order */
  getCommitted(): string[] {
    const out: string[] = [];
    for (const c of this.commands) {
      if (c.op === 'commit') out.push(c.subsystem);
    }
    return out;
  }
}

// ─── Script export ───────────────────────────────────────────────────

export class ScriptExportSink extends RecordingSink {
  toScript(generatedAt: Date = new Date()): string {
    return [
      '#!/bin/sh',
      '# VLAN network deployment script',
      `# generated ${generatedAt.toISOString()}`,
      '# run on the router: sh deploy.sh && /etc/init.d/network restart',
      'set -e',
      '',
      ...this.getLines(),
      '',
    ].join('\n');
  }

  writeScript(path: string, generatedAt?: Date): void {
    try {
      writeFileSync(path, this.toScript(generatedAt), { encoding: 'utf-8', mode: 0o755 });
    } catch (err) {
      throw new ExportWriteError(path, err instanceof Error ? err.message : String(err));
    }
    this.logger.info('uci', 'export:written', `deployment script written to ${path}`, {
      path,
      commands: this.getCommands().length,
    });
  }
}
