/**
 * CommandQuery - Read-only access to the live device
 *
 * Detection never talks to the device directly: it asks a CommandQuery for
 * `uci get` / `uci show` output and, for switch enumeration only, runs a
 * shell command. Implementations never throw; any failure (non-zero exit,
 * missing binary, timeout) comes back as "no data".
 */

import { spawnSync, SpawnSyncOptionsWithStringEncoding, SpawnSyncReturns } from 'child_process';

export interface UciSelector {
  verb: 'get' | 'show';
  /** e.g. "network.wan.device" or "network" */
  path: string;
}

export interface ShellResult {
  exitCode: number;
  stdout: string;
}

export interface CommandQuery {
  /** false when no live target is reachable (dry-run, export) */
  readonly live: boolean;
  query(selector: UciSelector): string | undefined;
  runShell(commandLine: string): ShellResult;
}

export function selectorKey(selector: UciSelector): string {
  return `${selector.verb} ${selector.path}`;
}

export type SpawnFn = (
  file: string,
  args: readonly string[],
  options: SpawnSyncOptionsWithStringEncoding,
) => SpawnSyncReturns<string>;

export const DEFAULT_PROBE_TIMEOUT_MS = 5000;

export interface ShellCommandQueryOptions {
  timeoutMs?: number;
  uciBinary?: string;
  shell?: string;
  spawn?: SpawnFn;
}

// ─── Live implementation ─────────────────────────────────────────────

export class ShellCommandQuery implements CommandQuery {
  readonly live = true;
  private readonly timeoutMs: number;
  private readonly uciBinary: string;
  private readonly shell: string;
  private readonly spawn: SpawnFn;

  constructor(options: ShellCommandQueryOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.uciBinary = options.uciBinary ?? 'uci';
    this.shell = options.shell ?? '/bin/sh';
    this.spawn = options.spawn ?? spawnSync;
  }

  query(selector: UciSelector): string | undefined {
    const result = this.exec(this.uciBinary, ['-q', selector.verb, selector.path]);
    if (result.exitCode !== 0) return undefined;
    const text = result.stdout.trim();
    return text.length > 0 ? text : undefined;
  }

  runShell(commandLine: string): ShellResult {
    return this.exec(this.shell, ['-c', commandLine]);
  }

  private exec(file: string, args: string[]): ShellResult {
    try {
      const result = this.spawn(file, args, {
        encoding: 'utf-8',
        timeout: this.timeoutMs,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
      // spawn errors (ENOENT, ETIMEDOUT) surface on .error with a null status
      if (result.error || result.status === null) {
        return { exitCode: -1, stdout: '' };
      }
      return { exitCode: result.status, stdout: result.stdout ?? '' };
    } catch {
      return { exitCode: -1, stdout: '' };
    }
  }
}

// ─── Offline implementation ──────────────────────────────────────────

export class OfflineCommandQuery implements CommandQuery {
  readonly live = false;

  query(_selector: UciSelector): string | undefined {
    return undefined;
  }

  runShell(_commandLine: string): ShellResult {
    return { exitCode: -1, stdout: '' };
  }
}
