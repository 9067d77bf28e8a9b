/**
 * UciExecutor - Live sink that runs every command on the device
 *
 * Commands run one at a time through the `uci` binary with an argv (no
 * shell). A failing command aborts the run with UciCommandError; nothing
 * already written is undone.
 */

import { spawnSync } from 'child_process';
import { Logger } from '../core/Logger';
import { UciCommandError } from '../core/errors';
import { UciSink, UciCommand, commandArgs, renderCommand } from './ConfigSink';
import type { SpawnFn } from './CommandQuery';

export interface UciExecutorOptions {
  uciBinary?: string;
  timeoutMs?: number;
  spawn?: SpawnFn;
}

export class UciExecutor extends UciSink {
  private readonly uciBinary: string;
  private readonly timeoutMs: number;
  private readonly spawn: SpawnFn;
  private executed = 0;

  constructor(logger: Logger, options: UciExecutorOptions = {}) {
    super(logger);
    this.uciBinary = options.uciBinary ?? 'uci';
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.spawn = options.spawn ?? spawnSync;
  }

  getExecutedCount(): number {
    return this.executed;
  }

  protected apply(cmd: UciCommand): void {
    const result = this.spawn(this.uciBinary, commandArgs(cmd), {
      encoding: 'utf-8',
      timeout: this.timeoutMs,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    if (result.error || result.status !== 0) {
      const stderr = result.error ? result.error.message : (result.stderr ?? '');
      throw new UciCommandError(`uci ${renderCommand(cmd)}`, result.status, stderr);
    }
    this.executed++;
  }
}
