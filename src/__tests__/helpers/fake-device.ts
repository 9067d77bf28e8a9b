/**
 * In-process stand-in for a router reached through `uci` / `/bin/sh`.
 */

import { vi } from 'vitest';
import {
  CommandQuery, ShellResult, UciSelector, selectorKey,
} from '@/network/uci/CommandQuery';

export interface FakeDeviceState {
  /** "get network.wan.device" → "eth0" */
  answers?: Record<string, string>;
  /** command line → result */
  shell?: Record<string, ShellResult>;
}

export class FakeDevice implements CommandQuery {
  readonly live = true;
  readonly answers: Map<string, string>;
  readonly queried: string[] = [];
  readonly runShell = vi.fn((commandLine: string): ShellResult =>
    this.shell.get(commandLine) ?? { exitCode: 1, stdout: '' });
  private readonly shell: Map<string, ShellResult>;

  constructor(state: FakeDeviceState = {}) {
    this.answers = new Map(Object.entries(state.answers ?? {}));
    this.shell = new Map(Object.entries(state.shell ?? {}));
  }

  query(selector: UciSelector): string | undefined {
    const key = selectorKey(selector);
    this.queried.push(key);
    return this.answers.get(key);
  }
}

/** Builds `uci show network` text for a switch-chip router */
export function switchChipDump(vlans: Array<{ vlan: string; ports: string }>, switchName = 'switch0'): string {
  const lines = [
    "network.loopback=interface",
    "network.loopback.device='lo'",
    `network.@switch[0]=switch`,
    `network.@switch[0].name='${switchName}'`,
    `network.@switch[0].reset='1'`,
    `network.@switch[0].enable_vlan='1'`,
  ];
  vlans.forEach((v, i) => {
    lines.push(`network.@switch_vlan[${i}]=switch_vlan`);
    lines.push(`network.@switch_vlan[${i}].device='${switchName}'`);
    lines.push(`network.@switch_vlan[${i}].vlan='${v.vlan}'`);
    lines.push(`network.@switch_vlan[${i}].ports='${v.ports}'`);
  });
  return lines.join('\n');
}
