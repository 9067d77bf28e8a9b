/**
 * Tests for the command-line front end
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { formatLog, formatWifiTable, main, parseCliArgs } from '@/cli';
import { createDsaProfile } from '@/network/hardware/types';

const PLAN = [
  'networks:',
  '  - name: lan',
  '    vlan_id: 1',
  '    role: clean',
  '  - name: guest',
  '    vlan_id: 20',
  '    role: isolate',
  '    wifi: {ssid: Guest, password: test-secret}',
].join('\n');

describe('parseCliArgs', () => {
  it('should apply defaults', () => {
    expect(parseCliArgs([])).toEqual({
      config: 'network_plan.yaml',
      dryRun: false,
      exportPath: undefined,
      probeTimeoutMs: 5000,
      verbose: false,
    });
  });

  it('should read every flag', () => {
    expect(parseCliArgs(['-c', 'plan.yaml', '--export', 'deploy.sh', '--probe-timeout', '800', '-v'])).toEqual({
      config: 'plan.yaml',
      dryRun: false,
      exportPath: 'deploy.sh',
      probeTimeoutMs: 800,
      verbose: true,
    });
  });

  it('should reject a non-numeric probe timeout', () => {
    expect(() => parseCliArgs(['--probe-timeout', 'soon'])).toThrow("--probe-timeout must be a positive integer, got 'soon'");
  });
});

describe('formatting', () => {
  it('should prefix non-info events with their level', () => {
    const base = { timestamp: 0, source: 'port-resolver', event: 'resolve:dropped', message: "port 'lan9' ignored" };
    expect(formatLog({ ...base, level: 'warn' })).toBe("[port-resolver] WARN port 'lan9' ignored");
    expect(formatLog({ ...base, level: 'info' })).toBe("[port-resolver] port 'lan9' ignored");
  });

  it('should align the WiFi table', () => {
    const summary = {
      mode: 'dsa' as const,
      profile: createDsaProfile('eth0', ['eth1']),
      entries: [],
      wifi: [{ ssid: 'Guest', password: 'Abcd1234', role: 'isolate' }],
      committed: [],
    };
    expect(formatWifiTable(summary)).toEqual([
      'SSID   PASSWORD  ROLE',
      'Guest  Abcd1234  isolate',
    ]);
  });
});

describe('main', () => {
  let dir: string;
  let planPath: string;
  let out: string[];
  let err: string[];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'vlanplan-cli-'));
    planPath = join(dir, 'network_plan.yaml');
    writeFileSync(planPath, PLAN);
    out = [];
    err = [];
    vi.spyOn(console, 'log').mockImplementation((line: string) => {
      out.push(line);
    });
    vi.spyOn(console, 'error').mockImplementation((line: string) => {
      err.push(line);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should print the commands of a dry run', () => {
    expect(main(['--config', planPath, '--dry-run'])).toBe(0);
    expect(out).toContain("uci set network.guest.device='br-lan.20'");
    expect(out).toContain('uci commit wireless');
    expect(out.slice(-2)).toEqual(['SSID   PASSWORD     ROLE', 'Guest  test-secret  isolate']);
  });

  it('should write a deployment script on export', () => {
    const script = join(dir, 'deploy.sh');
    expect(main(['--config', planPath, '--export', script])).toBe(0);
    const lines = readFileSync(script, 'utf-8').split('\n');
    expect(lines[0]).toBe('#!/bin/sh');
    expect(lines).toContain("uci set wireless.@wifi-iface[-1].key='test-secret'");
    expect(lines.slice(-5)).toEqual([
      'uci commit network',
      'uci commit dhcp',
      'uci commit firewall',
      'uci commit wireless',
      '',
    ]);
  });

  it('should exit with 1 when the plan file is missing', () => {
    const missing = join(dir, 'nope.yaml');
    expect(main(['--config', missing, '--dry-run'])).toBe(1);
    expect(err).toEqual([`[cli] ERROR plan file not found: ${missing}`]);
  });

  it('should exit with 1 on an unknown role', () => {
    writeFileSync(planPath, 'networks:\n  - {name: lan, vlan_id: 1, role: vpn}\n');
    expect(main(['--config', planPath, '--dry-run'])).toBe(1);
    expect(err).toEqual(["[cli] ERROR unknown network role 'vpn', available roles: [clean, isolate, proxy]"]);
  });

  it('should exit with 1 when the export script cannot be written', () => {
    const script = join(dir, 'missing', 'deploy.sh');
    expect(main(['--config', planPath, '--export', script])).toBe(1);
    expect(err).toHaveLength(1);
    expect(err[0].startsWith(`[cli] ERROR cannot write deployment script ${script}: ENOENT`)).toBe(true);
  });

  it('should exit with 2 on unknown flags', () => {
    expect(main(['--frobnicate'])).toBe(2);
    expect(err).toHaveLength(1);
  });
});
