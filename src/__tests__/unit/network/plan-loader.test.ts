/**
 * Tests for PlanLoader: defaults, legacy global block, validation
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { PlanFileNotFoundError, PlanValidationError } from '@/network/core/errors';
import { loadPlan, parsePlan, parsePlanText } from '@/network/plan/PlanLoader';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof PlanValidationError) return err.issues;
    throw err;
  }
  throw new Error('expected a PlanValidationError');
}

describe('parsePlanText', () => {
  it('should fill in subnet, netmask, alias and ports', () => {
    const plan = parsePlanText([
      'networks:',
      '  - name: lan',
      '    vlan_id: 1',
      '    role: proxy',
    ].join('\n'));
    expect(plan.proxy).toBeUndefined();
    expect(plan.networks).toEqual([{
      name: 'lan',
      vlanId: 1,
      role: 'proxy',
      subnet: '192.168.1.1',
      netmask: '255.255.255.0',
      alias: 'lan',
      wifi: undefined,
      explicitPorts: [],
    }]);
  });

  it('should keep explicit values and stringify numeric ports', () => {
    const plan = parsePlanText([
      'networks:',
      '  - name: guest',
      '    vlan_id: 20',
      '    role: isolate',
      '    subnet: 10.20.0.1',
      '    netmask: 255.255.0.0',
      '    alias: Guests',
      '    ports: [3, "lan2:t"]',
      '    wifi:',
      '      ssid: Guest',
      '      password: test-secret',
    ].join('\n'));
    const guest = plan.networks[0];
    expect(guest.subnet).toBe('10.20.0.1');
    expect(guest.netmask).toBe('255.255.0.0');
    expect(guest.alias).toBe('Guests');
    expect(guest.explicitPorts).toEqual(['3', 'lan2:t']);
    expect(guest.wifi).toEqual({ ssid: 'Guest', password: 'test-secret' });
  });

  it('should ask for a generated WiFi password by default', () => {
    const plan = parsePlanText('networks:\n  - {name: iot, vlan_id: 30, role: clean, wifi: {ssid: Things}}');
    expect(plan.networks[0].wifi).toEqual({ ssid: 'Things', password: 'auto_generate' });
  });

  it('should read the proxy block', () => {
    const plan = parsePlanText('proxy:\n  side_router_ip: 192.168.1.254\nnetworks: []');
    expect(plan.proxy).toEqual({ sideRouterIp: '192.168.1.254', dhcpMode: 'main' });
  });

  it('should read a legacy global block when proxy is absent', () => {
    const plan = parsePlanText('global:\n  main_router_ip: 10.0.0.2\n  proxy_dhcp_mode: side\n');
    expect(plan.proxy).toEqual({ sideRouterIp: '10.0.0.2', dhcpMode: 'side' });
  });

  it('should default the side router of an empty global block', () => {
    const plan = parsePlan({ global: {} });
    expect(plan.proxy).toEqual({ sideRouterIp: '192.168.1.2', dhcpMode: 'main' });
  });

  it('should accept an empty document', () => {
    expect(parsePlanText('')).toEqual({ proxy: undefined, networks: [] });
  });

  it('should report YAML syntax errors as validation errors', () => {
    const issues = issuesOf(() => parsePlanText('networks: [\n'));
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('yaml: ')).toBe(true);
  });
});

describe('parsePlan validation', () => {
  it('should reject names with characters uci does not accept', () => {
    const issues = issuesOf(() => parsePlan({ networks: [{ name: 'my-lan', vlan_id: 1, role: 'clean' }] }));
    expect(issues).toEqual(['networks.0.name: must contain only letters, digits and _']);
  });

  it('should reject VLAN ids outside 1-4094', () => {
    const issues = issuesOf(() => parsePlan({ networks: [{ name: 'lan', vlan_id: 4095, role: 'clean' }] }));
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('networks.0.vlan_id: ')).toBe(true);
  });

  it('should require a role', () => {
    const issues = issuesOf(() => parsePlan({ networks: [{ name: 'lan', vlan_id: 1 }] }));
    expect(issues).toEqual(['networks.0.role: Required']);
  });

  it('should reject malformed addresses', () => {
    const issues = issuesOf(() => parsePlan({
      networks: [{ name: 'lan', vlan_id: 1, role: 'clean', subnet: '192.168.1', netmask: '255.0.255.0' }],
    }));
    expect(issues).toEqual([
      'networks.0.subnet: not a dotted-quad IPv4 address',
      'networks.0.netmask: not a valid subnet mask',
    ]);
  });

  it('should reject duplicate names and VLAN ids', () => {
    const issues = issuesOf(() => parsePlan({
      networks: [
        { name: 'lan', vlan_id: 1, role: 'clean' },
        { name: 'lan', vlan_id: 1, role: 'clean' },
      ],
    }));
    expect(issues).toEqual([
      "networks.1.name: 'lan' already used by networks.0",
      'networks.1.vlan_id: 1 already used by networks.0',
    ]);
  });

  it('should require a subnet when the VLAN id cannot be an octet', () => {
    const issues = issuesOf(() => parsePlan({ networks: [{ name: 'cams', vlan_id: 300, role: 'isolate' }] }));
    expect(issues).toEqual(['networks.0.subnet: required when vlan_id (300) is above 255']);
  });

  it('should list every issue in the error message', () => {
    const err = new PlanValidationError(['a: bad', 'b: worse']);
    expect(err.message).toBe('invalid network plan:\n  a: bad\n  b: worse');
    expect(err.kind).toBe('PlanValidationError');
  });
});

describe('loadPlan', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'vlanplan-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read a plan from disk', () => {
    const path = join(dir, 'plan.yaml');
    writeFileSync(path, 'networks:\n  - {name: lan, vlan_id: 1, role: clean}\n');
    expect(loadPlan(path).networks.map(n => n.name)).toEqual(['lan']);
  });

  it('should throw PlanFileNotFoundError for a missing file', () => {
    const path = join(dir, 'missing.yaml');
    expect(() => loadPlan(path)).toThrow(PlanFileNotFoundError);
    expect(() => loadPlan(path)).toThrow(`plan file not found: ${path}`);
  });
});
