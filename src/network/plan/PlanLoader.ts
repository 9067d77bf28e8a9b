/**
 * PlanLoader - YAML network plan → validated, defaulted plan entries
 *
 * Minimal plan:
 *
 *   proxy:
 *     side_router_ip: "192.168.1.2"
 *   networks:
 *     - name: lan
 *       vlan_id: 1
 *       role: proxy
 *       wifi:
 *         ssid: Home
 *
 * Defaults: subnet 192.168.<vlan_id>.1, netmask 255.255.255.0, alias = name,
 * ports [] (automatic), wifi password generated. A legacy `global` block is
 * read when `proxy` is absent.
 */

import { existsSync, readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { IPAddress, SubnetMask, VLAN_MIN, VLAN_MAX } from '../core/types';
import { PlanFileNotFoundError, PlanValidationError } from '../core/errors';
import {
  AUTO_GENERATE_PASSWORD, NetworkPlan, NetworkPlanEntry, ProxySettings,
} from './types';

export const DEFAULT_NETMASK = '255.255.255.0';
export const DEFAULT_SIDE_ROUTER_IP = '192.168.1.2';

// ─── Schema ──────────────────────────────────────────────────────────

const ipv4 = z.string().refine(IPAddress.isValid, { message: 'not a dotted-quad IPv4 address' });

const WifiSchema = z.object({
  ssid: z.string().min(1),
  password: z.string().min(1).default(AUTO_GENERATE_PASSWORD),
});

const NetworkSchema = z.object({
  name: z.string().regex(/^[A-Za-z0-9_]+$/, { message: 'must contain only letters, digits and _' }),
  vlan_id: z.number().int().min(VLAN_MIN).max(VLAN_MAX),
  role: z.string().min(1),
  subnet: ipv4.optional(),
  netmask: z.string().refine(SubnetMask.isValid, { message: 'not a valid subnet mask' }).optional(),
  alias: z.string().optional(),
  ports: z.array(z.union([z.string(), z.number()]).transform(String)).default([]),
  wifi: WifiSchema.optional(),
});

const ProxySchema = z.object({
  side_router_ip: ipv4,
  proxy_dhcp_mode: z.enum(['main', 'side']).default('main'),
});

const LegacyGlobalSchema = z.object({
  side_router_ip: ipv4.optional(),
  main_router_ip: ipv4.optional(),
  proxy_dhcp_mode: z.enum(['main', 'side']).default('main'),
});

const PlanSchema = z.object({
  proxy: ProxySchema.optional(),
  global: LegacyGlobalSchema.optional(),
  networks: z.array(NetworkSchema).default([]),
});

type RawNetwork = z.infer<typeof NetworkSchema>;
type RawPlan = z.infer<typeof PlanSchema>;

// ─── Conversion ──────────────────────────────────────────────────────

function toProxy(raw: RawPlan): ProxySettings | undefined {
  if (raw.proxy) {
    return { sideRouterIp: raw.proxy.side_router_ip, dhcpMode: raw.proxy.proxy_dhcp_mode };
  }
  if (raw.global) {
    return {
      sideRouterIp: raw.global.side_router_ip ?? raw.global.main_router_ip ?? DEFAULT_SIDE_ROUTER_IP,
      dhcpMode: raw.global.proxy_dhcp_mode,
    };
  }
  return undefined;
}

function toEntry(raw: RawNetwork): NetworkPlanEntry {
  return {
    name: raw.name,
    vlanId: raw.vlan_id,
    role: raw.role,
    subnet: raw.subnet ?? `192.168.${raw.vlan_id}.1`,
    netmask: raw.netmask ?? DEFAULT_NETMASK,
    alias: raw.alias ?? raw.name,
    wifi: raw.wifi ? { ssid: raw.wifi.ssid, password: raw.wifi.password } : undefined,
    explicitPorts: [...raw.ports],
  };
}

function crossCheck(networks: RawNetwork[]): string[] {
  const issues: string[] = [];
  const names = new Map<string, number>();
  const vlans = new Map<number, number>();

  networks.forEach((net, i) => {
    const prevName = names.get(net.name);
    if (prevName !== undefined) {
      issues.push(`networks.${i}.name: '${net.name}' already used by networks.${prevName}`);
    } else {
      names.set(net.name, i);
    }
    const prevVlan = vlans.get(net.vlan_id);
    if (prevVlan !== undefined) {
      issues.push(`networks.${i}.vlan_id: ${net.vlan_id} already used by networks.${prevVlan}`);
    } else {
      vlans.set(net.vlan_id, i);
    }
    if (net.subnet === undefined && net.vlan_id > 255) {
      issues.push(`networks.${i}.subnet: required when vlan_id (${net.vlan_id}) is above 255`);
    }
  });

  return issues;
}

/**
 * Validate an already-parsed plan document.
 */
export function parsePlan(raw: unknown): NetworkPlan {
  const result = PlanSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new PlanValidationError(
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const issues = crossCheck(result.data.networks);
  if (issues.length > 0) throw new PlanValidationError(issues);

  return {
    proxy: toProxy(result.data),
    networks: result.data.networks.map(toEntry),
  };
}

export function parsePlanText(text: string): NetworkPlan {
  let doc: unknown;
  try {
    doc = parseYaml(text);
  } catch (err) {
    throw new PlanValidationError([`yaml: ${err instanceof Error ? err.message : String(err)}`]);
  }
  return parsePlan(doc);
}

export function loadPlan(path: string): NetworkPlan {
  if (!existsSync(path)) throw new PlanFileNotFoundError(path);
  return parsePlanText(readFileSync(path, 'utf-8'));
}
