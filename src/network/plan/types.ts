/**
 * Network plan types
 *
 * Entries are immutable once loaded. Port allocation produces a new list of
 * entries instead of filling in `explicitPorts` in place.
 */

import type { PortToken } from '../core/types';

/** Sentinel password that asks for a generated one */
export const AUTO_GENERATE_PASSWORD = 'auto_generate';

export interface WifiSettings {
  readonly ssid: string;
  /** May be AUTO_GENERATE_PASSWORD */
  readonly password: string;
}

export interface NetworkPlanEntry {
  readonly name: string;
  readonly vlanId: number;
  readonly role: string;
  readonly subnet: string;
  readonly netmask: string;
  readonly alias: string;
  readonly wifi?: WifiSettings;
  /** Empty means "allocate automatically" */
  readonly explicitPorts: readonly PortToken[];
}

export type ProxyDhcpMode = 'main' | 'side';

export interface ProxySettings {
  /** Side router acting as gateway / DNS for proxied networks */
  readonly sideRouterIp: string;
  readonly dhcpMode: ProxyDhcpMode;
}

export interface NetworkPlan {
  readonly proxy?: ProxySettings;
  readonly networks: readonly NetworkPlanEntry[];
}

/** Credentials echoed to the operator after a run */
export interface WifiCredentials {
  ssid: string;
  password: string;
  role: string;
}
