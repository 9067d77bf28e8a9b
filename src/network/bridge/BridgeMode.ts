/**
 * BridgeMode - Paradigm-specific VLAN wiring
 *
 * Exactly two implementations exist, one per switch paradigm, and one is
 * picked per run from the detected profile:
 *
 *   DsaBridgeMode         br-lan + vlan_filtering + bridge-vlan sections,
 *                         interfaces bound through `device br-lan.<vid>`
 *   SwitchChipBridgeMode  switch + switch_vlan sections with the CPU port
 *                         tagged everywhere, interfaces bound through
 *                         `ifname <cpu-if>.<vid>`
 *
 * Call order per run: configureBase once, then configureVlan and
 * configureInterface for each network.
 */

import type { HardwareProfile } from '../hardware/types';
import type { NetworkPlanEntry } from '../plan/types';
import type { ConfigSink } from '../uci/ConfigSink';

export type BridgeModeKind = 'dsa' | 'switch-chip';

export interface BridgeMode {
  readonly kind: BridgeModeKind;
  /** Human-readable name for logs */
  readonly label: string;
  configureBase(profile: HardwareProfile): void;
  configureVlan(entry: NetworkPlanEntry, profile: HardwareProfile): void;
  configureInterface(entry: NetworkPlanEntry): void;
}

/** Static L3 settings shared by both paradigms */
export function setStaticAddress(sink: ConfigSink, section: string, entry: NetworkPlanEntry): void {
  sink.set(section, 'proto', 'static');
  sink.set(section, 'ipaddr', entry.subnet);
  sink.set(section, 'netmask', entry.netmask);
}
