/**
 * Hardware profile - what detection learned about the router
 *
 * Two shapes, one per switch paradigm:
 *   dsa          one bridge device (br-lan) with VLAN filtering; LAN ports are
 *                kernel interfaces (eth1, lan2, ...)
 *   switch-chip  a switch subsystem with switch_vlan tables; LAN ports are
 *                chip port numbers and live in `chip`
 */

export type BridgeParadigm = 'dsa' | 'switch-chip';

export interface SwitchChipProfile {
  readonly name: string;            // e.g. "switch0"
  readonly cpuPort: number;
  readonly cpuInterface: string;    // kernel interface wired to the CPU port, e.g. "eth0"
  readonly lanPorts: readonly number[]; // ascending, excludes cpuPort and wanPort
  readonly wanPort: number | null;  // null when no WAN port could be identified
}

export interface DsaHardwareProfile {
  readonly mode: 'dsa';
  readonly wanInterface: string;
  readonly lanPorts: readonly string[]; // ascending
}

export interface SwitchChipHardwareProfile {
  readonly mode: 'switch-chip';
  readonly wanInterface: string;
  readonly lanPorts: readonly never[];
  readonly chip: SwitchChipProfile;
}

export type HardwareProfile = DsaHardwareProfile | SwitchChipHardwareProfile;

export function createDsaProfile(wanInterface: string, lanPorts: readonly string[]): DsaHardwareProfile {
  return Object.freeze({
    mode: 'dsa',
    wanInterface,
    lanPorts: Object.freeze([...lanPorts].sort()),
  });
}

export function createSwitchChipProfile(wanInterface: string, chip: SwitchChipProfile): SwitchChipHardwareProfile {
  const lanPorts = [...new Set(chip.lanPorts)]
    .filter(p => p !== chip.cpuPort && p !== chip.wanPort)
    .sort((a, b) => a - b);
  return Object.freeze({
    mode: 'switch-chip',
    wanInterface,
    lanPorts: Object.freeze([]),
    chip: Object.freeze({ ...chip, lanPorts: Object.freeze(lanPorts) }),
  });
}

/** LAN ports in their native form: interface names or chip port numbers */
export function physicalLanPorts(profile: HardwareProfile): readonly (string | number)[] {
  return profile.mode === 'dsa' ? profile.lanPorts : profile.chip.lanPorts;
}

/** Fixed profile used when no live device is reachable */
export const OFFLINE_DEFAULT_PROFILE: DsaHardwareProfile = createDsaProfile('eth0', ['eth1', 'eth2']);
