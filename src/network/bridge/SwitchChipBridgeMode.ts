/**
 * SwitchChipBridgeMode - Older OpenWrt releases with a configurable switch
 *
 * The switch section is reset and rebuilt; every network gets a switch_vlan
 * row with the CPU port tagged, and an interface on <cpu-if>.<vid>.
 */

import { Logger } from '../core/Logger';
import { CHIP_TAG_SUFFIX, DEFAULT_LAN_VLAN, WAN_VLAN } from '../core/types';
import { resolvePorts } from '../hardware/PortResolver';
import type { SwitchChipProfile } from '../hardware/types';
import type { NetworkPlanEntry } from '../plan/types';
import type { ConfigSink } from '../uci/ConfigSink';
import { BridgeMode, setStaticAddress } from './BridgeMode';

const SOURCE = 'bridge-switch';

/** reset=1 wipes the chip's implicit WAN VLAN; true when configureBase puts it back */
export function preservesWanVlan(chip: SwitchChipProfile): boolean {
  return chip.wanPort !== null && chip.wanPort !== chip.cpuPort;
}

export class SwitchChipBridgeMode implements BridgeMode {
  readonly kind = 'switch-chip' as const;
  readonly label = 'switch chip';

  constructor(
    private readonly chip: SwitchChipProfile,
    private readonly sink: ConfigSink,
    private readonly logger: Logger,
  ) {}

  private cpuToken(): string {
    return `${this.chip.cpuPort}${CHIP_TAG_SUFFIX}`;
  }

  private addSwitchVlan(vlanId: number, ports: string): void {
    const section = this.sink.addSection('network', 'switch_vlan');
    this.sink.set(section, 'device', this.chip.name);
    this.sink.set(section, 'vlan', String(vlanId));
    this.sink.set(section, 'ports', ports);
  }

  configureBase(): void {
    const { name, cpuPort, wanPort, lanPorts } = this.chip;
    const section = `network.${name}`;
    this.logger.info(SOURCE, 'bridge:base',
      `configuring ${name}, CPU port ${cpuPort}, LAN ports ${lanPorts.join(' ')}`);
    this.sink.set('network', name, 'switch');
    this.sink.set(section, 'name', name);
    this.sink.set(section, 'reset', '1');
    this.sink.set(section, 'enable_vlan', '1');

    if (preservesWanVlan(this.chip)) {
      const ports = `${wanPort} ${this.cpuToken()}`;
      this.logger.info(SOURCE, 'bridge:wan-vlan', `keeping WAN on VLAN ${WAN_VLAN}: ${ports}`);
      this.addSwitchVlan(WAN_VLAN, ports);
    }
  }

  /** The switch_vlan `ports` string, CPU port last and tagged */
  vlanPorts(entry: NetworkPlanEntry): string {
    const cpu = this.cpuToken();
    if (entry.explicitPorts.length > 0) {
      const members = resolvePorts(entry.explicitPorts, this.chip.lanPorts, this.logger)
        .map(({ port, tagged }) => (tagged ? `${port}${CHIP_TAG_SUFFIX}` : String(port)));
      return [...members, cpu].join(' ');
    }
    if (entry.vlanId === DEFAULT_LAN_VLAN) {
      return [...this.chip.lanPorts.map(String), cpu].join(' ');
    }
    return cpu;
  }

  configureVlan(entry: NetworkPlanEntry): void {
    const ports = this.vlanPorts(entry);
    this.logger.info(SOURCE, 'bridge:vlan', `VLAN ${entry.vlanId}: ${ports}`, { vlanId: entry.vlanId, ports });
    this.addSwitchVlan(entry.vlanId, ports);
  }

  configureInterface(entry: NetworkPlanEntry): void {
    const section = `network.${entry.name}`;
    const ifname = `${this.chip.cpuInterface}.${entry.vlanId}`;
    this.logger.info(SOURCE, 'bridge:interface', `${entry.name} -> ${ifname} (${entry.subnet}/${entry.netmask})`);
    this.sink.set('network', entry.name, 'interface');
    this.sink.set(section, 'type', 'bridge');
    this.sink.set(section, 'ifname', ifname);
    setStaticAddress(this.sink, section, entry);
  }
}
