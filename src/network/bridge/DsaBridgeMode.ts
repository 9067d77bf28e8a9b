/**
 * DsaBridgeMode - Newer OpenWrt releases
 *
 * One VLAN-filtering bridge (br-lan) owns every LAN port; each network gets
 * a bridge-vlan section and an interface on br-lan.<vid>.
 */

import { Logger } from '../core/Logger';
import { DEFAULT_LAN_VLAN, TOKEN_TAG_SUFFIX } from '../core/types';
import { resolvePorts } from '../hardware/PortResolver';
import type { HardwareProfile } from '../hardware/types';
import type { NetworkPlanEntry } from '../plan/types';
import type { ConfigSink } from '../uci/ConfigSink';
import { BridgeMode, setStaticAddress } from './BridgeMode';

const SOURCE = 'bridge-dsa';

export const DSA_BRIDGE_NAME = 'br-lan';
export const DSA_BRIDGE_SECTION = 'network.lan_dev';

function bridgePorts(profile: HardwareProfile): readonly string[] {
  return profile.mode === 'dsa' ? profile.lanPorts : [];
}

export class DsaBridgeMode implements BridgeMode {
  readonly kind = 'dsa' as const;
  readonly label = 'DSA';

  constructor(
    private readonly sink: ConfigSink,
    private readonly logger: Logger,
  ) {}

  configureBase(profile: HardwareProfile): void {
    const ports = bridgePorts(profile);
    this.logger.info(SOURCE, 'bridge:base', `creating ${DSA_BRIDGE_NAME} with ports ${ports.join(' ')}`);
    this.sink.set('network', 'lan_dev', 'device');
    this.sink.set(DSA_BRIDGE_SECTION, 'name', DSA_BRIDGE_NAME);
    this.sink.set(DSA_BRIDGE_SECTION, 'type', 'bridge');
    for (const port of ports) {
      this.sink.addListItem(DSA_BRIDGE_SECTION, 'ports', port);
    }
    this.sink.set(DSA_BRIDGE_SECTION, 'vlan_filtering', '1');
  }

  /** Member strings for the bridge-vlan `ports` list ("lan1", "lan2:t") */
  vlanMembers(entry: NetworkPlanEntry, profile: HardwareProfile): string[] {
    if (entry.explicitPorts.length > 0) {
      return resolvePorts(entry.explicitPorts, bridgePorts(profile), this.logger)
        .map(({ port, tagged }) => (tagged ? `${port}${TOKEN_TAG_SUFFIX}` : port));
    }
    if (entry.vlanId === DEFAULT_LAN_VLAN) {
      return [...bridgePorts(profile)];
    }
    return [];
  }

  configureVlan(entry: NetworkPlanEntry, profile: HardwareProfile): void {
    const members = this.vlanMembers(entry, profile);
    this.logger.info(SOURCE, 'bridge:vlan',
      `VLAN ${entry.vlanId}: ${members.length > 0 ? members.join(' ') : 'no physical members'}`,
      { vlanId: entry.vlanId, members });

    const section = this.sink.addSection('network', 'bridge-vlan');
    this.sink.set(section, 'device', DSA_BRIDGE_NAME);
    this.sink.set(section, 'vlan', String(entry.vlanId));
    for (const member of members) {
      this.sink.addListItem(section, 'ports', member);
    }
  }

  configureInterface(entry: NetworkPlanEntry): void {
    const section = `network.${entry.name}`;
    const device = `${DSA_BRIDGE_NAME}.${entry.vlanId}`;
    this.logger.info(SOURCE, 'bridge:interface', `${entry.name} -> ${device} (${entry.subnet}/${entry.netmask})`);
    this.sink.set('network', entry.name, 'interface');
    this.sink.set(section, 'device', device);
    setStaticAddress(this.sink, section, entry);
  }
}
