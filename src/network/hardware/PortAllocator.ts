/**
 * PortAllocator - 1:1 automatic port assignment
 *
 * Networks that pin no ports get one each, lowest free index first, in
 * declaration order. Once every such network is served, leftover ports go to
 * the VLAN 1 network. Index i is written as the id of the i-th detected port
 * ("eth2", "lan3", "2"), which PortResolver matches literally.
 */

import { Logger } from '../core/Logger';
import { DEFAULT_LAN_VLAN, PortToken } from '../core/types';
import type { NetworkPlanEntry } from '../plan/types';
import { HardwareProfile, physicalLanPorts } from './types';

const SOURCE = 'port-allocator';

export function allocatePorts(
  networks: readonly NetworkPlanEntry[],
  profile: HardwareProfile,
  logger: Logger,
): NetworkPlanEntry[] {
  const assigned = new Map<number, string[]>();
  networks.forEach((net, i) => assigned.set(i, [...net.explicitPorts]));

  const ports = physicalLanPorts(profile);
  const total = ports.length;
  const tokenFor = (index: number): PortToken => String(ports[index - 1]);
  if (total === 0) {
    logger.info(SOURCE, 'alloc:skipped', 'no physical LAN ports detected, automatic allocation skipped');
    return networks.map(net => ({ ...net, explicitPorts: [...net.explicitPorts] }));
  }

  const pool = Array.from({ length: total }, (_, i) => i + 1);
  logger.info(SOURCE, 'alloc:start', `allocating ${total} LAN ports`, { total });

  networks.forEach((net, i) => {
    if (net.explicitPorts.length > 0) return;
    const index = pool.shift();
    if (index === undefined) {
      logger.info(SOURCE, 'alloc:exhausted', `${net.name}: no port left (WiFi only)`, { network: net.name });
      return;
    }
    const token = tokenFor(index);
    assigned.get(i)?.push(token);
    logger.info(SOURCE, 'alloc:assigned', `${net.name}: ${token}`, { network: net.name, port: token });
  });

  if (pool.length > 0) {
    const extras = pool.map(tokenFor);
    const lanIndex = networks.findIndex(n => n.vlanId === DEFAULT_LAN_VLAN);
    if (lanIndex >= 0) {
      assigned.get(lanIndex)?.push(...extras);
      logger.info(SOURCE, 'alloc:leftover', `${networks[lanIndex].name} (VLAN ${DEFAULT_LAN_VLAN}): also gets ${extras.join(', ')}`,
        { network: networks[lanIndex].name, ports: extras });
    } else {
      logger.warn(SOURCE, 'alloc:unused', `ports ${extras.join(', ')} left unused (no VLAN ${DEFAULT_LAN_VLAN} network)`,
        { ports: extras });
    }
  }

  return networks.map((net, i) => ({ ...net, explicitPorts: assigned.get(i) ?? [] }));
}
