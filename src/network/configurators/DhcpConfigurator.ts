/**
 * DhcpConfigurator - One DHCP pool per network
 *
 * Common pool settings live here; anything role-specific is delegated to the
 * network's role.
 */

import { Logger } from '../core/Logger';
import type { NetworkPlanEntry, ProxySettings } from '../plan/types';
import type { NetworkRole } from '../roles/NetworkRole';
import type { ConfigSink } from '../uci/ConfigSink';

export const DHCP_POOL_START = 100;
export const DHCP_POOL_LIMIT = 150;
export const DHCP_LEASE_TIME = '12h';

export class DhcpConfigurator {
  constructor(
    private readonly sink: ConfigSink,
    private readonly logger: Logger,
  ) {}

  configure(entry: NetworkPlanEntry, proxy: ProxySettings | undefined, role: NetworkRole): void {
    const section = `dhcp.${entry.name}`;
    this.logger.info('dhcp', 'dhcp:pool',
      `${entry.name}: pool .${DHCP_POOL_START} + ${DHCP_POOL_LIMIT}, lease ${DHCP_LEASE_TIME}`);
    this.sink.set('dhcp', entry.name, 'dhcp');
    this.sink.set(section, 'interface', entry.name);
    this.sink.set(section, 'start', String(DHCP_POOL_START));
    this.sink.set(section, 'limit', String(DHCP_POOL_LIMIT));
    this.sink.set(section, 'leasetime', DHCP_LEASE_TIME);

    role.configureDhcp(this.sink, entry, proxy);
  }
}
