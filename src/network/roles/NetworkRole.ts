/**
 * NetworkRole - What a network is for
 *
 * A role adds its own DHCP options and firewall rules on top of the common
 * ones the configurators emit. New roles are registered in a RoleRegistry;
 * nothing else changes.
 *
 *   proxy    gateway and DNS handed to clients point at the side router
 *   clean    direct WAN access with public DNS
 *   isolate  internet only, public DNS
 */

import { Logger } from '../core/Logger';
import type { NetworkPlanEntry, ProxySettings } from '../plan/types';
import type { ConfigSink } from '../uci/ConfigSink';

export interface NetworkRole {
  readonly name: string;
  configureDhcp(sink: ConfigSink, entry: NetworkPlanEntry, proxy: ProxySettings | undefined): void;
  configureFirewall(sink: ConfigSink, zone: string, entry: NetworkPlanEntry): void;
}

export const PUBLIC_DNS = '223.5.5.5,114.114.114.114';

// DHCP option codes (RFC 2132)
const DHCP_OPTION_ROUTER = 3;
const DHCP_OPTION_DNS = 6;

export class ProxyRole implements NetworkRole {
  readonly name = 'proxy';

  constructor(private readonly logger: Logger) {}

  configureDhcp(sink: ConfigSink, entry: NetworkPlanEntry, proxy: ProxySettings | undefined): void {
    const section = `dhcp.${entry.name}`;
    if (!proxy) {
      this.logger.warn('role-proxy', 'role:no-proxy',
        `${entry.name}: no side router configured, gateway left unchanged`);
      return;
    }

    if (proxy.dhcpMode === 'main') {
      this.logger.info('role-proxy', 'role:dhcp', `${entry.name}: gateway and DNS -> ${proxy.sideRouterIp}`);
      sink.addListItem(section, 'dhcp_option', `${DHCP_OPTION_ROUTER},${proxy.sideRouterIp}`);
      sink.addListItem(section, 'dhcp_option', `${DHCP_OPTION_DNS},${proxy.sideRouterIp}`);
      sink.set(section, 'force', '1');
    } else {
      this.logger.info('role-proxy', 'role:dhcp', `${entry.name}: DHCP served by the side router, ignored here`);
      sink.set(section, 'ignore', '1');
    }
  }

  configureFirewall(): void {}
}

/** Roles that only swap in public DNS */
class PublicDnsRole implements NetworkRole {
  constructor(readonly name: string, private readonly logger: Logger) {}

  configureDhcp(sink: ConfigSink, entry: NetworkPlanEntry): void {
    this.logger.info(`role-${this.name}`, 'role:dhcp', `${entry.name}: DNS ${PUBLIC_DNS}`);
    sink.addListItem(`dhcp.${entry.name}`, 'dhcp_option', `${DHCP_OPTION_DNS},${PUBLIC_DNS}`);
  }

  configureFirewall(): void {}
}

export class CleanRole extends PublicDnsRole {
  constructor(logger: Logger) {
    super('clean', logger);
  }
}

export class IsolateRole extends PublicDnsRole {
  constructor(logger: Logger) {
    super('isolate', logger);
  }
}
