/**
 * FirewallConfigurator - One zone per network
 *
 * Baseline: input/output accepted, forwarding between zones rejected,
 * masquerading on, and a forwarding rule to wan. Roles may add more.
 */

import { Logger } from '../core/Logger';
import type { NetworkPlanEntry } from '../plan/types';
import type { NetworkRole } from '../roles/NetworkRole';
import type { ConfigSink } from '../uci/ConfigSink';

export const WAN_ZONE = 'wan';

export class FirewallConfigurator {
  constructor(
    private readonly sink: ConfigSink,
    private readonly logger: Logger,
  ) {}

  configure(entry: NetworkPlanEntry, role: NetworkRole): void {
    const zone = entry.name;
    const section = `firewall.${zone}`;
    this.logger.info('firewall', 'firewall:zone', `zone ${zone} (role ${entry.role})`);

    this.sink.set('firewall', zone, 'zone');
    this.sink.set(section, 'name', zone);
    this.sink.set(section, 'network', entry.name);
    this.sink.set(section, 'input', 'ACCEPT');
    this.sink.set(section, 'output', 'ACCEPT');
    this.sink.set(section, 'forward', 'REJECT');
    this.sink.set(section, 'masq', '1');

    const forwarding = this.sink.addSection('firewall', 'forwarding');
    this.sink.set(forwarding, 'src', zone);
    this.sink.set(forwarding, 'dest', WAN_ZONE);

    role.configureFirewall(this.sink, zone, entry);
  }
}
