/**
 * Orchestrator - Plan in, uci commands out
 *
 *   detect → pick bridge mode → allocate ports → base bridge
 *     → per network: VLAN, interface, DHCP, WiFi, firewall
 *     → commit
 *
 * Roles are resolved for every network before anything is emitted, so an
 * unknown role aborts the run with an untouched sink. The same holds for a
 * network on VLAN 2 of a switch chip whose WAN port sits on VLAN 2.
 */

import { Logger } from './core/Logger';
import { WanVlanConflictError } from './core/errors';
import { WAN_VLAN } from './core/types';
import { createBridgeMode, preservesWanVlan } from './bridge';
import type { BridgeModeKind } from './bridge';
import { DhcpConfigurator } from './configurators/DhcpConfigurator';
import { FirewallConfigurator } from './configurators/FirewallConfigurator';
import { PasswordGenerator, WifiConfigurator } from './configurators/WifiConfigurator';
import { allocatePorts } from './hardware/PortAllocator';
import { detectHardware } from './hardware/TopologyDetector';
import type { HardwareProfile } from './hardware/types';
import { loadPlan } from './plan/PlanLoader';
import type { NetworkPlan, NetworkPlanEntry, WifiCredentials } from './plan/types';
import type { NetworkRole } from './roles/NetworkRole';
import { RoleRegistry, createDefaultRegistry } from './roles/RoleRegistry';
import type { CommandQuery } from './uci/CommandQuery';
import type { ConfigSink } from './uci/ConfigSink';

const SOURCE = 'orchestrator';

/** Subsystems committed at the end of a run, in this order */
export const COMMITTED_SUBSYSTEMS = ['network', 'dhcp', 'firewall', 'wireless'] as const;

export interface OrchestratorOptions {
  query: CommandQuery;
  sink: ConfigSink;
  logger: Logger;
  registry?: RoleRegistry;
  makePassword?: PasswordGenerator;
}

export interface RunSummary {
  mode: BridgeModeKind;
  profile: HardwareProfile;
  /** Entries after port allocation */
  entries: NetworkPlanEntry[];
  wifi: WifiCredentials[];
  committed: string[];
}

export class Orchestrator {
  private readonly query: CommandQuery;
  private readonly sink: ConfigSink;
  private readonly logger: Logger;
  private readonly registry: RoleRegistry;
  private readonly makePassword?: PasswordGenerator;

  constructor(options: OrchestratorOptions) {
    this.query = options.query;
    this.sink = options.sink;
    this.logger = options.logger;
    this.registry = options.registry ?? createDefaultRegistry(options.logger);
    this.makePassword = options.makePassword;
  }

  run(planPath: string): RunSummary {
    this.logger.info(SOURCE, 'run:plan', `loading plan ${planPath}`, { path: planPath });
    return this.apply(loadPlan(planPath));
  }

  apply(plan: NetworkPlan): RunSummary {
    const roles = new Map<string, NetworkRole>();
    for (const net of plan.networks) {
      roles.set(net.name, this.registry.get(net.role));
    }

    const profile = detectHardware(this.query, this.logger);
    if (profile.mode === 'switch-chip' && preservesWanVlan(profile.chip)) {
      const clash = plan.networks.find(net => net.vlanId === WAN_VLAN);
      if (clash) throw new WanVlanConflictError(clash.name, clash.vlanId);
    }
    const bridge = createBridgeMode(profile, this.sink, this.logger);
    const entries = allocatePorts(plan.networks, profile, this.logger);

    const dhcp = new DhcpConfigurator(this.sink, this.logger);
    const firewall = new FirewallConfigurator(this.sink, this.logger);
    const wifi = new WifiConfigurator(this.sink, this.query, this.logger, this.makePassword);

    bridge.configureBase(profile);

    const credentials: WifiCredentials[] = [];
    for (const entry of entries) {
      const role = roles.get(entry.name) ?? this.registry.get(entry.role);
      this.logger.info(SOURCE, 'run:network',
        `${entry.name} (VLAN ${entry.vlanId}, ${entry.role}) ${entry.subnet}/${entry.netmask}`,
        { network: entry.name, vlan: entry.vlanId, ports: [...entry.explicitPorts] });

      bridge.configureVlan(entry, profile);
      bridge.configureInterface(entry);
      dhcp.configure(entry, plan.proxy, role);
      const creds = wifi.configure(entry);
      if (creds) credentials.push(creds);
      firewall.configure(entry, role);
    }

    const committed = this.commitAll();
    this.logger.info(SOURCE, 'run:done',
      `${entries.length} network(s) configured (${bridge.label})`, { committed });

    return { mode: bridge.kind, profile, entries, wifi: credentials, committed };
  }

  /** Live runs leave alone subsystems the device does not have */
  private commitAll(): string[] {
    const committed: string[] = [];
    for (const subsystem of COMMITTED_SUBSYSTEMS) {
      if (this.query.live && this.query.query({ verb: 'show', path: subsystem }) === undefined) {
        this.logger.info(SOURCE, 'run:commit-skipped', `${subsystem}: not present on device, not committed`);
        continue;
      }
      this.sink.commit(subsystem);
      committed.push(subsystem);
    }
    return committed;
  }
}
