// Core
export * from './core';

// uci
export type { ConfigSink, UciCommand } from './uci/ConfigSink';
export {
  RecordingSink, ScriptExportSink, UciSink,
  renderCommand, commandArgs, shellQuote, lastSectionHandle,
} from './uci/ConfigSink';
export type { CommandQuery, UciSelector, ShellResult, SpawnFn } from './uci/CommandQuery';
export { ShellCommandQuery, OfflineCommandQuery, DEFAULT_PROBE_TIMEOUT_MS } from './uci/CommandQuery';
export { UciExecutor } from './uci/UciExecutor';

// Hardware
export type {
  BridgeParadigm, HardwareProfile, DsaHardwareProfile, SwitchChipHardwareProfile, SwitchChipProfile,
} from './hardware/types';
export {
  createDsaProfile, createSwitchChipProfile, physicalLanPorts, OFFLINE_DEFAULT_PROFILE,
} from './hardware/types';
export { detectHardware, parseUciShow } from './hardware/TopologyDetector';
export { resolvePorts, parsePortToken } from './hardware/PortResolver';
export { allocatePorts } from './hardware/PortAllocator';

// Bridge modes
export * from './bridge';

// Plan
export type { NetworkPlan, NetworkPlanEntry, ProxySettings, WifiSettings, WifiCredentials } from './plan/types';
export { AUTO_GENERATE_PASSWORD } from './plan/types';
export { loadPlan, parsePlan, parsePlanText } from './plan/PlanLoader';

// Roles
export type { NetworkRole } from './roles/NetworkRole';
export { ProxyRole, CleanRole, IsolateRole, PUBLIC_DNS } from './roles/NetworkRole';
export { RoleRegistry, createDefaultRegistry } from './roles/RoleRegistry';

// Configurators
export { DhcpConfigurator } from './configurators/DhcpConfigurator';
export { FirewallConfigurator } from './configurators/FirewallConfigurator';
export { WifiConfigurator, generatePassword } from './configurators/WifiConfigurator';

// Orchestration
export { Orchestrator, COMMITTED_SUBSYSTEMS } from './Orchestrator';
export type { RunSummary, OrchestratorOptions } from './Orchestrator';
