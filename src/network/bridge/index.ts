import { Logger } from '../core/Logger';
import type { HardwareProfile } from '../hardware/types';
import type { ConfigSink } from '../uci/ConfigSink';
import type { BridgeMode } from './BridgeMode';
import { DsaBridgeMode } from './DsaBridgeMode';
import { SwitchChipBridgeMode } from './SwitchChipBridgeMode';

export type { BridgeMode, BridgeModeKind } from './BridgeMode';
export { DsaBridgeMode, DSA_BRIDGE_NAME } from './DsaBridgeMode';
export { SwitchChipBridgeMode, preservesWanVlan } from './SwitchChipBridgeMode';

/**
 * Pick the bridge mode for a detected profile. The choice holds for the
 * whole run.
 */
export function createBridgeMode(profile: HardwareProfile, sink: ConfigSink, logger: Logger): BridgeMode {
  const mode = profile.mode === 'switch-chip'
    ? new SwitchChipBridgeMode(profile.chip, sink, logger)
    : new DsaBridgeMode(sink, logger);
  logger.info('bridge', 'bridge:selected', `bridge mode: ${mode.label}`, { kind: mode.kind });
  return mode;
}
