/**
 * TopologyDetector - Works out the switch paradigm and port roles
 *
 * Detection is tiered; each tier runs only when the previous one was
 * inconclusive, and every failure falls through to a fixed default:
 *
 *   1. offline        no live target → DSA eth0 / [eth1, eth2]
 *   2. paradigm       "=switch" section → switch chip, "=bridge-vlan" → DSA,
 *                     neither → DSA
 *   3. DSA            WAN from network.wan, LAN from the bridge device ports
 *   4. switch chip    CPU / LAN / WAN ports from every switch_vlan ports string
 *   5. ghost guard    enumerate chip ports only when ≤1 LAN port was declared
 *   6. fallback       LAN [1, 2, 3, 4]
 *
 * Chips often enumerate ports that have no jack behind them. Declared
 * configuration is trusted over enumeration as soon as it names two or more
 * LAN ports; enumeration is only consulted below that.
 */

import { Logger } from '../core/Logger';
import { CHIP_TAG_SUFFIX, WAN_VLAN } from '../core/types';
import type { CommandQuery } from '../uci/CommandQuery';
import {
  HardwareProfile, DsaHardwareProfile, SwitchChipHardwareProfile, BridgeParadigm,
  OFFLINE_DEFAULT_PROFILE, createDsaProfile, createSwitchChipProfile,
} from './types';

const SOURCE = 'hw-detect';

/** Section-type markers looked for in `uci show network` */
export const SWITCH_SECTION_MARKER = '=switch';
export const BRIDGE_VLAN_SECTION_MARKER = '=bridge-vlan';

export const DEFAULT_WAN_INTERFACE = 'eth0';
export const DEFAULT_DSA_LAN_PORTS: readonly string[] = ['eth1', 'eth2'];
export const DEFAULT_SWITCH_NAME = 'switch0';
export const DEFAULT_CPU_PORT = 0;
export const DEFAULT_CHIP_LAN_PORTS: readonly number[] = [1, 2, 3, 4];

// ─── uci show parsing ────────────────────────────────────────────────

export interface UciSectionDump {
  name: string;                     // "@switch_vlan[0]" or "cfg0b1ec7"
  type: string;                     // "switch_vlan"
  options: Map<string, string>;
}

function unquote(raw: string): string {
  const chunks = [...raw.matchAll(/'([^']*)'/g)].map(m => m[1]);
  return chunks.length > 0 ? chunks.join(' ') : raw.trim();
}

/**
 * Parse `uci show <config>` output into sections, in the order they appear.
 * Lines that don't look like `config.section[.option]=value` are skipped.
 */
export function parseUciShow(dump: string): UciSectionDump[] {
  const sections = new Map<string, UciSectionDump>();

  for (const rawLine of dump.split('\n')) {
    const line = rawLine.trim();
    const eq = line.indexOf('=');
    if (eq < 0) continue;
    const key = line.slice(0, eq).split('.');
    const value = line.slice(eq + 1);

    if (key.length === 2) {
      sections.set(key[1], { name: key[1], type: unquote(value), options: new Map() });
    } else if (key.length === 3) {
      const section = sections.get(key[1]);
      if (section) section.options.set(key[2], unquote(value));
    }
  }

  return [...sections.values()];
}

function hasMarker(dump: string, marker: string): boolean {
  return dump.split('\n').some(line => line.trim().endsWith(marker));
}

function parsePortNumber(token: string): number | undefined {
  return /^\d+$/.test(token) ? parseInt(token, 10) : undefined;
}

function firstAnswer(query: CommandQuery, paths: string[]): string | undefined {
  for (const path of paths) {
    const answer = query.query({ verb: 'get', path });
    if (answer !== undefined) return answer;
  }
  return undefined;
}

// ─── Paradigm ────────────────────────────────────────────────────────

export function classifyParadigm(dump: string | undefined, logger: Logger): BridgeParadigm {
  if (dump !== undefined && hasMarker(dump, SWITCH_SECTION_MARKER)) {
    logger.info(SOURCE, 'detect:mode', 'switch section found, using switch-chip mode', { mode: 'switch-chip' });
    return 'switch-chip';
  }
  if (dump !== undefined && hasMarker(dump, BRIDGE_VLAN_SECTION_MARKER)) {
    logger.info(SOURCE, 'detect:mode', 'bridge-vlan section found, using DSA mode', { mode: 'dsa' });
    return 'dsa';
  }
  logger.info(SOURCE, 'detect:mode', 'no switch or bridge-vlan section, assuming DSA', { mode: 'dsa' });
  return 'dsa';
}

// ─── DSA ─────────────────────────────────────────────────────────────

function detectWanInterface(query: CommandQuery, logger: Logger): string {
  const wan = firstAnswer(query, ['network.wan.device', 'network.wan.ifname']);
  if (wan === undefined) {
    logger.info(SOURCE, 'detect:wan-default', `WAN interface not configured, using ${DEFAULT_WAN_INTERFACE}`);
    return DEFAULT_WAN_INTERFACE;
  }
  return wan;
}

export function detectDsa(query: CommandQuery, logger: Logger): DsaHardwareProfile {
  const wanInterface = detectWanInterface(query, logger);

  let lanPorts: string[] = [];
  for (const path of ['network.@device[0].ports', 'network.lan_dev.ports']) {
    const raw = query.query({ verb: 'get', path });
    const ports = raw?.split(/\s+/).filter(p => p.length > 0) ?? [];
    if (ports.length > 0) {
      lanPorts = ports;
      break;
    }
  }
  if (lanPorts.length === 0) {
    logger.info(SOURCE, 'detect:lan-default',
      `bridge ports not found, using ${DEFAULT_DSA_LAN_PORTS.join(', ')}`);
    lanPorts = [...DEFAULT_DSA_LAN_PORTS];
  }

  const profile = createDsaProfile(wanInterface, lanPorts);
  logger.info(SOURCE, 'detect:dsa', `WAN ${profile.wanInterface}, LAN ${profile.lanPorts.join(' ')}`,
    { wanInterface: profile.wanInterface, lanPorts: [...profile.lanPorts] });
  return profile;
}

// ─── Switch chip ─────────────────────────────────────────────────────

interface TagTally {
  count: number;
  lastSeen: number;
}

/**
 * The CPU port is tagged in every VLAN it carries, so the tagged port seen in
 * the most VLAN strings wins; a tie goes to the one seen last.
 */
function pickCpuPort(tally: Map<number, TagTally>, logger: Logger): number {
  if (tally.size === 0) {
    logger.info(SOURCE, 'detect:cpu-default', `no tagged port found, CPU port defaults to ${DEFAULT_CPU_PORT}`);
    return DEFAULT_CPU_PORT;
  }

  let best: [number, TagTally] | undefined;
  for (const entry of tally) {
    if (!best || entry[1].count > best[1].count ||
        (entry[1].count === best[1].count && entry[1].lastSeen > best[1].lastSeen)) {
      best = entry;
    }
  }
  const cpu = best ? best[0] : DEFAULT_CPU_PORT;

  if (tally.size > 1) {
    logger.warn(SOURCE, 'detect:cpu-ambiguous',
      `several tagged ports (${[...tally.keys()].join(', ')}), using ${cpu} as CPU port`,
      { candidates: [...tally.keys()], cpuPort: cpu });
  }
  return cpu;
}

/**
 * List every port the chip reports (`swconfig dev <name> show`).
 * Empty when the command fails.
 */
export function probeChipPorts(query: CommandQuery, switchName: string, logger: Logger): number[] {
  const result = query.runShell(`swconfig dev ${switchName} show`);
  if (result.exitCode !== 0) {
    logger.info(SOURCE, 'detect:enumerate-failed', `swconfig enumeration of ${switchName} failed`,
      { exitCode: result.exitCode });
    return [];
  }
  const ports = new Set<number>();
  for (const m of result.stdout.matchAll(/^\s*Port (\d+):/gm)) {
    ports.add(parseInt(m[1], 10));
  }
  return [...ports].sort((a, b) => a - b);
}

export function detectSwitchChip(query: CommandQuery, dump: string, logger: Logger): SwitchChipHardwareProfile {
  const name = query.query({ verb: 'get', path: 'network.@switch[0].name' }) ?? DEFAULT_SWITCH_NAME;
  const wanInterface = detectWanInterface(query, logger);
  const vlans = parseUciShow(dump).filter(s => s.type === 'switch_vlan');

  const tally = new Map<number, TagTally>();
  const candidates = new Set<number>();
  let seen = 0;

  for (const vlan of vlans) {
    for (const token of (vlan.options.get('ports') ?? '').split(/\s+/)) {
      if (token.endsWith(CHIP_TAG_SUFFIX)) {
        const port = parsePortNumber(token.slice(0, -CHIP_TAG_SUFFIX.length));
        if (port === undefined) continue;
        const prev = tally.get(port);
        tally.set(port, { count: (prev?.count ?? 0) + 1, lastSeen: seen++ });
      } else {
        const port = parsePortNumber(token);
        if (port !== undefined) candidates.add(port);
      }
    }
  }

  const cpuPort = pickCpuPort(tally, logger);

  let wanPort: number | null = null;
  const wanVlan = vlans.find(v => v.options.get('vlan') === String(WAN_VLAN)) ?? vlans[1];
  if (wanVlan) {
    const untagged = (wanVlan.options.get('ports') ?? '')
      .split(/\s+/)
      .map(parsePortNumber)
      .filter((p): p is number => p !== undefined);
    if (untagged.length === 1) {
      wanPort = untagged[0];
    } else {
      logger.info(SOURCE, 'detect:wan-port-unknown',
        `WAN VLAN has ${untagged.length} untagged ports, WAN port left undetermined`);
    }
  } else {
    logger.info(SOURCE, 'detect:wan-port-unknown', 'no WAN switch_vlan found, WAN port left undetermined');
  }

  if (wanPort !== null) candidates.delete(wanPort);
  candidates.delete(cpuPort);
  let lanPorts = [...candidates];

  if (lanPorts.length <= 1) {
    logger.info(SOURCE, 'detect:ghost-guard',
      `only ${lanPorts.length} LAN port(s) declared, enumerating ${name}`);
    const all = probeChipPorts(query, name, logger);
    if (all.length > 0) {
      lanPorts = all.filter(p => p !== cpuPort && p !== wanPort);
    }
  }

  if (lanPorts.length === 0) {
    logger.info(SOURCE, 'detect:lan-default',
      `no LAN ports found, using ${DEFAULT_CHIP_LAN_PORTS.join(', ')}`);
    lanPorts = [...DEFAULT_CHIP_LAN_PORTS];
  }

  const lanIfname = query.query({ verb: 'get', path: 'network.lan.ifname' }) ?? wanInterface;
  const cpuInterface = lanIfname.split(/\s+/)[0].split('.')[0];

  const profile = createSwitchChipProfile(wanInterface, {
    name,
    cpuPort,
    cpuInterface,
    lanPorts,
    wanPort,
  });
  logger.info(SOURCE, 'detect:switch-chip',
    `${profile.chip.name}: CPU ${profile.chip.cpuPort} (${profile.chip.cpuInterface}), ` +
    `LAN ${profile.chip.lanPorts.join(' ')}, WAN ${profile.chip.wanPort ?? 'none'}`,
    { ...profile.chip, lanPorts: [...profile.chip.lanPorts] });
  return profile;
}

// ─── Entry point ─────────────────────────────────────────────────────

export function detectHardware(query: CommandQuery, logger: Logger): HardwareProfile {
  if (!query.live) {
    logger.info(SOURCE, 'detect:offline', 'no live target, using default DSA profile');
    return OFFLINE_DEFAULT_PROFILE;
  }

  try {
    const dump = query.query({ verb: 'show', path: 'network' });
    return classifyParadigm(dump, logger) === 'switch-chip'
      ? detectSwitchChip(query, dump ?? '', logger)
      : detectDsa(query, logger);
  } catch (err) {
    logger.info(SOURCE, 'detect:failed',
      `detection failed (${err instanceof Error ? err.message : String(err)}), using default DSA profile`);
    return OFFLINE_DEFAULT_PROFILE;
  }
}
