/**
 * Core types shared by detection, resolution and emission
 *
 *   PortId     a physical port: interface name (DSA) or switch port number (switch chip)
 *   PortToken  user input naming a port: "lan2", "lan2:t", "eth2", "2"
 *   IPAddress / SubnetMask  value objects validating the L3 side of a plan entry
 */

// ─── Ports ───────────────────────────────────────────────────────────

export type PortId = string | number;

/** Textual port reference from the plan */
export type PortToken = string;

/** Suffix marking a plan token as a tagged (trunk) member */
export const TOKEN_TAG_SUFFIX = ':t';

/** Suffix marking a tagged member inside a switch_vlan ports string */
export const CHIP_TAG_SUFFIX = 't';

/** Logical port prefix: "lan<N>" is the N-th detected LAN port, 1-based */
export const LOGICAL_PORT_PREFIX = 'lan';

export interface ResolvedPort<P extends PortId = PortId> {
  port: P;
  tagged: boolean;
}

// ─── VLAN ────────────────────────────────────────────────────────────

export const VLAN_MIN = 1;
export const VLAN_MAX = 4094;

/** VLAN whose members default to every LAN port */
export const DEFAULT_LAN_VLAN = 1;

/** VLAN conventionally carrying WAN traffic on switch chips */
export const WAN_VLAN = 2;

// ─── IPv4 Address ────────────────────────────────────────────────────

export class IPAddress {
  private readonly octets: number[];

  constructor(ip: string) {
    this.octets = IPAddress.parse(ip);
  }

  private static parse(ip: string): number[] {
    const parts = ip.split('.');
    if (parts.length !== 4) throw new Error(`Invalid IP address: ${ip}`);
    return parts.map(p => {
      if (!/^\d{1,3}$/.test(p)) throw new Error(`Invalid IP octet: ${p}`);
      const n = parseInt(p, 10);
      if (n > 255) throw new Error(`Invalid IP octet: ${p}`);
      return n;
    });
  }

  static isValid(ip: string): boolean {
    try {
      new IPAddress(ip);
      return true;
    } catch {
      return false;
    }
  }

  getOctets(): number[] {
    return [...this.octets];
  }

  toString(): string {
    return this.octets.join('.');
  }
}

// ─── Subnet Mask ─────────────────────────────────────────────────────

export class SubnetMask {
  private readonly octets: number[];

  constructor(mask: string) {
    const octets = new IPAddress(mask).getOctets();
    if (!SubnetMask.isContiguous(octets)) throw new Error(`Invalid subnet mask: ${mask}`);
    this.octets = octets;
  }

  static isValid(mask: string): boolean {
    try {
      new SubnetMask(mask);
      return true;
    } catch {
      return false;
    }
  }

  // ones followed only by zeros
  private static isContiguous(octets: number[]): boolean {
    const value = ((octets[0] << 24) | (octets[1] << 16) | (octets[2] << 8) | octets[3]) >>> 0;
    const inverted = (~value) >>> 0;
    return (inverted & (inverted + 1)) === 0;
  }

  toString(): string {
    return this.octets.join('.');
  }
}
