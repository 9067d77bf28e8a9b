/**
 * WifiConfigurator - Access point per network that asks for one
 *
 * On a live device without a wireless config (x86 images, containers) the
 * network is left wired-only. Offline runs assume the target has radios.
 */

import { randomInt } from 'crypto';
import { Logger } from '../core/Logger';
import { AUTO_GENERATE_PASSWORD, NetworkPlanEntry, WifiCredentials } from '../plan/types';
import type { CommandQuery } from '../uci/CommandQuery';
import type { ConfigSink } from '../uci/ConfigSink';

export const DEFAULT_RADIO = 'radio0';
export const GENERATED_PASSWORD_LENGTH = 8;

const PASSWORD_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

export type PasswordGenerator = (length: number) => string;

export function generatePassword(length: number = GENERATED_PASSWORD_LENGTH): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += PASSWORD_ALPHABET[randomInt(PASSWORD_ALPHABET.length)];
  }
  return out;
}

export class WifiConfigurator {
  private wirelessAvailable: boolean | undefined;

  constructor(
    private readonly sink: ConfigSink,
    private readonly query: CommandQuery,
    private readonly logger: Logger,
    private readonly makePassword: PasswordGenerator = generatePassword,
  ) {}

  private hasWireless(): boolean {
    if (!this.query.live) return true;
    if (this.wirelessAvailable === undefined) {
      this.wirelessAvailable = this.query.query({ verb: 'show', path: 'wireless' }) !== undefined;
    }
    return this.wirelessAvailable;
  }

  configure(entry: NetworkPlanEntry, radio: string = DEFAULT_RADIO): WifiCredentials | undefined {
    if (!entry.wifi) return undefined;

    if (!this.hasWireless()) {
      this.logger.warn('wifi', 'wifi:unavailable',
        `no wireless subsystem, skipping SSID ${entry.wifi.ssid}`, { network: entry.name });
      return undefined;
    }

    const { ssid } = entry.wifi;
    const password = entry.wifi.password === AUTO_GENERATE_PASSWORD
      ? this.makePassword(GENERATED_PASSWORD_LENGTH)
      : entry.wifi.password;

    this.logger.info('wifi', 'wifi:iface', `SSID ${ssid} @ ${radio}`, { network: entry.name, radio });
    const section = this.sink.addSection('wireless', 'wifi-iface');
    this.sink.set(section, 'device', radio);
    this.sink.set(section, 'mode', 'ap');
    this.sink.set(section, 'ssid', ssid);
    this.sink.set(section, 'encryption', 'psk2');
    this.sink.set(section, 'key', password);
    this.sink.set(section, 'network', entry.name);

    return { ssid, password, role: entry.role };
  }
}
