/**
 * PortResolver - Plan port tokens → physical ports
 *
 * A token is matched against the ports detection found, in order:
 *   1. literally ("eth2" on DSA, "2" on a switch chip)
 *   2. as "lan<N>", the N-th available port (1-based)
 *
 * A trailing ":t" makes the membership tagged. Tokens that match nothing
 * are dropped with a warning; the rest keep their input order. Duplicates
 * are passed through untouched.
 */

import { Logger } from '../core/Logger';
import {
  PortId, PortToken, ResolvedPort, TOKEN_TAG_SUFFIX, LOGICAL_PORT_PREFIX,
} from '../core/types';

const LOGICAL_PORT_RE = new RegExp(`^${LOGICAL_PORT_PREFIX}(\\d+)$`);

export interface ParsedToken {
  base: string;
  tagged: boolean;
}

export function parsePortToken(token: PortToken): ParsedToken {
  const trimmed = token.trim();
  if (trimmed.endsWith(TOKEN_TAG_SUFFIX)) {
    return { base: trimmed.slice(0, -TOKEN_TAG_SUFFIX.length), tagged: true };
  }
  return { base: trimmed, tagged: false };
}

function matchPort<P extends PortId>(base: string, available: readonly P[]): P | undefined {
  const literal = available.find(p => String(p) === base);
  if (literal !== undefined) return literal;

  const m = LOGICAL_PORT_RE.exec(base);
  if (!m) return undefined;
  const index = parseInt(m[1], 10);
  if (index < 1 || index > available.length) return undefined;
  return available[index - 1];
}

export function resolvePorts<P extends PortId>(
  tokens: readonly PortToken[],
  available: readonly P[],
  logger?: Logger,
): ResolvedPort<P>[] {
  const resolved: ResolvedPort<P>[] = [];

  for (const token of tokens) {
    const { base, tagged } = parsePortToken(token);
    const port = matchPort(base, available);
    if (port === undefined) {
      logger?.warn('port-resolver', 'resolve:dropped',
        `port '${token}' does not match any of the ${available.length} detected LAN ports, ignored`,
        { token, available: available.map(String) });
      continue;
    }
    resolved.push({ port, tagged });
  }

  return resolved;
}
