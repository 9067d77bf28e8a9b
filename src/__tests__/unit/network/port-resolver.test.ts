/**
 * Tests for PortResolver: literal and lan<N> tokens, tag suffix, drops
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Logger } from '@/network/core/Logger';
import { parsePortToken, resolvePorts } from '@/network/hardware/PortResolver';

describe('parsePortToken', () => {
  it('should split off the tag suffix', () => {
    expect(parsePortToken('lan2:t')).toEqual({ base: 'lan2', tagged: true });
  });

  it('should treat tokens without suffix as untagged', () => {
    expect(parsePortToken(' eth1 ')).toEqual({ base: 'eth1', tagged: false });
  });
});

describe('resolvePorts', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger();
  });

  it('should map lan<k> to the k-th available DSA port', () => {
    const out = resolvePorts(['lan1'], ['eth1', 'eth2', 'eth3'], logger);
    expect(out).toEqual([{ port: 'eth1', tagged: false }]);
  });

  it('should map lan<k> to the k-th chip port', () => {
    const out = resolvePorts(['lan1', 'lan3:t'], [1, 2, 4], logger);
    expect(out).toEqual([
      { port: 1, tagged: false },
      { port: 4, tagged: true },
    ]);
  });

  it('should prefer a literal match over the lan<N> rule', () => {
    // DSA boards often name their ports lan1..lanN already
    const out = resolvePorts(['lan2'], ['lan2', 'lan3', 'lan4'], logger);
    expect(out).toEqual([{ port: 'lan2', tagged: false }]);
  });

  it('should match numeric chip ports literally', () => {
    const out = resolvePorts(['3', '4:t'], [1, 2, 3, 4], logger);
    expect(out).toEqual([
      { port: 3, tagged: false },
      { port: 4, tagged: true },
    ]);
  });

  it('should drop out-of-range indices and keep the rest in order', () => {
    const out = resolvePorts(['lan0', 'lan2', 'lan3', 'lan1'], ['eth1', 'eth2'], logger);
    expect(out).toEqual([
      { port: 'eth2', tagged: false },
      { port: 'eth1', tagged: false },
    ]);
  });

  it('should publish a warning per dropped token', () => {
    resolvePorts(['wan', 'lan9:t', 'lan1'], ['eth1'], logger);
    const dropped = logger.getLogsByEvent('resolve:dropped');
    expect(dropped).toHaveLength(2);
    expect(dropped.map(l => l.level)).toEqual(['warn', 'warn']);
    expect(dropped.map(l => l.data?.token)).toEqual(['wan', 'lan9:t']);
  });

  it('should not deduplicate repeated tokens', () => {
    const out = resolvePorts(['lan1', 'lan1'], ['eth1'], logger);
    expect(out).toHaveLength(2);
  });

  it('should be idempotent for the same input', () => {
    const tokens = ['lan2', 'eth1:t', 'lan7'];
    const available = ['eth1', 'eth2', 'eth3'];
    expect(resolvePorts(tokens, available, logger)).toEqual(resolvePorts(tokens, available, logger));
  });

  it('should work without a logger', () => {
    expect(resolvePorts(['lan5'], [1, 2])).toEqual([]);
  });

  it('should resolve every in-range index to available[k-1]', () => {
    const available = ['a', 'b', 'c', 'd', 'e'];
    for (let k = 1; k <= available.length; k++) {
      expect(resolvePorts([`lan${k}`], available)).toEqual([{ port: available[k - 1], tagged: false }]);
    }
    expect(resolvePorts([`lan${available.length + 1}`], available)).toEqual([]);
  });
});
