import { describe, it, expect } from 'vitest';
import { Lifecycle } from 'polycodec';

const ALL: Lifecycle[] = [Lifecycle.experimental(), Lifecycle.stable(), Lifecycle.deprecated(3), Lifecycle.deprecated(5)];

describe('Lifecycle', () => {
  it('should let experimental dominate every other lifecycle', () => {
    for (const other of ALL) {
      expect(Lifecycle.add(Lifecycle.experimental(), other)).toEqual({ kind: 'experimental' });
      expect(Lifecycle.add(other, Lifecycle.experimental())).toEqual({ kind: 'experimental' });
    }
  });

  it('should keep the earlier of two deprecations', () => {
    expect(Lifecycle.add(Lifecycle.deprecated(3), Lifecycle.deprecated(5))).toEqual({ kind: 'deprecated', since: 3 });
    expect(Lifecycle.add(Lifecycle.deprecated(5), Lifecycle.deprecated(3))).toEqual({ kind: 'deprecated', since: 3 });
  });

  it('should treat stable as the weakest lifecycle', () => {
    expect(Lifecycle.add(Lifecycle.stable(), Lifecycle.stable())).toEqual({ kind: 'stable' });
    expect(Lifecycle.add(Lifecycle.stable(), Lifecycle.deprecated(4))).toEqual({ kind: 'deprecated', since: 4 });
    expect(Lifecycle.add(Lifecycle.deprecated(4), Lifecycle.stable())).toEqual({ kind: 'deprecated', since: 4 });
  });

  it('should be associative, commutative and idempotent', () => {
    for (const a of ALL) {
      expect(Lifecycle.equals(Lifecycle.add(a, a), a)).toBe(true);
      for (const b of ALL) {
        expect(Lifecycle.equals(Lifecycle.add(a, b), Lifecycle.add(b, a))).toBe(true);
        for (const c of ALL) {
          const left = Lifecycle.add(Lifecycle.add(a, b), c);
          const right = Lifecycle.add(a, Lifecycle.add(b, c));
          expect(Lifecycle.equals(left, right)).toBe(true);
        }
      }
    }
  });

  it('should compare deprecations by version', () => {
    expect(Lifecycle.equals(Lifecycle.deprecated(2), Lifecycle.deprecated(2))).toBe(true);
    expect(Lifecycle.equals(Lifecycle.deprecated(2), Lifecycle.deprecated(7))).toBe(false);
    expect(Lifecycle.equals(Lifecycle.stable(), Lifecycle.experimental())).toBe(false);
  });

  it('should render lifecycles for messages', () => {
    expect(Lifecycle.toString(Lifecycle.experimental())).toBe('Experimental');
    expect(Lifecycle.toString(Lifecycle.stable())).toBe('Stable');
    expect(Lifecycle.toString(Lifecycle.deprecated(3))).toBe('Deprecated[3]');
  });
});
