/**
 * How much a value may still change between versions.
 *
 * Lifecycles form a join lattice: combining two values keeps the one with the
 * greater breakage potential. `experimental` dominates everything, the earlier
 * of two deprecations wins, and `stable` is the weakest.
 */
export type Lifecycle =
  | { readonly kind: 'experimental' }
  | { readonly kind: 'stable' }
  | { readonly kind: 'deprecated'; readonly since: number };

const EXPERIMENTAL: Lifecycle = Object.freeze({ kind: 'experimental' });
const STABLE: Lifecycle = Object.freeze({ kind: 'stable' });

export function experimental(): Lifecycle {
  return EXPERIMENTAL;
}

export function stable(): Lifecycle {
  return STABLE;
}

export function deprecated(since: number): Lifecycle {
  return { kind: 'deprecated', since };
}

/**
 * Joins two lifecycles.
 *
 * @example
 * ```typescript
 * add(deprecated(3), deprecated(5)); // deprecated(3)
 * add(stable(), experimental());     // experimental
 * ```
 */
export function add(a: Lifecycle, b: Lifecycle): Lifecycle {
  if (a.kind === 'experimental' || b.kind === 'experimental') {
    return EXPERIMENTAL;
  }
  if (a.kind === 'deprecated') {
    if (b.kind === 'deprecated' && b.since < a.since) {
      return b;
    }
    return a;
  }
  if (b.kind === 'deprecated') {
    return b;
  }
  return STABLE;
}

export function equals(a: Lifecycle, b: Lifecycle): boolean {
  if (a.kind === 'deprecated' && b.kind === 'deprecated') {
    return a.since === b.since;
  }
  return a.kind === b.kind;
}

export function toString(lifecycle: Lifecycle): string {
  switch (lifecycle.kind) {
    case 'experimental':
      return 'Experimental';
    case 'stable':
      return 'Stable';
    case 'deprecated':
      return `Deprecated[${lifecycle.since}]`;
  }
}

export const Lifecycle = {
  experimental,
  stable,
  deprecated,
  add,
  equals,
  toString,
} as const;
