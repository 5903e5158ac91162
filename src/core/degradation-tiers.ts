/**
 * Degradation Tiers
 *
 * Ordered tier ladders per domain. Components only ever move down one step
 * per failure; moving up happens on confirmed or system recovery.
 */

// ============= INTERFACES & TYPES =============

/**
 * Domain-neutral health class used by the system aggregator.
 */
export type HealthBucket = 'normal' | 'reduced' | 'degraded' | 'near-failed' | 'failed';

export const COMPONENT_TIERS = ['normal', 'reduced', 'fallback', 'emergency', 'failed'] as const;
export type ComponentTier = (typeof COMPONENT_TIERS)[number];

export const GLASS_TIERS = ['full', 'reduced', 'minimal', 'none'] as const;
export type GlassTier = (typeof GLASS_TIERS)[number];

// ============= LADDER =============

export class TierLadder<T extends string> {
  constructor(
    readonly domain: string,
    readonly tiers: readonly T[],
    private readonly buckets: Record<T, HealthBucket>
  ) {
    if (tiers.length === 0) {
      throw new Error(`Tier ladder for ${domain} needs at least one tier`);
    }
  }

  get top(): T {
    return this.tiers[0];
  }

  get bottom(): T {
    return this.tiers[this.tiers.length - 1];
  }

  rank(tier: T): number {
    return this.tiers.indexOf(tier);
  }

  includes(value: string): value is T {
    return this.tiers.some(tier => tier === value);
  }

  /** one step down; the bottom tier stays where it is */
  degrade(tier: T): T {
    const next = this.rank(tier) + 1;
    return next < this.tiers.length ? this.tiers[next] : this.bottom;
  }

  /** one step up; the top tier stays where it is */
  upgrade(tier: T): T {
    const previous = this.rank(tier) - 1;
    return previous >= 0 ? this.tiers[previous] : this.top;
  }

  isWorse(a: T, b: T): boolean {
    return this.rank(a) > this.rank(b);
  }

  worst(a: T, b: T): T {
    return this.isWorse(a, b) ? a : b;
  }

  best(a: T, b: T): T {
    return this.isWorse(a, b) ? b : a;
  }

  bucketOf(tier: T): HealthBucket {
    return this.buckets[tier];
  }
}

export const COMPONENT_LADDER = new TierLadder<ComponentTier>('component', COMPONENT_TIERS, {
  normal: 'normal',
  reduced: 'reduced',
  fallback: 'degraded',
  emergency: 'near-failed',
  failed: 'failed'
});

export const GLASS_LADDER = new TierLadder<GlassTier>('glass', GLASS_TIERS, {
  full: 'normal',
  reduced: 'reduced',
  minimal: 'near-failed',
  none: 'failed'
});
