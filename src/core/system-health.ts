/**
 * System Health
 *
 * Folds per-component tiers into one system tier. Pure functions only; the
 * engine decides when to recompute.
 */

import { HealthBucket } from './degradation-tiers';
import { HealthThresholds } from '../utils/config';

export enum SystemTier {
  NORMAL = 'Normal',
  DEGRADED = 'Degraded',
  EMERGENCY = 'Emergency',
  CRITICAL = 'Critical'
}

export interface ComponentHealth {
  componentId: string;
  domain: string;
  tier: string;
  bucket: HealthBucket;
  retryCount: number;
  recoverable: boolean;
}

export interface SystemHealth {
  tier: SystemTier;
  total: number;
  normal: number;
  reduced: number;
  degraded: number;
  nearFailed: number;
  failed: number;
  healthPercentage: number;
  canRecover: boolean;
  components: ComponentHealth[];
}

export const DEFAULT_THRESHOLDS: HealthThresholds = { critical: 0.5, emergency: 0.3, degraded: 0.1 };

export function computeSystemHealth(
  components: readonly ComponentHealth[],
  thresholds: HealthThresholds = DEFAULT_THRESHOLDS
): SystemHealth {
  const count = (bucket: HealthBucket): number => components.filter(c => c.bucket === bucket).length;

  const total = components.length;
  const normal = count('normal');
  const reduced = count('reduced');
  const degraded = count('degraded');
  const nearFailed = count('near-failed');
  const failed = count('failed');

  let tier = SystemTier.NORMAL;
  if (total > 0) {
    if (failed > total * thresholds.critical) {
      tier = SystemTier.CRITICAL;
    } else if (failed + nearFailed > total * thresholds.emergency) {
      tier = SystemTier.EMERGENCY;
    } else if (failed + nearFailed + degraded > total * thresholds.degraded) {
      // reduced components are not counted here
      tier = SystemTier.DEGRADED;
    }
  }

  return {
    tier,
    total,
    normal,
    reduced,
    degraded,
    nearFailed,
    failed,
    healthPercentage: total === 0 ? 100 : (normal / total) * 100,
    canRecover: components.some(c => c.recoverable),
    components: components.map(c => ({ ...c }))
  };
}

/**
 * Pre-flight tier from the number of resources missing at start-up.
 */
export function initialSystemTier(missingTotal: number): SystemTier {
  if (missingTotal === 0) {
    return SystemTier.NORMAL;
  }
  if (missingTotal <= 5) {
    return SystemTier.DEGRADED;
  }
  if (missingTotal <= 15) {
    return SystemTier.EMERGENCY;
  }
  return SystemTier.CRITICAL;
}
