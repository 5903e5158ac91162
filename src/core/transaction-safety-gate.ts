/**
 * Transaction Safety Gate
 *
 * Decides whether a UI-tree mutation may be committed given the owning
 * scope's current state. Pure: no state of its own.
 */

import { EnvironmentState } from '../types/common';

export enum CommitDecision {
  SAFE = 'Safe',
  ALLOW_LOSSY_COMMIT = 'AllowLossyCommit',
  UNSAFE = 'Unsafe'
}

export type SafetyLevel = 'safe' | 'allow_state_loss' | 'unsafe_manager' | 'unsafe_scope';

export interface SafetyEvaluation {
  level: SafetyLevel;
  decision: CommitDecision;
  scopeFinishing: boolean;
  scopeDestroyed: boolean;
  managerDestroyed: boolean;
  stateSaved: boolean;
  reason: string;
}

const DECISION_BY_LEVEL: Record<SafetyLevel, CommitDecision> = {
  safe: CommitDecision.SAFE,
  allow_state_loss: CommitDecision.ALLOW_LOSSY_COMMIT,
  unsafe_manager: CommitDecision.UNSAFE,
  unsafe_scope: CommitDecision.UNSAFE
};

export class TransactionSafetyGate {
  canCommit(env: EnvironmentState): CommitDecision {
    return this.evaluate(env).decision;
  }

  evaluate(env: EnvironmentState): SafetyEvaluation {
    let level: SafetyLevel;
    let reason: string;

    if (env.scopeFinishing || env.scopeDestroyed) {
      level = 'unsafe_scope';
      reason = env.scopeDestroyed ? 'owning scope destroyed' : 'owning scope finishing';
    } else if (env.managerDestroyed) {
      level = 'unsafe_manager';
      reason = 'component manager destroyed';
    } else if (env.stateSaved) {
      level = 'allow_state_loss';
      reason = 'UI state already saved; commit would be lossy';
    } else {
      level = 'safe';
      reason = 'no unsafe condition';
    }

    return {
      level,
      decision: DECISION_BY_LEVEL[level],
      scopeFinishing: env.scopeFinishing,
      scopeDestroyed: env.scopeDestroyed,
      managerDestroyed: env.managerDestroyed,
      stateSaved: env.stateSaved,
      reason
    };
  }
}
