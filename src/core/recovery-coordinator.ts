/**
 * Component Recovery Coordinator
 *
 * Per-component degradation state machine. Each failure moves a component one
 * tier down its domain's ladder, tries the recovery strategy that fits the
 * failure mode, and otherwise hands back a synthesised fallback.
 *
 * Key Features:
 * - One generic coordinator, instantiated per domain (components, glass)
 * - Strategy table keyed by failure mode
 * - Transaction safety gate consulted before any retry
 * - Never throws and never returns nothing from onFailure
 * - Timers and state dropped together on destroy
 */

import {
  FailureOptions,
  HostEnvironment,
  Renderable,
  RetryContext,
  RetryFn
} from '../types/common';
import { createLogger, Logger, LogLevel } from '../utils/logger';
import { DiagnosticLedger } from './diagnostic-ledger';
import {
  COMPONENT_LADDER,
  ComponentTier,
  GLASS_LADDER,
  GlassTier,
  TierLadder
} from './degradation-tiers';
import { ErrorClassifier, FailureMode } from './error-classifier';
import { toError } from './errors';
import {
  COMPONENT_TIER_STYLE,
  FallbackStyle,
  GLASS_TIER_STYLE,
  emergencyFallback,
  statusMessage,
  synthesizeFallback
} from './fallback-registry';
import { ComponentHealth } from './system-health';
import { CommitDecision, TransactionSafetyGate } from './transaction-safety-gate';

// ============= INTERFACES & TYPES =============

export interface ComponentState<T extends string = string> {
  componentId: string;
  domain: string;
  tier: T;
  lastError?: string;
  failureMode?: FailureMode;
  retryCount: number;
  timestamp: number;
  recoverable: boolean;
  /** strategy that last brought the component back, if any */
  lastRecovery?: string;
}

export interface RecoveryDomain<T extends string> {
  name: string;
  ladder: TierLadder<T>;
  styles: Record<T, FallbackStyle>;
  maxRetryAttempts: number;
  /** best tier the environment currently supports */
  ceiling: () => T;
}

export interface CoordinatorOptions {
  retryDelayMs?: number;
  gate?: TransactionSafetyGate;
  now?: () => number;
  logLevel?: LogLevel;
}

export type TierChangeListener<T extends string> = (componentId: string, from: T, to: T) => void;

export interface SystemRecoveryResult {
  attempted: number;
  improved: string[];
}

type RecoveryStrategy = 'immediate-retry' | 'delayed-retry' | 'force-cleanup' | 'abort';

/**
 * Which strategy handles which failure mode.
 */
export const RECOVERY_STRATEGIES: Record<FailureMode, RecoveryStrategy> = {
  [FailureMode.STATE_LOSS]: 'immediate-retry',
  [FailureMode.ILLEGAL_STATE]: 'immediate-retry',
  [FailureMode.NOT_ATTACHED]: 'delayed-retry',
  [FailureMode.LIFECYCLE_ERROR]: 'force-cleanup',
  [FailureMode.UNKNOWN]: 'abort'
};

interface RetryPlan {
  componentId: string;
  recordId: string;
  attempt: number;
  tier: string;
  allowStateLoss: boolean;
  retryFn: RetryFn;
  onDeferred?: (result: Renderable) => void;
}

// ============= COORDINATOR =============

export class ComponentRecoveryCoordinator<T extends string> {
  protected readonly log: Logger;
  private readonly componentStates = new Map<string, ComponentState<T>>();
  private readonly timers = new Set<NodeJS.Timeout>();
  private readonly listeners = new Set<TierChangeListener<T>>();
  private readonly gate: TransactionSafetyGate;
  private readonly retryDelayMs: number;
  private readonly now: () => number;
  private destroyed = false;

  constructor(
    protected readonly domain: RecoveryDomain<T>,
    private readonly host: HostEnvironment,
    private readonly ledger: DiagnosticLedger,
    options: CoordinatorOptions = {}
  ) {
    this.log = createLogger(`RecoveryCoordinator:${domain.name}`, options.logLevel);
    this.gate = options.gate ?? new TransactionSafetyGate();
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.now = options.now ?? Date.now;
  }

  get ladder(): TierLadder<T> {
    return this.domain.ladder;
  }

  /**
   * Handle a component failure and return what to render instead.
   */
  onFailure(componentId: string, error: unknown, retryFn?: RetryFn, options: FailureOptions = {}): Renderable {
    const { ladder } = this.domain;
    if (this.destroyed) {
      this.log.debug(`${componentId} failed after teardown, nothing to recover`);
      return statusMessage(componentId, ladder.bottom);
    }
    try {
      const err = toError(error);
      const failureMode = ErrorClassifier.classifyFailure(err);
      const recordId = this.ledger.recordFailure(err, options.context ?? `${this.domain.name}.onFailure`, componentId);

      const previous = this.componentStates.get(componentId);
      const currentTier = previous?.tier ?? ladder.top;
      const retryCount = (previous?.retryCount ?? 0) + 1;
      const nextTier = ladder.degrade(currentTier);

      this.log.warn(
        `${componentId} failed (${failureMode}, attempt ${retryCount}): ${err.message} - ${currentTier} -> ${nextTier}`
      );

      let result: Renderable;
      const decision = this.commitDecision();
      if (decision === CommitDecision.UNSAFE) {
        result = statusMessage(componentId, nextTier);
        this.ledger.recordRecoveryAttempt(recordId, 'gate', false, 'UI tree not safe to mutate');
      } else {
        const retried =
          retryFn && retryCount <= this.domain.maxRetryAttempts
            ? this.runStrategy(failureMode, {
                componentId,
                recordId,
                attempt: retryCount,
                tier: nextTier,
                allowStateLoss: decision === CommitDecision.ALLOW_LOSSY_COMMIT,
                retryFn,
                onDeferred: options.onDeferred
              })
            : null;

        if (retried) {
          result = retried;
        } else {
          result = synthesizeFallback(componentId, nextTier, this.domain.styles[nextTier], options.previous);
          this.ledger.recordRecoveryAttempt(recordId, `fallback:${nextTier}`, true);
        }
      }

      this.store(
        {
          componentId,
          domain: this.domain.name,
          tier: nextTier,
          lastError: err.message,
          failureMode,
          retryCount,
          timestamp: this.now(),
          recoverable: nextTier !== ladder.bottom,
          lastRecovery: result.source === 'retry' ? RECOVERY_STRATEGIES[failureMode] : undefined
        },
        currentTier
      );
      return result;
    } catch (unexpected) {
      this.log.error(`Recovery for ${componentId} failed unexpectedly`, unexpected);
      return emergencyFallback(componentId, ladder.bottom);
    }
  }

  /**
   * Caller confirms the component renders again.
   */
  markRecovered(componentId: string): boolean {
    const state = this.componentStates.get(componentId);
    if (!state) {
      return false;
    }
    this.log.info(`${componentId} recovered`);
    this.store({ ...state, tier: this.ladder.top, retryCount: 0, recoverable: true, timestamp: this.now() }, state.tier);
    return true;
  }

  /**
   * Reset counters and lift every recoverable component to the tier the
   * environment now supports, if that is better than where it is.
   */
  attemptSystemRecovery(): SystemRecoveryResult {
    const result: SystemRecoveryResult = { attempted: 0, improved: [] };
    if (this.destroyed) {
      return result;
    }

    let ceiling: T;
    try {
      ceiling = this.domain.ceiling();
    } catch (error) {
      this.log.error('Environment re-validation failed, skipping system recovery', error);
      return result;
    }

    for (const state of [...this.componentStates.values()]) {
      if (!state.recoverable) {
        continue;
      }
      result.attempted++;
      const tier = this.ladder.best(state.tier, ceiling);
      if (tier !== state.tier) {
        result.improved.push(state.componentId);
      }
      this.store(
        { ...state, tier, retryCount: 0, recoverable: tier !== this.ladder.bottom, timestamp: this.now() },
        state.tier
      );
    }

    this.log.info(`System recovery: ${result.improved.length}/${result.attempted} components improved (ceiling ${ceiling})`);
    return result;
  }

  onTierChange(listener: TierChangeListener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  states(): ComponentState<T>[] {
    return [...this.componentStates.values()].map(state => ({ ...state }));
  }

  stateOf(componentId: string): ComponentState<T> | undefined {
    const state = this.componentStates.get(componentId);
    return state ? { ...state } : undefined;
  }

  /** untracked components are at the top tier */
  tierOf(componentId: string): T {
    return this.componentStates.get(componentId)?.tier ?? this.ladder.top;
  }

  health(): ComponentHealth[] {
    return [...this.componentStates.values()].map(state => ({
      componentId: state.componentId,
      domain: state.domain,
      tier: state.tier,
      bucket: this.ladder.bucketOf(state.tier),
      retryCount: state.retryCount,
      recoverable: state.recoverable
    }));
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  destroy(): void {
    this.destroyed = true;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.componentStates.clear();
    this.listeners.clear();
  }

  // ============= INTERNALS =============

  protected stored(_state: ComponentState<T>, _previousTier: T): void {
    // subclasses track domain-wide state here
  }

  private store(state: ComponentState<T>, previousTier: T): void {
    if (this.destroyed) {
      return;
    }
    this.componentStates.set(state.componentId, state);
    this.ledger.updateComponentState(state.componentId, state.tier, {
      domain: state.domain,
      retryCount: state.retryCount,
      recoverable: state.recoverable,
      failureMode: state.failureMode,
      lastRecovery: state.lastRecovery
    });
    this.stored(state, previousTier);

    if (state.tier !== previousTier) {
      for (const listener of this.listeners) {
        try {
          listener(state.componentId, previousTier, state.tier);
        } catch (error) {
          this.log.error(`Tier listener threw for ${state.componentId}`, error);
        }
      }
    }
  }

  private commitDecision(): CommitDecision {
    try {
      return this.gate.canCommit(this.host.environmentState());
    } catch (error) {
      this.log.warn('Environment state unavailable, treating commit as unsafe', error);
      return CommitDecision.UNSAFE;
    }
  }

  private runStrategy(mode: FailureMode, plan: RetryPlan): Renderable | null {
    const strategy = RECOVERY_STRATEGIES[mode];
    switch (strategy) {
      case 'immediate-retry':
        return this.retryNow({ ...plan, allowStateLoss: true }, strategy);
      case 'delayed-retry':
        this.scheduleRetry(plan);
        return null;
      case 'force-cleanup':
        this.forceCleanup(plan);
        return null;
      case 'abort':
        this.ledger.recordRecoveryAttempt(plan.recordId, strategy, false, `no strategy for ${mode}`);
        return null;
    }
  }

  private retryNow(plan: RetryPlan, strategy: RecoveryStrategy): Renderable | null {
    const context: RetryContext = {
      componentId: plan.componentId,
      attempt: plan.attempt,
      tier: plan.tier,
      allowStateLoss: plan.allowStateLoss
    };
    try {
      const rendered = plan.retryFn(context);
      if (rendered === null) {
        this.ledger.recordRecoveryAttempt(plan.recordId, strategy, false, 'retry returned nothing');
        return null;
      }
      this.ledger.recordRecoveryAttempt(plan.recordId, strategy, true);
      return { ...rendered, componentId: plan.componentId, tier: plan.tier, source: 'retry' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.ledger.recordRecoveryAttempt(plan.recordId, strategy, false, message);
      this.log.warn(`${strategy} of ${plan.componentId} failed`, error);
      return null;
    }
  }

  private scheduleRetry(plan: RetryPlan): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      if (this.destroyed) {
        return;
      }
      const rendered = this.retryNow(plan, 'delayed-retry');
      if (!rendered) {
        return;
      }
      this.deferredRecovered(plan);
      if (plan.onDeferred) {
        try {
          plan.onDeferred(rendered);
        } catch (error) {
          this.log.error(`Deferred delivery for ${plan.componentId} threw`, error);
        }
      }
    }, this.retryDelayMs);
    this.timers.add(timer);
    this.log.debug(`Retry of ${plan.componentId} scheduled in ${this.retryDelayMs}ms`);
  }

  /**
   * A delayed retry rendered the component. The stored state is only updated
   * while it still reflects the failure the retry was scheduled for.
   */
  private deferredRecovered(plan: RetryPlan): void {
    const state = this.componentStates.get(plan.componentId);
    if (!state || state.tier !== plan.tier || state.retryCount !== plan.attempt) {
      return;
    }
    this.log.info(`${plan.componentId} rendered again after delayed retry`);
    this.store(
      { ...state, lastError: undefined, lastRecovery: 'delayed-retry', timestamp: this.now() },
      state.tier
    );
  }

  private forceCleanup(plan: RetryPlan): void {
    try {
      this.host.releaseComponent?.(plan.componentId);
      this.ledger.recordRecoveryAttempt(plan.recordId, 'force-cleanup', false, 'component released');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.ledger.recordRecoveryAttempt(plan.recordId, 'force-cleanup', false, message);
      this.log.warn(`Cleanup of ${plan.componentId} failed`, error);
    }
  }
}

// ============= DOMAIN INSTANCES =============

export interface DomainCoordinatorOptions extends CoordinatorOptions {
  maxRetryAttempts?: number;
  ceiling: () => ComponentTier;
}

export function createComponentRecovery(
  host: HostEnvironment,
  ledger: DiagnosticLedger,
  options: DomainCoordinatorOptions
): ComponentRecoveryCoordinator<ComponentTier> {
  return new ComponentRecoveryCoordinator(
    {
      name: 'component',
      ladder: COMPONENT_LADDER,
      styles: COMPONENT_TIER_STYLE,
      maxRetryAttempts: options.maxRetryAttempts ?? 3,
      ceiling: options.ceiling
    },
    host,
    ledger,
    options
  );
}

/**
 * Glass coordinator also tracks the subsystem-wide effects tier, which drops
 * one step the first time each glass component fails.
 */
export class GlassRecoveryCoordinator extends ComponentRecoveryCoordinator<GlassTier> {
  private currentEffectsTier: GlassTier = GLASS_LADDER.top;

  effectsTier(): GlassTier {
    return this.currentEffectsTier;
  }

  override attemptSystemRecovery(): SystemRecoveryResult {
    const result = super.attemptSystemRecovery();
    try {
      this.currentEffectsTier = GLASS_LADDER.best(this.currentEffectsTier, this.domain.ceiling());
    } catch (error) {
      this.log.warn('Could not re-evaluate glass effects tier', error);
    }
    return result;
  }

  protected override stored(state: ComponentState<GlassTier>, previousTier: GlassTier): void {
    if (state.retryCount === 1 && state.tier !== previousTier) {
      const next = GLASS_LADDER.degrade(this.currentEffectsTier);
      if (next !== this.currentEffectsTier) {
        this.log.info(`Glass effects ${this.currentEffectsTier} -> ${next}`);
        this.currentEffectsTier = next;
      }
    }
  }
}

export interface GlassCoordinatorOptions extends CoordinatorOptions {
  maxRetryAttempts?: number;
  ceiling: () => GlassTier;
}

export function createGlassRecovery(
  host: HostEnvironment,
  ledger: DiagnosticLedger,
  options: GlassCoordinatorOptions
): GlassRecoveryCoordinator {
  return new GlassRecoveryCoordinator(
    {
      name: 'glass',
      ladder: GLASS_LADDER,
      styles: GLASS_TIER_STYLE,
      maxRetryAttempts: options.maxRetryAttempts ?? 3,
      ceiling: options.ceiling
    },
    host,
    ledger,
    options
  );
}
