/**
 * Resilience Engine
 *
 * Wires the validators, the diagnostic ledger, the safety gate and both
 * recovery coordinators for one UI scope, and keeps the system tier in step
 * with component tiers.
 *
 * Key Features:
 * - Pre-flight validation of both catalogs
 * - System tier recomputed on every component tier change
 * - System tier transitions recorded in the ledger under "FallbackSystem"
 * - Whole-screen fallback choice from the validation report
 */

import { FailureOptions, HostEnvironment, RenderNode, Renderable, ResourceFallback, RetryFn } from '../types/common';
import { EngineConfig, EngineConfigInput, resolveConfig } from '../utils/config';
import { createLogger, Logger } from '../utils/logger';
import { ComponentTier, GlassTier } from './degradation-tiers';
import { DiagnosticLedger, DiagnosticReport } from './diagnostic-ledger';
import { PALETTE } from './fallback-registry';
import { DomainValidationReport, GlassResourceValidator, createGlassResourceValidator } from './glass-resource-validator';
import {
  ComponentRecoveryCoordinator,
  GlassRecoveryCoordinator,
  SystemRecoveryResult,
  createComponentRecovery,
  createGlassRecovery
} from './recovery-coordinator';
import { GlassResourceName, SETTINGS_FALLBACKS, SETTINGS_RESOURCES } from './resource-catalog';
import { RecommendedAction, ResourceCatalogValidator, ValidationReport } from './resource-validator';
import { SystemHealth, SystemTier, computeSystemHealth, initialSystemTier } from './system-health';
import { TransactionSafetyGate } from './transaction-safety-gate';

// ============= INTERFACES & TYPES =============

export const SYSTEM_COMPONENT_ID = 'FallbackSystem';

export interface ResilienceEngineOptions {
  config?: EngineConfigInput;
  now?: () => number;
}

export interface PreflightResult {
  validation: ValidationReport;
  glass: DomainValidationReport<GlassResourceName>;
  missingTotal: number;
  systemTier: SystemTier;
}

export interface SystemStatus extends SystemHealth {
  /** tier derived from missing resources at initialize(), null before it */
  preflightTier: SystemTier | null;
  effectsTier: GlassTier;
}

export type ScreenMode = 'full' | 'standard' | 'emergency' | 'diagnostic';

export interface ScreenFallback {
  mode: ScreenMode;
  action: RecommendedAction;
  /** substitutes the host applies in standard mode */
  fallbacks: Record<string, ResourceFallback>;
  /** replacement screen; null when the host renders its own screen */
  node: RenderNode | null;
}

export interface EngineRecoveryResult {
  component: SystemRecoveryResult;
  glass: SystemRecoveryResult;
  health: SystemHealth;
}

const CEILING_BY_ACTION: Record<RecommendedAction, ComponentTier> = {
  [RecommendedAction.PROCEED_NORMAL]: 'normal',
  [RecommendedAction.USE_FALLBACK_UI]: 'fallback',
  [RecommendedAction.USE_EMERGENCY_UI]: 'emergency',
  [RecommendedAction.ABORT]: 'failed'
};

const SCREEN_MODE_BY_ACTION: Record<RecommendedAction, ScreenMode> = {
  [RecommendedAction.PROCEED_NORMAL]: 'full',
  [RecommendedAction.USE_FALLBACK_UI]: 'standard',
  [RecommendedAction.USE_EMERGENCY_UI]: 'emergency',
  [RecommendedAction.ABORT]: 'diagnostic'
};

const DIAGNOSTIC_LIST_LIMIT = 10;

// ============= ENGINE =============

export class ResilienceEngine {
  readonly config: EngineConfig;
  readonly ledger: DiagnosticLedger;
  readonly resourceValidator: ResourceCatalogValidator;
  readonly glassValidator: GlassResourceValidator;
  readonly gate = new TransactionSafetyGate();
  readonly components: ComponentRecoveryCoordinator<ComponentTier>;
  readonly glass: GlassRecoveryCoordinator;

  private readonly log: Logger;
  private systemTier = SystemTier.NORMAL;
  private preflightTier: SystemTier | null = null;

  constructor(private readonly host: HostEnvironment, options: ResilienceEngineOptions = {}) {
    this.config = resolveConfig(options.config);
    const { logLevel } = this.config;
    const now = options.now ?? Date.now;
    this.log = createLogger('ResilienceEngine', logLevel);

    this.resourceValidator = new ResourceCatalogValidator(
      host,
      SETTINGS_FALLBACKS,
      SETTINGS_RESOURCES,
      now,
      createLogger('ResourceValidator', logLevel)
    );
    this.glassValidator = createGlassResourceValidator(host, () => host.capabilityProbe(), now, logLevel);
    this.ledger = new DiagnosticLedger({
      maxCrashReports: this.config.maxCrashReports,
      recentReportLimit: this.config.recentReportLimit,
      domainKeywords: this.config.domainKeywords,
      validate: () => this.resourceValidator.validate(),
      deviceSnapshot: host.deviceSnapshot?.bind(host),
      now,
      logLevel
    });

    this.components = createComponentRecovery(host, this.ledger, {
      maxRetryAttempts: this.config.maxRetryAttempts,
      retryDelayMs: this.config.retryDelayMs,
      gate: this.gate,
      now,
      logLevel,
      ceiling: () => CEILING_BY_ACTION[this.resourceValidator.validate().recommendedAction]
    });
    this.glass = createGlassRecovery(host, this.ledger, {
      maxRetryAttempts: this.config.glassMaxRetryAttempts,
      retryDelayMs: this.config.retryDelayMs,
      gate: this.gate,
      now,
      logLevel,
      ceiling: () => this.glassValidator.validateAll().recommendedTier
    });

    this.components.onTierChange(() => this.refreshSystemTier());
    this.glass.onTierChange(() => this.refreshSystemTier());
  }

  /**
   * Validate both catalogs and derive the starting system tier.
   */
  initialize(): PreflightResult {
    const validation = this.resourceValidator.validate();
    const glass = this.glassValidator.validateAll();
    const missingTotal = validation.missing.length + glass.totalMissing;
    const systemTier = initialSystemTier(missingTotal);

    this.preflightTier = systemTier;
    this.systemTier = systemTier;
    this.log.info(`Initialized - system tier ${systemTier} (${missingTotal} missing resources)`);
    this.ledger.updateComponentState(SYSTEM_COMPONENT_ID, systemTier, {
      resourcesAvailable: validation.allAvailable,
      effectsSupported: glass.effectsSupported,
      totalMissingResources: missingTotal
    });

    return { validation, glass, missingTotal, systemTier };
  }

  onFailure(componentId: string, error: unknown, retryFn?: RetryFn, options?: FailureOptions): Renderable {
    return this.components.onFailure(componentId, error, retryFn, options);
  }

  onGlassFailure(componentId: string, error: unknown, retryFn?: RetryFn, options?: FailureOptions): Renderable {
    return this.glass.onFailure(componentId, error, retryFn, options);
  }

  validate(): ValidationReport {
    return this.resourceValidator.validate();
  }

  validateAll(): DomainValidationReport<GlassResourceName> {
    return this.glassValidator.validateAll();
  }

  systemStatus(): SystemStatus {
    return {
      ...this.currentHealth(),
      preflightTier: this.preflightTier,
      effectsTier: this.glass.effectsTier()
    };
  }

  diagnosticReport(): DiagnosticReport {
    return this.ledger.report();
  }

  attemptSystemRecovery(): EngineRecoveryResult {
    this.log.info('Attempting system recovery');
    const component = this.components.attemptSystemRecovery();
    const glass = this.glass.attemptSystemRecovery();
    this.refreshSystemTier();
    return { component, glass, health: this.currentHealth() };
  }

  /**
   * Pick the whole-screen representation for the current resource state.
   */
  screenFallback(report: ValidationReport = this.validate()): ScreenFallback {
    const mode = SCREEN_MODE_BY_ACTION[report.recommendedAction];
    const fallbacks = this.resourceValidator.fallbackMap(report);

    switch (mode) {
      case 'full':
      case 'standard':
        return { mode, action: report.recommendedAction, fallbacks, node: null };
      case 'emergency':
        return {
          mode,
          action: report.recommendedAction,
          fallbacks,
          node: {
            type: 'container',
            orientation: 'vertical',
            padding: 32,
            background: PALETTE.backgroundDark,
            children: [
              { type: 'text', text: 'Settings (Safe Mode)', color: PALETTE.white, size: 20, padding: 8 },
              {
                type: 'text',
                text: 'Settings are running in safe mode due to missing resources. Basic functionality is available.',
                color: PALETTE.secondaryText,
                size: 14,
                padding: 8
              }
            ]
          }
        };
      case 'diagnostic': {
        const missing = report.missing.map(descriptor => `${descriptor.kind}/${descriptor.name}`);
        const shown = missing.slice(0, DIAGNOSTIC_LIST_LIMIT);
        const lines: RenderNode[] = shown.map(text => ({
          type: 'text',
          text,
          color: PALETTE.secondaryText,
          size: 14,
          padding: 4
        }));
        if (missing.length > shown.length) {
          lines.push({
            type: 'text',
            text: `... and ${missing.length - shown.length} more`,
            color: PALETTE.tertiaryText,
            size: 14,
            padding: 4
          });
        }
        return {
          mode,
          action: report.recommendedAction,
          fallbacks,
          node: {
            type: 'container',
            orientation: 'vertical',
            padding: 16,
            background: PALETTE.backgroundDark,
            children: [
              { type: 'text', text: 'Settings Diagnostic Mode', color: PALETTE.white, size: 20, padding: 16 },
              {
                type: 'text',
                text: `${missing.length} missing resource(s)`,
                color: PALETTE.white,
                size: 16,
                padding: 8
              },
              ...lines
            ]
          }
        };
      }
    }
  }

  destroy(): void {
    this.components.destroy();
    this.glass.destroy();
    this.ledger.destroy();
    this.log.info('Destroyed');
  }

  // ============= INTERNALS =============

  private currentHealth(): SystemHealth {
    return computeSystemHealth([...this.components.health(), ...this.glass.health()], this.config.thresholds);
  }

  private refreshSystemTier(): void {
    const health = this.currentHealth();
    if (health.tier === this.systemTier) {
      return;
    }
    const previousTier = this.systemTier;
    this.systemTier = health.tier;
    this.log.info(`System tier changed from ${previousTier} to ${health.tier}`);
    this.ledger.updateComponentState(SYSTEM_COMPONENT_ID, health.tier, {
      previousTier,
      failedComponents: health.failed,
      nearFailedComponents: health.nearFailed,
      degradedComponents: health.degraded,
      totalComponents: health.total
    });
  }
}
