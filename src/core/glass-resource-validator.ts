/**
 * Domain Resource Validator
 *
 * Validates a domain catalog (visuals, colours, dimensions that all carry a
 * fallback) and recommends the tier the domain should render at. The glass
 * subsystem is the built-in instance.
 *
 * Key Features:
 * - Per-kind availability sub-reports
 * - Without advanced rendering the recommendation is always `reduced`
 * - Style presets per glass tier
 */

import { ResourceEnvironment, ResourceFallback } from '../types/common';
import { createLogger, Logger, LogLevel } from '../utils/logger';
import { DomainCatalog, GLASS_CATALOG, GlassResourceName } from './resource-catalog';
import { isResourceAvailable } from './resource-validator';
import { GlassTier } from './degradation-tiers';

// ============= INTERFACES & TYPES =============

export type DomainResourceKind = 'visual' | 'color' | 'dimension';

export interface KindValidation<Name extends string = string> {
  kind: DomainResourceKind;
  total: number;
  available: number;
  missing: Name[];
  fallbacksAvailable: number;
  availabilityPercentage: number;
}

export interface DomainValidationReport<Name extends string = string> {
  visual: KindValidation<Name>;
  color: KindValidation<Name>;
  dimension: KindValidation<Name>;
  totalMissing: number;
  totalFallbacksAvailable: number;
  missingPercentage: number;
  effectsSupported: boolean;
  recommendedTier: GlassTier;
  validationTimeMs: number;
  timestamp: number;
}

export interface GlassStyleConfig {
  backgroundAlpha: number;
  borderAlpha: number;
  cornerRadius: number;
  blurRadius: number;
  focusScale: number;
  enableBlurEffects: boolean;
  enableElevationShadows: boolean;
  enableComplexAnimations: boolean;
}

export const DEFAULT_GLASS_STYLE: GlassStyleConfig = {
  backgroundAlpha: 0.2,
  borderAlpha: 0.3,
  cornerRadius: 12,
  blurRadius: 25,
  focusScale: 1.02,
  enableBlurEffects: true,
  enableElevationShadows: true,
  enableComplexAnimations: true
};

const STYLE_OVERRIDES: Record<GlassTier, Partial<GlassStyleConfig>> = {
  full: {},
  reduced: {
    enableBlurEffects: false,
    blurRadius: 0,
    backgroundAlpha: 0.8
  },
  minimal: {
    enableBlurEffects: false,
    enableElevationShadows: false,
    enableComplexAnimations: false,
    blurRadius: 0,
    backgroundAlpha: 0.9,
    borderAlpha: 0.5
  },
  none: {
    enableBlurEffects: false,
    enableElevationShadows: false,
    enableComplexAnimations: false,
    blurRadius: 0,
    backgroundAlpha: 1,
    borderAlpha: 0
  }
};

/**
 * Map a missing share to a tier. Without advanced rendering the answer is
 * always `reduced`, whatever the share.
 */
export function recommendTier(missingPercentage: number, effectsSupported: boolean): GlassTier {
  if (!effectsSupported) {
    return 'reduced';
  }
  if (missingPercentage === 0) {
    return 'full';
  }
  if (missingPercentage <= 25) {
    return 'reduced';
  }
  return missingPercentage <= 50 ? 'minimal' : 'none';
}

export function styleConfigFor(tier: GlassTier, base: GlassStyleConfig = DEFAULT_GLASS_STYLE): GlassStyleConfig {
  return { ...base, ...STYLE_OVERRIDES[tier] };
}

// ============= VALIDATOR =============

export class DomainResourceValidator<Name extends string> {
  private readonly log: Logger;
  private lastReport: DomainValidationReport<Name> | null = null;

  constructor(
    readonly domain: string,
    private readonly catalog: DomainCatalog<Name>,
    private readonly env: ResourceEnvironment,
    private readonly capabilityProbe: () => boolean,
    private readonly now: () => number = Date.now,
    logLevel?: LogLevel
  ) {
    this.log = createLogger(`${domain[0].toUpperCase()}${domain.slice(1)}ResourceValidator`, logLevel);
  }

  validateAll(): DomainValidationReport<Name> {
    const started = this.now();
    const visual = this.validateKind('visual', this.catalog.visual);
    const color = this.validateKind('color', this.catalog.color);
    const dimension = this.validateKind('dimension', this.catalog.dimension);

    const total = visual.total + color.total + dimension.total;
    const totalMissing = visual.missing.length + color.missing.length + dimension.missing.length;
    const missingPercentage = total === 0 ? 0 : (totalMissing / total) * 100;
    const effectsSupported = this.probe();
    const finished = this.now();

    const report: DomainValidationReport<Name> = {
      visual,
      color,
      dimension,
      totalMissing,
      totalFallbacksAvailable: visual.fallbacksAvailable + color.fallbacksAvailable + dimension.fallbacksAvailable,
      missingPercentage,
      effectsSupported,
      recommendedTier: recommendTier(missingPercentage, effectsSupported),
      validationTimeMs: finished - started,
      timestamp: finished
    };

    if (totalMissing > 0 || !effectsSupported) {
      this.log.warn(
        `${totalMissing}/${total} resources missing (${missingPercentage.toFixed(1)}%), ` +
          `effects ${effectsSupported ? 'supported' : 'unsupported'} - recommending ${report.recommendedTier}`
      );
    }

    this.lastReport = report;
    return report;
  }

  fallbackFor(name: Name): ResourceFallback {
    return this.catalog.fallbacks[name];
  }

  /** the last report, validating first if there is none */
  latestReport(): DomainValidationReport<Name> {
    return this.lastReport ?? this.validateAll();
  }

  canUseEffects(): boolean {
    return this.latestReport().recommendedTier !== 'none';
  }

  optimalStyleConfig(base: GlassStyleConfig = DEFAULT_GLASS_STYLE): GlassStyleConfig {
    return styleConfigFor(this.latestReport().recommendedTier, base);
  }

  private validateKind(kind: DomainResourceKind, names: readonly Name[]): KindValidation<Name> {
    const missing = names.filter(name => !isResourceAvailable(this.env, { name, kind }));
    const available = names.length - missing.length;
    return {
      kind,
      total: names.length,
      available,
      missing,
      fallbacksAvailable: missing.filter(name => this.catalog.fallbacks[name] !== undefined).length,
      availabilityPercentage: names.length === 0 ? 100 : (available / names.length) * 100
    };
  }

  private probe(): boolean {
    try {
      return this.capabilityProbe();
    } catch (error) {
      this.log.warn('Capability probe threw, assuming no advanced rendering', error);
      return false;
    }
  }
}

export type GlassResourceValidator = DomainResourceValidator<GlassResourceName>;

export function createGlassResourceValidator(
  env: ResourceEnvironment,
  capabilityProbe: () => boolean,
  now?: () => number,
  logLevel?: LogLevel
): GlassResourceValidator {
  return new DomainResourceValidator('glass', GLASS_CATALOG, env, capabilityProbe, now, logLevel);
}
