/**
 * Resource Catalog Validator
 *
 * Checks that every resource a screen depends on resolves and loads in the
 * current environment, and recommends how the screen should proceed.
 *
 * Key Features:
 * - Single pass over a descriptor catalog, no retries
 * - A null resolve and a throwing load both count as missing
 * - Fallback table decides whether the fallback UI can cover the gaps
 * - Frozen reports
 */

import {
  RESOURCE_KINDS,
  ResourceDescriptor,
  ResourceEnvironment,
  ResourceFallback,
  ResourceKind
} from '../types/common';
import { createLogger, Logger } from '../utils/logger';
import { SETTINGS_FALLBACKS, SETTINGS_RESOURCES } from './resource-catalog';

// ============= INTERFACES & TYPES =============

export enum RecommendedAction {
  PROCEED_NORMAL = 'ProceedNormal',
  USE_FALLBACK_UI = 'UseFallbackUI',
  USE_EMERGENCY_UI = 'UseEmergencyUI',
  ABORT = 'Abort'
}

export interface ValidationReport {
  readonly missingByKind: Readonly<Record<ResourceKind, readonly string[]>>;
  readonly missing: readonly ResourceDescriptor[];
  /** fallbacks for exactly the missing names that have one */
  readonly fallbacks: Readonly<Record<string, ResourceFallback>>;
  readonly fallbacksAvailable: number;
  readonly allAvailable: boolean;
  readonly recommendedAction: RecommendedAction;
  readonly validationTimeMs: number;
  readonly timestamp: number;
}

export type FallbackTable = Partial<Record<string, ResourceFallback>>;

const moduleLog = createLogger('ResourceValidator');

/**
 * Resolve-then-load probe shared by both validators.
 */
export function isResourceAvailable(env: ResourceEnvironment, descriptor: ResourceDescriptor): boolean {
  try {
    const handle = env.resolve(descriptor);
    if (handle === null) {
      return false;
    }
    env.load(handle);
    return true;
  } catch (error) {
    moduleLog.debug(`${descriptor.kind}/${descriptor.name} failed to load`, error);
    return false;
  }
}

export function decideAction(missing: readonly ResourceDescriptor[], fallbacks: FallbackTable): RecommendedAction {
  if (missing.length === 0) {
    return RecommendedAction.PROCEED_NORMAL;
  }
  if (missing.every(descriptor => fallbacks[descriptor.name] !== undefined)) {
    return RecommendedAction.USE_FALLBACK_UI;
  }
  if (missing.some(descriptor => descriptor.kind === 'layout')) {
    return RecommendedAction.USE_EMERGENCY_UI;
  }
  return RecommendedAction.ABORT;
}

// ============= VALIDATOR =============

export class ResourceCatalogValidator {
  constructor(
    private readonly env: ResourceEnvironment,
    private readonly fallbackTable: FallbackTable = SETTINGS_FALLBACKS,
    private readonly catalog: readonly ResourceDescriptor[] = SETTINGS_RESOURCES,
    private readonly now: () => number = Date.now,
    private readonly log: Logger = moduleLog
  ) {}

  validate(descriptors: readonly ResourceDescriptor[] = this.catalog): ValidationReport {
    const started = this.now();
    const missingByKind: Record<ResourceKind, string[]> = { visual: [], layout: [], color: [], dimension: [] };
    const missing: ResourceDescriptor[] = [];
    const fallbacks: Record<string, ResourceFallback> = {};

    for (const descriptor of descriptors) {
      if (isResourceAvailable(this.env, descriptor)) {
        continue;
      }
      missing.push(descriptor);
      missingByKind[descriptor.kind].push(descriptor.name);
      const fallback = this.fallbackTable[descriptor.name];
      if (fallback) {
        fallbacks[descriptor.name] = fallback;
      }
    }

    const finished = this.now();
    const report: ValidationReport = {
      missingByKind: Object.freeze({
        visual: Object.freeze(missingByKind.visual),
        layout: Object.freeze(missingByKind.layout),
        color: Object.freeze(missingByKind.color),
        dimension: Object.freeze(missingByKind.dimension)
      }),
      missing: Object.freeze(missing),
      fallbacks: Object.freeze(fallbacks),
      fallbacksAvailable: Object.keys(fallbacks).length,
      allAvailable: missing.length === 0,
      recommendedAction: decideAction(missing, this.fallbackTable),
      validationTimeMs: finished - started,
      timestamp: finished
    };

    if (!report.allAvailable) {
      this.log.warn(
        `${missing.length} missing resource(s), ${report.fallbacksAvailable} with fallback - ${report.recommendedAction}`
      );
    }
    return Object.freeze(report);
  }

  fallbackFor(name: string): ResourceFallback | undefined {
    return this.fallbackTable[name];
  }

  /** the fallbacks for exactly the names missing in the report */
  fallbackMap(report: ValidationReport): Record<string, ResourceFallback> {
    return { ...report.fallbacks };
  }

  /** custom components render when no visual, colour or dimension is missing */
  customComponentsAvailable(report: ValidationReport): boolean {
    return RESOURCE_KINDS.filter(kind => kind !== 'layout').every(kind => report.missingByKind[kind].length === 0);
  }
}
