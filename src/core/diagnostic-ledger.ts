/**
 * Diagnostic Ledger
 *
 * Bounded, in-memory record of every failure the engine handles, enriched in
 * the background with device and resource snapshots, and summarised into a
 * report with recommendations.
 *
 * Key Features:
 * - Synchronous append, so recording never waits on enrichment
 * - Background enrichment on the next event-loop turn
 * - Hard cap with oldest-first eviction
 * - Component status snapshots
 */

import os from 'os';
import { randomUUID } from 'crypto';
import { DeviceSnapshot, RESOURCE_KINDS, ResourceKind } from '../types/common';
import { createLogger, Logger, LogLevel } from '../utils/logger';
import { CrashType, DEFAULT_DOMAIN_KEYWORDS, ErrorClassifier } from './error-classifier';
import { ResourceNotFoundError, toError } from './errors';
import { RecommendedAction, ValidationReport } from './resource-validator';

// ============= INTERFACES & TYPES =============

export type EnrichmentState = 'pending' | 'complete' | 'partial';

export interface RecoveryAttempt {
  strategy: string;
  success: boolean;
  detail?: string;
  timestamp: number;
}

export interface ResourceSnapshot {
  totalMissing: number;
  missingByKind: Record<ResourceKind, string[]>;
  recommendedAction: RecommendedAction;
}

export interface ComponentSnapshot {
  componentId: string;
  tier: string;
  details: Record<string, unknown>;
  timestamp: number;
}

export interface CrashRecord {
  id: string;
  timestamp: number;
  classification: CrashType;
  errorName: string;
  message: string;
  stackSummary: string[];
  context: string;
  componentId?: string;
  /** set for ResourceNotFoundError failures */
  resourceName?: string;
  deviceSnapshot: DeviceSnapshot | null;
  resourceSnapshot: ResourceSnapshot | null;
  componentSnapshot: ComponentSnapshot | null;
  enrichment: EnrichmentState;
  recoveryAttempts: RecoveryAttempt[];
}

export interface DiagnosticReport {
  generatedAt: number;
  totalCrashes: number;
  recentCrashes: CrashRecord[];
  crashTypeCounts: Record<CrashType, number>;
  mostCommonCrashType: CrashType | null;
  averageRecoveryAttempts: number;
  successfulRecoveries: number;
  componentStates: ComponentSnapshot[];
  resourceState: ValidationReport | null;
  recommendations: string[];
}

export interface DiagnosticLedgerOptions {
  maxCrashReports?: number;
  recentReportLimit?: number;
  domainKeywords?: readonly string[];
  /** current resource validation; called during enrichment and report() */
  validate?: () => ValidationReport;
  deviceSnapshot?: () => DeviceSnapshot | Promise<DeviceSnapshot>;
  now?: () => number;
  logLevel?: LogLevel;
}

interface StoredRecord {
  seq: number;
  record: CrashRecord;
}

const STACK_SUMMARY_LINES = 5;
const MB = 1024 * 1024;


export function captureDeviceSnapshot(): DeviceSnapshot {
  return {
    platform: os.platform(),
    arch: os.arch(),
    release: os.release(),
    runtimeVersion: process.version,
    hostname: os.hostname(),
    totalMemoryMB: Math.round(os.totalmem() / MB),
    availableMemoryMB: Math.round(os.freemem() / MB),
    cpuCount: os.cpus().length
  };
}

function emptyCounts(): Record<CrashType, number> {
  return {
    [CrashType.RESOURCE_NOT_FOUND]: 0,
    [CrashType.FRAGMENT_LIFECYCLE_ERROR]: 0,
    [CrashType.CUSTOM_COMPONENT_FAILURE]: 0,
    [CrashType.MEMORY_ERROR]: 0,
    [CrashType.DOMAIN_SPECIFIC_ERROR]: 0,
    [CrashType.UNKNOWN]: 0
  };
}

function copyRecord(record: CrashRecord): CrashRecord {
  return { ...record, recoveryAttempts: record.recoveryAttempts.map(attempt => ({ ...attempt })) };
}

// ============= LEDGER =============

export class DiagnosticLedger {
  private readonly entries = new Map<string, StoredRecord>();
  private readonly components = new Map<string, ComponentSnapshot>();
  private readonly pending = new Set<Promise<void>>();
  private sequence = 0;
  private destroyed = false;

  private readonly maxCrashReports: number;
  private readonly recentReportLimit: number;
  private readonly domainKeywords: readonly string[];
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(private readonly options: DiagnosticLedgerOptions = {}) {
    this.log = createLogger('DiagnosticLedger', options.logLevel);
    this.maxCrashReports = options.maxCrashReports ?? 50;
    this.recentReportLimit = options.recentReportLimit ?? 50;
    this.domainKeywords = options.domainKeywords ?? DEFAULT_DOMAIN_KEYWORDS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Classify and append a failure. Returns the record id immediately;
   * snapshots are filled in on a later turn.
   */
  recordFailure(error: unknown, context: string, componentId?: string): string {
    const timestamp = this.now();
    const id = `crash_${timestamp}_${randomUUID().replace(/-/g, '').slice(0, 8)}`;
    if (this.destroyed) {
      this.log.debug(`Ledger destroyed, not recording failure in ${context}`);
      return id;
    }

    try {
      const err = toError(error);
      const record: CrashRecord = {
        id,
        timestamp,
        classification: ErrorClassifier.classifyCrash(err, context, this.domainKeywords),
        errorName: err.name,
        message: err.message,
        stackSummary: (err.stack ?? '').split('\n').slice(1, STACK_SUMMARY_LINES + 1).map(line => line.trim()),
        context,
        componentId,
        resourceName: err instanceof ResourceNotFoundError ? err.resourceName : undefined,
        deviceSnapshot: null,
        resourceSnapshot: null,
        componentSnapshot: componentId ? this.snapshotOf(componentId) : null,
        enrichment: 'pending',
        recoveryAttempts: []
      };

      this.log.debug(`Recording ${record.classification} in ${context}${componentId ? ` (${componentId})` : ''}`);
      this.entries.set(id, { seq: this.sequence++, record });
      this.evictOverflow();
      this.scheduleEnrichment(id);
    } catch (recordError) {
      this.log.error(`Failed to record failure for ${context}`, recordError);
    }

    return id;
  }

  recordRecoveryAttempt(recordId: string, strategy: string, success: boolean, detail?: string): void {
    const stored = this.entries.get(recordId);
    if (!stored) {
      this.log.debug(`Recovery attempt for unknown record ${recordId} dropped`);
      return;
    }
    stored.record.recoveryAttempts.push({ strategy, success, detail, timestamp: this.now() });
  }

  updateComponentState(componentId: string, tier: string, details: Record<string, unknown> = {}): void {
    this.components.set(componentId, { componentId, tier, details: { ...details }, timestamp: this.now() });
  }

  getRecord(recordId: string): CrashRecord | undefined {
    const stored = this.entries.get(recordId);
    return stored ? copyRecord(stored.record) : undefined;
  }

  /** most recent first */
  records(): CrashRecord[] {
    return this.ordered().map(stored => copyRecord(stored.record));
  }

  componentStates(): ComponentSnapshot[] {
    return [...this.components.values()].map(snapshot => ({ ...snapshot, details: { ...snapshot.details } }));
  }

  get size(): number {
    return this.entries.size;
  }

  report(): DiagnosticReport {
    const all = this.ordered().map(stored => stored.record);
    const crashTypeCounts = emptyCounts();
    let attempts = 0;
    let successfulRecoveries = 0;

    for (const record of all) {
      crashTypeCounts[record.classification]++;
      attempts += record.recoveryAttempts.length;
      successfulRecoveries += record.recoveryAttempts.filter(attempt => attempt.success).length;
    }

    let mostCommonCrashType: CrashType | null = null;
    for (const type of Object.values(CrashType)) {
      const count = crashTypeCounts[type];
      if (count > 0 && (mostCommonCrashType === null || count > crashTypeCounts[mostCommonCrashType])) {
        mostCommonCrashType = type;
      }
    }

    const averageRecoveryAttempts = all.length === 0 ? 0 : attempts / all.length;
    const resourceState = this.currentValidation();

    return {
      generatedAt: this.now(),
      totalCrashes: all.length,
      recentCrashes: all.slice(0, this.recentReportLimit).map(copyRecord),
      crashTypeCounts,
      mostCommonCrashType,
      averageRecoveryAttempts,
      successfulRecoveries,
      componentStates: this.componentStates(),
      resourceState,
      recommendations: this.recommendations(all, mostCommonCrashType, averageRecoveryAttempts, resourceState)
    };
  }

  /**
   * Resolves once every enrichment scheduled so far has settled.
   */
  async whenIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  clear(): void {
    this.entries.clear();
    this.components.clear();
    this.log.info('Crash records cleared');
  }

  /** in-flight enrichment results are discarded after this */
  destroy(): void {
    this.destroyed = true;
    this.clear();
  }

  // ============= INTERNALS =============

  private ordered(): StoredRecord[] {
    return [...this.entries.values()].sort(
      (a, b) => b.record.timestamp - a.record.timestamp || b.seq - a.seq
    );
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxCrashReports) {
      let oldest: StoredRecord | null = null;
      for (const stored of this.entries.values()) {
        if (
          oldest === null ||
          stored.record.timestamp < oldest.record.timestamp ||
          (stored.record.timestamp === oldest.record.timestamp && stored.seq < oldest.seq)
        ) {
          oldest = stored;
        }
      }
      if (oldest === null) {
        return;
      }
      this.entries.delete(oldest.record.id);
      this.log.debug(`Evicted ${oldest.record.id}`);
    }
  }

  private snapshotOf(componentId: string): ComponentSnapshot | null {
    const snapshot = this.components.get(componentId);
    return snapshot ? { ...snapshot, details: { ...snapshot.details } } : null;
  }

  private scheduleEnrichment(id: string): void {
    const task: Promise<void> = new Promise<void>(resolve => setImmediate(resolve))
      .then(() => this.enrich(id))
      .catch(error => this.log.error(`Enrichment of ${id} failed`, error))
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  private async enrich(id: string): Promise<void> {
    let partial = false;
    let device: DeviceSnapshot | null = null;
    let resources: ResourceSnapshot | null = null;

    try {
      device = await (this.options.deviceSnapshot ?? captureDeviceSnapshot)();
    } catch (error) {
      partial = true;
      this.log.warn(`Device snapshot unavailable for ${id}`, error);
    }

    try {
      const validation = this.options.validate?.();
      if (validation) {
        resources = {
          totalMissing: validation.missing.length,
          missingByKind: {
            visual: [...validation.missingByKind.visual],
            layout: [...validation.missingByKind.layout],
            color: [...validation.missingByKind.color],
            dimension: [...validation.missingByKind.dimension]
          },
          recommendedAction: validation.recommendedAction
        };
      }
    } catch (error) {
      partial = true;
      this.log.warn(`Resource snapshot unavailable for ${id}`, error);
    }

    if (this.destroyed) {
      return;
    }
    const stored = this.entries.get(id);
    if (!stored) {
      return;
    }

    stored.record.deviceSnapshot = device;
    stored.record.resourceSnapshot = resources;
    stored.record.enrichment = partial ? 'partial' : 'complete';
    this.logSummary(stored.record);
  }

  private logSummary(record: CrashRecord): void {
    const device = record.deviceSnapshot;
    this.log.info(
      [
        `CRASH SUMMARY [${record.id}]`,
        `Type: ${record.classification}`,
        `Error: ${record.errorName}: ${record.message}`,
        `Context: ${record.context}`,
        `Component: ${record.componentId ?? 'N/A'}`,
        `Missing Resources: ${record.resourceSnapshot?.totalMissing ?? 'unknown'}`,
        `Device: ${device ? `${device.platform} ${device.arch} ${device.release}` : 'unknown'}`,
        `Time: ${new Date(record.timestamp).toISOString()}`
      ].join('\n')
    );
  }

  private currentValidation(): ValidationReport | null {
    if (!this.options.validate) {
      return null;
    }
    try {
      return this.options.validate();
    } catch (error) {
      this.log.warn('Resource validation failed while building report', error);
      return null;
    }
  }

  private recommendations(
    records: CrashRecord[],
    mostCommon: CrashType | null,
    averageAttempts: number,
    resourceState: ValidationReport | null
  ): string[] {
    const recommendations: string[] = [];

    if (resourceState) {
      for (const kind of RESOURCE_KINDS) {
        const names = resourceState.missingByKind[kind];
        if (names.length > 0) {
          recommendations.push(`Add missing ${kind} resources: ${names.join(', ')}`);
        }
      }
    }

    switch (mostCommon) {
      case CrashType.RESOURCE_NOT_FOUND: {
        const names = [...new Set(records.flatMap(record => (record.resourceName ? [record.resourceName] : [])))];
        recommendations.push(
          names.length > 0
            ? `Add resources missing at runtime: ${names.join(', ')}`
            : 'Add resources missing at runtime'
        );
        break;
      }
      case CrashType.FRAGMENT_LIFECYCLE_ERROR:
        recommendations.push('Implement safer component lifecycle management');
        break;
      case CrashType.CUSTOM_COMPONENT_FAILURE:
        recommendations.push('Add fallback mechanisms for custom UI components');
        break;
      case CrashType.MEMORY_ERROR:
        recommendations.push('Reduce memory-heavy visual effects');
        break;
      default:
        break;
    }

    if (averageAttempts > 3) {
      recommendations.push('Improve error recovery strategies to reduce retry attempts');
    }

    if (recommendations.length === 0) {
      recommendations.push('System appears stable - continue monitoring');
    }
    return recommendations;
  }
}
