/**
 * resilient-ui: adaptive fallback and resilience engine for UI-rendering
 * applications.
 */

export * from './types/common';
export * from './core/errors';
export * from './core/error-classifier';
export * from './core/degradation-tiers';
export * from './core/resource-catalog';
export * from './core/resource-validator';
export * from './core/glass-resource-validator';
export * from './core/fallback-registry';
export * from './core/transaction-safety-gate';
export * from './core/diagnostic-ledger';
export * from './core/system-health';
export * from './core/recovery-coordinator';
export * from './core/resilience-engine';
export type { EngineConfig, EngineConfigInput, HealthThresholds } from './utils/config';
export { CONFIG_FILE_NAME, DEFAULT_CONFIG, EngineConfigSchema, loadConfig, resolveConfig } from './utils/config';
export type { LogLevel, Logger } from './utils/logger';
export { createLogger, getLogLevel, setLogLevel } from './utils/logger';
