import chalk from 'chalk';
import path from 'path';
import fs from 'fs-extra';
import { ResilienceEngine } from '../core/resilience-engine';
import { RecommendedAction, ValidationReport } from '../core/resource-validator';
import { DomainValidationReport } from '../core/glass-resource-validator';
import { SystemHealth, SystemTier } from '../core/system-health';
import { DiagnosticReport } from '../core/diagnostic-ledger';
import { loadConfig, resolveConfig } from '../utils/config';
import { setLogLevel } from '../utils/logger';
import { ReplayOutcome, Scenario, createScenarioHost, loadScenario, replayScenario } from './scenario';

export type CommonOptions = {
  config?: string;
};

export interface SimulateOptions extends CommonOptions {
  recover?: boolean;
  json?: boolean;
}

export interface ReportOptions extends CommonOptions {
  out?: string;
}

const ACTION_COLOR: Record<RecommendedAction, (text: string) => string> = {
  [RecommendedAction.PROCEED_NORMAL]: chalk.green,
  [RecommendedAction.USE_FALLBACK_UI]: chalk.yellow,
  [RecommendedAction.USE_EMERGENCY_UI]: chalk.magenta,
  [RecommendedAction.ABORT]: chalk.red
};

const TIER_COLOR: Record<SystemTier, (text: string) => string> = {
  [SystemTier.NORMAL]: chalk.green,
  [SystemTier.DEGRADED]: chalk.yellow,
  [SystemTier.EMERGENCY]: chalk.magenta,
  [SystemTier.CRITICAL]: chalk.red
};

async function createEngine(scenario: Scenario, options: CommonOptions): Promise<ResilienceEngine> {
  const fileConfig = await loadConfig(options.config);
  const config = resolveConfig({ ...fileConfig, ...scenario.config }, options.config ?? 'scenario config');
  // stateless helpers log at the process-wide level
  setLogLevel(config.logLevel);
  return new ResilienceEngine(createScenarioHost(scenario), { config });
}

function printValidation(report: ValidationReport): void {
  console.log(chalk.blue('📋 Settings Resources'));
  console.log(`   Action: ${ACTION_COLOR[report.recommendedAction](report.recommendedAction)}`);
  console.log(`   Missing: ${chalk.white(report.missing.length)}   Fallbacks: ${chalk.white(report.fallbacksAvailable)}`);
  for (const descriptor of report.missing) {
    const fallback = report.fallbacks[descriptor.name];
    const note = fallback ? chalk.gray(' (fallback available)') : chalk.red(' (no fallback)');
    console.log(`   ${chalk.gray('├')} ${descriptor.kind}/${descriptor.name}${note}`);
  }
  console.log('');
}

function printGlassValidation(report: DomainValidationReport): void {
  console.log(chalk.blue('🪟 Glass Resources'));
  console.log(`   Recommended tier: ${chalk.cyan(report.recommendedTier)}`);
  console.log(
    `   Missing: ${chalk.white(report.totalMissing)} (${report.missingPercentage.toFixed(1)}%)   ` +
      `Effects: ${report.effectsSupported ? chalk.green('supported') : chalk.yellow('unsupported')}`
  );
  for (const kind of [report.visual, report.color, report.dimension]) {
    console.log(
      `   ${chalk.gray('├')} ${kind.kind}: ${kind.available}/${kind.total} available` +
        (kind.missing.length > 0 ? chalk.gray(` - missing ${kind.missing.join(', ')}`) : '')
    );
  }
  console.log('');
}

function printHealth(health: SystemHealth): void {
  console.log(chalk.blue('🩺 System Health'));
  console.log(`   Tier: ${TIER_COLOR[health.tier](health.tier)}`);
  console.log(`   Healthy: ${chalk.white(health.healthPercentage.toFixed(1) + '%')} of ${health.total} component(s)`);
  console.log(
    `   Reduced: ${health.reduced}   Degraded: ${health.degraded}   Near-failed: ${health.nearFailed}   ` +
      `Failed: ${chalk.red(health.failed)}`
  );
  console.log('');
}

function printOutcomes(outcomes: ReplayOutcome[]): void {
  console.log(chalk.blue('🔁 Replayed Failures'));
  for (const outcome of outcomes) {
    const source = outcome.source === 'retry' ? chalk.green(outcome.source) : chalk.yellow(outcome.source);
    console.log(
      `   ${chalk.gray('├')} ${chalk.white(outcome.componentId)} [${outcome.domain}] -> ${chalk.cyan(outcome.tier)} via ${source}` +
        (outcome.inert ? chalk.gray(' (inert)') : '')
    );
  }
  console.log('');
}

function printReport(report: DiagnosticReport): void {
  console.log(chalk.blue('📊 Diagnostic Report'));
  console.log(`   Crashes: ${chalk.white(report.totalCrashes)}`);
  console.log(`   Most common: ${chalk.white(report.mostCommonCrashType ?? 'none')}`);
  console.log(`   Avg recovery attempts: ${chalk.white(report.averageRecoveryAttempts.toFixed(2))}`);
  console.log(`   Successful recoveries: ${chalk.green(report.successfulRecoveries)}`);
  console.log('');
  console.log(chalk.cyan('Recommendations:'));
  for (const recommendation of report.recommendations) {
    console.log(`   ${chalk.gray('•')} ${recommendation}`);
  }
  console.log('');
}

/**
 * Validate both resource catalogs for a scenario.
 */
export async function validateScenario(file: string, options: CommonOptions = {}): Promise<void> {
  const scenario = await loadScenario(file);
  const engine = await createEngine(scenario, options);
  try {
    console.log(chalk.blue.bold(`🔍 ${scenario.name}`));
    console.log('');
    const preflight = engine.initialize();
    printValidation(preflight.validation);
    printGlassValidation(preflight.glass);
    console.log(`Initial system tier: ${TIER_COLOR[preflight.systemTier](preflight.systemTier)}`);
    console.log(`Screen mode: ${chalk.cyan(engine.screenFallback(preflight.validation).mode)}`);
  } finally {
    engine.destroy();
  }
}

/**
 * Replay a scenario's failures and show the resulting tiers.
 */
export async function simulateScenario(file: string, options: SimulateOptions = {}): Promise<void> {
  const scenario = await loadScenario(file);
  const engine = await createEngine(scenario, options);
  try {
    engine.initialize();
    const outcomes = replayScenario(engine, scenario);
    const before = engine.systemStatus();
    const recovery = options.recover ? engine.attemptSystemRecovery() : null;

    if (options.json) {
      console.log(JSON.stringify({ scenario: scenario.name, outcomes, status: before, recovery }, null, 2));
      return;
    }

    console.log(chalk.blue.bold(`🧪 ${scenario.name}`));
    console.log('');
    printOutcomes(outcomes);
    printHealth(before);
    console.log(`Glass effects tier: ${chalk.cyan(before.effectsTier)}`);
    console.log('');

    if (recovery) {
      console.log(chalk.blue('♻️  System Recovery'));
      console.log(
        `   Improved: ${chalk.green(recovery.component.improved.length + recovery.glass.improved.length)} of ` +
          `${recovery.component.attempted + recovery.glass.attempted} recoverable component(s)`
      );
      console.log('');
      printHealth(recovery.health);
    }
  } finally {
    engine.destroy();
  }
}

/**
 * Replay a scenario and print (or export) the diagnostic report.
 */
export async function reportScenario(file: string, options: ReportOptions = {}): Promise<void> {
  const scenario = await loadScenario(file);
  const engine = await createEngine(scenario, options);
  try {
    engine.initialize();
    replayScenario(engine, scenario);
    await engine.ledger.whenIdle();
    const report = engine.diagnosticReport();

    if (options.out) {
      const target = path.resolve(options.out);
      await fs.ensureDir(path.dirname(target));
      await fs.writeJson(target, report, { spaces: 2 });
      console.log(chalk.green(`✅ Report written to ${target}`));
      return;
    }
    printReport(report);
  } finally {
    engine.destroy();
  }
}
