#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigValidationError } from '../core/errors';
import { CommonOptions, reportScenario, simulateScenario, validateScenario } from './status-commands';

function fail(error: unknown): never {
  if (error instanceof ConfigValidationError) {
    console.error(chalk.red(`❌ Invalid input in ${error.source}:`));
    for (const issue of error.issues) {
      console.error(chalk.red(`   • ${issue}`));
    }
  } else {
    console.error(chalk.red('❌ Command failed:'), error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
}

const program = new Command();

program
  .name('resilient-ui')
  .description('Replay UI failure scenarios against the resilience engine')
  .version('0.1.0')
  .option('-c, --config <path>', 'engine configuration file (defaults to ./resilient-ui.config.json)');

program
  .command('validate')
  .description('Validate the settings and glass resource catalogs for a scenario')
  .argument('<scenario>', 'scenario JSON file')
  .action(async (scenario: string) => {
    try {
      await validateScenario(scenario, program.opts<CommonOptions>());
    } catch (error) {
      fail(error);
    }
  });

program
  .command('simulate')
  .description('Replay the failures of a scenario and show component tiers and system health')
  .argument('<scenario>', 'scenario JSON file')
  .option('--recover', 'run a system recovery pass after the replay')
  .option('--json', 'print machine-readable output')
  .action(async (scenario: string, options: { recover?: boolean; json?: boolean }) => {
    try {
      await simulateScenario(scenario, { ...program.opts<CommonOptions>(), ...options });
    } catch (error) {
      fail(error);
    }
  });

program
  .command('report')
  .description('Replay a scenario and print the diagnostic report')
  .argument('<scenario>', 'scenario JSON file')
  .option('-o, --out <file>', 'write the report as JSON instead of printing it')
  .action(async (scenario: string, options: { out?: string }) => {
    try {
      await reportScenario(scenario, { ...program.opts<CommonOptions>(), ...options });
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
