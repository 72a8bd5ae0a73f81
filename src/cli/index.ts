#!/usr/bin/env node
import chalk from 'chalk';
import { Command } from 'commander';

import { ConfigurationManager } from '../core/config/ConfigurationManager';
import { ScanEngine } from '../core/engine/ScanEngine';
import { AuthDiagnosticCollector } from '../diagnostics/AuthDiagnosticCollector';
import { ScanConfiguration } from '../types/config';
import { Initiator, ReportFormat, Technology } from '../types/enums';
import { DetectorRegistry } from '../utils/DetectorRegistry';
import { registerBuiltInDetectors } from '../utils/builtInDetectors';
import { loadHarFile } from '../utils/har/HarLoader';
import { globalLogger, parseLogLevel } from '../utils/logger/Logger';
import { isEnumValue } from '../utils/validators/config-validator';

interface ScanCliOptions {
  config?: string;
  output?: string;
  formats?: string;
  targetName?: string;
  technologies?: string;
}

interface DiagnoseCliOptions {
  config?: string;
  username?: string;
  password?: string;
}

function parseList<T extends Record<string, string>>(enumObject: T, value: string, label: string): Array<T[keyof T]> {
  const items: Array<T[keyof T]> = [];
  for (const raw of value.split(',')) {
    const item = raw.trim().toLowerCase();
    if (!item) continue;
    if (!isEnumValue(enumObject, item)) {
      throw new Error(`Unknown ${label}: ${item}`);
    }
    items.push(item);
  }
  return items;
}

/**
 * Loads the configuration file (or defaults) and layers the command line overrides on top
 */
async function resolveConfig(options: ScanCliOptions): Promise<ScanConfiguration> {
  const configManager = ConfigurationManager.getInstance();
  const base = options.config ? await configManager.loadFromFile(options.config) : configManager.loadFromObject({});

  const config = configManager.loadFromObject({
    ...base,
    target: {
      ...base.target,
      ...(options.targetName ? { name: options.targetName } : {}),
      ...(options.technologies ? { technologies: parseList(Technology, options.technologies, 'technology') } : {}),
    },
    reporting: {
      ...base.reporting,
      ...(options.formats ? { formats: parseList(ReportFormat, options.formats, 'report format') } : {}),
      ...(options.output ? { outputDir: options.output } : {}),
    },
  });

  // The environment wins over the file so a run can be debugged without editing it
  globalLogger.setLevel(parseLogLevel(process.env['RULESCOPE_LOG_LEVEL'], config.advanced.logLevel));
  return config;
}

function createCollector(username?: string, password?: string): AuthDiagnosticCollector {
  const collector = new AuthDiagnosticCollector();
  collector.setEnabled(true);
  collector.setCredentials(username, password);
  collector.setSink({
    log: (block) => {
      // eslint-disable-next-line no-console
      console.log(block);
    },
  });
  return collector;
}

function fail(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`\nError: ${message}`));
  process.exit(1);
}

const program = new Command();

program
  .name('rulescope')
  .version('0.1.0')
  .description('rulescope - heuristic vulnerability detection for HTTP traffic');

program
  .command('scan')
  .description('Run the passive detectors over a HAR capture and write reports')
  .argument('<har>', 'HAR file to scan')
  .option('-c, --config <file>', 'Load configuration from a JSON file')
  .option('-o, --output <dir>', 'Output directory for reports')
  .option('-f, --formats <list>', 'Comma-separated report formats (console,json,html,sarif)')
  .option('-t, --target-name <name>', 'Label for the scanned target')
  .option('--technologies <list>', 'Comma-separated technologies the target runs (php,nginx,...)')
  .action(async (harPath: string, options: ScanCliOptions) => {
    try {
      const config = await resolveConfig(options);
      registerBuiltInDetectors();

      const transactions = await loadHarFile(harPath);
      if (config.diagnostics.enabled) {
        const collector = createCollector(config.diagnostics.username, config.diagnostics.password);
        transactions.forEach((tx) => collector.onResponseReceived(tx, Initiator.PROXY));
      }

      const engine = new ScanEngine({ config });
      const result = await engine.scan(transactions, config.target.name ?? harPath);

      // Non-zero exit on high risk findings, for CI pipelines
      process.exit(result.summary.high > 0 ? 1 : 0);
    } catch (err: unknown) {
      fail(err);
    }
  });

program
  .command('diagnose')
  .description('Print sanitized authentication transcripts for a HAR capture')
  .argument('<har>', 'HAR file to read')
  .option('-c, --config <file>', 'Take credentials and log level from a JSON configuration file')
  .option('--username <name>', 'Username to mask in transcripts')
  .option('--password <password>', 'Password to mask in transcripts')
  .action(async (harPath: string, options: DiagnoseCliOptions) => {
    try {
      const configManager = ConfigurationManager.getInstance();
      const config = options.config ? await configManager.loadFromFile(options.config) : configManager.loadFromObject({});
      globalLogger.setLevel(parseLogLevel(process.env['RULESCOPE_LOG_LEVEL'], config.advanced.logLevel));

      // Command line credentials win over the configured ones
      const collector = createCollector(
        options.username ?? config.diagnostics.username,
        options.password ?? config.diagnostics.password
      );

      for (const tx of await loadHarFile(harPath)) {
        collector.onResponseReceived(tx, Initiator.PROXY);
      }
    } catch (err: unknown) {
      fail(err);
    }
  });

program
  .command('rules')
  .description('List the built-in detectors')
  .action(() => {
    const registry = registerBuiltInDetectors(DetectorRegistry.getInstance());
    for (const detector of registry.getAll()) {
      const { id, name, risk } = detector.metadata;
      // eslint-disable-next-line no-console
      console.log(`${String(id).padEnd(6)} ${detector.type.padEnd(8)} ${risk.padEnd(7)} ${name}`);
    }
  });

program.parseAsync(process.argv).catch(fail);
