import chalk from 'chalk';
import ora from 'ora';

import { Alert } from '../types/alert';
import { ScanConfiguration } from '../types/config';
import { ReportFormat, RiskLevel } from '../types/enums';
import { ScanResult } from '../types/scan-result';

import { BaseReporter } from './base/IReporter';

const RISK_COLORS: Readonly<Record<RiskLevel, chalk.Chalk>> = {
  [RiskLevel.HIGH]: chalk.red,
  [RiskLevel.MEDIUM]: chalk.yellow,
  [RiskLevel.LOW]: chalk.blue,
  [RiskLevel.INFO]: chalk.gray,
};

export class ConsoleReporter extends BaseReporter {
  private spinner = ora({ spinner: 'dots' });
  private alertCount = 0;

  getFormat(): ReportFormat {
    return ReportFormat.CONSOLE;
  }

  override async onScanStarted(scanId: string, config: ScanConfiguration): Promise<void> {
    this.config = config;
    this.alertCount = 0;
    this.spinner.start(`Starting scan ${scanId}`);
  }

  override async onAlert(alert: Alert): Promise<void> {
    this.alertCount += 1;
    const color = RISK_COLORS[alert.risk];
    this.spinner.stop();
    // eslint-disable-next-line no-console
    console.log(`${color(` ${alert.risk.toUpperCase()} `)} ${chalk.bold(alert.name)} ${chalk.gray(alert.uri)}`);
    if (alert.evidence) {
      // eslint-disable-next-line no-console
      console.log(chalk.gray(`    evidence: ${alert.evidence}`));
    }
    this.spinner.start(`${this.alertCount} alerts so far`);
  }

  override async onScanCompleted(result: ScanResult): Promise<void> {
    this.spinner.stop();
    const s = result.summary;
    // eslint-disable-next-line no-console
    console.log(
      chalk.bold(`\nScanned ${result.transactionsScanned} transactions in ${result.duration}ms: `) +
        `${s.total} alerts (H:${s.high} M:${s.medium} L:${s.low} I:${s.info})\n`
    );
    for (const error of result.errors) {
      // eslint-disable-next-line no-console
      console.log(chalk.red(`Detector ${error.ruleId} failed on ${error.uri}: ${error.message}`));
    }
  }
}
