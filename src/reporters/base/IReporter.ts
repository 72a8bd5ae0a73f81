import * as path from 'path';

import { Alert } from '../../types/alert';
import { ScanConfiguration } from '../../types/config';
import { ReportFormat } from '../../types/enums';
import { ScanResult } from '../../types/scan-result';

export interface ReporterInitOptions {
  outputDir: string;
  /** `{{scanId}}` is replaced by the scan id */
  fileNameTemplate?: string;
}

export interface IReporter {
  getFormat(): ReportFormat;
  init(config: ScanConfiguration, options: ReporterInitOptions): Promise<void>;
  onScanStarted(scanId: string, config: ScanConfiguration): Promise<void>;
  onAlert(alert: Alert): Promise<void>;
  onScanCompleted(result: ScanResult): Promise<void>;
  generate(result: ScanResult): Promise<void>;
}

export abstract class BaseReporter implements IReporter {
  protected config: ScanConfiguration | null = null;
  protected options: ReporterInitOptions = { outputDir: 'reports' };

  abstract getFormat(): ReportFormat;

  async init(config: ScanConfiguration, options: ReporterInitOptions): Promise<void> {
    this.config = config;
    this.options = options;
  }

  async onScanStarted(_scanId: string, _config: ScanConfiguration): Promise<void> {}
  async onAlert(_alert: Alert): Promise<void> {}
  async onScanCompleted(_result: ScanResult): Promise<void> {}
  async generate(_result: ScanResult): Promise<void> {}

  /**
   * Output file for a scan, from the configured template or `scan-<id>.<extension>`
   */
  protected outputPath(result: ScanResult, extension: string): string {
    const fileName = (this.options.fileNameTemplate || `scan-{{scanId}}.${extension}`).replace(
      /\{\{scanId\}\}/g,
      result.scanId
    );
    return path.join(this.options.outputDir, fileName);
  }
}
