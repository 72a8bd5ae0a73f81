import * as fs from 'fs';
import * as path from 'path';

import Handlebars from 'handlebars';

import { ScanConfiguration } from '../types/config';
import { ReportFormat } from '../types/enums';
import { ScanResult } from '../types/scan-result';

import { BaseReporter, ReporterInitOptions } from './base/IReporter';

export class HtmlReporter extends BaseReporter {
  private template?: Handlebars.TemplateDelegate<ScanResult>;

  getFormat(): ReportFormat {
    return ReportFormat.HTML;
  }

  override async init(config: ScanConfiguration, options: ReporterInitOptions): Promise<void> {
    await super.init(config, options);
    const candidateTemplates = [
      path.join(__dirname, 'templates', 'report.hbs'),
      // useful when running from source without copied assets
      path.join(process.cwd(), 'src', 'reporters', 'templates', 'report.hbs'),
    ];

    const failures: string[] = [];
    for (const candidate of candidateTemplates) {
      try {
        const source = await fs.promises.readFile(candidate, 'utf-8');
        this.template = Handlebars.compile<ScanResult>(source);
        return;
      } catch (error) {
        failures.push(`${candidate}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    throw new Error(`HTML report template not found (${failures.join('; ')})`);
  }

  render(result: ScanResult): string {
    if (!this.template) {
      throw new Error('HtmlReporter used before init()');
    }
    return this.template(result);
  }

  override async generate(result: ScanResult): Promise<void> {
    const html = this.render(result);
    const outPath = this.outputPath(result, 'html');
    await fs.promises.mkdir(path.dirname(outPath), { recursive: true });
    await fs.promises.writeFile(outPath, html, 'utf-8');
  }
}
