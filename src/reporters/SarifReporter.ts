import * as fs from 'fs';
import * as path from 'path';

import { Alert } from '../types/alert';
import { ReportFormat, RiskLevel } from '../types/enums';
import { ScanResult } from '../types/scan-result';

import { BaseReporter } from './base/IReporter';

export type SarifLevel = 'error' | 'warning' | 'note';

interface SarifRule {
  id: string;
  name: string;
  shortDescription: { text: string };
  fullDescription: { text: string };
  help: { text: string };
  helpUri?: string;
  properties: { tags: string[]; cwe?: string; wasc?: string };
}

interface SarifResult {
  ruleId: string;
  level: SarifLevel;
  message: { text: string };
  locations: Array<{ physicalLocation: { artifactLocation: { uri: string } } }>;
  properties: { confidence: string; param?: string; evidence?: string; attack?: string };
}

export interface SarifLog {
  $schema: string;
  version: '2.1.0';
  runs: Array<{
    tool: { driver: { name: string; informationUri?: string; rules: SarifRule[] } };
    results: SarifResult[];
  }>;
}

export class SarifReporter extends BaseReporter {
  getFormat(): ReportFormat {
    return ReportFormat.SARIF;
  }

  override async generate(result: ScanResult): Promise<void> {
    const outPath = this.outputPath(result, 'sarif');
    await fs.promises.mkdir(path.dirname(outPath), { recursive: true });
    await fs.promises.writeFile(outPath, JSON.stringify(this.toSarif(result), null, 2), 'utf-8');
  }

  toSarif(result: ScanResult): SarifLog {
    const rules = new Map<string, SarifRule>();
    const results = result.alerts.map((alert): SarifResult => {
      const ruleId = String(alert.ruleId);
      if (!rules.has(ruleId)) {
        rules.set(ruleId, toRule(alert));
      }

      const properties: SarifResult['properties'] = { confidence: alert.confidence };
      if (alert.param) properties.param = alert.param;
      if (alert.evidence) properties.evidence = alert.evidence;
      if (alert.attack) properties.attack = alert.attack;

      return {
        ruleId,
        level: this.severityToSarif(alert.risk),
        message: { text: alert.otherInfo ? `${alert.name}: ${alert.otherInfo}` : alert.name },
        locations: [{ physicalLocation: { artifactLocation: { uri: alert.uri || result.targetName } } }],
        properties,
      };
    });

    return {
      $schema: 'https://json.schemastore.org/sarif-2.1.0.json',
      version: '2.1.0',
      runs: [
        {
          tool: { driver: { name: 'rulescope', rules: [...rules.values()] } },
          results,
        },
      ],
    };
  }

  severityToSarif(risk: RiskLevel): SarifLevel {
    if (risk === RiskLevel.HIGH) return 'error';
    if (risk === RiskLevel.MEDIUM) return 'warning';
    return 'note';
  }
}

function toRule(alert: Alert): SarifRule {
  const rule: SarifRule = {
    id: String(alert.ruleId),
    name: alert.name,
    shortDescription: { text: alert.name },
    fullDescription: { text: alert.description || alert.name },
    help: { text: alert.solution },
    properties: { tags: Object.keys(alert.tags) },
  };
  if (alert.references.length > 0) rule.helpUri = alert.references[0];
  if (alert.cweId > 0) rule.properties.cwe = `CWE-${alert.cweId}`;
  if (alert.wascId > 0) rule.properties.wasc = `WASC-${alert.wascId}`;
  return rule;
}
