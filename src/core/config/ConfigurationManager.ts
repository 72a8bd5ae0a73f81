import { promises as fs } from 'fs';
import { ScanConfiguration } from '../../types/config';
import { AlertThreshold, AttackStrength, LogLevel, ReportFormat } from '../../types/enums';
import { validateScanConfiguration } from '../../utils/validators/config-validator';

/**
 * Configuration as it may appear in a file: every section and field optional
 */
export type PartialScanConfiguration = {
  [K in keyof ScanConfiguration]?: Partial<ScanConfiguration[K]>;
};

export function defaultScanConfiguration(): ScanConfiguration {
  return {
    target: { technologies: [] },
    detectors: {
      disabled: [],
      defaultThreshold: AlertThreshold.MEDIUM,
      defaultStrength: AttackStrength.MEDIUM,
    },
    diagnostics: { enabled: false },
    reporting: { formats: [ReportFormat.CONSOLE], outputDir: 'reports' },
    advanced: { logLevel: LogLevel.INFO, deduplicateAlerts: true },
  };
}

/**
 * Holds the active scan configuration. Sections missing from the input take their defaults.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | null = null;
  private config: ScanConfiguration | null = null;

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  /**
   * Merge with defaults and validate. Throws when the result is invalid.
   */
  loadFromObject(input: PartialScanConfiguration): ScanConfiguration {
    const defaults = defaultScanConfiguration();
    const merged: ScanConfiguration = {
      target: { ...defaults.target, ...input.target },
      detectors: { ...defaults.detectors, ...input.detectors },
      diagnostics: { ...defaults.diagnostics, ...input.diagnostics },
      reporting: { ...defaults.reporting, ...input.reporting },
      advanced: { ...defaults.advanced, ...input.advanced },
    };

    const { valid, errors } = validateScanConfiguration(merged);
    if (!valid) {
      throw new Error(`Invalid configuration: ${errors.join('; ')}`);
    }

    this.config = merged;
    return merged;
  }

  async loadFromFile(filePath: string): Promise<ScanConfiguration> {
    const content = await fs.readFile(filePath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new Error(`Failed to parse configuration file ${filePath}: ${error}`);
    }
    if (!isSectionMap(parsed)) {
      throw new Error(`Configuration file ${filePath} must contain a JSON object`);
    }
    return this.loadFromObject(parsed);
  }

  hasConfig(): boolean {
    return this.config !== null;
  }

  getConfig(): ScanConfiguration {
    if (!this.config) {
      throw new Error('No configuration loaded');
    }
    return this.config;
  }

  reset(): void {
    this.config = null;
  }
}

// Field types are checked by the validator once defaults are merged in
function isSectionMap(value: unknown): value is PartialScanConfiguration {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every((section) => section === undefined || (typeof section === 'object' && section !== null && !Array.isArray(section)));
}
