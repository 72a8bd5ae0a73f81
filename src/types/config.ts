import { AlertThreshold, AttackStrength, LogLevel, ReportFormat, Technology } from './enums';

/**
 * Main scan configuration
 */
export interface ScanConfiguration {
  /** Target configuration */
  target: TargetConfig;

  /** Detector selection and tuning */
  detectors: DetectorConfig;

  /** Auth diagnostics collector configuration */
  diagnostics: DiagnosticsConfig;

  /** Reporting configuration */
  reporting: ReportingConfig;

  /** Advanced configuration options */
  advanced: AdvancedConfig;
}

/**
 * Target configuration
 */
export interface TargetConfig {
  /** Label used in reports (usually the origin of the captured traffic) */
  name?: string;

  /** Technologies the target is known to run; empty means "all" */
  technologies: Technology[];
}

/**
 * Detector configuration
 */
export interface DetectorConfig {
  /** Rule ids to run. When omitted every registered detector is eligible */
  enabled?: number[];

  /** Rule ids to skip */
  disabled: number[];

  /** Threshold applied when no per-rule override exists */
  defaultThreshold: AlertThreshold;

  /** Strength applied when no per-rule override exists */
  defaultStrength: AttackStrength;

  /** Per-rule threshold overrides, keyed by rule id */
  thresholds?: Record<string, AlertThreshold>;

  /** Per-rule strength overrides, keyed by rule id */
  strengths?: Record<string, AttackStrength>;
}

/**
 * Auth diagnostics configuration
 */
export interface DiagnosticsConfig {
  enabled: boolean;

  /** Registered username, replaced by a fixed literal in transcripts */
  username?: string;

  /** Registered password, replaced by a fixed literal in transcripts */
  password?: string;
}

/**
 * Reporting configuration
 */
export interface ReportingConfig {
  /** Report formats to generate */
  formats: ReportFormat[];

  /** Output directory for file based reports */
  outputDir: string;

  /** File name template, `{{scanId}}` is replaced */
  fileNameTemplate?: string;
}

/**
 * Advanced configuration
 */
export interface AdvancedConfig {
  logLevel: LogLevel;

  /** Collapse alerts with identical rule, uri, param and evidence */
  deduplicateAlerts?: boolean;
}
