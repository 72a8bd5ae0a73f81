import { ScanConfiguration } from '../../types/config';
import { AlertThreshold, AttackStrength, LogLevel, ReportFormat, Technology } from '../../types/enums';

/**
 * Validate scan configuration
 */
export function validateScanConfiguration(config: ScanConfiguration): {
  valid: boolean;
  errors: string[];
} {
  const errors: string[] = [];

  // Validate target
  for (const tech of config.target.technologies) {
    if (!isEnumValue(Technology, tech)) {
      errors.push(`Unknown technology: ${tech}`);
    }
  }

  // Validate detector config
  const detectors = config.detectors;
  if (!isEnumValue(AlertThreshold, detectors.defaultThreshold)) {
    errors.push(`Invalid default threshold: ${detectors.defaultThreshold}`);
  }
  if (!isEnumValue(AttackStrength, detectors.defaultStrength)) {
    errors.push(`Invalid default strength: ${detectors.defaultStrength}`);
  }
  for (const id of [...(detectors.enabled ?? []), ...detectors.disabled]) {
    if (!isValidRuleId(id)) {
      errors.push(`Invalid rule id: ${id}`);
    }
  }
  for (const [id, threshold] of Object.entries(detectors.thresholds ?? {})) {
    if (!isValidRuleId(Number(id)) || !isEnumValue(AlertThreshold, threshold)) {
      errors.push(`Invalid threshold override for rule ${id}: ${threshold}`);
    }
  }
  for (const [id, strength] of Object.entries(detectors.strengths ?? {})) {
    if (!isValidRuleId(Number(id)) || !isEnumValue(AttackStrength, strength)) {
      errors.push(`Invalid strength override for rule ${id}: ${strength}`);
    }
  }

  // Validate diagnostics config
  if (config.diagnostics.enabled && config.diagnostics.password && !config.diagnostics.username) {
    errors.push('Diagnostics password given without a username');
  }

  // Validate reporting config
  if (!isValidPath(config.reporting.outputDir)) {
    errors.push('Output directory is required');
  }
  if (config.reporting.formats.length === 0) {
    errors.push('At least one report format must be specified');
  }
  for (const format of config.reporting.formats) {
    if (!isEnumValue(ReportFormat, format)) {
      errors.push(`Unknown report format: ${format}`);
    }
  }

  // Validate advanced config
  if (!isEnumValue(LogLevel, config.advanced.logLevel)) {
    errors.push(`Invalid log level: ${config.advanced.logLevel}`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * True when the value is one of the string enum's values
 */
export function isEnumValue<T extends Record<string, string>>(enumObject: T, value: unknown): value is T[keyof T] {
  return typeof value === 'string' && Object.values(enumObject).includes(value);
}

export function isValidRuleId(id: number): boolean {
  return Number.isInteger(id) && id > 0;
}

/**
 * Validate file path
 */
export function isValidPath(path: string): boolean {
  // Basic validation - check for null bytes and invalid characters
  if (path.includes('\0')) return false;
  if (path.trim().length === 0) return false;
  return true;
}
