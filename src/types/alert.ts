import { ConfidenceLevel, DetectorType, RiskLevel } from './enums';

/**
 * Alert tags map a tag key to an optional value (usually a reference URL)
 */
export type AlertTags = Readonly<Record<string, string>>;

/**
 * A single finding raised by a detector.
 * Alerts are frozen once built and never change afterwards.
 */
export interface Alert {
  /** Unique identifier for this alert instance */
  readonly id: string;

  /** Numeric id of the rule that raised it */
  readonly ruleId: number;

  /** Rule name */
  readonly name: string;

  /** Detector type that produced the alert */
  readonly detectorType: DetectorType;

  readonly risk: RiskLevel;

  readonly confidence: ConfidenceLevel;

  readonly description: string;

  /** Remediation advice */
  readonly solution: string;

  /** Reference URLs */
  readonly references: readonly string[];

  /**
   * Literal excerpt of the inspected header block or body.
   * Empty when the signal has no printable form.
   */
  readonly evidence: string;

  /** Free-form supporting observations, one per line */
  readonly otherInfo: string;

  /** Request payload used (active detectors only) */
  readonly attack: string;

  /** Name of the header, cookie or parameter involved */
  readonly param: string;

  /** HTTP method of the inspected request */
  readonly method: string;

  /** URI of the inspected request */
  readonly uri: string;

  readonly cweId: number;

  readonly wascId: number;

  readonly tags: AlertTags;

  readonly timestamp: Date;
}

/**
 * Summary of alerts by risk
 */
export interface AlertSummary {
  total: number;
  high: number;
  medium: number;
  low: number;
  info: number;
}
