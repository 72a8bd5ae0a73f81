import { Alert, AlertSummary } from './alert';
import { ScanConfiguration } from './config';
import { ScanStatus } from './enums';

/**
 * Errors recorded while dispatching detectors
 */
export interface ScanError {
  /** Rule id of the detector that failed */
  ruleId: number;

  /** Error message */
  message: string;

  /** URI of the transaction being inspected */
  uri: string;
}

/**
 * Result of scanning a batch of transactions
 */
export interface ScanResult {
  /** Unique identifier for this scan */
  scanId: string;

  /** Label of the scanned target */
  targetName: string;

  status: ScanStatus;

  /** Epoch milliseconds */
  startTime: number;

  /** Epoch milliseconds */
  endTime: number;

  /** Scan duration in milliseconds */
  duration: number;

  /** Number of transactions handed to the detectors */
  transactionsScanned: number;

  alerts: Alert[];

  summary: AlertSummary;

  /** Detector failures (isolated, they did not stop the scan) */
  errors: ScanError[];

  config: ScanConfiguration;
}
