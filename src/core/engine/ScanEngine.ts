import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { HtmlReporter } from '../../reporters/HtmlReporter';
import { IReporter } from '../../reporters/base/IReporter';
import { ConsoleReporter } from '../../reporters/ConsoleReporter';
import { JsonReporter } from '../../reporters/JsonReporter';
import { SarifReporter } from '../../reporters/SarifReporter';
import { Alert, AlertSummary } from '../../types/alert';
import { ScanConfiguration } from '../../types/config';
import { AlertThreshold, ReportFormat, RiskLevel, ScanStatus, Technology } from '../../types/enums';
import { ScanError, ScanResult } from '../../types/scan-result';
import { DetectorRegistry, effectiveStrength, effectiveThreshold } from '../../utils/DetectorRegistry';
import { globalLogger, Logger } from '../../utils/logger/Logger';
import { ConfigurationManager } from '../config/ConfigurationManager';
import { HttpTransaction } from '../http/HttpMessage';
import { ActiveScanContext, Transport } from '../interfaces/IActiveDetector';
import { IDetector } from '../interfaces/IDetector';
import { IPassiveDetector } from '../interfaces/IPassiveDetector';

/**
 * Receives every alert the engine keeps
 */
export type AlertSink = (alert: Alert) => void;

export interface ActiveScanOptions {
  send: Transport;
  signal?: AbortSignal;
  /** Overrides `target.technologies` from the configuration */
  technologies?: readonly Technology[];
}

/**
 * Alerts and failures of one `scan()` call. Deduplication only applies inside a batch.
 */
interface ScanBatch {
  readonly alerts: Alert[];
  readonly keys: Set<string>;
  readonly errors: ScanError[];
}

export interface ScanEngineOptions {
  registry?: DetectorRegistry;
  config?: ScanConfiguration;
  logger?: Logger;
  alertSink?: AlertSink;
}

/**
 * ScanEngine - dispatches transactions to the registered detectors
 * Isolates detector failures and drives the reporters. Only `scan()` keeps and deduplicates alerts,
 * the per-transaction methods return everything the detectors raise.
 */
export class ScanEngine extends EventEmitter {
  private readonly logger: Logger;
  private readonly registry: DetectorRegistry;
  private readonly configManager: ConfigurationManager;
  private readonly explicitConfig: ScanConfiguration | null;
  private alertSink: AlertSink | null;
  private lastBatch: ScanBatch = newBatch();
  private reporters: IReporter[] = [];
  private scanStatus: ScanStatus = ScanStatus.PENDING;

  constructor(options: ScanEngineOptions = {}) {
    super();
    this.logger = (options.logger ?? globalLogger).child('ScanEngine');
    this.registry = options.registry ?? DetectorRegistry.getInstance();
    this.configManager = ConfigurationManager.getInstance();
    this.explicitConfig = options.config ?? null;
    this.alertSink = options.alertSink ?? null;
  }

  setAlertSink(sink: AlertSink | null): void {
    this.alertSink = sink;
  }

  /** Registers a reporter */
  registerReporter(reporter: IReporter): void {
    this.reporters.push(reporter);
  }

  /** Registers multiple reporters */
  registerReporters(reporters: IReporter[]): void {
    reporters.forEach((r) => this.registerReporter(r));
  }

  getConfig(): ScanConfiguration {
    if (this.explicitConfig) return this.explicitConfig;
    if (!this.configManager.hasConfig()) {
      this.configManager.loadFromObject({});
    }
    return this.configManager.getConfig();
  }

  /**
   * Run every enabled passive detector over the request
   */
  inspectRequest(tx: HttpTransaction): Alert[] {
    return this.runPassive(tx, (detector) => detector.inspectRequest(tx), null);
  }

  /**
   * Run every enabled passive detector over the response
   */
  inspectResponse(tx: HttpTransaction): Alert[] {
    if (!tx.response) return [];
    return this.runPassive(tx, (detector) => detector.inspectResponse(tx), null);
  }

  /**
   * Run the applicable active detectors one after another against a base transaction
   */
  async runActive(base: HttpTransaction, options: ActiveScanOptions): Promise<Alert[]> {
    const config = this.getConfig();
    const signal = options.signal ?? new AbortController().signal;
    const technologies = new Set(options.technologies ?? config.target.technologies);
    const raised: Alert[] = [];

    for (const detector of this.registry.getActiveDetectors()) {
      if (signal.aborted) {
        this.logger.info('Active scan cancelled');
        break;
      }

      const ruleId = detector.metadata.id;
      const threshold = effectiveThreshold(config.detectors, ruleId);
      if (threshold === AlertThreshold.OFF || !detector.applicable(technologies)) {
        this.logger.debug(`Skipping active detector ${ruleId}`);
        continue;
      }

      const context: ActiveScanContext = {
        strength: effectiveStrength(config.detectors, ruleId),
        threshold,
        technologies,
        send: options.send,
        signal,
        logger: this.logger.child(String(ruleId)),
      };

      this.emit('detectorStarted', { ruleId, uri: base.uri });
      let alerts: Alert[];
      try {
        alerts = await detector.scan(base, context);
      } catch (error) {
        this.recordFailure(detector, base, error, null);
        this.emit('detectorCompleted', { ruleId, uri: base.uri });
        continue;
      }
      if (signal.aborted) {
        this.logger.info(`Discarding results of ${ruleId}, scan was cancelled`);
        break;
      }
      raised.push(...this.collect(alerts, null));
      this.emit('detectorCompleted', { ruleId, uri: base.uri });
    }

    return raised;
  }

  /**
   * Passive scan of a batch of captured transactions, reported through the registered reporters
   */
  async scan(transactions: readonly HttpTransaction[], targetName?: string): Promise<ScanResult> {
    const config = this.getConfig();
    const scanId = uuidv4();
    const startTime = Date.now();

    const batch = newBatch();
    this.lastBatch = batch;
    this.scanStatus = ScanStatus.RUNNING;
    this.logger.info(`Starting scan of ${transactions.length} transactions`);
    this.emit('scanStarted', { scanId, config });

    await this.initializeReporters(config);
    await Promise.all(this.reporters.map((r) => r.onScanStarted(scanId, config)));

    try {
      for (const tx of transactions) {
        const raised = this.runPassive(tx, (detector) => detector.inspectRequest(tx), batch);
        if (tx.response) {
          raised.push(...this.runPassive(tx, (detector) => detector.inspectResponse(tx), batch));
        }
        for (const alert of raised) {
          await Promise.all(this.reporters.map((r) => r.onAlert(alert)));
        }
      }
      this.scanStatus = ScanStatus.COMPLETED;
    } catch (error) {
      this.scanStatus = ScanStatus.FAILED;
      this.logger.error(`Scan failed: ${error}`);
      this.emit('scanFailed', { scanId, error });
      throw error;
    }

    const endTime = Date.now();
    const result: ScanResult = {
      scanId,
      targetName: targetName ?? config.target.name ?? deriveTargetName(transactions),
      status: this.scanStatus,
      startTime,
      endTime,
      duration: endTime - startTime,
      transactionsScanned: transactions.length,
      alerts: [...batch.alerts],
      summary: summarizeAlerts(batch.alerts),
      errors: [...batch.errors],
      config,
    };

    this.logger.info(`Scan completed. Found ${result.alerts.length} alerts in ${result.duration}ms`);
    this.emit('scanCompleted', result);
    await Promise.all(this.reporters.map((r) => r.onScanCompleted(result)));
    await Promise.all(this.reporters.map((r) => r.generate(result)));
    return result;
  }

  /** Alerts kept by the last `scan()` */
  getAlerts(): Alert[] {
    return [...this.lastBatch.alerts];
  }

  /** Detector failures of the last `scan()` */
  getErrors(): ScanError[] {
    return [...this.lastBatch.errors];
  }

  getStatus(): ScanStatus {
    return this.scanStatus;
  }

  private runPassive(
    tx: HttpTransaction,
    inspect: (detector: IPassiveDetector) => Alert[],
    batch: ScanBatch | null
  ): Alert[] {
    const config = this.getConfig();
    const raised: Alert[] = [];

    for (const detector of this.registry.getPassiveDetectors()) {
      if (effectiveThreshold(config.detectors, detector.metadata.id) === AlertThreshold.OFF) {
        continue;
      }
      let alerts: Alert[];
      try {
        alerts = inspect(detector);
      } catch (error) {
        this.recordFailure(detector, tx, error, batch);
        continue;
      }
      raised.push(...this.collect(alerts, batch));
    }
    return raised;
  }

  /**
   * Deliver alerts to the sink and listeners. Inside a batch, repeats of an alert
   * already kept are dropped. Returns the delivered ones.
   */
  private collect(alerts: readonly Alert[], batch: ScanBatch | null): Alert[] {
    const dedupe = batch !== null && this.getConfig().advanced.deduplicateAlerts !== false;
    const kept: Alert[] = [];

    for (const alert of alerts) {
      if (batch) {
        const key = alertKey(alert);
        if (dedupe && batch.keys.has(key)) {
          this.logger.debug(`Deduped alert ${alert.ruleId} on ${alert.uri}`);
          continue;
        }
        batch.keys.add(key);
        batch.alerts.push(alert);
      }
      kept.push(alert);

      this.logger.info(`Alert raised: [${alert.risk}] ${alert.name} on ${alert.uri}`);
      this.deliver(alert);
    }
    return kept;
  }

  /**
   * A failing sink or listener is logged and does not count against the detector
   */
  private deliver(alert: Alert): void {
    try {
      this.alertSink?.(alert);
    } catch (error) {
      this.logger.error(`Alert sink failed for ${alert.ruleId} on ${alert.uri}: ${error}`);
    }
    try {
      this.emit('alertRaised', alert);
    } catch (error) {
      this.logger.error(`alertRaised listener failed for ${alert.ruleId} on ${alert.uri}: ${error}`);
    }
  }

  private recordFailure(detector: IDetector, tx: HttpTransaction, error: unknown, batch: ScanBatch | null): void {
    const ruleId = detector.metadata.id;
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`Detector ${ruleId} failed on ${tx.uri}: ${message}`);
    batch?.errors.push({ ruleId, message, uri: tx.uri });
    this.emit('detectorFailed', { ruleId, uri: tx.uri, error });
  }

  /** Initialize reporters from config */
  private async initializeReporters(config: ScanConfiguration): Promise<void> {
    // If reporters already configured, skip
    if (this.reporters.length > 0) return;
    const options = {
      outputDir: config.reporting.outputDir,
      fileNameTemplate: config.reporting.fileNameTemplate,
    };

    const created: IReporter[] = [];
    for (const f of config.reporting.formats) {
      if (f === ReportFormat.CONSOLE) created.push(new ConsoleReporter());
      if (f === ReportFormat.JSON) created.push(new JsonReporter());
      if (f === ReportFormat.HTML) created.push(new HtmlReporter());
      if (f === ReportFormat.SARIF) created.push(new SarifReporter());
    }

    // De-dup by format
    const byFmt = new Map<string, IReporter>();
    for (const r of created) byFmt.set(r.getFormat(), r);
    this.reporters = Array.from(byFmt.values());
    await Promise.all(this.reporters.map((r) => r.init(config, options)));
  }
}

function newBatch(): ScanBatch {
  return { alerts: [], keys: new Set(), errors: [] };
}

function alertKey(alert: Alert): string {
  return JSON.stringify([alert.ruleId, alert.method, alert.uri, alert.param, alert.evidence, alert.attack]);
}

export function summarizeAlerts(alerts: readonly Alert[]): AlertSummary {
  const count = (risk: RiskLevel) => alerts.filter((a) => a.risk === risk).length;
  return {
    total: alerts.length,
    high: count(RiskLevel.HIGH),
    medium: count(RiskLevel.MEDIUM),
    low: count(RiskLevel.LOW),
    info: count(RiskLevel.INFO),
  };
}

function deriveTargetName(transactions: readonly HttpTransaction[]): string {
  const origins = new Set<string>();
  for (const tx of transactions) {
    const url = tx.request.url;
    if (url) origins.add(url.origin);
  }
  return [...origins].join(', ') || 'unknown';
}
