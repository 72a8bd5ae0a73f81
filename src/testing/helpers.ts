/**
 * Test helpers for exercising detectors without a live target
 *
 * @example Passive check of a captured response:
 * ```typescript
 * const tx = createTransaction({
 *   response: { headers: { 'Access-Control-Allow-Origin': '*' } },
 * });
 * const alerts = new ScanEngine().inspectResponse(tx);
 * assertNoAlerts(alerts, RiskLevel.LOW);
 * ```
 *
 * @example Active check against scripted responses:
 * ```typescript
 * const transport = new RecordingTransport(() => ({ statusCode: 200, body: '<?php echo 1; ?>' }));
 * const alerts = await engine.runActive(base, { send: transport.send });
 * expect(transport.requests[0].query).toBe('-s');
 * ```
 */
import { HttpRequest, HttpRequestInit, HttpResponse, HttpResponseInit, HttpTransaction } from '../core/http/HttpMessage';
import { ActiveScanContext, Transport } from '../core/interfaces/IActiveDetector';
import { Alert } from '../types/alert';
import { AlertThreshold, AttackStrength, compareRisk, LogLevel, RiskLevel, Technology } from '../types/enums';
import { Logger } from '../utils/logger/Logger';

export interface TransactionInit {
  request?: Partial<HttpRequestInit>;
  /** `null` leaves the transaction without a response */
  response?: Partial<HttpResponseInit> | null;
}

/**
 * Builds a transaction, defaulting to `GET https://example.com/` answered by an empty 200
 */
export function createTransaction(init: TransactionInit = {}): HttpTransaction {
  const request = new HttpRequest({ uri: 'https://example.com/', ...init.request });
  if (init.response === null) {
    return new HttpTransaction(request);
  }
  return new HttpTransaction(request, new HttpResponse({ statusCode: 200, reasonPhrase: 'OK', ...init.response }));
}

/**
 * Scripted responder. Returning `null` makes the transport reject as a network failure would.
 */
export type Responder = (request: HttpRequest, followRedirects: boolean) => HttpResponseInit | null;

/**
 * In-process transport that records every request it is given
 */
export class RecordingTransport {
  readonly requests: HttpRequest[] = [];
  readonly redirectFlags: boolean[] = [];

  constructor(private readonly responder: Responder) {}

  readonly send: Transport = async (request, followRedirects) => {
    this.requests.push(request);
    this.redirectFlags.push(followRedirects);
    const init = this.responder(request, followRedirects);
    if (init === null) {
      throw new Error(`connection refused: ${request.uri}`);
    }
    return new HttpTransaction(request, new HttpResponse(init));
  };
}

/**
 * Collects alerts handed to an `AlertSink`
 */
export class AlertCollector {
  readonly alerts: Alert[] = [];

  readonly sink = (alert: Alert): void => {
    this.alerts.push(alert);
  };

  byRule(ruleId: number): Alert[] {
    return this.alerts.filter((a) => a.ruleId === ruleId);
  }

  clear(): void {
    this.alerts.length = 0;
  }
}

/**
 * Logger that keeps its lines in memory
 */
export function createMemoryLogger(lines: string[] = []): Logger {
  return new Logger(LogLevel.DEBUG, '', (_level, line) => {
    lines.push(line);
  });
}

export interface ContextInit {
  strength?: AttackStrength;
  threshold?: AlertThreshold;
  technologies?: readonly Technology[];
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Active scan context with Medium strength and threshold unless overridden
 */
export function createActiveContext(send: Transport, init: ContextInit = {}): ActiveScanContext {
  return {
    strength: init.strength ?? AttackStrength.MEDIUM,
    threshold: init.threshold ?? AlertThreshold.MEDIUM,
    technologies: new Set(init.technologies ?? []),
    send,
    signal: init.signal ?? new AbortController().signal,
    logger: init.logger ?? createMemoryLogger(),
  };
}

/**
 * Throws when any alert is riskier than the allowed level
 */
export function assertNoAlerts(alerts: readonly Alert[], maxAllowedRisk: RiskLevel = RiskLevel.INFO): void {
  const violations = alerts.filter((a) => compareRisk(a.risk, maxAllowedRisk) > 0);

  if (violations.length > 0) {
    const summary = violations.map((a) => `  - [${a.risk.toUpperCase()}] ${a.ruleId} ${a.name} on ${a.uri}`).join('\n');

    throw new Error(
      `Alerts found above ${maxAllowedRisk} risk:\n${summary}\n\n` + `Total: ${violations.length} alert(s)`
    );
  }
}
