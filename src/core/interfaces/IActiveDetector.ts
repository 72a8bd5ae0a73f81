import { Alert } from '../../types/alert';
import { AlertThreshold, AttackStrength, DetectorType } from '../../types/enums';
import { Logger } from '../../utils/logger/Logger';
import { HttpRequest, HttpTransaction } from '../http/HttpMessage';
import { BaseDetector, IDetector, TechnologySet } from './IDetector';

/**
 * Host supplied function that sends a request and resolves with the completed transaction
 */
export type Transport = (request: HttpRequest, followRedirects: boolean) => Promise<HttpTransaction>;

/**
 * Everything an active detector needs to probe a target
 */
export interface ActiveScanContext {
  strength: AttackStrength;
  threshold: AlertThreshold;
  technologies: TechnologySet;
  send: Transport;
  signal: AbortSignal;
  logger: Logger;
}

/**
 * Active detectors mutate and resend requests
 */
export interface IActiveDetector extends IDetector {
  readonly type: DetectorType.ACTIVE;

  applicable(technologies: TechnologySet): boolean;

  scan(base: HttpTransaction, context: ActiveScanContext): Promise<Alert[]>;
}

export abstract class BaseActiveDetector extends BaseDetector implements IActiveDetector {
  readonly type = DetectorType.ACTIVE;

  abstract scan(base: HttpTransaction, context: ActiveScanContext): Promise<Alert[]>;

  /**
   * An empty set means the target's stack is unknown, so every rule applies
   */
  applicable(technologies: TechnologySet): boolean {
    const targets = this.metadata.technologies;
    if (!targets || technologies.size === 0) return true;
    return targets.some((t) => technologies.has(t));
  }

  /**
   * Send one request. Resolves null when the scan was cancelled or the transport failed.
   */
  protected async sendAndReceive(
    context: ActiveScanContext,
    request: HttpRequest,
    followRedirects: boolean
  ): Promise<HttpTransaction | null> {
    if (context.signal.aborted) {
      return null;
    }

    let tx: HttpTransaction;
    try {
      tx = await context.send(request, followRedirects);
    } catch (error) {
      context.logger.debug(`Request to ${request.uri} failed: ${error}`);
      return null;
    }

    if (context.signal.aborted || !tx.response) {
      return null;
    }
    return tx;
  }
}

export function isActiveDetector(detector: IDetector): detector is IActiveDetector {
  return detector.type === DetectorType.ACTIVE;
}
