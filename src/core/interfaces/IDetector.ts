import { Alert, AlertTags } from '../../types/alert';
import { ConfidenceLevel, DetectorCategory, DetectorType, RiskLevel, Technology } from '../../types/enums';
import { Logger } from '../../utils/logger/Logger';
import { AlertBuilder } from '../alerts/AlertBuilder';
import { HttpTransaction } from '../http/HttpMessage';

/**
 * Static description of a detector, fixed at construction
 */
export interface DetectorMetadata {
  /** Numeric rule id */
  readonly id: number;

  readonly name: string;

  readonly description: string;

  readonly solution: string;

  readonly references: readonly string[];

  readonly category: DetectorCategory;

  /** Default risk of raised alerts */
  readonly risk: RiskLevel;

  /** Default confidence of raised alerts */
  readonly confidence: ConfidenceLevel;

  readonly cweId: number;

  readonly wascId: number;

  readonly tags: AlertTags;

  /** Technologies the rule targets. Undefined means every technology */
  readonly technologies?: readonly Technology[];
}

export type TechnologySet = ReadonlySet<Technology>;

/**
 * Base interface for all detectors
 */
export interface IDetector {
  readonly metadata: DetectorMetadata;

  readonly type: DetectorType;

  /**
   * Documentation alerts, built without traffic
   */
  getExampleAlerts(): Alert[];
}

/**
 * Base abstract class for detectors
 */
export abstract class BaseDetector implements IDetector {
  abstract readonly metadata: DetectorMetadata;
  abstract readonly type: DetectorType;

  protected readonly logger: Logger;

  protected constructor(logger: Logger) {
    this.logger = logger;
  }

  abstract getExampleAlerts(): Alert[];

  /**
   * Builder pre-filled from the metadata, and from the transaction when one is given
   */
  protected newAlert(tx?: HttpTransaction): AlertBuilder {
    const meta = this.metadata;
    const builder = new AlertBuilder(meta.id, meta.name, this.type)
      .setRisk(meta.risk)
      .setConfidence(meta.confidence)
      .setDescription(meta.description)
      .setSolution(meta.solution)
      .setReferences(meta.references)
      .setCweId(meta.cweId)
      .setWascId(meta.wascId)
      .setTags(meta.tags);

    if (tx) {
      builder.setMethod(tx.method).setUri(tx.uri);
    }
    return builder;
  }
}
