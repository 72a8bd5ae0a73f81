import { v4 as uuidv4 } from 'uuid';
import { Alert, AlertTags } from '../../types/alert';
import { ConfidenceLevel, DetectorType, RiskLevel } from '../../types/enums';

type MutableAlert = { -readonly [K in keyof Alert]: Alert[K] };

/**
 * Fluent builder for alerts. `build()` returns a frozen record with a fresh id.
 */
export class AlertBuilder {
  private readonly fields: Omit<MutableAlert, 'id' | 'timestamp'>;

  constructor(ruleId: number, name: string, detectorType: DetectorType) {
    this.fields = {
      ruleId,
      name,
      detectorType,
      risk: RiskLevel.INFO,
      confidence: ConfidenceLevel.MEDIUM,
      description: '',
      solution: '',
      references: [],
      evidence: '',
      otherInfo: '',
      attack: '',
      param: '',
      method: '',
      uri: '',
      cweId: 0,
      wascId: 0,
      tags: {},
    };
  }

  setRisk(risk: RiskLevel): this {
    this.fields.risk = risk;
    return this;
  }

  setConfidence(confidence: ConfidenceLevel): this {
    this.fields.confidence = confidence;
    return this;
  }

  setDescription(description: string): this {
    this.fields.description = description;
    return this;
  }

  setSolution(solution: string): this {
    this.fields.solution = solution;
    return this;
  }

  setReferences(references: readonly string[]): this {
    this.fields.references = [...references];
    return this;
  }

  setEvidence(evidence: string): this {
    this.fields.evidence = evidence;
    return this;
  }

  setOtherInfo(otherInfo: string): this {
    this.fields.otherInfo = otherInfo;
    return this;
  }

  setAttack(attack: string): this {
    this.fields.attack = attack;
    return this;
  }

  setParam(param: string): this {
    this.fields.param = param;
    return this;
  }

  setMethod(method: string): this {
    this.fields.method = method;
    return this;
  }

  setUri(uri: string): this {
    this.fields.uri = uri;
    return this;
  }

  setCweId(cweId: number): this {
    this.fields.cweId = cweId;
    return this;
  }

  setWascId(wascId: number): this {
    this.fields.wascId = wascId;
    return this;
  }

  setTags(tags: AlertTags): this {
    this.fields.tags = { ...tags };
    return this;
  }

  build(): Alert {
    return Object.freeze({
      ...this.fields,
      id: uuidv4(),
      references: Object.freeze([...this.fields.references]),
      tags: Object.freeze({ ...this.fields.tags }),
      timestamp: new Date(),
    });
  }
}
