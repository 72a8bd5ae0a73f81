import { IActiveDetector, isActiveDetector } from '../core/interfaces/IActiveDetector';
import { IDetector } from '../core/interfaces/IDetector';
import { IPassiveDetector, isPassiveDetector } from '../core/interfaces/IPassiveDetector';
import { DetectorConfig } from '../types/config';
import { AlertThreshold, AttackStrength } from '../types/enums';

/**
 * Registered detectors, kept in registration order. That order is the dispatch order.
 */
export class DetectorRegistry {
  private static instance: DetectorRegistry | null = null;
  private readonly detectors = new Map<number, IDetector>();

  static getInstance(): DetectorRegistry {
    if (!DetectorRegistry.instance) {
      DetectorRegistry.instance = new DetectorRegistry();
    }
    return DetectorRegistry.instance;
  }

  register(detector: IDetector): void {
    const id = detector.metadata.id;
    if (this.detectors.has(id)) {
      throw new Error(`A detector with id ${id} is already registered`);
    }
    this.detectors.set(id, detector);
  }

  registerAll(detectors: readonly IDetector[]): void {
    detectors.forEach((d) => this.register(d));
  }

  get(id: number): IDetector | undefined {
    return this.detectors.get(id);
  }

  has(id: number): boolean {
    return this.detectors.has(id);
  }

  getAll(): IDetector[] {
    return [...this.detectors.values()];
  }

  getPassiveDetectors(): IPassiveDetector[] {
    return this.getAll().filter(isPassiveDetector);
  }

  getActiveDetectors(): IActiveDetector[] {
    return this.getAll().filter(isActiveDetector);
  }

  get size(): number {
    return this.detectors.size;
  }

  clear(): void {
    this.detectors.clear();
  }
}

/**
 * Threshold for a rule: the per-rule override, else the default.
 * Rules outside the enabled list, or in the disabled list, are Off.
 */
export function effectiveThreshold(config: DetectorConfig, ruleId: number): AlertThreshold {
  if (config.enabled && !config.enabled.includes(ruleId)) return AlertThreshold.OFF;
  if (config.disabled.includes(ruleId)) return AlertThreshold.OFF;
  return config.thresholds?.[String(ruleId)] ?? config.defaultThreshold;
}

export function effectiveStrength(config: DetectorConfig, ruleId: number): AttackStrength {
  return config.strengths?.[String(ruleId)] ?? config.defaultStrength;
}
