import { Alert } from '../../types/alert';
import { DetectorType } from '../../types/enums';
import { HttpTransaction } from '../http/HttpMessage';
import { BaseDetector, IDetector } from './IDetector';

/**
 * Passive detectors inspect captured traffic. They are synchronous and do no I/O.
 */
export interface IPassiveDetector extends IDetector {
  readonly type: DetectorType.PASSIVE;

  inspectRequest(tx: HttpTransaction): Alert[];

  inspectResponse(tx: HttpTransaction): Alert[];
}

export abstract class BasePassiveDetector extends BaseDetector implements IPassiveDetector {
  readonly type = DetectorType.PASSIVE;

  inspectRequest(_tx: HttpTransaction): Alert[] {
    return [];
  }

  inspectResponse(_tx: HttpTransaction): Alert[] {
    return [];
  }
}

export function isPassiveDetector(detector: IDetector): detector is IPassiveDetector {
  return detector.type === DetectorType.PASSIVE;
}
