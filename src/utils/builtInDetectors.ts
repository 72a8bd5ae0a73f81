/**
 * Built-in detector registration
 * Centralizes all detector instantiation
 */

import { RelativePathConfusionDetector } from '../detectors/active/RelativePathConfusionDetector';
import { SourceCodeDisclosureCve20121823Detector } from '../detectors/active/SourceCodeDisclosureCve20121823Detector';
import { CrossDomainMisconfigurationDetector } from '../detectors/passive/CrossDomainMisconfigurationDetector';
import { ModernAppDetector } from '../detectors/passive/ModernAppDetector';
import { SerializedObjectDetector } from '../detectors/passive/SerializedObjectDetector';
import { globalLogger, Logger } from './logger/Logger';

import { DetectorRegistry } from './DetectorRegistry';

/**
 * Register all built-in detectors, passive first, to the given registry
 * (the global one by default). Ids already present are skipped.
 */
export function registerBuiltInDetectors(
  registry: DetectorRegistry = DetectorRegistry.getInstance(),
  logger: Logger = globalLogger
): DetectorRegistry {
  const detectors = [
    // Passive Detectors
    new CrossDomainMisconfigurationDetector(logger),
    new SerializedObjectDetector(logger),
    new ModernAppDetector(logger),

    // Active Detectors
    new RelativePathConfusionDetector(logger),
    new SourceCodeDisclosureCve20121823Detector(logger),
  ];

  for (const detector of detectors) {
    if (!registry.has(detector.metadata.id)) {
      registry.register(detector);
    }
  }
  return registry;
}
