/**
 * rulescope
 * Heuristic vulnerability detection for HTTP traffic
 *
 * @packageDocumentation
 */

export * from './types';
export * from './core/http';
export * from './core/interfaces';
export * from './utils';

export { AlertBuilder } from './core/alerts/AlertBuilder';
export { OwaspTags, PolicyTags, mergeTags } from './core/alerts/alert-tags';

export { ScanEngine, summarizeAlerts } from './core/engine/ScanEngine';
export type { ActiveScanOptions, AlertSink, ScanEngineOptions } from './core/engine/ScanEngine';
export { ConfigurationManager, defaultScanConfiguration } from './core/config/ConfigurationManager';
export type { PartialScanConfiguration } from './core/config/ConfigurationManager';

export type { IReporter, ReporterInitOptions } from './reporters/base/IReporter';
export { BaseReporter } from './reporters/base/IReporter';
export { ConsoleReporter } from './reporters/ConsoleReporter';
export { JsonReporter } from './reporters/JsonReporter';
export { HtmlReporter } from './reporters/HtmlReporter';
export { SarifReporter } from './reporters/SarifReporter';

// Detectors
export { CrossDomainMisconfigurationDetector } from './detectors/passive/CrossDomainMisconfigurationDetector';
export { SerializedObjectDetector } from './detectors/passive/SerializedObjectDetector';
export { ModernAppDetector } from './detectors/passive/ModernAppDetector';
export { RelativePathConfusionDetector } from './detectors/active/RelativePathConfusionDetector';
export { SourceCodeDisclosureCve20121823Detector } from './detectors/active/SourceCodeDisclosureCve20121823Detector';

// Diagnostics
export * from './diagnostics/AuthDiagnosticCollector';
export * from './diagnostics/relevance';

// Testing utilities
export * from './testing/helpers';
