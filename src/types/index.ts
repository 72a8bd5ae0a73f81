/**
 * Central export point for all type definitions
 */

// Enums
export * from './enums';

// Alert types
export type { Alert, AlertSummary, AlertTags } from './alert';

// Configuration types
export * from './config';

// Scan result types
export type { ScanResult, ScanError } from './scan-result';
