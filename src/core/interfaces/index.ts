/**
 * Central export point for all core interfaces
 */

export * from './IDetector';
export * from './IPassiveDetector';
export * from './IActiveDetector';
