/**
 * Central export for all utilities
 */

// Logger
export * from './logger/Logger';

// Registry
export * from './DetectorRegistry';
export * from './builtInDetectors';

// Parsing & Decoding
export * from './encoding/decoders';
export * from './html/HtmlDocument';
export * from './har/HarLoader';

// Patterns
export * from './patterns/relative-path-patterns';

// Validators
export * from './validators/config-validator';
