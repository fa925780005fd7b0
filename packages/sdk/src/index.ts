/**
 * Spindle SDK
 * Capability registry and first-match dispatcher
 */

// Types
export * from './types/errors';
export * from './types/context';

// Core interfaces
export * from './interfaces/provider';

// Registry
export * from './registry/provider-iterator';
export * from './registry/service-registry';
export * from './registry/manifest';

// Dispatch
export * from './dispatcher/dispatcher';

// Observability
export * from './observability/logger';

// Test helpers
export * from './testing/recording-logger';
export * from './testing/recording-tracer';

/**
 * SDK version
 */
export const SDK_VERSION = '1.0.0';
