/**
 * @polybridge/types - Type definitions for the polymorphic override bridge
 */

// Hierarchy types
export * from './hierarchy.js';

// Host capability
export * from './host.js';

// API manifest and hierarchy file
export * from './manifest.js';

// Branded class references (type-only)
export type { ClassRef, RefLevel } from './branded.js';

// Error codes
export * from './errors.js';

// Logging
export * from './logging.js';
