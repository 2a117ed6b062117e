/**
 * Configuration and hierarchy file loading
 */
export { loadConfig, validateConfig, validateVersion, DEFAULT_CONFIG } from './ConfigLoader.js';
export type { BridgeConfig } from './ConfigLoader.js';
export { loadHierarchy, parseHierarchy, registerHierarchy } from './HierarchyLoader.js';
export type { ImplementationTable } from './HierarchyLoader.js';
