/**
 * @polybridge/core - Polymorphic override bridge between a native hierarchy and a host
 */

// Error types
export {
  BridgeError,
  RegistrationError,
  ResolutionError,
  DispatchError,
  NoSuchMethodError,
  LifecycleError,
  ConfigError,
} from './errors/BridgeError.js';
export type { ErrorContext, BridgeErrorJSON } from './errors/BridgeError.js';

// Logging
export { ConsoleLogger, FileLogger, MultiLogger, createLogger, isLogLevel } from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Config and hierarchy files
export {
  loadConfig,
  validateConfig,
  validateVersion,
  DEFAULT_CONFIG,
  loadHierarchy,
  parseHierarchy,
  registerHierarchy,
} from './config/index.js';
export type { BridgeConfig, ImplementationTable } from './config/index.js';

// Bridge
export { ClassTable } from './core/ClassTable.js';
export { DispatchBridge } from './core/DispatchBridge.js';
export type { DispatchBridgeOptions } from './core/DispatchBridge.js';
export { Trampoline } from './core/Trampoline.js';
export type { TrampolineContext } from './core/Trampoline.js';
export { defineCallback } from './core/callbacks.js';
export type { Callback } from './core/callbacks.js';
export { buildApiManifest } from './core/ApiManifest.js';
export { toposort, CycleError } from './core/toposort.js';
export type { ToposortItem } from './core/toposort.js';

// Hosts
export { ObjectHost } from './host/ObjectHost.js';
export type { ObjectHostOptions } from './host/ObjectHost.js';

// Version
export { POLYBRIDGE_VERSION, getSchemaVersion } from './version.js';

// Re-export shared types
export type {
  ApiManifest,
  ApiManifestEntry,
  ClassDescriptor,
  ClassNode,
  ClassRef,
  HierarchyDescriptor,
  HostRuntime,
  MethodDeclaration,
  MethodSpec,
  NativeImpl,
  ResolvedDefault,
  VirtualMethod,
  VirtualObject,
} from '@polybridge/types';
