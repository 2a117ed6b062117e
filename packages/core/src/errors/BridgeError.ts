/**
 * BridgeError - Error hierarchy for polybridge
 *
 * All errors extend the native JavaScript Error class.
 *
 * Error types:
 * - RegistrationError: class registration rejected (fatal)
 * - ResolutionError: lookup of an unregistered class (fatal)
 * - DispatchError: a virtual call that cannot be completed (error)
 * - NoSuchMethodError: host has no override for a method (warning, fallback signal)
 * - LifecycleError: use of a disposed instance or bridge (fatal)
 * - ConfigError: config or hierarchy file errors (fatal)
 */

import type {
  BridgeErrorCode,
  ConfigErrorCode,
  DispatchErrorCode,
  ErrorSeverity,
  LifecycleErrorCode,
  RegistrationErrorCode,
  ResolutionErrorCode,
} from '@polybridge/types';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  className?: string;
  method?: string;
  filePath?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of BridgeError
 */
export interface BridgeErrorJSON {
  code: BridgeErrorCode;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all bridge errors.
 */
export abstract class BridgeError extends Error {
  abstract readonly code: BridgeErrorCode;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): BridgeErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Registration error - duplicate or malformed class, missing parent, sealed table
 *
 * Severity: fatal (always)
 */
export class RegistrationError extends BridgeError {
  readonly code: RegistrationErrorCode;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: RegistrationErrorCode, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Resolution error - class name never registered
 *
 * Severity: fatal (always)
 */
export class ResolutionError extends BridgeError {
  readonly code: ResolutionErrorCode;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: ResolutionErrorCode, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Dispatch error - no implementation anywhere, wrong arity, failed upcast
 *
 * Severity: error
 */
export class DispatchError extends BridgeError {
  readonly code: DispatchErrorCode;
  readonly severity = 'error' as const;

  constructor(message: string, code: DispatchErrorCode, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Host has no override for a method.
 *
 * Thrown by HostRuntime implementations. Trampolines catch it for the method
 * they dispatched and fall back to the native default; it never reaches the
 * caller of invoke().
 *
 * Severity: warning (always)
 */
export class NoSuchMethodError extends BridgeError {
  readonly code = 'ERR_NO_SUCH_METHOD' as const;
  readonly severity = 'warning' as const;
  readonly method: string;

  constructor(method: string, context: ErrorContext = {}) {
    super(`Host object does not implement "${method}"`, { ...context, method });
    this.method = method;
  }
}

/**
 * Lifecycle error - instance or bridge used after dispose()
 *
 * Severity: fatal (always)
 */
export class LifecycleError extends BridgeError {
  readonly code: LifecycleErrorCode;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: LifecycleErrorCode, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Configuration error - config.yaml or hierarchy file parsing and validation
 *
 * Severity: fatal (always)
 */
export class ConfigError extends BridgeError {
  readonly code: ConfigErrorCode;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: ConfigErrorCode, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}
