/**
 * Error codes and severities shared by every bridge error
 */

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

export type RegistrationErrorCode =
  | 'ERR_DUPLICATE_CLASS'
  | 'ERR_UNKNOWN_PARENT'
  | 'ERR_UNDECLARED_DEFAULT'
  | 'ERR_INVALID_DESCRIPTOR'
  | 'ERR_REGISTRY_SEALED';

export type ResolutionErrorCode = 'ERR_UNKNOWN_CLASS';

export type DispatchErrorCode =
  | 'ERR_UNIMPLEMENTED_VIRTUAL'
  | 'ERR_ARITY_MISMATCH'
  | 'ERR_NOT_A_SUBCLASS';

export type LifecycleErrorCode = 'ERR_INSTANCE_DISPOSED' | 'ERR_BRIDGE_DISPOSED';

export type ConfigErrorCode =
  | 'ERR_CONFIG_INVALID'
  | 'ERR_CONFIG_MISSING_IMPL'
  | 'ERR_HIERARCHY_CYCLE';

export type BridgeErrorCode =
  | RegistrationErrorCode
  | ResolutionErrorCode
  | DispatchErrorCode
  | LifecycleErrorCode
  | ConfigErrorCode
  | 'ERR_NO_SUCH_METHOD';
