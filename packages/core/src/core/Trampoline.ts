/**
 * Trampoline - native instance whose virtual calls go to the host first
 *
 * A trampoline holds exactly one host handle. invoke() asks the host to run
 * the method on that handle; only when the host reports NoSuchMethodError for
 * that same method does the call fall back to the nearest native default
 * registered along the instance's class chain. A host result is final:
 * defaults are never consulted once the host has answered.
 *
 * The handle is released through HostRuntime.release exactly once, on the
 * first dispose(). An error thrown by release propagates, but the instance
 * is disposed all the same and is not retried.
 */

import type {
  HostRuntime,
  Logger,
  MethodDeclaration,
  ResolvedDefault,
  VirtualObject,
} from '@polybridge/types';
import { DispatchError, LifecycleError, NoSuchMethodError } from '../errors/BridgeError.js';

/**
 * What a trampoline needs from the bridge that created it.
 * Resolution stays in the bridge so all instances share one table.
 */
export interface TrampolineContext<H> {
  readonly host: HostRuntime<H>;
  readonly logger: Logger;
  defaultFor(className: string, method: string): ResolvedDefault | undefined;
  lookupMethod(className: string, method: string): MethodDeclaration | undefined;
  isSubclass(className: string, ancestor: string): boolean;
  /** Called once when the trampoline is disposed */
  detach(instance: Trampoline<H>): void;
}

export class Trampoline<H = unknown> implements VirtualObject {
  readonly className: string;
  private readonly context: TrampolineContext<H>;
  private readonly heldHandle: H;
  private released = false;

  constructor(context: TrampolineContext<H>, className: string, handle: H) {
    this.context = context;
    this.className = className;
    this.heldHandle = handle;
  }

  get disposed(): boolean {
    return this.released;
  }

  /**
   * The host override handle. Unavailable after dispose().
   */
  get handle(): H {
    this.assertLive('handle');
    return this.heldHandle;
  }

  isA(className: string): boolean {
    return this.context.isSubclass(this.className, className);
  }

  invoke(method: string, ...args: unknown[]): unknown {
    this.assertLive(method);
    this.checkArity(method, args);

    const { host, logger } = this.context;
    let result: unknown;
    try {
      result = host.invoke(this.heldHandle, method, args);
    } catch (err) {
      // Only a miss for this exact method means "not overridden"; anything
      // else, including a miss raised deeper inside the override, is the host's.
      if (err instanceof NoSuchMethodError && err.method === method) {
        logger.trace('No host override, using native default', { className: this.className, method });
        return this.callDefault(method, args);
      }
      throw err;
    }

    logger.trace('Dispatched to host override', { className: this.className, method });
    return result;
  }

  invokeDefault(method: string, ...args: unknown[]): unknown {
    this.assertLive(method);
    this.checkArity(method, args);
    return this.callDefault(method, args);
  }

  dispose(): void {
    if (this.released) return;
    this.released = true;
    try {
      this.context.host.release?.(this.heldHandle);
    } finally {
      // A failing release still leaves the instance disposed and detached
      this.context.detach(this);
    }
    this.context.logger.debug('Released host handle', { className: this.className });
  }

  private callDefault(method: string, args: unknown[]): unknown {
    const resolved = this.context.defaultFor(this.className, method);
    if (!resolved) {
      throw new DispatchError(
        `Virtual method "${method}" of "${this.className}" has no host override and no native default`,
        'ERR_UNIMPLEMENTED_VIRTUAL',
        { className: this.className, method },
        `Implement "${method}" on the host object or register a default for it`
      );
    }
    this.context.logger.trace('Calling native default', { className: this.className, method, owner: resolved.owner });
    return resolved.impl(this, ...args);
  }

  private checkArity(method: string, args: unknown[]): void {
    const declaration = this.context.lookupMethod(this.className, method);
    if (!declaration) return;
    const { arity } = declaration.method;
    if (arity !== undefined && args.length !== arity) {
      throw new DispatchError(
        `"${declaration.owner}.${method}" expects ${arity} argument(s), got ${args.length}`,
        'ERR_ARITY_MISMATCH',
        { className: this.className, method, expected: arity, received: args.length }
      );
    }
  }

  private assertLive(method: string): void {
    if (this.released) {
      throw new LifecycleError(
        `Instance of "${this.className}" was disposed`,
        'ERR_INSTANCE_DISPOSED',
        { className: this.className, method }
      );
    }
  }
}
