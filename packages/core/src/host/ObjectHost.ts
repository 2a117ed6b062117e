/**
 * ObjectHost - plain JavaScript objects as host override handles
 *
 * A method counts as overridden when the handle has a function under that
 * name anywhere on its prototype chain, other than what every object inherits
 * from Object.prototype. Class instances therefore override at any depth:
 * the most-derived definition on the chain wins.
 */

import type { HostRuntime } from '@polybridge/types';
import { NoSuchMethodError } from '../errors/BridgeError.js';

export interface ObjectHostOptions {
  /** Called when an instance gives up its handle */
  onRelease?: (handle: object) => void;
}

export class ObjectHost implements HostRuntime<object> {
  private readonly onRelease?: (handle: object) => void;

  constructor(options: ObjectHostOptions = {}) {
    this.onRelease = options.onRelease;
  }

  /**
   * Whether `handle` overrides `method`.
   */
  implements(handle: object, method: string): boolean {
    if (method === 'constructor') return false;
    const member: unknown = Reflect.get(handle, method);
    return typeof member === 'function' && member !== Reflect.get(Object.prototype, method);
  }

  invoke(handle: object, method: string, args: readonly unknown[]): unknown {
    const member: unknown = Reflect.get(handle, method);
    if (!this.implements(handle, method) || typeof member !== 'function') {
      throw new NoSuchMethodError(method);
    }
    return Reflect.apply(member, handle, args);
  }

  release(handle: object): void {
    this.onRelease?.(handle);
  }
}
