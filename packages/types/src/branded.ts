/**
 * Branded class references
 *
 * A ClassRef<L> is an instance viewed through a reference statically typed at
 * hierarchy level L. The brand is a phantom type: it has no runtime
 * representation, so the only way to obtain one is a checked upcast
 * (DispatchBridge.ref), which is where the "is-a" precondition is verified.
 *
 * @example
 * const asBase = bridge.ref(instance, 'Base');
 * doSomething(asBase); // (ref: ClassRef<'Base'>) => unknown
 */

import type { VirtualObject } from './hierarchy.js';

/**
 * Declared but never exists at runtime.
 */
declare const CLASS_REF_BRAND: unique symbol;

export type ClassRef<L extends string> = VirtualObject & {
  readonly [CLASS_REF_BRAND]: L;
};

/**
 * Extract the static level of a reference.
 *
 * @example
 * type Level = RefLevel<ClassRef<'Derived'>>; // 'Derived'
 */
export type RefLevel<T> = T extends ClassRef<infer L> ? L : never;
