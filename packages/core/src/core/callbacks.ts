/**
 * Callback entry points - native call sites typed at one hierarchy level
 *
 * A callback takes a reference typed at `level` and invokes one virtual
 * method on it. It performs no runtime check: holding a ClassRef<level> is the
 * precondition, and DispatchBridge.ref() is where it was verified. Because the
 * call goes through invoke(), the most-derived host override is reached even
 * when the reference is typed at the root.
 *
 * @example
 * const doSomething = defineCallback('Base', 'do_something');
 * doSomething(bridge.ref(extraDerived, 'Base'));
 */

import type { ClassRef } from '@polybridge/types';

export interface Callback<L extends string> {
  (ref: ClassRef<L>, ...args: unknown[]): unknown;
  readonly level: L;
  readonly method: string;
}

export function defineCallback<L extends string>(level: L, method: string): Callback<L> {
  const call = (ref: ClassRef<L>, ...args: unknown[]): unknown => ref.invoke(method, ...args);
  return Object.assign(call, { level, method });
}
