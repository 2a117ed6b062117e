/**
 * Internal branding helper for checked upcasts.
 * Only DispatchBridge.ref() may call this, after verifying isA().
 *
 * @internal
 */
import type { ClassRef, VirtualObject } from '@polybridge/types';

export function brandRefInternal<L extends string>(instance: VirtualObject): ClassRef<L> {
  return instance as ClassRef<L>;
}
