/**
 * Host capability consumed by the bridge.
 *
 * A host is the dynamically-typed environment that supplies overrides.
 * The bridge never inspects a handle; it only passes it back to the host.
 */
export interface HostRuntime<H = unknown> {
  /**
   * Invoke `method` on the override object behind `handle`.
   * Must throw NoSuchMethodError when the object does not implement it.
   */
  invoke(handle: H, method: string, args: readonly unknown[]): unknown;

  /** Give up ownership of `handle`. Called once per instance. */
  release?(handle: H): void;
}
