/**
 * Manifest Types - what the hierarchy looks like from outside
 */

// === API MANIFEST ===
/**
 * One constructible class as exposed to the host.
 */
export interface ApiManifestEntry {
  parent?: string;
  /** Methods introduced at this level; omitted when there are none */
  overridable?: string[];
}

/**
 * Registered classes keyed by name, in registration order.
 *
 * @example
 * {
 *   "Base": { "overridable": ["do_something"] },
 *   "Derived": { "parent": "Base" }
 * }
 */
export type ApiManifest = Record<string, ApiManifestEntry>;

// === HIERARCHY FILE ===
/**
 * Class entry of a hierarchy file (YAML or JSON).
 * `defaults` maps method names to keys of an implementation table.
 */
export interface HierarchyFileClass {
  parent?: string;
  methods?: Array<string | { name: string; arity?: number }>;
  defaults?: Record<string, string>;
}

export interface HierarchyFile {
  classes: Record<string, HierarchyFileClass>;
}

/**
 * Validated class entry, ready to be bound to implementations.
 */
export interface HierarchyDescriptor {
  name: string;
  parent: string | null;
  methods: Array<{ name: string; arity?: number }>;
  /** method name -> implementation key */
  defaults: Record<string, string>;
}
