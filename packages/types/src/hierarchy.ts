/**
 * Hierarchy Types - classes, virtual methods and native defaults
 */

// === VIRTUAL METHODS ===
/**
 * A virtual method declared on one level of the hierarchy.
 * Identity is (declaring class, name); arity is an optional signature tag.
 */
export interface VirtualMethod {
  name: string;
  /** Expected argument count, checked on every invoke when present */
  arity?: number;
}

/**
 * Method declaration as accepted by registration: a bare name or a full record.
 */
export type MethodSpec = string | VirtualMethod;

// === VIRTUAL OBJECTS ===
/**
 * What native code sees of an instance of the registered hierarchy.
 */
export interface VirtualObject {
  /** Most-derived registered class of this instance */
  readonly className: string;
  /** Host override first, nearest native default second */
  invoke(method: string, ...args: unknown[]): unknown;
  /** Nearest native default, skipping the host */
  invokeDefault(method: string, ...args: unknown[]): unknown;
  /** True for the instance's own class and each of its ancestors */
  isA(className: string): boolean;
}

/**
 * Native default implementation. Receives the instance the call arrived on,
 * so a default can dispatch other virtuals through it.
 */
export type NativeImpl = (self: VirtualObject, ...args: unknown[]) => unknown;

// === REGISTRATION ===
export interface ClassDescriptor {
  name: string;
  /** Name of an already registered class; null or omitted for a root */
  parent?: string | null;
  /** Virtual methods introduced at this level */
  methods?: readonly MethodSpec[];
  /** Native defaults, for methods declared here or at any ancestor */
  defaults?: Readonly<Record<string, NativeImpl>>;
}

/**
 * One level of the registered hierarchy.
 *
 * Nodes live in an arena; `parent` is the arena index of the parent node.
 */
export interface ClassNode {
  readonly index: number;
  readonly name: string;
  readonly parent: number | null;
  readonly methods: ReadonlyMap<string, VirtualMethod>;
  readonly defaults: ReadonlyMap<string, NativeImpl>;
}

// === RESOLUTION ===
export interface ResolvedDefault {
  /** Class whose default was selected */
  owner: string;
  method: string;
  impl: NativeImpl;
}

export interface MethodDeclaration {
  /** Nearest class declaring the method */
  owner: string;
  method: VirtualMethod;
}
