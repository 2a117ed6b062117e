/**
 * ClassTable - arena of registered hierarchy levels
 *
 * Nodes are stored in registration order and refer to their parent by arena
 * index, so every ancestor walk is an explicit loop over indices rather than a
 * prototype lookup. A parent must be registered before its children, which
 * keeps every parent chain finite and acyclic.
 *
 * Registration validates the whole descriptor before touching the arena: a
 * rejected descriptor leaves the table exactly as it was.
 */

import type {
  ClassDescriptor,
  ClassNode,
  MethodDeclaration,
  MethodSpec,
  NativeImpl,
  ResolvedDefault,
  VirtualMethod,
} from '@polybridge/types';
import { RegistrationError, ResolutionError } from '../errors/BridgeError.js';

function normalizeMethod(spec: MethodSpec, className: string): VirtualMethod {
  const method: VirtualMethod = typeof spec === 'string' ? { name: spec } : { ...spec };

  if (typeof method.name !== 'string' || !method.name.trim()) {
    throw new RegistrationError(
      `Class "${className}" declares a method with an empty name`,
      'ERR_INVALID_DESCRIPTOR',
      { className }
    );
  }

  if (method.arity !== undefined && (!Number.isInteger(method.arity) || method.arity < 0)) {
    throw new RegistrationError(
      `Method "${className}.${method.name}" has invalid arity ${String(method.arity)}`,
      'ERR_INVALID_DESCRIPTOR',
      { className, method: method.name },
      'Arity must be a non-negative integer'
    );
  }

  return method;
}

export class ClassTable {
  private readonly nodes: ClassNode[] = [];
  private readonly byName = new Map<string, number>();
  private sealed = false;

  get size(): number {
    return this.nodes.length;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Freeze the table. Later registrations fail with ERR_REGISTRY_SEALED.
   */
  seal(): void {
    this.sealed = true;
  }

  register(descriptor: ClassDescriptor): ClassNode {
    const { name } = descriptor;

    if (this.sealed) {
      throw new RegistrationError(
        `Cannot register "${name}": instances have already been created`,
        'ERR_REGISTRY_SEALED',
        { className: name },
        'Register every class before the first create() call'
      );
    }

    if (typeof name !== 'string' || !name.trim()) {
      throw new RegistrationError('Class name cannot be empty', 'ERR_INVALID_DESCRIPTOR');
    }

    if (this.byName.has(name)) {
      throw new RegistrationError(
        `Class "${name}" is already registered`,
        'ERR_DUPLICATE_CLASS',
        { className: name }
      );
    }

    let parent: number | null = null;
    if (descriptor.parent !== undefined && descriptor.parent !== null) {
      const parentIndex = this.byName.get(descriptor.parent);
      if (parentIndex === undefined) {
        throw new RegistrationError(
          `Parent class "${descriptor.parent}" of "${name}" is not registered`,
          'ERR_UNKNOWN_PARENT',
          { className: name, parent: descriptor.parent },
          `Register "${descriptor.parent}" before "${name}"`
        );
      }
      parent = parentIndex;
    }

    const methods = new Map<string, VirtualMethod>();
    for (const spec of descriptor.methods ?? []) {
      const method = normalizeMethod(spec, name);
      if (methods.has(method.name)) {
        throw new RegistrationError(
          `Method "${name}.${method.name}" is declared twice`,
          'ERR_INVALID_DESCRIPTOR',
          { className: name, method: method.name }
        );
      }
      methods.set(method.name, method);
    }

    const defaults = new Map<string, NativeImpl>();
    for (const [methodName, impl] of Object.entries(descriptor.defaults ?? {})) {
      const declared = methods.has(methodName) || (parent !== null && this.declarationFrom(parent, methodName) !== undefined);
      if (!declared) {
        throw new RegistrationError(
          `Default for "${name}.${methodName}" has no virtual method to implement`,
          'ERR_UNDECLARED_DEFAULT',
          { className: name, method: methodName },
          `Declare "${methodName}" on "${name}" or one of its ancestors`
        );
      }
      defaults.set(methodName, impl);
    }

    const node: ClassNode = { index: this.nodes.length, name, parent, methods, defaults };
    this.nodes.push(node);
    this.byName.set(name, node.index);
    return node;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): ClassNode | undefined {
    const index = this.byName.get(name);
    return index === undefined ? undefined : this.nodes[index];
  }

  /**
   * Like get(), but an unregistered name is an error.
   */
  require(name: string): ClassNode {
    const node = this.get(name);
    if (!node) {
      throw new ResolutionError(
        `Class "${name}" is not registered`,
        'ERR_UNKNOWN_CLASS',
        { className: name },
        this.nodes.length > 0 ? `Registered classes: ${this.names().join(', ')}` : undefined
      );
    }
    return node;
  }

  /** All nodes in registration order (ancestors before descendants). */
  list(): readonly ClassNode[] {
    return this.nodes;
  }

  names(): string[] {
    return this.nodes.map(node => node.name);
  }

  parentOf(node: ClassNode): ClassNode | null {
    return node.parent === null ? null : this.nodes[node.parent];
  }

  /**
   * The node itself, then each ancestor up to the root.
   */
  *ancestry(node: ClassNode): Generator<ClassNode> {
    let current: ClassNode | null = node;
    while (current) {
      yield current;
      current = this.parentOf(current);
    }
  }

  /**
   * True when `ancestor` is `name` itself or one of its ancestors.
   * An unregistered `ancestor` is simply not an ancestor.
   */
  isSubclass(name: string, ancestor: string): boolean {
    const target = this.get(ancestor);
    if (!target) return false;
    for (const node of this.ancestry(this.require(name))) {
      if (node.index === target.index) return true;
    }
    return false;
  }

  /**
   * Nearest declaration of a virtual method, walking from `name` to the root.
   */
  findMethod(name: string, method: string): MethodDeclaration | undefined {
    return this.declarationFrom(this.require(name).index, method);
  }

  /**
   * Nearest native default, walking from `name` to the root.
   * Levels without a default for `method` are skipped.
   */
  findDefault(name: string, method: string): ResolvedDefault | undefined {
    for (const node of this.ancestry(this.require(name))) {
      const impl = node.defaults.get(method);
      if (impl) {
        return { owner: node.name, method, impl };
      }
    }
    return undefined;
  }

  private declarationFrom(index: number, method: string): MethodDeclaration | undefined {
    for (const node of this.ancestry(this.nodes[index])) {
      const declared = node.methods.get(method);
      if (declared) {
        return { owner: node.name, method: declared };
      }
    }
    return undefined;
  }
}
