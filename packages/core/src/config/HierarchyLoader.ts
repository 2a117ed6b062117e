/**
 * Hierarchy files - class hierarchies declared in YAML or JSON
 *
 * ```yaml
 * classes:
 *   Base:
 *     methods:
 *       - name: do_something
 *         arity: 0
 *     defaults:
 *       do_something: base.do_something
 *   Derived:
 *     parent: Base
 * ```
 *
 * Defaults name keys of an implementation table supplied in code, since a
 * file cannot carry functions. Classes may appear in any order; loading sorts
 * them parents-first.
 */

import { readFileSync } from 'fs';
import { extname } from 'path';
import { parse as parseYAML } from 'yaml';
import type { ClassDescriptor, ClassNode, HierarchyDescriptor, NativeImpl } from '@polybridge/types';
import type { DispatchBridge } from '../core/DispatchBridge.js';
import { ClassTable } from '../core/ClassTable.js';
import { toposort, CycleError } from '../core/toposort.js';
import { ConfigError } from '../errors/BridgeError.js';

export type ImplementationTable = Readonly<Record<string, NativeImpl>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string, filePath?: string): ConfigError {
  return new ConfigError(`Hierarchy error: ${message}`, 'ERR_CONFIG_INVALID', filePath ? { filePath } : {});
}

function parseMethods(value: unknown, className: string, filePath?: string): HierarchyDescriptor['methods'] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw invalid(`classes.${className}.methods must be an array`, filePath);
  }

  return value.map((item: unknown, i) => {
    if (typeof item === 'string') return { name: item };
    if (isRecord(item) && typeof item.name === 'string') {
      const { arity } = item;
      if (arity === undefined || arity === null) return { name: item.name };
      if (typeof arity !== 'number') {
        throw invalid(`classes.${className}.methods[${i}].arity must be a number`, filePath);
      }
      return { name: item.name, arity };
    }
    throw invalid(`classes.${className}.methods[${i}] must be a name or { name, arity }`, filePath);
  });
}

function parseDefaults(value: unknown, className: string, filePath?: string): Record<string, string> {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw invalid(`classes.${className}.defaults must be a mapping`, filePath);
  }

  const defaults: Record<string, string> = {};
  for (const [method, key] of Object.entries(value)) {
    if (typeof key !== 'string' || !key.trim()) {
      throw invalid(`classes.${className}.defaults.${method} must name an implementation`, filePath);
    }
    defaults[method] = key;
  }
  return defaults;
}

/**
 * Validate a parsed hierarchy file and order its classes parents-first.
 */
export function parseHierarchy(raw: unknown, filePath?: string): HierarchyDescriptor[] {
  if (!isRecord(raw) || !isRecord(raw.classes)) {
    throw invalid('file must contain a "classes" mapping', filePath);
  }

  const byName = new Map<string, HierarchyDescriptor>();
  for (const [name, entry] of Object.entries(raw.classes)) {
    const fields = entry ?? {};
    if (!isRecord(fields)) {
      throw invalid(`classes.${name} must be a mapping`, filePath);
    }

    let parent: string | null = null;
    if (fields.parent !== undefined && fields.parent !== null) {
      if (typeof fields.parent !== 'string') {
        throw invalid(`classes.${name}.parent must be a string`, filePath);
      }
      parent = fields.parent;
    }

    byName.set(name, {
      name,
      parent,
      methods: parseMethods(fields.methods, name, filePath),
      defaults: parseDefaults(fields.defaults, name, filePath),
    });
  }

  let order: string[];
  try {
    order = toposort(
      [...byName.values()].map(d => ({ id: d.name, dependencies: d.parent === null ? [] : [d.parent] }))
    );
  } catch (err) {
    if (err instanceof CycleError) {
      throw new ConfigError(
        `Hierarchy error: inheritance cycle ${err.cycle.join(' -> ')}`,
        'ERR_HIERARCHY_CYCLE',
        { cycle: err.cycle, ...(filePath ? { filePath } : {}) }
      );
    }
    throw err;
  }

  const sorted: HierarchyDescriptor[] = [];
  for (const name of order) {
    const descriptor = byName.get(name);
    if (descriptor) sorted.push(descriptor);
  }
  return sorted;
}

/**
 * Read a hierarchy file. `.json` files are parsed as JSON, everything else as YAML.
 */
export function loadHierarchy(filePath: string): HierarchyDescriptor[] {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read hierarchy file: ${reason}`, 'ERR_CONFIG_INVALID', { filePath });
  }

  let raw: unknown;
  try {
    raw = extname(filePath).toLowerCase() === '.json' ? JSON.parse(text) : parseYAML(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot parse hierarchy file: ${reason}`, 'ERR_CONFIG_INVALID', { filePath });
  }

  return parseHierarchy(raw, filePath);
}

/**
 * Bind default keys to `impls` and register every class on `bridge`.
 *
 * The whole file is first registered on a scratch table holding a copy of
 * the bridge's classes, so any registration error (missing implementation,
 * unknown parent, duplicate class or method, undeclared default) is raised
 * before the bridge is touched.
 */
export function registerHierarchy<H>(
  bridge: DispatchBridge<H>,
  hierarchy: readonly HierarchyDescriptor[],
  impls: ImplementationTable
): ClassNode[] {
  const bound: ClassDescriptor[] = hierarchy.map(descriptor => {
    const defaults: Record<string, NativeImpl> = {};
    for (const [method, key] of Object.entries(descriptor.defaults)) {
      const impl = Object.prototype.hasOwnProperty.call(impls, key) ? impls[key] : undefined;
      if (!impl) {
        throw new ConfigError(
          `No implementation "${key}" for default ${descriptor.name}.${method}`,
          'ERR_CONFIG_MISSING_IMPL',
          { className: descriptor.name, method, key },
          `Add "${key}" to the implementation table`
        );
      }
      defaults[method] = impl;
    }
    return { name: descriptor.name, parent: descriptor.parent, methods: descriptor.methods, defaults };
  });

  const scratch = new ClassTable();
  const existing = bridge.classes();
  for (const node of existing) {
    scratch.register({
      name: node.name,
      parent: node.parent === null ? null : existing[node.parent].name,
      methods: [...node.methods.values()],
      defaults: Object.fromEntries(node.defaults),
    });
  }
  for (const descriptor of bound) {
    scratch.register(descriptor);
  }

  return bound.map(descriptor => bridge.registerClass(descriptor));
}
