/**
 * DispatchBridge - registration, instance creation and default resolution
 *
 * Lifecycle:
 *   1. registerClass() for every level, ancestors first
 *   2. create() instances; the first call seals the class table
 *   3. invoke() on instances, any number of times, reentrantly
 *   4. dispose() instances, or the bridge to release everything still live
 *
 * There is no global bridge: each one owns its own table, so independent
 * bridges can coexist (one per test, one per embedded host).
 *
 * Usage:
 *   const bridge = new DispatchBridge({ host: new ObjectHost() });
 *   bridge.registerClass({ name: 'Base', methods: ['do_something'], defaults: { do_something: baseImpl } });
 *   const obj = bridge.create('Base', { do_something: () => 'from host' });
 *   obj.invoke('do_something'); // 'from host'
 */

import type {
  ApiManifest,
  ClassDescriptor,
  ClassNode,
  ClassRef,
  HostRuntime,
  Logger,
  MethodDeclaration,
  ResolvedDefault,
} from '@polybridge/types';
import { ClassTable } from './ClassTable.js';
import { Trampoline, type TrampolineContext } from './Trampoline.js';
import { buildApiManifest } from './ApiManifest.js';
import { brandRefInternal } from './brandRefInternal.js';
import { DispatchError, LifecycleError } from '../errors/BridgeError.js';
import { ConsoleLogger } from '../logging/Logger.js';

export interface DispatchBridgeOptions<H> {
  host: HostRuntime<H>;
  /** Defaults to a silent ConsoleLogger */
  logger?: Logger;
}

export class DispatchBridge<H = unknown> {
  private readonly table = new ClassTable();
  private readonly host: HostRuntime<H>;
  private readonly logger: Logger;
  private readonly live = new Set<Trampoline<H>>();
  /** (class, method) -> resolved default; filled only once the table is sealed */
  private readonly resolved = new Map<string, ResolvedDefault | null>();
  private readonly context: TrampolineContext<H>;
  private disposed = false;

  constructor(options: DispatchBridgeOptions<H>) {
    this.host = options.host;
    this.logger = options.logger ?? new ConsoleLogger('silent');
    this.context = {
      host: this.host,
      logger: this.logger,
      defaultFor: (className, method) => this.defaultFor(className, method),
      lookupMethod: (className, method) => this.lookupMethod(className, method),
      isSubclass: (className, ancestor) => this.table.isSubclass(className, ancestor),
      detach: (instance) => {
        this.live.delete(instance);
      },
    };
  }

  /** Number of instances created and not yet disposed. */
  get liveInstances(): number {
    return this.live.size;
  }

  get isSealed(): boolean {
    return this.table.isSealed;
  }

  registerClass(descriptor: ClassDescriptor): ClassNode {
    this.assertOpen('registerClass');
    const node = this.table.register(descriptor);
    this.logger.debug('Registered class', {
      className: node.name,
      parent: descriptor.parent ?? null,
      methods: [...node.methods.keys()],
      defaults: [...node.defaults.keys()],
    });
    return node;
  }

  getClass(name: string): ClassNode | undefined {
    return this.table.get(name);
  }

  classes(): readonly ClassNode[] {
    return this.table.list();
  }

  /**
   * Create an instance of `className` bound to a host override handle.
   * Seals the class table.
   */
  create(className: string, handle: H): Trampoline<H> {
    this.assertOpen('create');
    this.table.require(className);

    if (!this.table.isSealed) {
      this.table.seal();
      this.logger.debug('Class table sealed', { classes: this.table.size });
    }

    const instance = new Trampoline(this.context, className, handle);
    this.live.add(instance);
    return instance;
  }

  /**
   * Nearest native default for `method`, starting at `className` and walking
   * toward the root. Levels without a default are skipped.
   */
  defaultFor(className: string, method: string): ResolvedDefault | undefined {
    if (!this.table.isSealed) {
      return this.table.findDefault(className, method);
    }

    const key = `${className}\u0000${method}`;
    const cached = this.resolved.get(key);
    if (cached !== undefined) {
      return cached ?? undefined;
    }

    const found = this.table.findDefault(className, method);
    this.resolved.set(key, found ?? null);
    return found;
  }

  /**
   * Nearest declaration of `method` at or above `className`.
   */
  lookupMethod(className: string, method: string): MethodDeclaration | undefined {
    return this.table.findMethod(className, method);
  }

  isSubclass(className: string, ancestor: string): boolean {
    return this.table.isSubclass(className, ancestor);
  }

  /**
   * Checked upcast: view `instance` through a reference typed at `level`.
   */
  ref<L extends string>(instance: Trampoline<H>, level: L): ClassRef<L> {
    this.table.require(level);
    if (!instance.isA(level)) {
      throw new DispatchError(
        `Instance of "${instance.className}" is not a "${level}"`,
        'ERR_NOT_A_SUBCLASS',
        { className: instance.className, level }
      );
    }
    return brandRefInternal<L>(instance);
  }

  manifest(): ApiManifest {
    return buildApiManifest(this.table.list());
  }

  /**
   * Dispose every live instance, then refuse further use.
   * Calling it again is a no-op.
   *
   * Every instance is disposed even when a host release fails. One failure
   * is rethrown as is; several are rethrown as an AggregateError.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    const instances = [...this.live];
    const failures: unknown[] = [];
    for (const instance of instances) {
      try {
        instance.dispose();
      } catch (err) {
        failures.push(err);
      }
    }
    this.resolved.clear();
    this.logger.debug('Bridge disposed', {
      releasedInstances: instances.length - failures.length,
      failedReleases: failures.length,
    });

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `${failures.length} host handles failed to release`);
    }
  }

  private assertOpen(operation: string): void {
    if (this.disposed) {
      throw new LifecycleError(
        `Cannot ${operation}: bridge was disposed`,
        'ERR_BRIDGE_DISPOSED',
        { operation }
      );
    }
  }
}
