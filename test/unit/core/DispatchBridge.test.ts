/**
 * DispatchBridge Tests
 *
 * - Host result wins over native defaults at every override depth
 * - Missing host override falls back to the nearest ancestor default
 * - defaultFor() walks nearest-ancestor-first and never below the class
 * - Unknown classes, sealed table, disposed bridge
 * - API manifest
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  DispatchBridge,
  DispatchError,
  LifecycleError,
  ObjectHost,
  RegistrationError,
  ResolutionError,
} from '@polybridge/core';
import { createInheritanceBridge, createRecordingLogger } from '../../helpers/inheritance.js';

describe('DispatchBridge', () => {
  describe('Base / Derived / ExtraDerived scenario', () => {
    it('should run the Base default for do_something and the host for do_something_else', () => {
      const { bridge, calls } = createInheritanceBridge();
      const instance = bridge.create('ExtraDerived', {
        do_something_else: () => 'hello again from host',
      });

      assert.strictEqual(instance.invoke('do_something'), 'hello Base');
      assert.deepStrictEqual(calls, ['Base.do_something']);

      assert.strictEqual(instance.invoke('do_something_else'), 'hello again from host');
      assert.deepStrictEqual(calls, ['Base.do_something']);
    });
  });

  describe('host dispatch', () => {
    it('should return the host result and never consult the default', () => {
      const { bridge, calls } = createInheritanceBridge({ derivedDefault: true });
      const instance = bridge.create('ExtraDerived', { do_something: () => 'from host' });

      assert.strictEqual(instance.invoke('do_something'), 'from host');
      assert.deepStrictEqual(calls, []);
    });

    it('should treat an undefined host result as an answer', () => {
      const { bridge, calls } = createInheritanceBridge();
      const instance = bridge.create('Base', { do_something: () => undefined });

      assert.strictEqual(instance.invoke('do_something'), undefined);
      assert.deepStrictEqual(calls, []);
    });

    it('should reach the most-derived host override at every class level', () => {
      class HostBase {
        do_something(): string {
          return 'HostBase';
        }
      }
      class HostMiddle extends HostBase {}
      class HostLeaf extends HostMiddle {
        override do_something(): string {
          return `HostLeaf over ${super.do_something()}`;
        }
      }

      const { bridge, calls } = createInheritanceBridge({ derivedDefault: true });
      for (const level of ['Base', 'Derived', 'ExtraDerived']) {
        const instance = bridge.create(level, new HostLeaf());
        assert.strictEqual(instance.invoke('do_something'), 'HostLeaf over HostBase', level);
      }
      assert.deepStrictEqual(calls, []);
    });

    it('should try the host even for methods no class declares', () => {
      const { bridge } = createInheritanceBridge();
      const instance = bridge.create('Base', { undeclared: (n: unknown) => `got ${String(n)}` });

      assert.strictEqual(instance.invoke('undeclared', 7), 'got 7');
    });
  });

  describe('default fallback', () => {
    it('should use the nearest ancestor default', () => {
      const { bridge, calls } = createInheritanceBridge({ derivedDefault: true });

      assert.strictEqual(bridge.create('ExtraDerived', {}).invoke('do_something'), 'hello Derived');
      assert.strictEqual(bridge.create('Derived', {}).invoke('do_something'), 'hello Derived');
      assert.strictEqual(bridge.create('Base', {}).invoke('do_something'), 'hello Base');
      assert.deepStrictEqual(calls, ['Derived.do_something', 'Derived.do_something', 'Base.do_something']);
    });

    it('should fail with ERR_UNIMPLEMENTED_VIRTUAL when nothing implements the method', () => {
      const { bridge } = createInheritanceBridge();
      const instance = bridge.create('ExtraDerived', {});

      assert.throws(
        () => instance.invoke('do_something_else'),
        (err: unknown) => {
          assert.ok(err instanceof DispatchError);
          assert.strictEqual(err.code, 'ERR_UNIMPLEMENTED_VIRTUAL');
          assert.deepStrictEqual(err.context, { className: 'ExtraDerived', method: 'do_something_else' });
          return true;
        }
      );
    });

    it('should fail with ERR_UNIMPLEMENTED_VIRTUAL for an undeclared method the host lacks', () => {
      const { bridge } = createInheritanceBridge();

      assert.throws(
        () => bridge.create('Base', {}).invoke('never_declared'),
        { name: 'DispatchError', code: 'ERR_UNIMPLEMENTED_VIRTUAL' }
      );
    });
  });

  describe('defaultFor', () => {
    it('should skip Derived when it has no default', () => {
      const { bridge } = createInheritanceBridge();
      assert.strictEqual(bridge.defaultFor('ExtraDerived', 'do_something')?.owner, 'Base');
    });

    it('should find the Derived default first when present', () => {
      const { bridge } = createInheritanceBridge({ derivedDefault: true });
      assert.strictEqual(bridge.defaultFor('ExtraDerived', 'do_something')?.owner, 'Derived');
      assert.strictEqual(bridge.defaultFor('Base', 'do_something')?.owner, 'Base');
    });

    it('should never consider defaults declared below the class', () => {
      const bridge = new DispatchBridge<object>({ host: new ObjectHost() });
      bridge.registerClass({ name: 'Root', methods: ['render'] });
      bridge.registerClass({ name: 'Leaf', parent: 'Root', defaults: { render: () => 'leaf' } });

      assert.strictEqual(bridge.defaultFor('Root', 'render'), undefined);
      assert.throws(() => bridge.create('Root', {}).invoke('render'), { code: 'ERR_UNIMPLEMENTED_VIRTUAL' });
      assert.strictEqual(bridge.create('Leaf', {}).invoke('render'), 'leaf');
    });

    it('should return the same resolution on repeated lookups once sealed', () => {
      const { bridge } = createInheritanceBridge();
      bridge.create('Base', {});

      const first = bridge.defaultFor('ExtraDerived', 'do_something');
      assert.ok(first);
      assert.strictEqual(bridge.defaultFor('ExtraDerived', 'do_something'), first);
      assert.strictEqual(bridge.defaultFor('ExtraDerived', 'do_something_else'), undefined);
    });

    it('should reject unknown classes', () => {
      const { bridge } = createInheritanceBridge();
      assert.throws(() => bridge.defaultFor('Missing', 'do_something'), ResolutionError);
    });
  });

  describe('create', () => {
    it('should fail with ERR_UNKNOWN_CLASS for unregistered names', () => {
      const { bridge } = createInheritanceBridge();

      assert.throws(
        () => bridge.create('Nope', {}),
        (err: unknown) => {
          assert.ok(err instanceof ResolutionError);
          assert.strictEqual(err.code, 'ERR_UNKNOWN_CLASS');
          assert.strictEqual(err.suggestion, 'Registered classes: Base, Derived, ExtraDerived');
          return true;
        }
      );
      assert.strictEqual(bridge.liveInstances, 0);
    });

    it('should seal the class table', () => {
      const { bridge } = createInheritanceBridge();
      assert.strictEqual(bridge.isSealed, false);

      bridge.create('Base', {});

      assert.strictEqual(bridge.isSealed, true);
      assert.throws(
        () => bridge.registerClass({ name: 'Late', parent: 'Base' }),
        (err: unknown) => err instanceof RegistrationError && err.code === 'ERR_REGISTRY_SEALED'
      );
      assert.strictEqual(bridge.getClass('Late'), undefined);
    });

    it('should keep bridges independent', () => {
      const first = createInheritanceBridge();
      const second = createInheritanceBridge();
      first.bridge.create('Base', {});

      assert.strictEqual(second.bridge.isSealed, false);
      assert.doesNotThrow(() => second.bridge.registerClass({ name: 'Other' }));
    });
  });

  describe('ref', () => {
    it('should upcast to an ancestor level without copying', () => {
      const { bridge } = createInheritanceBridge();
      const instance = bridge.create('ExtraDerived', {});

      assert.strictEqual(bridge.ref(instance, 'Base'), instance);
    });

    it('should reject a level the instance is not', () => {
      const { bridge } = createInheritanceBridge();
      const instance = bridge.create('Base', {});

      assert.throws(() => bridge.ref(instance, 'ExtraDerived'), { code: 'ERR_NOT_A_SUBCLASS' });
      assert.throws(() => bridge.ref(instance, 'Unknown'), { code: 'ERR_UNKNOWN_CLASS' });
    });
  });

  describe('manifest', () => {
    it('should list classes with parents and overridable methods', () => {
      const { bridge } = createInheritanceBridge({ derivedDefault: true });

      assert.deepStrictEqual(bridge.manifest(), {
        Base: { overridable: ['do_something'] },
        Derived: { parent: 'Base' },
        ExtraDerived: { parent: 'Derived', overridable: ['do_something_else'] },
      });
    });
  });

  describe('dispose', () => {
    it('should release every live handle exactly once', () => {
      const { bridge, released } = createInheritanceBridge();
      const first = { tag: 'first' };
      const second = { tag: 'second' };
      const third = { tag: 'third' };
      bridge.create('Base', first);
      bridge.create('Derived', second);
      bridge.create('ExtraDerived', third).dispose();

      bridge.dispose();
      bridge.dispose();

      assert.deepStrictEqual(released, [third, first, second]);
      assert.strictEqual(bridge.liveInstances, 0);
    });

    it('should release the remaining handles when one release fails', () => {
      const attempts: string[] = [];
      const bridge = new DispatchBridge<object>({
        host: new ObjectHost({
          onRelease: handle => {
            const tag = String(Reflect.get(handle, 'tag'));
            attempts.push(tag);
            if (tag === 'a') throw new Error('release failed');
          },
        }),
      });
      bridge.registerClass({ name: 'Base', methods: ['run'] });
      const a = bridge.create('Base', { tag: 'a' });
      const b = bridge.create('Base', { tag: 'b' });

      assert.throws(() => bridge.dispose(), { message: 'release failed' });

      assert.deepStrictEqual(attempts, ['a', 'b']);
      assert.strictEqual(a.disposed, true);
      assert.strictEqual(b.disposed, true);
      assert.strictEqual(bridge.liveInstances, 0);
      assert.throws(() => bridge.create('Base', { tag: 'c' }), { code: 'ERR_BRIDGE_DISPOSED' });
      assert.doesNotThrow(() => bridge.dispose());
      assert.deepStrictEqual(attempts, ['a', 'b']);
    });

    it('should aggregate several failed releases', () => {
      const bridge = new DispatchBridge<object>({
        host: new ObjectHost({
          onRelease: () => {
            throw new Error('release failed');
          },
        }),
      });
      bridge.registerClass({ name: 'Base' });
      bridge.create('Base', {});
      bridge.create('Base', {});

      assert.throws(
        () => bridge.dispose(),
        (err: unknown) => {
          assert.ok(err instanceof AggregateError);
          assert.strictEqual(err.message, '2 host handles failed to release');
          assert.strictEqual(err.errors.length, 2);
          return true;
        }
      );
      assert.strictEqual(bridge.liveInstances, 0);
    });

    it('should refuse create and registerClass afterwards', () => {
      const { bridge } = createInheritanceBridge();
      bridge.dispose();

      assert.throws(
        () => bridge.create('Base', {}),
        (err: unknown) => err instanceof LifecycleError && err.code === 'ERR_BRIDGE_DISPOSED'
      );
      assert.throws(() => bridge.registerClass({ name: 'After' }), { code: 'ERR_BRIDGE_DISPOSED' });
    });
  });

  describe('logging', () => {
    it('should trace fallbacks with class and method', () => {
      const logger = createRecordingLogger();
      const { bridge } = createInheritanceBridge({ logger });
      bridge.create('ExtraDerived', {}).invoke('do_something');

      const traces = logger.entries.filter(entry => entry.level === 'trace');
      assert.deepStrictEqual(traces, [
        {
          level: 'trace',
          message: 'No host override, using native default',
          context: { className: 'ExtraDerived', method: 'do_something' },
        },
        {
          level: 'trace',
          message: 'Calling native default',
          context: { className: 'ExtraDerived', method: 'do_something', owner: 'Base' },
        },
      ]);
    });

    it('should log registrations at debug level', () => {
      const logger = createRecordingLogger();
      createInheritanceBridge({ logger });

      const registered = logger.entries.filter(entry => entry.message === 'Registered class');
      assert.deepStrictEqual(registered.map(entry => entry.context?.className), ['Base', 'Derived', 'ExtraDerived']);
      assert.ok(registered.every(entry => entry.level === 'debug'));
    });
  });
});
