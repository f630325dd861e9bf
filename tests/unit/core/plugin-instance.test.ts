/**
 * Tests for the PluginInstance lifecycle controller.
 */

import { existsSync } from 'node:fs';
import { writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createPluginInstance, type PluginInstance } from '../../../src/core/plugin-instance.js';
import {
  IdentityError,
  LifecycleError,
  TeardownError,
  ValidationError,
  WorkspaceError,
} from '../../../src/core/plugin-errors.js';
import { createFileDataStore } from '../../../src/storage/data-store.js';
import { DataSaveError } from '../../../src/storage/errors.js';
import type { PluginContext, PluginDefinition, PluginHooks } from '../../../src/types/plugin.js';
import {
  FakeScheduler,
  MemoryEngine,
  RecordingRegistrar,
  createMockLogger,
  createTempDir,
  createTestDefinition,
  loggedMessages,
  removeTempDir,
  type MockLogger,
} from '../../helpers/factories.js';

describe('PluginInstance', () => {
  let root: string;
  let persistentRoot: string;
  let dataFile: string;
  let registrar: RecordingRegistrar;
  let scheduler: FakeScheduler;
  let engine: MemoryEngine;
  let logger: MockLogger;

  beforeEach(async () => {
    root = await createTempDir();
    persistentRoot = join(root, 'data');
    dataFile = join(persistentRoot, 'sample', 'sample.json');
    registrar = new RecordingRegistrar();
    scheduler = new FakeScheduler();
    engine = new MemoryEngine();
    logger = createMockLogger();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  function create(definition: PluginDefinition, debug = false): PluginInstance {
    return createPluginInstance(
      definition,
      { eventBus: registrar, scheduler, persistence: engine },
      { persistentRoot, debug, logger }
    );
  }

  describe('construction', () => {
    it('resolves identity, paths and first load', () => {
      const instance = create(createTestDefinition(root));

      expect(instance.state).toBe('uninitialized');
      expect(instance.name).toBe('Sample');
      expect(instance.identity.author).toBe('Unknown');
      expect(instance.identity.dependencies).toEqual({});
      expect(instance.paths.workDir).toBe(join(persistentRoot, 'sample'));
      expect(instance.paths.dataFile).toBe(dataFile);
      expect(instance.firstLoad).toBe(true);
      expect(instance.debug).toBe(false);
      expect(instance.extras).toEqual({});
      expect(instance.data).toEqual({});
      expect(instance.funcs).toEqual([]);
    });

    it('rejects a definition without a version', () => {
      const definition = createTestDefinition(root);
      definition.identity.version = '';

      expect(() => create(definition)).toThrow(IdentityError);
    });

    it('rejects a work dir occupied by a file', async () => {
      await mkdir(persistentRoot, { recursive: true });
      await writeFile(join(persistentRoot, 'sample'), 'x');

      expect(() => create(createTestDefinition(root))).toThrow(WorkspaceError);
    });

    it('rejects a save format the engine cannot write', () => {
      expect(() => create(createTestDefinition(root, { saveFormat: 'yaml' }))).toThrow(
        new ValidationError('Sample', 'no codec for save format "yaml"')
      );
      expect(existsSync(join(persistentRoot, 'sample'))).toBe(false);
    });

    it('accepts a save format the engine supports', () => {
      engine.formats.add('yaml');

      const instance = create(createTestDefinition(root, { saveFormat: 'yaml' }));

      expect(instance.paths.dataFile).toBe(join(persistentRoot, 'sample', 'sample.yaml'));
    });

    it('accepts declared extras and freezes them', () => {
      const api = { sendMessage: vi.fn(() => Promise.resolve()) };
      const instance = createPluginInstance(
        createTestDefinition(root),
        { eventBus: registrar, scheduler, persistence: engine },
        { persistentRoot, logger, extras: { metaData: { source: 'bundled' }, api } }
      );

      expect(instance.extras.metaData).toEqual({ source: 'bundled' });
      expect(instance.extras.api).toBe(api);
      expect(Object.isFrozen(instance.extras)).toBe(true);
    });

    it('rejects undeclared extras', () => {
      const extras = { metaData: {}, token: 'test-secret' };

      expect(() =>
        createPluginInstance(
          createTestDefinition(root),
          { eventBus: registrar, scheduler, persistence: engine },
          { persistentRoot, logger, extras }
        )
      ).toThrow(ValidationError);
    });
  });

  describe('load', () => {
    it('loads data, then runs init, then onLoad', async () => {
      engine.files.set(dataFile, JSON.stringify({ count: 1 }));
      const events: string[] = [];
      const instance = create(
        createTestDefinition(root, {
          hooks: {
            init(ctx) {
              events.push(`init:${String(ctx.data['count'])}`);
            },
            onLoad(ctx) {
              events.push(`onLoad:${String(ctx.data['count'])}`);
              return Promise.resolve();
            },
          },
        })
      );

      await instance.load();

      expect(events).toEqual(['init:1', 'onLoad:1']);
      expect(instance.state).toBe('loaded');
      expect(instance.data).toEqual({ count: 1 });
    });

    it('recovers a missing store before running hooks', async () => {
      const instance = create(createTestDefinition(root));

      await instance.load();

      expect(engine.files.get(dataFile)).toBe('{}');
      expect(instance.state).toBe('loaded');
    });

    it('runs at most once', async () => {
      const init = vi.fn();
      const instance = create(createTestDefinition(root, { hooks: { init } }));
      await instance.load();

      await expect(instance.load()).rejects.toThrow(LifecycleError);
      expect(init).toHaveBeenCalledOnce();
      expect(instance.state).toBe('loaded');
    });

    it('marks the instance failed and drops registrations when a hook throws', async () => {
      const instance = create(
        createTestDefinition(root, {
          hooks: {
            init(ctx) {
              ctx.registerUserFunc('forecast', vi.fn(), { rawMessageFilter: 'forecast' });
              ctx.addScheduledTask('refresh', vi.fn(), { intervalMs: 1000 });
            },
            onLoad() {
              return Promise.reject(new Error('upstream unavailable'));
            },
          },
        })
      );

      await expect(instance.load()).rejects.toThrow('upstream unavailable');
      expect(instance.state).toBe('failed');
      expect(instance.funcs).toEqual([]);
      expect(registrar.active).toEqual([]);
      expect(scheduler.pending.size).toBe(0);
      expect(loggedMessages(logger, 'error')).toEqual(['Plugin load failed']);
    });

    it('propagates an unrecoverable persistence failure', async () => {
      engine.saveError = new DataSaveError(dataFile, new Error('read-only'));
      const init = vi.fn();
      const instance = create(createTestDefinition(root, { hooks: { init } }));

      await expect(instance.load()).rejects.toBeInstanceOf(DataSaveError);
      expect(init).not.toHaveBeenCalled();
      expect(instance.state).toBe('failed');
    });
  });

  describe('unload', () => {
    it('unregisters, runs close and onClose with args, then saves', async () => {
      const events: string[] = [];
      const hooks: PluginHooks = {
        init(ctx) {
          ctx.registerUserFunc('forecast', vi.fn(), { rawMessageFilter: 'forecast' });
          ctx.registerDefaultFunc(vi.fn());
          ctx.addScheduledTask('refresh', vi.fn(), { intervalMs: 1000 });
          ctx.data['count'] = 5;
        },
        close(_ctx, ...args) {
          events.push(`close:${args.join(',')}`);
          events.push(`bus:${String(registrar.active.length)}`);
          events.push(`tasks:${String(scheduler.pending.size)}`);
        },
        onClose(_ctx, ...args) {
          events.push(`onClose:${args.join(',')}`);
          events.push(`saves:${String(engine.saves.length)}`);
          return Promise.resolve();
        },
      };
      const instance = create(createTestDefinition(root, { hooks }));
      await instance.load();
      expect(registrar.active).toHaveLength(2);
      const savesAfterLoad = engine.saves.length;

      await instance.unload('restart', 3);

      expect(events).toEqual([
        'close:restart,3',
        'bus:0',
        'tasks:0',
        'onClose:restart,3',
        `saves:${String(savesAfterLoad)}`,
      ]);
      expect(engine.saves).toHaveLength(savesAfterLoad + 1);
      expect(engine.files.get(dataFile)).toBe('{"count":5}');
      expect(instance.state).toBe('unloaded');
      expect(instance.funcs).toEqual([]);
    });

    it('requires a loaded instance', async () => {
      const instance = create(createTestDefinition(root));

      await expect(instance.unload()).rejects.toThrow(
        'Plugin Sample: cannot unload from state "uninitialized"'
      );
    });

    it('runs at most once', async () => {
      const close = vi.fn();
      const instance = create(createTestDefinition(root, { hooks: { close } }));
      await instance.load();
      await instance.unload();

      await expect(instance.unload()).rejects.toThrow(LifecycleError);
      expect(close).toHaveBeenCalledOnce();
    });

    it('wraps a save failure in TeardownError', async () => {
      const instance = create(createTestDefinition(root));
      await instance.load();
      const cause = new DataSaveError(dataFile, new Error('disk full'));
      engine.saveError = cause;

      const error: unknown = await instance.unload().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TeardownError);
      expect(error instanceof TeardownError && error.cause).toBe(cause);
      expect(instance.state).toBe('failed');
    });

    it('propagates hook errors unchanged', async () => {
      const failure = new Error('close failed');
      const instance = create(
        createTestDefinition(root, {
          hooks: {
            close() {
              throw failure;
            },
          },
        })
      );
      await instance.load();
      const savesAfterLoad = engine.saves.length;

      await expect(instance.unload()).rejects.toBe(failure);
      expect(instance.state).toBe('failed');
      expect(engine.saves).toHaveLength(savesAfterLoad);
    });

    it('logs the tree instead of saving in debug mode', async () => {
      engine.files.set(dataFile, JSON.stringify({ count: 2 }));
      const instance = create(createTestDefinition(root), true);
      await instance.load();

      await instance.unload();

      expect(engine.saves).toEqual([]);
      expect(instance.state).toBe('unloaded');
      expect(loggedMessages(logger, 'warn')).toContain(
        'Debug mode: persisted data not saved on unload'
      );
      expect(loggedMessages(logger, 'info')).toContain('Sample\n└── count: 2');
    });
  });

  describe('context', () => {
    it('resolves paths against the work and source dirs', async () => {
      let captured: PluginContext | undefined;
      const instance = create(
        createTestDefinition(root, {
          hooks: {
            init(ctx) {
              captured = ctx;
            },
          },
        })
      );
      await instance.load();

      expect(captured?.workPath('cache', 'a.txt')).toBe(
        join(persistentRoot, 'sample', 'cache', 'a.txt')
      );
      expect(captured?.sourcePath('assets')).toBe(join(root, 'src', 'sample', 'assets'));
      expect(captured?.data).toBe(instance.data);
      expect(captured?.lock).toBe(instance.lock);
    });

    it('exposes declared configs and resolves them', async () => {
      const instance = create(
        createTestDefinition(root, {
          hooks: {
            init(ctx) {
              ctx.registerConfig('city', 'Oslo');
              ctx.registerConfig('days', 3, (raw) => Number(raw));
            },
          },
        })
      );
      await instance.load();

      expect(instance.configs.map((conf) => conf.key)).toEqual(['city', 'days']);
      expect(instance.resolveConfig({ days: '5' })).toEqual({ city: 'Oslo', days: 5 });
    });

    it('fills ctx.config after init and before onLoad', async () => {
      const seen: Record<string, unknown>[] = [];
      const instance = createPluginInstance(
        createTestDefinition(root, {
          hooks: {
            init(ctx) {
              ctx.registerConfig('days', 3, (raw) => Number(raw));
              ctx.registerConfig('city', 'Oslo');
              seen.push({ ...ctx.config });
            },
            onLoad(ctx) {
              seen.push({ ...ctx.config });
              return Promise.resolve();
            },
          },
        }),
        { eventBus: registrar, scheduler, persistence: engine },
        { persistentRoot, logger, config: { days: '5' } }
      );

      await instance.load();

      expect(seen).toEqual([{}, { days: 5, city: 'Oslo' }]);
      expect(instance.config).toEqual({ days: 5, city: 'Oslo' });
    });

    it('fails the load when a config value cannot be converted', async () => {
      const onLoad = vi.fn(() => Promise.resolve());
      const instance = createPluginInstance(
        createTestDefinition(root, {
          hooks: {
            init(ctx) {
              ctx.registerConfig('days', 3, () => {
                throw new Error('not a number');
              });
              ctx.addScheduledTask('refresh', vi.fn(), { intervalMs: 1000 });
            },
            onLoad,
          },
        }),
        { eventBus: registrar, scheduler, persistence: engine },
        { persistentRoot, logger, config: { days: 'many' } }
      );

      await expect(instance.load()).rejects.toBeInstanceOf(ValidationError);

      expect(instance.state).toBe('failed');
      expect(onLoad).not.toHaveBeenCalled();
      expect(scheduler.names()).toEqual([]);
      expect(loggedMessages(logger, 'error')).toEqual(['Plugin load failed']);
    });

    it('frees a removed task name', async () => {
      let captured: PluginContext | undefined;
      const instance = create(
        createTestDefinition(root, {
          hooks: {
            init(ctx) {
              captured = ctx;
              ctx.addScheduledTask('refresh', vi.fn(), { intervalMs: 1000 });
            },
          },
        })
      );
      await instance.load();

      expect(captured?.removeScheduledTask('refresh')).toBe(true);
      expect(scheduler.names()).toEqual([]);
    });
  });

  describe('two instances with the same name', () => {
    it('keep separate state', async () => {
      const definition = createTestDefinition(root, {
        hooks: {
          init(ctx) {
            ctx.registerUserFunc('forecast', vi.fn(), { rawMessageFilter: 'forecast' });
          },
        },
      });
      const a = create(definition);
      const b = create(definition);
      await a.load();
      await b.load();

      a.data['city'] = 'Oslo';

      expect(b.data).toEqual({});
      expect(a.data).not.toBe(b.data);
      expect(a.lock).not.toBe(b.lock);
      expect(a.funcs).toHaveLength(1);
      expect(b.funcs).toHaveLength(1);
      expect(a.funcs[0]).not.toBe(b.funcs[0]);

      await a.unload();

      expect(a.state).toBe('unloaded');
      expect(b.state).toBe('loaded');
      expect(registrar.active).toEqual([b.funcs[0]]);
    });
  });

  describe('with the file data store', () => {
    it('persists data across instances', async () => {
      const store = createFileDataStore();
      const collaborators = { eventBus: registrar, scheduler, persistence: store };
      const definition = createTestDefinition(root, {
        hooks: {
          init(ctx) {
            const visits = ctx.data['visits'];
            ctx.data['visits'] = typeof visits === 'number' ? visits + 1 : 1;
          },
        },
      });

      const first = createPluginInstance(definition, collaborators, { persistentRoot, logger });
      expect(first.firstLoad).toBe(true);
      await first.load();
      await first.unload();

      const second = createPluginInstance(definition, collaborators, { persistentRoot, logger });
      expect(second.firstLoad).toBe(false);
      await second.load();

      expect(second.data).toEqual({ visits: 2 });
    });
  });
});
