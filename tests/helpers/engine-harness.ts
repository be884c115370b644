import { loadSetupConfig, type SetupOptions, type ValidatedSetupConfig } from '../../src/config/app-config.js';
import { AdapterRegistry } from '../../src/application/services/adapter-registry.js';
import { ViewStateStore } from '../../src/application/services/view-state-store.js';
import { Reporter } from '../../src/application/services/reporter.js';
import { WindowBookkeeper } from '../../src/application/services/window-bookkeeping.js';
import { EntryReader } from '../../src/application/services/entry-reader.js';
import { BufferLifecycleController } from '../../src/application/services/buffer-lifecycle.js';
import { Navigator } from '../../src/application/services/navigator.js';
import { FloatWindowManager } from '../../src/application/services/float-window-manager.js';
import { Engine } from '../../src/application/engine.js';
import { InMemoryEntryCache } from '../../src/infra/memory/entry-cache/index.js';
import { TextViewRenderer } from '../../src/infra/text/view-renderer/index.js';
import type { AdapterPort } from '../../src/ports/adapter.port.js';
import { FakeAdapter, FakeMutator, InMemoryHost, RecordingNotifier, type InMemoryHostOptions } from '../fakes/engine/index.js';
import { FakeLoggerFactory } from './FakeLoggerFactory.js';

export interface Harness {
  readonly host: InMemoryHost;
  /** Registered as the `files` adapter under `burrow://` */
  readonly adapter: FakeAdapter;
  readonly mutator: FakeMutator;
  readonly notifier: RecordingNotifier;
  readonly logs: FakeLoggerFactory;
  readonly config: ValidatedSetupConfig;
  readonly registry: AdapterRegistry;
  readonly cache: InMemoryEntryCache;
  readonly view: TextViewRenderer;
  readonly store: ViewStateStore;
  readonly reporter: Reporter;
  readonly bookkeeper: WindowBookkeeper;
  readonly entries: EntryReader;
  readonly lifecycle: BufferLifecycleController;
  readonly navigator: Navigator;
  readonly floats: FloatWindowManager;
  readonly engine: Engine;
}

export interface HarnessOptions {
  readonly setup?: SetupOptions;
  readonly host?: InMemoryHostOptions;
  readonly extraAdapters?: (host: InMemoryHost) => readonly AdapterPort[];
  /** Subscribe the engine to host events (default true) */
  readonly start?: boolean;
}

/**
 * Engine services wired by hand around in-memory fakes.
 */
export function createHarness(options: HarnessOptions = {}): Harness {
  const host = new InMemoryHost(options.host);
  const adapter = new FakeAdapter('files', host);
  const mutator = new FakeMutator();
  const notifier = new RecordingNotifier();
  const logs = new FakeLoggerFactory();
  const config = loadSetupConfig(options.setup ?? {})._unsafeUnwrap();
  const registry = AdapterRegistry.create({
    schemes: config.adapters,
    aliases: config.adapterAliases,
    adapters: [adapter, ...(options.extraAdapters?.(host) ?? [])],
  })._unsafeUnwrap();

  const cache = new InMemoryEntryCache();
  const view = new TextViewRenderer(host, registry, config.columns);
  const store = new ViewStateStore();
  const reporter = new Reporter(notifier, logs.create('Reporter'));
  const bookkeeper = new WindowBookkeeper(
    host,
    store,
    { winOptions: config.winOptions, restoreWinOptions: config.restoreWinOptions },
    logs.create('WindowBookkeeper')
  );
  const entries = new EntryReader(host, registry, view, cache);
  const lifecycle = new BufferLifecycleController({
    host,
    registry,
    view,
    cache,
    mutator,
    store,
    bookkeeper,
    entries,
    reporter,
    logger: logs.create('BufferLifecycle'),
  });
  const navigator = new Navigator(host, registry, cache, store, entries, reporter, logs.create('Navigator'));
  const floats = new FloatWindowManager(host, config.float, navigator, store, logs.create('FloatWindows'));
  const engine = new Engine({
    host,
    config,
    lifecycle,
    bookkeeper,
    navigator,
    floats,
    entries,
    store,
    view,
    mutator,
    reporter,
    logger: logs.create('Engine'),
  });
  if (options.start ?? true) engine.start();

  return {
    host,
    adapter,
    mutator,
    notifier,
    logs,
    config,
    registry,
    cache,
    view,
    store,
    reporter,
    bookkeeper,
    entries,
    lifecycle,
    navigator,
    floats,
    engine,
  };
}
