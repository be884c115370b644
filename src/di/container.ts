import 'reflect-metadata';
import { container, type DependencyContainer, instanceCachingFactory } from 'tsyringe';
import { ok, type Result } from 'neverthrow';
import { DI } from './tokens.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import { formatAppError } from '../errors/formatter.js';
import { FILES_ADAPTER, loadSetupConfig, type ValidatedSetupConfig } from '../config/app-config.js';
import { createBootstrapLogger, PinoLoggerFactory, type ILoggerFactory } from '../core/logging/index.js';
import type { AdapterPort } from '../ports/adapter.port.js';
import type { EntryCachePort } from '../ports/entry-cache.port.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { HostPort } from '../ports/host.port.js';
import type { MutatorPort } from '../ports/mutator.port.js';
import type { NotifierPort } from '../ports/notifier.port.js';
import type { ViewRendererPort } from '../ports/view-renderer.port.js';
import { NodeFileSystem } from '../infra/local/fs/index.js';
import { LocalFilesAdapter } from '../infra/local/files-adapter/index.js';
import { InMemoryEntryCache } from '../infra/memory/entry-cache/index.js';
import { TextViewRenderer } from '../infra/text/view-renderer/index.js';
import { AdapterRegistry } from '../application/services/adapter-registry.js';
import { ViewStateStore } from '../application/services/view-state-store.js';
import { Reporter } from '../application/services/reporter.js';
import { WindowBookkeeper } from '../application/services/window-bookkeeping.js';
import { EntryReader } from '../application/services/entry-reader.js';
import { BufferLifecycleController } from '../application/services/buffer-lifecycle.js';
import { Navigator } from '../application/services/navigator.js';
import { FloatWindowManager } from '../application/services/float-window-manager.js';
import { Engine } from '../application/engine.js';

/**
 * What the embedding editor hands the engine. Only the host, the notifier and
 * the mutator are required; everything else has a default.
 */
export interface EngineCollaborators {
  readonly host: HostPort;
  readonly notifier: NotifierPort;
  readonly mutator: MutatorPort;
  /** Extra adapters; a `files` adapter is added unless one is given */
  readonly adapters?: readonly AdapterPort[];
  readonly fileSystem?: FileSystemPort;
  readonly cache?: EntryCachePort;
  readonly view?: ViewRendererPort;
  readonly loggerFactory?: ILoggerFactory;
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerCollaborators(c: DependencyContainer, collaborators: EngineCollaborators): void {
  c.register<HostPort>(DI.Host.Editor, { useValue: collaborators.host });
  c.register<NotifierPort>(DI.Host.Notifier, { useValue: collaborators.notifier });
  c.register<MutatorPort>(DI.Ports.Mutator, { useValue: collaborators.mutator });

  const { loggerFactory, fileSystem, cache, view } = collaborators;
  c.register<ILoggerFactory>(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => loggerFactory ?? c.resolve(PinoLoggerFactory)),
  });
  c.register<FileSystemPort>(DI.Ports.FileSystem, {
    useFactory: instanceCachingFactory(() => fileSystem ?? new NodeFileSystem()),
  });
  c.register<EntryCachePort>(DI.Ports.EntryCache, {
    useFactory: instanceCachingFactory(() => cache ?? new InMemoryEntryCache()),
  });
  c.register<ViewRendererPort>(DI.Ports.ViewRenderer, {
    useFactory: instanceCachingFactory(
      (c) =>
        view ??
        new TextViewRenderer(
          c.resolve<HostPort>(DI.Host.Editor),
          c.resolve<AdapterRegistry>(DI.Services.AdapterRegistry),
          c.resolve<ValidatedSetupConfig>(DI.Config.Setup).columns
        )
    ),
  });
}

function registerServices(c: DependencyContainer): void {
  const logger = (component: string) => c.resolve<ILoggerFactory>(DI.Logging.Factory).create(component);

  c.register<ViewStateStore>(DI.Services.ViewState, {
    useFactory: instanceCachingFactory(() => new ViewStateStore()),
  });
  c.register<Reporter>(DI.Services.Reporter, {
    useFactory: instanceCachingFactory(
      (c) => new Reporter(c.resolve<NotifierPort>(DI.Host.Notifier), logger('Reporter'))
    ),
  });
  c.register<WindowBookkeeper>(DI.Services.WindowBookkeeper, {
    useFactory: instanceCachingFactory((c) => {
      const config = c.resolve<ValidatedSetupConfig>(DI.Config.Setup);
      return new WindowBookkeeper(
        c.resolve<HostPort>(DI.Host.Editor),
        c.resolve<ViewStateStore>(DI.Services.ViewState),
        { winOptions: config.winOptions, restoreWinOptions: config.restoreWinOptions },
        logger('WindowBookkeeper')
      );
    }),
  });
  c.register<EntryReader>(DI.Services.EntryReader, {
    useFactory: instanceCachingFactory(
      (c) =>
        new EntryReader(
          c.resolve<HostPort>(DI.Host.Editor),
          c.resolve<AdapterRegistry>(DI.Services.AdapterRegistry),
          c.resolve<ViewRendererPort>(DI.Ports.ViewRenderer),
          c.resolve<EntryCachePort>(DI.Ports.EntryCache)
        )
    ),
  });
  c.register<BufferLifecycleController>(DI.Services.BufferLifecycle, {
    useFactory: instanceCachingFactory(
      (c) =>
        new BufferLifecycleController({
          host: c.resolve<HostPort>(DI.Host.Editor),
          registry: c.resolve<AdapterRegistry>(DI.Services.AdapterRegistry),
          view: c.resolve<ViewRendererPort>(DI.Ports.ViewRenderer),
          cache: c.resolve<EntryCachePort>(DI.Ports.EntryCache),
          mutator: c.resolve<MutatorPort>(DI.Ports.Mutator),
          store: c.resolve<ViewStateStore>(DI.Services.ViewState),
          bookkeeper: c.resolve<WindowBookkeeper>(DI.Services.WindowBookkeeper),
          entries: c.resolve<EntryReader>(DI.Services.EntryReader),
          reporter: c.resolve<Reporter>(DI.Services.Reporter),
          logger: logger('BufferLifecycle'),
        })
    ),
  });
  c.register<Navigator>(DI.Services.Navigator, {
    useFactory: instanceCachingFactory(
      (c) =>
        new Navigator(
          c.resolve<HostPort>(DI.Host.Editor),
          c.resolve<AdapterRegistry>(DI.Services.AdapterRegistry),
          c.resolve<EntryCachePort>(DI.Ports.EntryCache),
          c.resolve<ViewStateStore>(DI.Services.ViewState),
          c.resolve<EntryReader>(DI.Services.EntryReader),
          c.resolve<Reporter>(DI.Services.Reporter),
          logger('Navigator')
        )
    ),
  });
  c.register<FloatWindowManager>(DI.Services.FloatWindows, {
    useFactory: instanceCachingFactory(
      (c) =>
        new FloatWindowManager(
          c.resolve<HostPort>(DI.Host.Editor),
          c.resolve<ValidatedSetupConfig>(DI.Config.Setup).float,
          c.resolve<Navigator>(DI.Services.Navigator),
          c.resolve<ViewStateStore>(DI.Services.ViewState),
          logger('FloatWindows')
        )
    ),
  });
  c.register<Engine>(DI.Services.Engine, {
    useFactory: instanceCachingFactory(
      (c) =>
        new Engine({
          host: c.resolve<HostPort>(DI.Host.Editor),
          config: c.resolve<ValidatedSetupConfig>(DI.Config.Setup),
          lifecycle: c.resolve<BufferLifecycleController>(DI.Services.BufferLifecycle),
          bookkeeper: c.resolve<WindowBookkeeper>(DI.Services.WindowBookkeeper),
          navigator: c.resolve<Navigator>(DI.Services.Navigator),
          floats: c.resolve<FloatWindowManager>(DI.Services.FloatWindows),
          entries: c.resolve<EntryReader>(DI.Services.EntryReader),
          store: c.resolve<ViewStateStore>(DI.Services.ViewState),
          view: c.resolve<ViewRendererPort>(DI.Ports.ViewRenderer),
          mutator: c.resolve<MutatorPort>(DI.Ports.Mutator),
          reporter: c.resolve<Reporter>(DI.Services.Reporter),
          logger: logger('Engine'),
        })
    ),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// COMPOSITION ROOT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Build the engine's container. Each call gets its own child container, so
 * engines never share state. The adapter registry is built first because
 * scheme tables are the one configuration failure that only shows up once
 * the adapters are known.
 */
export function createEngineContainer(
  options: unknown,
  collaborators: EngineCollaborators
): Result<DependencyContainer, ConfigInvalidError> {
  return loadSetupConfig(options).andThen((config) => {
    const c = container.createChildContainer();
    c.register<ValidatedSetupConfig>(DI.Config.Setup, { useValue: config });
    registerCollaborators(c, collaborators);

    const adapters = [...(collaborators.adapters ?? [])];
    if (!adapters.some((adapter) => adapter.name === FILES_ADAPTER)) {
      adapters.push(new LocalFilesAdapter(c.resolve<FileSystemPort>(DI.Ports.FileSystem), collaborators.host));
    }

    return AdapterRegistry.create({
      schemes: config.adapters,
      aliases: config.adapterAliases,
      adapters,
    }).andThen((registry) => {
      c.register<AdapterRegistry>(DI.Services.AdapterRegistry, { useValue: registry });
      registerServices(c);
      return ok(c);
    });
  });
}

/**
 * Set up an engine on a host: parse options, wire the services, subscribe to
 * host events and register the user command.
 */
export function createEngine(options: unknown, collaborators: EngineCollaborators): Result<Engine, ConfigInvalidError> {
  const result = createEngineContainer(options, collaborators).map((c) => {
    const engine = c.resolve<Engine>(DI.Services.Engine);
    engine.start();
    return engine;
  });
  if (result.isErr()) {
    createBootstrapLogger('setup').error({ issues: result.error.issues }, formatAppError(result.error));
  }
  return result;
}
