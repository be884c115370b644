// DI Container exports
export { createEngine, createEngineContainer } from './di/container.js';
export type { EngineCollaborators } from './di/container.js';
export { DI } from './di/tokens.js';

// Engine
export { Engine } from './application/engine.js';
export type { EngineServices, SaveOptions } from './application/engine.js';
export type { SelectOptions, SelectOutcome, ParentUrl } from './application/services/navigator.js';
export type {
  BufferState,
  BufferStatus,
  LoadOutcome,
  RenderOutcome,
  WriteOutcome,
} from './application/services/buffer-lifecycle.js';

// Configuration
export { loadSetupConfig, DEFAULT_SCHEME, ENGINE_FILETYPE, COMMAND_NAME, FILES_ADAPTER } from './config/app-config.js';
export type { SetupOptions, SetupConfig, ValidatedSetupConfig, FloatConfig } from './config/app-config.js';

// Ports
export type * from './ports/host.port.js';
export type { AdapterPort, AdapterAction, ColumnDefinition } from './ports/adapter.port.js';
export type { EntryCachePort } from './ports/entry-cache.port.js';
export type { MutatorPort } from './ports/mutator.port.js';
export type { NotifierPort, NotifyLevel } from './ports/notifier.port.js';
export type { ViewRendererPort, ColumnSpec } from './ports/view-renderer.port.js';
export type { FileSystemPort, FsError, FsStat, FsDirent, FsNodeKind } from './ports/fs.port.js';

// Domain
export type { Entry, EntryType, EntryMeta, RawEntry, InternalEntry } from './domain/entry.js';
export { parseUrl, addslash, toHostPath, fromHostPath } from './domain/url.js';
export { parseLine, resolveLine, formatEntryLine } from './domain/entry-parser.js';

// Default collaborators
export { NodeFileSystem } from './infra/local/fs/index.js';
export { LocalFilesAdapter } from './infra/local/files-adapter/index.js';
export { InMemoryEntryCache } from './infra/memory/entry-cache/index.js';
export { TextViewRenderer } from './infra/text/view-renderer/index.js';

// Errors and logging
export * from './errors/index.js';
export type { Logger, ILoggerFactory, LogLevel } from './core/logging/index.js';
export { PinoLoggerFactory } from './core/logging/index.js';
