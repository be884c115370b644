/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized by layer, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the appropriate namespace
 * 2. Register an instanceCachingFactory for it in container.ts
 * 3. Resolve it with c.resolve<YourType>(DI.YourToken) in consumers' factories
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // HOST (provided by the embedding editor)
  // ═══════════════════════════════════════════════════════════════════
  Host: {
    /** Window/buffer platform */
    Editor: Symbol('Host.Editor'),
    /** User-visible notification channel */
    Notifier: Symbol('Host.Notifier'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // COLLABORATORS (ports with swappable implementations)
  // ═══════════════════════════════════════════════════════════════════
  Ports: {
    Mutator: Symbol('Ports.Mutator'),
    EntryCache: Symbol('Ports.EntryCache'),
    ViewRenderer: Symbol('Ports.ViewRenderer'),
    FileSystem: Symbol('Ports.FileSystem'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // ENGINE SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Services: {
    /** Scheme → adapter table (built before the container) */
    AdapterRegistry: Symbol('Services.AdapterRegistry'),
    ViewState: Symbol('Services.ViewState'),
    Reporter: Symbol('Services.Reporter'),
    WindowBookkeeper: Symbol('Services.WindowBookkeeper'),
    EntryReader: Symbol('Services.EntryReader'),
    BufferLifecycle: Symbol('Services.BufferLifecycle'),
    Navigator: Symbol('Services.Navigator'),
    FloatWindows: Symbol('Services.FloatWindows'),
    /** The facade handed back to the host */
    Engine: Symbol('Services.Engine'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** Logger factory (ILoggerFactory) */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Validated setup options */
    Setup: Symbol('Config.Setup'),
  },
} as const;

/** Type helper for token values */
export type DIToken = typeof DI[keyof typeof DI][keyof typeof DI[keyof typeof DI]];
