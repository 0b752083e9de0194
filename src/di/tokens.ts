/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by layer.
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated) */
    App: Symbol('Config.App'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** Component logger factory */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (production/test/cli) */
    Mode: Symbol('Runtime.Mode'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // PORTS (swap an adapter by registering before initialization)
  // ═══════════════════════════════════════════════════════════════════
  Ports: {
    FileSystem: Symbol('Ports.FileSystem'),
    StandardDirectories: Symbol('Ports.StandardDirectories'),
    FileProtection: Symbol('Ports.FileProtection'),
    RandomEntropy: Symbol('Ports.RandomEntropy'),
    TimeClock: Symbol('Ports.TimeClock'),
    ProcessProbe: Symbol('Ports.ProcessProbe'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // STORAGE LAYER
  // ═══════════════════════════════════════════════════════════════════
  Storage: {
    /** The whole wired layer; the service tokens below resolve through it */
    Layer: Symbol('Storage.Layer'),
    PathResolver: Symbol('Storage.PathResolver'),
    ProtectionManager: Symbol('Storage.ProtectionManager'),
    SafeFileOps: Symbol('Storage.SafeFileOps'),
    DirectoryJanitor: Symbol('Storage.DirectoryJanitor'),
  },
} as const;

