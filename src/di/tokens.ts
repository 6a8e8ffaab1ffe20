/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for DI tokens, grouped by layer.
 *
 * ADDING A NEW SERVICE:
 * 1. Add a token here under the matching namespace
 * 2. Register it in `createClientContainer`
 * 3. Use @inject(DI.YourToken) in consumers
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // PORTS (supplied by the embedding application or by tests)
  // ═══════════════════════════════════════════════════════════════════
  Ports: {
    /** RPC + push-event transport to the object server */
    Transport: Symbol('Ports.Transport'),
    /** Keep-alive timer; resolved fresh for every session */
    Timer: Symbol('Ports.Timer'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONNECTION (one per container)
  // ═══════════════════════════════════════════════════════════════════
  Connection: {
    /** Transport wrapper owning the callback table */
    Object: Symbol('Connection.Object'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Validated client configuration */
    Client: Symbol('Config.Client'),
  },
} as const;
