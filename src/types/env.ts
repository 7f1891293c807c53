/**
 * Hono environment and context types
 */

/** Context variables (for c.set/c.get) */
export interface Variables {
  /** Request ID */
  requestId: string;
}

/** Hono environment; configuration is injected at app creation, not bound per request */
export interface AppEnv {
  Variables: Variables;
}
