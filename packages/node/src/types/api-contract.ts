/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /**
     * Address the request acts for (set by caller middleware).
     * Undefined when the request carries no identity.
     */
    caller: string | undefined;
  };
}
