/**
 * Injection tokens for dependency injection across the application.
 * Used for interface-based dependencies and multi-implementation providers.
 */
export const INJECTION_TOKENS = {
  // Cache & pub/sub
  CACHE_SERVICE: Symbol('CACHE_SERVICE'),
  PUBSUB: Symbol('PUBSUB'),

  // Observability
  METRICS_SINK: Symbol('METRICS_SINK'),

  // Tokens
  REVOKED_TOKEN_LOG: Symbol('REVOKED_TOKEN_LOG'),

  // External collaborators
  USER_LOOKUP: Symbol('USER_LOOKUP'),
  CHANNEL_MEMBERSHIP: Symbol('CHANNEL_MEMBERSHIP'),
};
