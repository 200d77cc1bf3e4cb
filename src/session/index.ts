/**
 * Session entrypoint: the shared connection pool owner and per-client auth state.
 * @module
 */
export { type AuthSlot, AuthState } from './authState.js';
export { createPoolFactory, type PoolFactory, type PoolOptions, SessionManager } from './sessionManager.js';
