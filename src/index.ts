/**
 * Root entrypoint: re-exports the client, the session layer, the models and the error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Typed client of the backend.
 */
export { DmartClient } from './core/client.js';

/**
 * Single chokepoint that attaches headers and maps failures onto the error kinds.
 */
export { Dispatcher, type DispatcherProps } from './core/dispatcher.js';

/**
 * Method and path template of every backend endpoint.
 */
export { type EndpointDefinition, type EndpointName, endpoints } from './core/endpoints.js';

/**
 * Parameter types of the client's operations.
 */
export type {
  Attributes,
  CallOptions,
  CreateParams,
  DeleteParams,
  DmartClientProps,
  EntryLocator,
  ProgressTicketParams,
  QueryDataAssetParams,
  QueryParams,
  ReadParams,
  UpdateParams,
  UploadParams,
} from './core/types.js';

/**
 * Settings read from environment variables.
 */
export { type EnvConfig, loadConfig } from './config.js';

/**
 * Error classes, guards and extractors.
 */
export * from './error/index.js';

/**
 * Pooled fetch client and header helpers.
 */
export { FetchClient, type FetchClientOptions } from './fetch/client.js';

/**
 * Enums, identifier patterns, record and envelope schemas.
 */
export * from './models/index.js';

/**
 * Shared connection pool owner and per-client auth state.
 */
export * from './session/index.js';

/**
 * Request shapes shared by the fetch client and the dispatcher.
 */
export type { DispatchRequest, FetchOptions, FetchResponse, HeaderOptions, HttpMethod, RequestOptions } from './types/request.js';

/**
 * Logger factories.
 */
export { createLogger, createSilentLogger, type LogLevel } from './utils/logger.js';

/**
 * Tuple-based results.
 */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
