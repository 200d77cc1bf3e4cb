/**
 * Core entrypoint: exports the client, its dispatcher and the operation parameter types.
 * Import from here if you only need the client without error helpers.
 * @module
 */

/**
 * Typed client of the backend: login state, pooled requests, typed envelopes.
 */
export { DmartClient } from './client.js';

/**
 * Single chokepoint that attaches headers and maps failures onto the error kinds.
 */
export { Dispatcher, type DispatcherProps } from './dispatcher.js';

/**
 * Method and path template of every backend endpoint.
 */
export { type EndpointDefinition, type EndpointName, endpoints } from './endpoints.js';

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
} from './types.js';
