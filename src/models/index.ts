/**
 * Models entrypoint: enums, identifier patterns, record and envelope schemas, request shapes.
 * @module
 */
export { ContentType, QueryType, RequestType, ResourceType, SortType, Status } from './enums.js';
export {
  buildIdentifierPatterns,
  createIdentifierSchemas,
  defaultIdentifierLocale,
  type IdentifierLocale,
  type IdentifierPatterns,
  normalizeSubpath,
} from './identifiers.js';
export {
  createRecordSchema,
  type DmartRecord,
  type DmartRecordInput,
  type IncomingRecord,
  incomingRecordSchema,
  type RecordSchema,
} from './record.js';
export type {
  ActionRequest,
  ActionRequestRecord,
  AggregationReducer,
  AggregationType,
  DataAssetQuery,
  Payload,
  Permission,
  QueryRequest,
  Translation,
} from './requests.js';
export { createResponseSchema, type DmartResponse, rejectionSchema, type ResponseSchema } from './response.js';
