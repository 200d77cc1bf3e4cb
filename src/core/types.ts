import type { Logger } from 'winston';
import type { ResourceType } from '../models/enums.js';
import type { IdentifierLocale } from '../models/identifiers.js';
import type { ActionRequestRecord, QueryRequest } from '../models/requests.js';
import type { SessionManager } from '../session/sessionManager.js';
import type { RequestOptions } from '../types/request.js';

/** Configuration for constructing a {@link DmartClient}. */
export interface DmartClientProps extends RequestOptions {
  /** Base URL of the backend (e.g. `https://dmart.example.com`). */
  baseUrl: string;
  /** Shortname of the user to log in as. */
  username: string;
  password: string;
  /**
   * Owner of the connection pool.
   * @default SessionManager.shared()
   */
  session?: SessionManager;
  /**
   * Whether shortnames and subpaths are checked against the identifier patterns before sending.
   * @default true
   */
  validation?: boolean;
  /**
   * Extra identifier characters.
   * @default defaultIdentifierLocale
   */
  identifierLocale?: IdentifierLocale;
  /**
   * Receives debug entries for every dispatched call.
   * @default a silent logger
   */
  logger?: Logger;
}

/** Options accepted by every operation. */
export interface CallOptions {
  /** Abort signal to cancel this call. */
  signal?: AbortSignal;
}

/** Attributes of a record, an open mapping. */
export type Attributes = Record<string, unknown>;

/** Space, subpath and shortname addressing one entry. */
export interface EntryLocator {
  space_name: string;
  subpath: string;
  shortname: string;
}

export interface CreateParams {
  space_name: string;
  subpath: string;
  attributes: Attributes;
  /** @default 'auto' */
  shortname?: string;
  /** @default 'content' */
  resource_type?: ResourceType;
}

export interface UpdateParams extends EntryLocator {
  attributes: Attributes;
  /** @default 'content' */
  resource_type?: ResourceType;
}

export interface DeleteParams extends EntryLocator {
  /** @default 'content' */
  resource_type?: ResourceType;
}

export interface ReadParams extends EntryLocator {
  /** @default false */
  retrieve_attachments?: boolean;
  /** @default 'content' */
  resource_type?: ResourceType;
}

/**
 * Query parameters. Anything besides the four named fields is passed through
 * to the body and overrides the defaults.
 */
export type QueryParams = Pick<QueryRequest, 'space_name' | 'subpath'> &
  Partial<Omit<QueryRequest, 'space_name' | 'subpath'>>;

export interface QueryDataAssetParams extends EntryLocator {
  data_asset_type: string;
  query_string: string;
  /** @default null */
  schema_shortname?: string | null;
  /** @default 'content' */
  resource_type?: ResourceType;
}

export interface ProgressTicketParams extends EntryLocator {
  /** Workflow action to take. */
  action: string;
  /** Resolution or cancellation reason; sent as `{ resolution }` when given. */
  resolution?: string;
}

export interface UploadParams {
  space_name: string;
  /** Record describing the entry the payload belongs to. */
  record: ActionRequestRecord;
  payload: Blob | Uint8Array;
  payload_file_name: string;
  payload_mime_type: string;
}
