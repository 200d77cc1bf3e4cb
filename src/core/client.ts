import { FormData } from 'undici';
import type { Logger } from 'winston';
import { z } from 'zod';
import { ConnectionError } from '../error/connectionError.js';
import { getBackendError } from '../error/backendError.js';
import { getDmartError } from '../error/dmartError.js';
import { UnauthenticatedError } from '../error/unauthenticatedError.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import { RequestType, ResourceType } from '../models/enums.js';
import { createIdentifierSchemas, defaultIdentifierLocale, normalizeSubpath } from '../models/identifiers.js';
import { createRecordSchema, type RecordSchema } from '../models/record.js';
import type { ActionRequest, ActionRequestRecord, DataAssetQuery } from '../models/requests.js';
import { createResponseSchema, type DmartResponse } from '../models/response.js';
import { AuthState } from '../session/authState.js';
import { SessionManager } from '../session/sessionManager.js';
import type { DispatchRequest, RequestOptions } from '../types/request.js';
import { constructUrl, type ParamValue, type ParsePathParams, type SearchParams } from '../utils/constructUrl.js';
import { createSilentLogger } from '../utils/logger.js';
import { validator } from '../utils/validator.js';
import { safeWrapAsync } from '../utils/wrap.js';
import { Dispatcher } from './dispatcher.js';
import { endpoints } from './endpoints.js';
import type {
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

/** Connection settings checked before logging in. */
const connectionSchema = z.object({
  baseUrl: z.string().url(),
  username: z.string().min(1),
  password: z.string().min(1),
});

/**
 * Typed client of the Dmart content-management backend.
 *
 * - Logs in with {@link DmartClient.connect} and keeps the bearer token per instance.
 * - Sends every call through one {@link Dispatcher}, over the pool of its {@link SessionManager}.
 * - Each operation resolves with a validated {@link DmartResponse} or rejects with a
 *   {@link DmartError}; nothing is retried.
 *
 * @example
 * const client = new DmartClient({ baseUrl: 'https://dmart.example.com', username: 'dmart', password: '...' });
 * await client.connect();
 * const { records } = await client.query({ space_name: 'posts', subpath: '/news' });
 */
export class DmartClient {
  #baseUrl: string;
  #username: string;
  #password: string;
  /** Bearer token of this instance. */
  #auth = new AuthState();
  #fetchClient: FetchClient;
  #dispatcher: Dispatcher;
  /** Whether outgoing identifiers are checked before sending. */
  #validation: boolean;
  #recordSchema: RecordSchema;
  #identifiers: ReturnType<typeof createIdentifierSchemas>;
  #logger: Logger;

  /**
   * Creates a client. No request is made and no pool is created until the first call.
   *
   * @param props - Connection target, credentials and options.
   */
  constructor({
    baseUrl,
    username,
    password,
    session = SessionManager.shared(),
    headers,
    timeout = false,
    validation = true,
    identifierLocale = defaultIdentifierLocale,
    logger = createSilentLogger(),
  }: DmartClientProps) {
    this.#baseUrl = baseUrl;
    this.#username = username;
    this.#password = password;
    this.#validation = validation;
    this.#logger = logger;
    this.#recordSchema = createRecordSchema(identifierLocale);
    this.#identifiers = createIdentifierSchemas(identifierLocale);
    this.#fetchClient = new FetchClient(baseUrl, session, {
      headers: mergeHeaderOptions({ Accept: 'application/json' }, headers),
    });
    this.#dispatcher = new Dispatcher({
      fetchClient: this.#fetchClient,
      auth: this.#auth,
      responseSchema: createResponseSchema(),
      logger,
      timeout,
    });
  }

  /** Whether a token is currently held. */
  get authenticated(): boolean {
    return this.#auth.present;
  }

  /**
   * Updates default headers and the request timeout at runtime.
   */
  config({ headers, timeout }: RequestOptions) {
    if (headers) {
      this.#fetchClient.config({ headers });
    }

    if (timeout !== undefined) {
      this.#dispatcher.timeout = timeout;
    }
  }

  /**
   * Logs in and stores the returned token, replacing any previous one.
   *
   * @throws {ConnectionError} for invalid settings, rejected credentials, an unreachable backend,
   *   a `failed` envelope or a response without a token. The stored token is left untouched.
   */
  async connect(opts: CallOptions = {}): Promise<void> {
    const [errSettings] = await validator(
      { baseUrl: this.#baseUrl, username: this.#username, password: this.#password },
      connectionSchema,
      'connection settings',
    );
    if (errSettings) {
      throw new ConnectionError('error invalid connection settings', { cause: errSettings });
    }

    const [errLogin, response] = await safeWrapAsync(() =>
      this.#dispatcher.dispatchUnauthenticated({
        method: endpoints.login.method,
        endpoint: this.#url(endpoints.login.path, {}),
        json: { shortname: this.#username, password: this.#password },
        signal: opts.signal,
      }),
    );
    if (errLogin) {
      throw new ConnectionError('error failed to connect, invalid url or credentials', {
        statusCode: getDmartError(errLogin)?.statusCode,
        error: getBackendError(errLogin)?.error,
        cause: errLogin,
      });
    }

    if (response.status === 'failed') {
      throw new ConnectionError('error login failed', { statusCode: 200, error: response.error });
    }

    const [record] = response.records;
    if (!record) {
      throw new ConnectionError('error login returned no records', { statusCode: 200 });
    }

    const token = record.attributes.access_token;
    if (typeof token !== 'string' || !token) {
      throw new ConnectionError('error login returned no access token', { statusCode: 200 });
    }

    this.#auth.set(token);
    this.#logger.debug('connected', { username: this.#username });
  }

  /**
   * Logs out and clears the token.
   *
   * The token is cleared once the backend answered, also when it rejected the logout.
   * When the backend could not be reached the token is kept and the error propagates.
   *
   * @throws {UnauthenticatedError} when not connected.
   */
  async disconnect(opts: CallOptions = {}): Promise<void> {
    this.#requireToken();

    const [err] = await safeWrapAsync(() =>
      this.#dispatcher.dispatch({
        method: endpoints.logout.method,
        endpoint: this.#url(endpoints.logout.path, {}),
        signal: opts.signal,
      }),
    );

    if (err && !getBackendError(err)) {
      throw err;
    }

    this.#auth.clear();
    this.#logger.debug('disconnected', { username: this.#username });

    if (err) {
      throw err;
    }
  }

  /** Profile of the logged-in user. */
  async getProfile(opts: CallOptions = {}): Promise<DmartResponse> {
    return this.#dispatcher.dispatch({
      method: endpoints.profile.method,
      endpoint: this.#url(endpoints.profile.path, {}),
      signal: opts.signal,
    });
  }

  /** Creates an entry; the shortname defaults to `auto`, letting the backend pick one. */
  async create(
    { space_name, subpath, attributes, shortname = 'auto', resource_type = ResourceType.content }: CreateParams,
    opts: CallOptions = {},
  ): Promise<DmartResponse> {
    return this.#request(
      space_name,
      RequestType.create,
      { resource_type, subpath, shortname, attributes },
      opts,
    );
  }

  /** Replaces the attributes of an entry. */
  async update(
    { space_name, subpath, shortname, attributes, resource_type = ResourceType.content }: UpdateParams,
    opts: CallOptions = {},
  ): Promise<DmartResponse> {
    return this.#request(
      space_name,
      RequestType.update,
      { resource_type, subpath, shortname, attributes },
      opts,
    );
  }

  /** Deletes an entry. */
  async delete(
    { space_name, subpath, shortname, resource_type = ResourceType.content }: DeleteParams,
    opts: CallOptions = {},
  ): Promise<DmartResponse> {
    return this.#request(
      space_name,
      RequestType.delete,
      { resource_type, subpath, shortname, attributes: {} },
      opts,
    );
  }

  /** Reads one entry with its JSON payload, and its attachments when asked. */
  async read(
    { retrieve_attachments = false, resource_type = ResourceType.content, ...locator }: ReadParams,
    opts: CallOptions = {},
  ): Promise<DmartResponse> {
    this.#requireToken();
    const { space_name, subpath, shortname } = await this.#locate(locator);
    return this.#dispatcher.dispatch({
      method: endpoints.entry.method,
      endpoint: this.#url(
        endpoints.entry.path,
        { resource_type, space_name, subpath, shortname },
        { retrieve_json_payload: true, retrieve_attachments },
      ),
      signal: opts.signal,
    });
  }

  /** Reads the JSON payload of a content entry. */
  async readJsonPayload(locator: EntryLocator, opts: CallOptions = {}): Promise<DmartResponse> {
    this.#requireToken();
    const { space_name, subpath, shortname } = await this.#locate(locator);
    return this.#dispatcher.dispatch({
      method: endpoints.jsonPayload.method,
      endpoint: this.#url(endpoints.jsonPayload.path, { space_name, subpath, shortname }),
      signal: opts.signal,
    });
  }

  /**
   * Searches a subpath. Fields besides `space_name`, `subpath`, `search` and
   * `filter_schema_names` are copied into the body and take precedence over the defaults.
   */
  async query(
    { space_name, subpath, search = '', filter_schema_names = [], ...extra }: QueryParams,
    opts: CallOptions = {},
  ): Promise<DmartResponse> {
    return this.#dispatcher.dispatch({
      method: endpoints.query.method,
      endpoint: this.#url(endpoints.query.path, {}),
      json: {
        type: 'search',
        space_name,
        subpath,
        retrieve_json_payload: true,
        filter_schema_names,
        search,
        ...extra,
      },
      signal: opts.signal,
    });
  }

  /** Runs a query string against a data asset (csv, sqlite, parquet, ...). */
  async queryDataAsset(
    {
      space_name,
      subpath,
      shortname,
      data_asset_type,
      query_string,
      schema_shortname = null,
      resource_type = ResourceType.content,
    }: QueryDataAssetParams,
    opts: CallOptions = {},
  ): Promise<DmartResponse> {
    const json: DataAssetQuery = {
      space_name,
      subpath,
      resource_type,
      shortname,
      schema_shortname,
      data_asset_type,
      query_string,
    };

    return this.#dispatcher.dispatch({
      method: endpoints.dataAsset.method,
      endpoint: this.#url(endpoints.dataAsset.path, {}),
      json,
      signal: opts.signal,
    });
  }

  /** Moves a ticket along its workflow; a non-empty `resolution` is sent as the body. */
  async progressTicket(
    { action, resolution, ...locator }: ProgressTicketParams,
    opts: CallOptions = {},
  ): Promise<DmartResponse> {
    this.#requireToken();
    const { space_name, subpath, shortname } = await this.#locate(locator);
    const endpoint = this.#url(endpoints.progressTicket.path, { space_name, subpath, shortname, action });
    const request: DispatchRequest = resolution
      ? { method: endpoints.progressTicket.method, endpoint, json: { resolution }, signal: opts.signal }
      : { method: endpoints.progressTicket.method, endpoint, signal: opts.signal };

    return this.#dispatcher.dispatch(request);
  }

  /**
   * Creates an entry together with its payload file, as a multipart upload.
   * The record goes as a `record.json` file part; the multipart encoder sets the content type.
   */
  async uploadResourceWithPayload(
    { space_name, record, payload, payload_file_name, payload_mime_type }: UploadParams,
    opts: CallOptions = {},
  ): Promise<DmartResponse> {
    this.#requireToken();
    const checked = await this.#record(record);

    const form = new FormData();
    form.append('request_record', new Blob([JSON.stringify(checked)], { type: 'application/json' }), 'record.json');
    form.append('payload_file', new Blob([payload], { type: payload_mime_type }), payload_file_name);
    form.append('space_name', space_name);

    return this.#dispatcher.dispatch({
      method: endpoints.resourceWithPayload.method,
      endpoint: this.#url(endpoints.resourceWithPayload.path, {}),
      form,
      signal: opts.signal,
    });
  }

  /**
   * Submits one record to `/managed/request`.
   */
  async #request(
    space_name: string,
    request_type: RequestType,
    record: ActionRequestRecord,
    opts: CallOptions,
  ): Promise<DmartResponse> {
    this.#requireToken();
    const json: ActionRequest = {
      space_name,
      request_type,
      records: [await this.#record(record)],
    };

    return this.#dispatcher.dispatch({
      method: endpoints.request.method,
      endpoint: this.#url(endpoints.request.path, {}),
      json,
      signal: opts.signal,
    });
  }

  /**
   * Fails an operation that needs a token before its arguments are checked.
   *
   * @throws {UnauthenticatedError} when not connected.
   */
  #requireToken(): void {
    if (!this.#auth.present) {
      throw new UnauthenticatedError();
    }
  }

  /**
   * Checks an outgoing record against the record schema, normalizing its subpath.
   * Returned unchanged when validation is off.
   *
   * @throws {ValidationError} for a malformed shortname, subpath or resource type.
   */
  async #record(record: ActionRequestRecord): Promise<ActionRequestRecord> {
    if (!this.#validation) {
      return record;
    }

    const [err, checked] = await validator(record, this.#recordSchema, 'record');
    if (err) {
      throw err;
    }

    return checked;
  }

  /**
   * Checks the identifiers of an entry address and normalizes its subpath.
   *
   * @throws {ValidationError} for a malformed shortname or subpath, when validation is on.
   */
  async #locate<T extends EntryLocator>(locator: T): Promise<T> {
    if (!this.#validation) {
      return { ...locator, subpath: normalizeSubpath(locator.subpath) };
    }

    const [err, checked] = await validator(locator, this.#identifiers.locator, 'entry address');
    if (err) {
      throw err;
    }

    return { ...locator, ...checked };
  }

  /**
   * Fills a path template.
   *
   * @throws {ConstructURLError} when a placeholder is left unfilled.
   */
  #url<Path extends string>(
    path: Path,
    params: ParsePathParams<Path> & Record<string, ParamValue>,
    search?: SearchParams,
  ): string {
    const [err, url] = constructUrl(path, params, search);
    if (err) {
      throw err;
    }

    return url;
  }
}
