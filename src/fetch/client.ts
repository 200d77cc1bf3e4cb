import { fetch } from 'undici';
import { HTTPError } from '../error/httpError.js';
import type { SessionManager } from '../session/sessionManager.js';
import type { FetchOptions, FetchResponse, HeaderOptions, HttpMethod } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/** Options to configure the {@link FetchClient} wrapper. */
export interface FetchClientOptions {
  /** Headers sent with every request, underneath per-request headers. */
  headers?: HeaderOptions;
}

/** The only status the backend uses for a successful call. */
const SUCCESS_STATUS = 200;

/**
 * Thin wrapper around undici's `fetch` that:
 * - prefixes all requests with a configured base URL,
 * - sends every request through the session's pooled dispatcher,
 * - merges default and per-request headers,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 */
export class FetchClient {
  /** Base URL prepended to all request paths. */
  #baseUrl: string;
  /** Owner of the shared connection pool. */
  #session: SessionManager;
  /** Default fetch options. */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client, with a base-url, session + options */
  constructor(baseUrl: string, session: SessionManager, opts?: FetchClientOptions) {
    if (!baseUrl.endsWith('/')) {
      baseUrl += '/';
    }

    this.#baseUrl = baseUrl;
    this.#session = session;
    this.#opts = opts ?? {};
  }

  /**
   * Updates default options (merged with existing headers).
   */
  public config(opts: FetchClientOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  /**
   * Executes a GET request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `user/profile`).
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public get(endpoint: string, opts: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('get', endpoint, { ...opts, body: undefined });
  }

  /**
   * Executes a PUT request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path.
   * @param opts - Request options, body included, merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public put(endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('put', endpoint, opts);
  }


  /**
   * Executes a POST request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `managed/request`).
   * @param opts - Request options, body included, merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public post(endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('post', endpoint, opts);
  }


  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Errors:
   * - Network / fetch errors (and aborts) are wrapped in `Error`.
   * - Responses with any status other than 200 are wrapped in `HTTPError`.
   *
   * @param method - HTTP method.
   * @param endpoint - Relative endpoint path.
   * @param opts - Fully-resolved request options.
   * @returns A promise resolving to `[error, response]`.
   */
  async #request(method: HttpMethod, endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    const verb = method.toUpperCase();
    const headers = mergeHeaderOptions(this.#opts.headers, opts.headers);
    const dispatcher = this.#session.acquire();

    const [err, res] = await safeWrapAsync(() =>
      fetch(this.constructPath(endpoint), {
        method: verb,
        headers,
        body: opts.body,
        dispatcher,
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${verb} request in fetchClient`, { cause: err }), null];
    }

    if (res.status !== SUCCESS_STATUS) {
      return [new HTTPError(res, `error in ${verb} request in fetchClient`), null];
    }

    return [null, res];
  }

  /**
   * Joins the base URL and endpoint into a single URL string.
   *
   * - Strips a leading slash from the endpoint to avoid `//` in the URL.
   *
   * @param endpoint - Endpoint to append to the base URL.
   * @returns The combined URL.
   */
  private constructPath(endpoint: string): string {
    return `${this.#baseUrl}${endpoint.replace(/^\//, '')}`;
  }
}
