import type { FormData, Headers, Response } from 'undici';

/** Header options accepted by the fetch wrapper; `null` removes a default header. */
export type HeaderOptions = Headers | Array<[string, string]> | Record<string, string | null | undefined>;

/** HTTP methods the backend's API uses. */
export type HttpMethod = 'get' | 'post' | 'put';

/** Response as produced by the pooled fetch. */
export type FetchResponse = Response;

/** Per-request options handed to the {@link FetchClient}. */
export interface FetchOptions {
  headers?: HeaderOptions;
  /** Serialized JSON or a multipart form. */
  body?: string | FormData;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal | null;
}

/** Body of a dispatched call: JSON, multipart, or nothing. */
export type DispatchBody = { json: object; form?: never } | { form: FormData; json?: never } | { json?: never; form?: never };

/** Everything the dispatcher needs to issue one call. */
export type DispatchRequest = {
  method: HttpMethod;
  /** Endpoint path relative to the base URL, query string included. */
  endpoint: string;
  /** Abort signal to cancel this call. */
  signal?: AbortSignal;
} & DispatchBody;

/** Request-level options shared by the client and its dispatcher. */
export interface RequestOptions {
  /**
   * Request timeout in milliseconds, `false` to disable.
   * @default false
   */
  timeout?: number | false;
  /** Headers merged underneath the ones each call sets. */
  headers?: HeaderOptions;
}
