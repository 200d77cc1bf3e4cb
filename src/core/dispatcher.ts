import type { Logger } from 'winston';
import { BackendError } from '../error/backendError.js';
import type { DmartError } from '../error/dmartError.js';
import { getHttpError, type HTTPError } from '../error/httpError.js';
import { TransportError } from '../error/transportError.js';
import { UnauthenticatedError } from '../error/unauthenticatedError.js';
import type { FetchClient } from '../fetch/client.js';
import { bearer, mergeHeaderOptions } from '../fetch/utils.js';
import { type DmartResponse, rejectionSchema, type ResponseSchema } from '../models/response.js';
import type { AuthState } from '../session/authState.js';
import type { DispatchRequest, FetchOptions, FetchResponse, HeaderOptions } from '../types/request.js';
import { getResponseData } from '../utils/getResponseData.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Collaborators of a {@link Dispatcher}. */
export interface DispatcherProps {
  /** Pooled HTTP transport. */
  fetchClient: FetchClient;
  /** Token holder of the owning client. */
  auth: AuthState;
  /** Envelope schema, built for the client's identifier locale. */
  responseSchema: ResponseSchema;
  logger: Logger;
  /**
   * Request timeout in milliseconds, `false` to disable.
   * @default false
   */
  timeout?: number | false;
}

/**
 * Single chokepoint of every backend call.
 *
 * - Refuses authenticated calls without a token, before touching the pool.
 * - Chooses headers from the body kind: JSON bodies get `Content-Type` and the bearer token,
 *   multipart bodies only the bearer token.
 * - Decodes the body and maps every failure onto one of the {@link DmartError} kinds.
 */
export class Dispatcher {
  #fetchClient: FetchClient;
  #auth: AuthState;
  #responseSchema: ResponseSchema;
  #logger: Logger;
  #timeout: number | false;

  constructor({ fetchClient, auth, responseSchema, logger, timeout = false }: DispatcherProps) {
    this.#fetchClient = fetchClient;
    this.#auth = auth;
    this.#responseSchema = responseSchema;
    this.#logger = logger;
    this.#timeout = timeout;
  }

  /** Updates the request timeout used by later calls. */
  set timeout(timeout: number | false) {
    this.#timeout = timeout;
  }

  /**
   * Issues an authenticated call.
   *
   * @throws {UnauthenticatedError} when no token is held; nothing is sent.
   * @throws {BackendError} when the backend answers with a status other than 200.
   * @throws {TransportError} when no response arrived or its body could not be decoded.
   */
  async dispatch(request: DispatchRequest): Promise<DmartResponse> {
    const token = this.#auth.token;
    if (token === null) {
      throw new UnauthenticatedError();
    }

    const [err, response] = await this.#execute(request, bearer(token));
    if (err) {
      throw err;
    }

    return response;
  }

  /**
   * Issues a call without the bearer token. Only logging in goes through here.
   */
  async dispatchUnauthenticated(request: DispatchRequest): Promise<DmartResponse> {
    const [err, response] = await this.#execute(request, {});
    if (err) {
      throw err;
    }

    return response;
  }

  /**
   * Core pipeline shared by both entry points. The timeout timer is cleared once the body has been decoded.
   *
   * @param request - Method, endpoint, body and signal of the call.
   * @param authHeaders - Authorization header, or nothing for the login call.
   * @returns A tuple `[error, envelope]`.
   */
  async #execute(request: DispatchRequest, authHeaders: HeaderOptions): SafeWrapAsync<DmartError, DmartResponse> {
    const timeout = createTimeoutSignal(this.#timeout);
    try {
      return await this.#send(request, authHeaders, timeout?.signal);
    } finally {
      timeout?.clear();
    }
  }

  /**
   * Sends one request and decodes its outcome, within the given timeout signal.
   */
  async #send(
    request: DispatchRequest,
    authHeaders: HeaderOptions,
    timeoutSignal: AbortSignal | undefined,
  ): SafeWrapAsync<DmartError, DmartResponse> {
    const { method, endpoint, signal } = request;
    const verb = method.toUpperCase();
    const options: FetchOptions = {
      signal: mergeSignals([signal, timeoutSignal]),
      headers: authHeaders,
    };

    if (request.json !== undefined) {
      options.body = JSON.stringify(request.json);
      options.headers = mergeHeaderOptions({ 'Content-Type': 'application/json' }, authHeaders);
    } else if (request.form !== undefined) {
      options.body = request.form;
    }

    this.#logger.debug('dispatching request', { method: verb, endpoint });
    const [errFetch, response] = await this.#fetchClient[method](endpoint, options);

    if (errFetch) {
      const httpError = getHttpError(errFetch);
      if (!httpError) {
        this.#logger.debug('request failed without response', { method: verb, endpoint, error: errFetch.message });
        return [new TransportError(`error reaching backend on ${verb} ${endpoint}`, { cause: errFetch }), null];
      }

      const rejection = await this.#rejection(httpError);
      this.#logger.debug('request rejected', { method: verb, endpoint, status: rejection.statusCode });
      return [rejection, null];
    }

    this.#logger.debug('request completed', { method: verb, endpoint, status: response.status });
    return this.#decode(response, `${verb} ${endpoint}`);
  }

  /**
   * Parses and validates a 200 response into the envelope.
   */
  async #decode(response: FetchResponse, label: string): SafeWrapAsync<DmartError, DmartResponse> {
    const opts = { statusCode: response.status };

    const [errBody, body] = await getResponseData(response);
    if (errBody) {
      return [new TransportError(`error decoding response body of ${label}`, { ...opts, cause: errBody }), null];
    }

    const [errEnvelope, envelope] = await validator(body, this.#responseSchema, 'response envelope');
    if (errEnvelope) {
      return [new TransportError(`error unexpected response shape of ${label}`, { ...opts, cause: errEnvelope }), null];
    }

    return [null, envelope];
  }

  /**
   * Turns a non-200 response into a {@link BackendError} carrying the backend's own error,
   * or a {@link TransportError} when the body holds no decodable error.
   */
  async #rejection(httpError: HTTPError): Promise<DmartError> {
    const opts = { statusCode: httpError.status, cause: httpError };

    const [errBody, body] = await getResponseData(httpError.response);
    if (errBody) {
      return new TransportError(`error decoding rejection body, status ${httpError.status}`, opts);
    }

    const [errShape, rejection] = await validator(body, rejectionSchema, 'rejection body');
    if (errShape) {
      return new TransportError(`error rejection without error payload, status ${httpError.status}`, {
        ...opts,
        cause: errShape,
      });
    }

    return new BackendError(httpError.status, rejection.error, { cause: httpError });
  }
}
