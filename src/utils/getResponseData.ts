import type { FetchResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads a response body and parses it as JSON into a tuple-style result.
 *
 * Behavior:
 * - Reads the body as text first, so a failed parse never leaves the body half-consumed.
 * - A failed read returns `[Error, null]` with the original error as `cause`.
 * - An empty body returns `[Error, null]`: every backend response carries an envelope.
 * - Invalid JSON returns `[Error, null]` with the parse error as `cause`.
 * - Otherwise returns `[null, parsedJson]`, regardless of the `Content-Type` header.
 *
 * @param response - The HTTP response to extract data from.
 */
export async function getResponseData(response: FetchResponse): SafeWrapAsync<Error, unknown> {
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseData', { cause: errText }), null];
  }

  if (!text.trim()) {
    return [new Error('error empty response body in getResponseData'), null];
  }

  const [errJson, json] = safeWrap<unknown>(() => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing json response body in getResponseData', { cause: errJson }), null];
  }

  return [null, json];
}
