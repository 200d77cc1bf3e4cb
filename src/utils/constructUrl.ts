import { ConstructURLError } from '../error/constructUrlError.js';
import type { SafeWrap } from './wrap.js';

/** Value accepted for a path or query parameter. */
export type ParamValue = string | number | boolean;

/** Empty object definition */
export type EmptyObject = Record<never, never>;

/** Parse `{param}` segments from a path template into a typed object. */
export type ParsePathParams<Path extends string> = Path extends `${infer _Start}{${infer Param}}${infer Rest}`
  ? { [K in Param]: ParamValue } & ParsePathParams<Rest>
  : EmptyObject;

/** Query parameters; `undefined` and `null` entries are skipped. */
export type SearchParams = Record<string, ParamValue | null | undefined>;

/**
 * Encodes a path value segment by segment, so `/` inside a subpath stays a separator.
 */
export function encodePathValue(value: ParamValue): string {
  return String(value).split('/').map(encodeURIComponent).join('/');
}

/**
 * Constructs a relative URL by replacing `{param}` placeholders and appending query parameters.
 *
 * @example
 * constructUrl('/managed/entry/{resource_type}/{space_name}', { resource_type: 'content', space_name: 'posts' });
 * // [null, 'managed/entry/content/posts']
 */
export function constructUrl<Path extends string>(
  path: Path,
  params: ParsePathParams<Path> & Record<string, ParamValue>,
  search?: SearchParams,
): SafeWrap<ConstructURLError, string> {
  let result: string = path;

  for (const [key, value] of Object.entries(params)) {
    result = result.replaceAll(`{${key}}`, encodePathValue(value));
  }

  // Check for remaining unreplaced braces
  if (result.includes('{') || result.includes('}')) {
    return [new ConstructURLError(`error constructing URL, path contains {} ${result}`, result), null];
  }

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(search ?? {})) {
    if (value === undefined || value === null) {
      continue;
    }
    searchParams.set(key, String(value));
  }

  const query = searchParams.toString();
  if (query) {
    result += `?${query}`;
  }

  // Strip leading slash for clean concatenation with baseUrl
  return [null, result.replace(/^\//, '')];
}
