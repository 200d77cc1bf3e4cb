import type { HttpMethod } from '../types/request.js';

/** Method and path template of one backend endpoint. */
export interface EndpointDefinition {
  method: HttpMethod;
  path: string;
}

/**
 * Endpoints of the backend's API. `{param}` placeholders are filled by `constructUrl`.
 */
export const endpoints = {
  login: { method: 'post', path: '/user/login' },
  logout: { method: 'post', path: '/user/logout' },
  profile: { method: 'get', path: '/user/profile' },
  request: { method: 'post', path: '/managed/request' },
  entry: { method: 'get', path: '/managed/entry/{resource_type}/{space_name}/{subpath}/{shortname}' },
  jsonPayload: { method: 'get', path: '/managed/payload/content/{space_name}/{subpath}/{shortname}.json' },
  query: { method: 'post', path: '/managed/query' },
  dataAsset: { method: 'post', path: '/managed/data-asset' },
  progressTicket: { method: 'put', path: '/managed/progress-ticket/{space_name}/{subpath}/{shortname}/{action}' },
  resourceWithPayload: { method: 'post', path: '/managed/resource_with_payload' },
} as const satisfies Record<string, EndpointDefinition>;

export type EndpointName = keyof typeof endpoints;
