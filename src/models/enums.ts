/** Outcome of a call as reported in the envelope. */
export const Status = {
  success: 'success',
  failed: 'failed',
} as const;
export type Status = (typeof Status)[keyof typeof Status];

/** Kind of change submitted to `/managed/request`. */
export const RequestType = {
  create: 'create',
  update: 'update',
  patch: 'patch',
  updateAcl: 'update_acl',
  assign: 'assign',
  replace: 'replace',
  delete: 'delete',
  move: 'move',
} as const;
export type RequestType = (typeof RequestType)[keyof typeof RequestType];

/** Entity kinds known to the backend. */
export const ResourceType = {
  user: 'user',
  group: 'group',
  folder: 'folder',
  schema: 'schema',
  content: 'content',
  acl: 'acl',
  comment: 'comment',
  media: 'media',
  dataAsset: 'data_asset',
  locator: 'locator',
  relationship: 'relationship',
  alteration: 'alteration',
  history: 'history',
  space: 'space',
  branch: 'branch',
  permission: 'permission',
  role: 'role',
  ticket: 'ticket',
  json: 'json',
  lock: 'lock',
  post: 'post',
  reaction: 'reaction',
  reply: 'reply',
  share: 'share',
  pluginWrapper: 'plugin_wrapper',
  notification: 'notification',
  csv: 'csv',
  jsonl: 'jsonl',
  sqlite: 'sqlite',
  duckdb: 'duckdb',
  parquet: 'parquet',
} as const;
export type ResourceType = (typeof ResourceType)[keyof typeof ResourceType];

/** Query modes of `/managed/query`. */
export const QueryType = {
  search: 'search',
  subpath: 'subpath',
  events: 'events',
  history: 'history',
  tags: 'tags',
  spaces: 'spaces',
  counters: 'counters',
  reports: 'reports',
  aggregation: 'aggregation',
  attachments: 'attachments',
  attachmentsAggregation: 'attachments_aggregation',
} as const;
export type QueryType = (typeof QueryType)[keyof typeof QueryType];

export const SortType = {
  ascending: 'ascending',
  descending: 'descending',
} as const;
export type SortType = (typeof SortType)[keyof typeof SortType];

/** Payload content kinds. */
export const ContentType = {
  text: 'text',
  markdown: 'markdown',
  html: 'html',
  json: 'json',
  image: 'image',
  python: 'python',
  pdf: 'pdf',
  audio: 'audio',
  video: 'video',
  csv: 'csv',
  jsonl: 'jsonl',
  sqlite: 'sqlite',
  duckdb: 'duckdb',
  parquet: 'parquet',
} as const;
export type ContentType = (typeof ContentType)[keyof typeof ContentType];
