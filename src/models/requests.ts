import type { RequestType, ResourceType, SortType, QueryType } from './enums.js';

/** Localized display string. */
export interface Translation {
  ar?: string;
  en?: string;
  kd?: string;
}

/** One record of an {@link ActionRequest}. */
export interface ActionRequestRecord {
  resource_type: ResourceType;
  uuid?: string | null;
  shortname: string;
  subpath: string;
  attributes: Record<string, unknown>;
  attachments?: Partial<Record<ResourceType, unknown[]>> | null;
}

/** Body of `/managed/request`. */
export interface ActionRequest {
  space_name: string;
  request_type: RequestType;
  records: ActionRequestRecord[];
}

export interface AggregationReducer {
  name: string;
  alias: string;
  args: string[];
}

/** Group-by / reduce descriptor of an aggregation query. */
export interface AggregationType {
  load: string[];
  group_by: string[];
  reducers: AggregationReducer[] | string[];
}

/** Body of `/managed/query`. */
export interface QueryRequest {
  type: QueryType;
  space_name: string;
  subpath: string;
  filter_types?: ResourceType[];
  filter_schema_names?: string[];
  filter_shortnames?: string[];
  search: string;
  from_date?: string;
  to_date?: string;
  sort_by?: string;
  sort_type?: SortType;
  retrieve_json_payload?: boolean;
  retrieve_attachments?: boolean;
  validate_schema?: boolean;
  jq_filter?: string;
  exact_subpath?: boolean;
  limit?: number;
  offset?: number;
  aggregation_data?: AggregationType;
}

/** Body of `/managed/data-asset`. */
export interface DataAssetQuery {
  space_name: string;
  subpath: string;
  resource_type: ResourceType;
  shortname: string;
  schema_shortname: string | null;
  data_asset_type: string;
  query_string: string;
}

/** Permission entry as found in a profile's attributes. */
export interface Permission {
  allowed_actions: string[];
  conditions: string[];
  restricted_fields: unknown[];
  allowed_fields_values: Record<string, unknown>;
}

/** Payload attached to an entry. */
export interface Payload {
  content_type: string;
  schema_shortname?: string | null;
  checksum: string;
  body: unknown;
  last_validated: string;
  validation_status: string;
}
