/**
 * Markers written into request log entries when a value is not available.
 */
export enum LogMarker {
  NONE = 'none',
  ANONYMOUS = 'Anonymous',
  UNKNOWN = 'Unknown',
  UNKNOWN_IP = 'Unknown IP',
  UNKNOWN_USER_AGENT = 'Unknown User Agent',
}

/**
 * Keys bound into the ContextStore for the lifetime of one request.
 */
export enum RequestContextKey {
  REQUEST_ID = 'request_id',
  IP_ADDRESS = 'ip_address',
  USER_AGENT = 'user_agent',
}

export enum FormatterKind {
  TEXT = 'text',
  JSON = 'json',
  XML = 'xml',
  FLAT = 'flat',
}

export enum QueryLogSource {
  MEMORY = 'memory',
  MONGODB = 'mongodb',
}

export const REQUEST_ID_HEADER = 'x-request-id';
export const FORWARDED_FOR_HEADER = 'x-forwarded-for';
export const USER_AGENT_HEADER = 'user-agent';
export const REFERRER_HEADER = 'referer';
export const CONTENT_TYPE_HEADER = 'content-type';
