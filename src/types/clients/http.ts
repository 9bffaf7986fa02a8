/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

export type HttpHeaders = Record<string, string>;

export type QueryValue = string | number | boolean;

export type QueryParams = Record<string, QueryValue | QueryValue[]>;

/**
 * Raw request body: sent as-is, or form-encoded when given as a record
 */
export type RequestData = string | Record<string, QueryValue>;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Request description, immutable per call
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: HttpHeaders;
  query?: QueryParams;
  /** Raw or form body. Mutually exclusive with `json`. */
  data?: RequestData;
  /** JSON body. Mutually exclusive with `data`. */
  json?: JsonValue;
  timeoutMs?: number;
}

/**
 * Request as handed to a transport: URL resolved, headers merged, body encoded
 */
export interface PreparedRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<HttpHeaders>;
  readonly body?: string;
  readonly timeoutMs: number;
}

export interface HttpResponseInit {
  status: number;
  statusText: string;
  url: string;
  headers: Headers;
  body: string;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * Error categories produced by the client.
 * The first three are transport failures a retry policy may opt into.
 */
export type TransientErrorKind = "connect-timeout" | "read-timeout" | "network";

export type HttpErrorKind =
  | TransientErrorKind
  | "http-status"
  | "request"
  | "json-decode"
  | "invalid-request"
  | "unknown";
