/**
 * retry-channel public API
 */

export * from "./clients/http";
export * from "./retry";
export { loadHttpConfigFromEnv, ConfigError } from "./config";
export type { Env } from "./config";
export type { HttpTransport } from "./interfaces";
export { setLogLevel, getLogLevel } from "./logger";
export { describeError, describeErrorDetailed, redactHeaders } from "./utils";
export type {
  HttpHeaders,
  QueryParams,
  QueryValue,
  RequestData,
  JsonValue,
  HttpResponseInit,
  HttpErrorKind,
  TransientErrorKind,
  RetryPolicy,
  RetryPolicyOptions,
  RetryPresetName,
  AttemptOutcome,
  RetryAttemptInfo,
  RetryHooks,
  HttpClientSettings,
  LogLevel,
} from "./types";
