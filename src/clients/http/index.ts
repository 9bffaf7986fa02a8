/**
 * HTTP client public API
 */

export { Channel } from "./channel";
export type {
  ChannelConfig,
  QueryRequestOptions,
  BodyRequestOptions,
  HeadersRequestOptions,
  ChannelRequestOptions,
} from "./channel";
export {
  httpGet,
  httpHead,
  httpPost,
  httpPut,
  httpPatch,
  httpDelete,
  httpRequest,
} from "./singleRequest";
export type { SingleRequestSettings } from "./singleRequest";
export { fetchTransport, mapFetchError } from "./httpClient";
export type { FetchPhase, FetchFailureContext } from "./httpClient";
export { HttpResponse } from "./httpResponse";
export { prepareRequest, buildUrl, normalizeMethod } from "./requestBuilder";
export { classifyResponse, classifyError, httpErrorFromResponse } from "./classify";
export {
  HttpClientError,
  ConnectTimeoutError,
  ReadTimeoutError,
  NetworkError,
  RequestError,
  JsonDecodeError,
  InvalidRequestError,
  UnknownRequestError,
  HttpError,
  toHttpClientError,
} from "./httpError";
export type {
  HttpRequest,
  HttpMethod,
  HttpErrorDetails,
  PreparedRequest,
} from "@/types";
