/**
 * One-shot request helpers: each call builds a throwaway Channel
 */

import type { HttpResponse } from "./httpResponse";
import { Channel } from "./channel";
import type {
  BodyRequestOptions,
  ChannelConfig,
  ChannelRequestOptions,
  HeadersRequestOptions,
  QueryRequestOptions,
} from "./channel";

/**
 * Channel settings accepted by every helper, minus the URL
 */
export type SingleRequestSettings = Omit<ChannelConfig, "url">;

function channelFor(url: string, settings: SingleRequestSettings): Channel {
  return new Channel({ ...settings, url });
}

export function httpGet(
  url: string,
  options: QueryRequestOptions = {},
  settings: SingleRequestSettings = {},
): Promise<HttpResponse> {
  return channelFor(url, settings).get(options);
}

export function httpHead(
  url: string,
  options: QueryRequestOptions = {},
  settings: SingleRequestSettings = {},
): Promise<HttpResponse> {
  return channelFor(url, settings).head(options);
}

export function httpPost(
  url: string,
  options: BodyRequestOptions,
  settings: SingleRequestSettings = {},
): Promise<HttpResponse> {
  return channelFor(url, settings).post(options);
}

export function httpPut(
  url: string,
  options: BodyRequestOptions,
  settings: SingleRequestSettings = {},
): Promise<HttpResponse> {
  return channelFor(url, settings).put(options);
}

export function httpPatch(
  url: string,
  options: BodyRequestOptions,
  settings: SingleRequestSettings = {},
): Promise<HttpResponse> {
  return channelFor(url, settings).patch(options);
}

export function httpDelete(
  url: string,
  options: HeadersRequestOptions = {},
  settings: SingleRequestSettings = {},
): Promise<HttpResponse> {
  return channelFor(url, settings).delete(options);
}

/**
 * Perform an HTTP request with timeout, retries, and error handling
 *
 * @example
 * const response = await httpRequest({ method: "post", url, json: { name: "widget" } });
 */
export function httpRequest(
  options: ChannelRequestOptions & { url: string },
  settings: SingleRequestSettings = {},
): Promise<HttpResponse> {
  const { url, ...requestOptions } = options;
  return channelFor(url, settings).request(requestOptions);
}
