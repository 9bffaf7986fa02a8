/**
 * Channel: HTTP client bound to one URL, retrying failed attempts per its policy
 *
 * Usage:
 *   const channel = new Channel({ url: "https://api.example.com/items" });
 *   const response = await channel.get({ query: { page: 2 } });
 *   const items = response.json<Item[]>();
 */

import type {
  AttemptOutcome,
  HttpHeaders,
  HttpMethod,
  HttpRequest,
  JsonValue,
  Logger,
  PreparedRequest,
  QueryParams,
  RequestData,
  RetryHooks,
  RetryPolicy,
  RetryPolicyOptions,
} from "@/types";
import type { HttpTransport } from "@/interfaces";
import { BODY_REQUIRED_METHODS, DEFAULT_HTTP_TIMEOUT_MS } from "@/constants";
import { executeWithRetry, PermanentFailureError, toRetryPolicy } from "@/retry";
import * as logger from "@/logger";
import { describeError, describeErrorDetailed, redactHeaders } from "@/utils";
import { fetchTransport } from "./httpClient";
import { toHttpClientError, InvalidRequestError } from "./httpError";
import type { HttpResponse } from "./httpResponse";
import { classifyError, classifyResponse } from "./classify";
import { normalizeMethod, prepareRequest } from "./requestBuilder";

export interface ChannelConfig {
  url: string;
  /** Per-attempt timeout. Default: DEFAULT_HTTP_TIMEOUT_MS */
  timeoutMs?: number;
  /** Ready policy or options for one. Default: DEFAULT_RETRY_POLICY values */
  retryPolicy?: RetryPolicy | RetryPolicyOptions;
  /** Headers sent with every request, overridable per call */
  headers?: HttpHeaders;
  /** Optional transport (for testing/mocking). Defaults to fetchTransport */
  transport?: HttpTransport;
  /** Optional sleep/random overrides (for testing) */
  sleep?: RetryHooks["sleep"];
  random?: RetryHooks["random"];
}

export interface QueryRequestOptions {
  query?: QueryParams;
  headers?: HttpHeaders;
  timeoutMs?: number;
}

export interface BodyRequestOptions {
  /** Raw or form body. Exactly one of `data` and `json` is required. */
  data?: RequestData;
  json?: JsonValue;
  headers?: HttpHeaders;
  timeoutMs?: number;
}

export interface HeadersRequestOptions {
  headers?: HttpHeaders;
  timeoutMs?: number;
}

export interface ChannelRequestOptions extends QueryRequestOptions, BodyRequestOptions {
  /** Case-insensitive method name */
  method: string;
}

let channelCounter = 0;

export class Channel {
  readonly id: string;
  readonly url: string;
  readonly timeoutMs: number;
  readonly retryPolicy: RetryPolicy;

  private readonly headers: HttpHeaders;
  private readonly transport: HttpTransport;
  private readonly hooks: Pick<RetryHooks, "sleep" | "random">;
  private readonly log: Logger;

  constructor(config: ChannelConfig) {
    channelCounter += 1;
    this.id = `channel-${channelCounter}`;
    this.url = config.url;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.retryPolicy = toRetryPolicy(config.retryPolicy);
    this.headers = { ...config.headers };
    this.transport = config.transport ?? fetchTransport;
    this.hooks = { sleep: config.sleep, random: config.random };
    this.log = logger.withContext({ channel: this.id });

    this.log.info("Channel created", {
      url: this.url,
      timeoutMs: this.timeoutMs,
      maxAttempts: this.retryPolicy.maxAttempts,
      baseDelayMs: this.retryPolicy.baseDelayMs,
      backoffMultiplier: this.retryPolicy.backoffMultiplier,
      jitter: this.retryPolicy.jitter,
    });
  }

  get(options: QueryRequestOptions = {}): Promise<HttpResponse> {
    return this.send({ method: "GET", url: this.url, ...options });
  }

  head(options: QueryRequestOptions = {}): Promise<HttpResponse> {
    return this.send({ method: "HEAD", url: this.url, ...options });
  }

  post(options: BodyRequestOptions): Promise<HttpResponse> {
    return this.sendWithBody("POST", options);
  }

  put(options: BodyRequestOptions): Promise<HttpResponse> {
    return this.sendWithBody("PUT", options);
  }

  patch(options: BodyRequestOptions): Promise<HttpResponse> {
    return this.sendWithBody("PATCH", options);
  }

  delete(options: HeadersRequestOptions = {}): Promise<HttpResponse> {
    return this.send({ method: "DELETE", url: this.url, ...options });
  }

  /**
   * Dispatch to the method-specific call; only the options that method takes are forwarded
   */
  async request(options: ChannelRequestOptions): Promise<HttpResponse> {
    const { method, query, data, json, headers, timeoutMs } = options;
    let normalized: HttpMethod;
    try {
      normalized = normalizeMethod(method);
    } catch (error) {
      throw this.rejectBeforeSending(error);
    }

    switch (normalized) {
      case "GET":
        return this.get({ query, headers, timeoutMs });
      case "HEAD":
        return this.head({ query, headers, timeoutMs });
      case "POST":
        return this.post({ data, json, headers, timeoutMs });
      case "PUT":
        return this.put({ data, json, headers, timeoutMs });
      case "PATCH":
        return this.patch({ data, json, headers, timeoutMs });
      case "DELETE":
        return this.delete({ headers, timeoutMs });
    }
  }

  /**
   * Send `req`, retrying per `policy`
   *
   * @returns The first 2xx response
   * @throws {PermanentFailureError} Non-retryable status or error, or invalid input (0 attempts)
   * @throws {ExhaustedRetriesError} Every attempt failed with a retryable status or error
   */
  async send(req: HttpRequest, policy: RetryPolicy = this.retryPolicy): Promise<HttpResponse> {
    let prepared: PreparedRequest;
    try {
      prepared = prepareRequest(req, { timeoutMs: this.timeoutMs, headers: this.headers });
    } catch (error) {
      throw this.rejectBeforeSending(error);
    }

    this.log.info("HTTP request", {
      method: prepared.method,
      url: prepared.url,
      headers: redactHeaders(prepared.headers),
    });

    try {
      const response = await executeWithRetry(
        (attempt) => this.attempt(prepared, policy, attempt),
        policy,
        {
          ...this.hooks,
          onRetry: ({ attempt, maxAttempts, delayMs }) =>
            this.log.debug("Retrying HTTP request", {
              method: prepared.method,
              url: prepared.url,
              attempt,
              maxAttempts,
              delayMs,
            }),
        },
      );
      this.log.info("HTTP response", {
        method: prepared.method,
        url: prepared.url,
        status: response.status,
      });
      return response;
    } catch (error) {
      this.log.warn("HTTP request failed", {
        method: prepared.method,
        url: prepared.url,
        error: describeError(error),
      });
      throw error;
    }
  }

  private sendWithBody(method: HttpMethod, options: BodyRequestOptions): Promise<HttpResponse> {
    if (BODY_REQUIRED_METHODS.includes(method) && options.data === undefined && options.json === undefined) {
      return Promise.reject(
        this.rejectBeforeSending(
          new InvalidRequestError(`${method} requires either data or json`),
        ),
      );
    }
    return this.send({ method, url: this.url, ...options });
  }

  private async attempt(
    prepared: PreparedRequest,
    policy: RetryPolicy,
    attempt: number,
  ): Promise<AttemptOutcome<HttpResponse>> {
    let outcome: AttemptOutcome<HttpResponse>;
    try {
      const response = await this.transport(prepared);
      outcome = classifyResponse(response, prepared.method, policy);
    } catch (error) {
      outcome = classifyError(toHttpClientError(error), prepared.method, policy);
    }

    if (outcome.kind !== "success") {
      this.log.warn("Attempt failed", {
        attempt,
        maxAttempts: policy.maxAttempts,
        retryable: outcome.kind === "retryable",
        error: describeError(outcome.error),
      });
      if (logger.isLevelEnabled("debug")) {
        this.log.debug("Attempt failure detail", { detail: describeErrorDetailed(outcome.error) });
      }
    }
    return outcome;
  }

  private rejectBeforeSending(error: unknown): PermanentFailureError {
    this.log.warn("Request rejected before sending", { error: describeError(error) });
    return new PermanentFailureError(error, 0);
  }
}
