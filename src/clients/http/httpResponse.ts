/**
 * HttpResponse: fully read response of a single attempt
 */

import type { HttpResponseInit } from "@/types";
import { JsonDecodeError } from "./httpError";

export class HttpResponse {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly headers: Headers;
  private readonly body: string;

  constructor(init: HttpResponseInit) {
    this.status = init.status;
    this.statusText = init.statusText;
    this.url = init.url;
    this.headers = init.headers;
    this.body = init.body;
  }

  /**
   * True for 2xx statuses
   */
  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  text(): string {
    return this.body;
  }

  /**
   * Parse the body as JSON
   * @throws {JsonDecodeError} When the body is empty or not valid JSON
   */
  json<T = unknown>(): T {
    try {
      return JSON.parse(this.body) as T;
    } catch (error) {
      throw new JsonDecodeError(
        `Response body from ${this.url} is not valid JSON (status ${this.status})`,
        { cause: error },
      );
    }
  }

  toString(): string {
    return `HttpResponse(${this.status} ${this.statusText}, ${this.url})`;
  }
}
