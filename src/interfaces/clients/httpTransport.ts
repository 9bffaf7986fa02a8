/**
 * HttpTransport: one attempt, no retries
 *
 * Implementations send the prepared request and resolve with the fully read
 * response whatever its status. Failures to obtain a response reject with an
 * HttpClientError subclass (ConnectTimeoutError, ReadTimeoutError,
 * NetworkError, RequestError); anything else is reported as
 * UnknownRequestError by the channel.
 */

import type { PreparedRequest } from "@/types";
import type { HttpResponse } from "@/clients/http/httpResponse";

export type HttpTransport = (request: PreparedRequest) => Promise<HttpResponse>;
