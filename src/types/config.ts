/**
 * Environment configuration types
 */

import type { RetryPolicy } from "./retry";

export interface HttpClientSettings {
  timeoutMs: number;
  retryPolicy: RetryPolicy;
}
