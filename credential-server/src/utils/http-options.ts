/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { request, type GaxiosError, type GaxiosOptions } from "gaxios";

import { logToFile } from "./logger";


/**
 * Status and decoded body of an HTTP exchange.
 */
export interface HttpResponse {
  status: number;
  data: unknown;
}


/**
 * Sends one HTTP request. Resolves for every status below 500; rejects on
 * network failures, timeouts and 5xx responses.
 */
export type HttpTransport = (options: GaxiosOptions) => Promise<HttpResponse>;


export const gaxiosTransport: HttpTransport = async (options) => {
  const response = await request<unknown>(options);
  return { status: response.status, data: response.data };
};


/**
 * Base options for calls whose 4xx answers are part of the protocol (token
 * endpoints, Vault 404s, Kratos 401s) and must reach the caller.
 */
export function baseRequestOptions(timeoutMs: number): GaxiosOptions {
  return {
    timeout: timeoutMs,
    validateStatus: (status: number) => status < 500,
  };
}


export interface RetryPolicy {
  /**
   * Total attempts, the first one included.
   */
  attempts: number;
  retryDelayMs: number;
  methods: string[];
}


/**
 * Base options plus gaxios retries on 5xx and dropped connections. The
 * delay grows exponentially after the first retry.
 */
export function retryingRequestOptions(timeoutMs: number, policy: RetryPolicy): GaxiosOptions {
  const retries = Math.max(0, policy.attempts - 1);
  return {
    ...baseRequestOptions(timeoutMs),
    retryConfig: {
      retry: retries,
      noResponseRetries: retries,
      retryDelay: policy.retryDelayMs,
      httpMethodsToRetry: policy.methods,
      statusCodesToRetry: [[500, 599]],
      onRetryAttempt: (err: GaxiosError) => {
        logToFile(
          `[http] retrying ${err.config.method ?? "GET"} ${err.config.url}, attempt #${err.config.retryConfig?.currentRetryAttempt}`
        );
        logToFile(`[http] error: ${err.message}`);
      },
    },
  };
}


/**
 * Options for idempotent calls against the secret backend.
 */
export function idempotentRequestOptions(timeoutMs: number): GaxiosOptions {
  return retryingRequestOptions(timeoutMs, {
    attempts: 3,
    retryDelayMs: 250,
    methods: ["GET", "HEAD", "OPTIONS", "DELETE", "PUT"],
  });
}
