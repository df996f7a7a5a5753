/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Speaks the provider token endpoint protocol: form-encoded POSTs for the
 * authorization-code and refresh-token grants, JSON (or legacy form-encoded)
 * answers. Code exchanges are sent exactly once; refresh grants are retried
 * by gaxios with exponential backoff on dropped connections and 5xx.
 */

import { GaxiosError, type GaxiosOptions } from "gaxios";
import { z } from "zod";

import { HTTP_TIMEOUT_MS, REFRESH_ATTEMPTS } from "../constants";
import { errorMessage, type Result } from "../errors";
import type { ProviderDescriptor } from "../providers/provider-registry";
import {
  baseRequestOptions,
  gaxiosTransport,
  retryingRequestOptions,
  type HttpResponse,
  type HttpTransport,
} from "../utils/http-options";
import { logToFile } from "../utils/logger";
import { isRecord } from "../utils/type-guards";


export interface TokenGrant {
  accessToken: string;
  refreshToken?: string;
  /**
   * Lifetime in seconds, when the provider states one.
   */
  expiresIn?: number;
  scope?: string;
  tokenType?: string;
}


export interface TokenEndpointFailure {
  status?: number;
  detail: string;
  /**
   * Timeouts, dropped connections and 5xx answers.
   */
  transient: boolean;
}


export type GrantResult = Result<TokenGrant, TokenEndpointFailure>;


export interface TokenEndpointClient {
  exchangeCode(
    provider: ProviderDescriptor,
    code: string,
    redirectUri: string
  ): Promise<GrantResult>;
  refreshToken(provider: ProviderDescriptor, refreshToken: string): Promise<GrantResult>;
}


export interface TokenEndpointClientOptions {
  transport?: HttpTransport;
  timeoutMs?: number;
  refreshAttempts?: number;
  /**
   * Delay before the first refresh retry; gaxios backs off from there.
   */
  retryDelayMs?: number;
}


const grantResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).nullish(),
  expires_in: z.coerce.number().positive().nullish(),
  scope: z.string().nullish(),
  token_type: z.string().nullish(),
});


/**
 * Normalizes a response body to a plain object. GitHub answers
 * `application/x-www-form-urlencoded` unless asked for JSON.
 */
function toFields(data: unknown): Record<string, unknown> | null {
  if (isRecord(data)) {
    return data;
  }
  if (typeof data === "string" && data.includes("=")) {
    return Object.fromEntries(new URLSearchParams(data));
  }
  return null;
}


function describeBody(data: unknown): string {
  const fields = toFields(data);
  if (fields) {
    const error = fields["error"];
    const description = fields["error_description"];
    if (typeof error === "string") {
      return typeof description === "string" ? `${error}: ${description}` : error;
    }
    return JSON.stringify(fields);
  }
  return typeof data === "string" && data ? data : "empty response";
}


function failure(detail: string, transient: boolean, status?: number): GrantResult {
  return { ok: false, error: { status, detail, transient } };
}


export class GaxiosTokenEndpointClient implements TokenEndpointClient {
  private readonly transport: HttpTransport;
  private readonly timeoutMs: number;
  private readonly refreshAttempts: number;
  private readonly retryDelayMs: number;

  constructor(options: TokenEndpointClientOptions = {}) {
    this.transport = options.transport ?? gaxiosTransport;
    this.timeoutMs = options.timeoutMs ?? HTTP_TIMEOUT_MS;
    this.refreshAttempts = Math.max(1, options.refreshAttempts ?? REFRESH_ATTEMPTS);
    this.retryDelayMs = options.retryDelayMs ?? 500;
  }

  async exchangeCode(
    provider: ProviderDescriptor,
    code: string,
    redirectUri: string
  ): Promise<GrantResult> {
    return this.post(provider, {
      grant_type: "authorization_code",
      code,
      redirect_uri: redirectUri,
      client_id: provider.clientId,
      client_secret: provider.clientSecret,
    });
  }

  async refreshToken(provider: ProviderDescriptor, refreshToken: string): Promise<GrantResult> {
    const params = {
      grant_type: "refresh_token",
      refresh_token: refreshToken,
      client_id: provider.clientId,
      client_secret: provider.clientSecret,
    };

    return this.post(
      provider,
      params,
      retryingRequestOptions(this.timeoutMs, {
        attempts: this.refreshAttempts,
        retryDelayMs: this.retryDelayMs,
        methods: ["POST"],
      })
    );
  }

  private async post(
    provider: ProviderDescriptor,
    params: Record<string, string>,
    requestOptions: GaxiosOptions = baseRequestOptions(this.timeoutMs)
  ): Promise<GrantResult> {
    let response: HttpResponse;
    try {
      response = await this.transport({
        ...requestOptions,
        method: "POST",
        url: provider.tokenUrl,
        headers: {
          Accept: "application/json",
          "Content-Type": "application/x-www-form-urlencoded",
        },
        data: new URLSearchParams(params).toString(),
      });
    } catch (error) {
      // Retries are spent by now; a 5xx arrives as a GaxiosError with its body.
      if (error instanceof GaxiosError && error.response) {
        logToFile(`[tokens] ${provider.id} token endpoint answered ${error.response.status}`);
        return failure(describeBody(error.response.data), true, error.response.status);
      }
      return failure(errorMessage(error), true);
    }

    if (response.status < 200 || response.status >= 300) {
      logToFile(`[tokens] ${provider.id} token endpoint answered ${response.status}`);
      return failure(describeBody(response.data), response.status >= 500, response.status);
    }

    const fields = toFields(response.data);
    if (fields && typeof fields["error"] === "string") {
      return failure(describeBody(fields), false, response.status);
    }

    const parsed = grantResponseSchema.safeParse(fields);
    if (!parsed.success) {
      return failure("Token response did not contain an access token", false, response.status);
    }

    const grant: TokenGrant = { accessToken: parsed.data.access_token };
    if (parsed.data.refresh_token) {
      grant.refreshToken = parsed.data.refresh_token;
    }
    if (parsed.data.expires_in) {
      grant.expiresIn = parsed.data.expires_in;
    }
    if (parsed.data.scope) {
      grant.scope = parsed.data.scope;
    }
    if (parsed.data.token_type) {
      grant.tokenType = parsed.data.token_type;
    }
    return { ok: true, value: grant };
  }
}
