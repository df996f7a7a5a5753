/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Drives the authorization-code flow for a platform user: `begin` issues a
 * CSRF state and composes the provider's authorization URL, `complete`
 * redeems the state, exchanges the code once and stores the credential.
 */

import { DEFAULT_TOKEN_LIFETIME_SECONDS } from "../constants";
import type { CredentialStore } from "../credentials/credential-store";
import type { CredentialRecord } from "../credentials/types";
import { err, ok, type Result } from "../errors";
import type { ProviderRegistry } from "../providers/provider-registry";
import type { TokenEndpointClient } from "../tokens/token-endpoint-client";
import { logToFile } from "../utils/logger";
import type { StateStore } from "./state-store";


export interface FlowOrchestratorOptions {
  registry: ProviderRegistry;
  states: StateStore;
  store: CredentialStore;
  tokenClient: TokenEndpointClient;
  /**
   * Public base URL the provider redirects back to, without a trailing slash.
   */
  callbackBaseUrl: string;
  now?: () => number;
}


export class FlowOrchestrator {
  private readonly registry: ProviderRegistry;
  private readonly states: StateStore;
  private readonly store: CredentialStore;
  private readonly tokenClient: TokenEndpointClient;
  private readonly callbackBaseUrl: string;
  private readonly now: () => number;

  constructor(options: FlowOrchestratorOptions) {
    this.registry = options.registry;
    this.states = options.states;
    this.store = options.store;
    this.tokenClient = options.tokenClient;
    this.callbackBaseUrl = options.callbackBaseUrl.replace(/\/+$/, "");
    this.now = options.now ?? Date.now;
  }

  redirectUriFor(providerId: string): string {
    return `${this.callbackBaseUrl}/oauth/callback/${encodeURIComponent(providerId)}`;
  }

  /**
   * Returns the URL the user must visit to authorize the provider. The URL
   * is never followed here.
   */
  async begin(userId: string, providerId: string): Promise<Result<string>> {
    const descriptor = this.registry.resolve(providerId);
    if (!descriptor.ok) {
      return descriptor;
    }

    const issued = await this.states.issue(userId, providerId);
    if (!issued.ok) {
      return issued;
    }

    const url = new URL(descriptor.value.authorizationUrl);
    url.searchParams.set("client_id", descriptor.value.clientId);
    url.searchParams.set("redirect_uri", this.redirectUriFor(providerId));
    url.searchParams.set("response_type", descriptor.value.responseType);
    url.searchParams.set("state", issued.value.state);
    if (descriptor.value.scope) {
      url.searchParams.set("scope", descriptor.value.scope);
    }

    logToFile(`[flow] initiating OAuth for user=${userId}, provider=${providerId}`);
    return ok(url.toString());
  }

  /**
   * Finishes the flow for the callback of `providerId`. The state is consumed
   * before anything else is checked, so a rejected callback cannot be
   * replayed; the code exchange is attempted exactly once.
   */
  async complete(
    providerId: string,
    code: string,
    state: string
  ): Promise<Result<CredentialRecord>> {
    const redeemed = await this.states.redeem(state);
    if (!redeemed.ok) {
      return redeemed;
    }

    if (redeemed.value.providerId !== providerId) {
      logToFile(
        `[flow] provider mismatch: state for ${redeemed.value.providerId}, callback for ${providerId}`
      );
      return err({
        kind: "ProviderMismatch",
        expected: redeemed.value.providerId,
        received: providerId,
      });
    }

    const descriptor = this.registry.resolve(providerId);
    if (!descriptor.ok) {
      return descriptor;
    }

    const { userId } = redeemed.value;
    const grant = await this.tokenClient.exchangeCode(
      descriptor.value,
      code,
      this.redirectUriFor(providerId)
    );
    if (!grant.ok) {
      logToFile(
        `[flow] token exchange failed for user=${userId}, provider=${providerId}: ${grant.error.status ?? "-"} ${grant.error.detail}`
      );
      return err({ kind: "ExchangeFailed", status: grant.error.status, detail: grant.error.detail });
    }

    const saved = await this.store.save(userId, providerId, {
      accessToken: grant.value.accessToken,
      refreshToken: grant.value.refreshToken,
      expiresAt: this.now() + (grant.value.expiresIn ?? DEFAULT_TOKEN_LIFETIME_SECONDS) * 1000,
      scope: grant.value.scope ?? descriptor.value.scope,
      tokenType: grant.value.tokenType,
    });
    if (!saved.ok) {
      return saved;
    }

    logToFile(`[flow] connected ${providerId} for user=${userId}`);
    return saved;
  }

  async purgeExpiredStates(): Promise<Result<number>> {
    return this.states.purgeExpired();
  }
}
