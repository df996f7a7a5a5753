/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Hands out usable access tokens. A stored token is returned as-is while it
 * has more than the refresh buffer left; otherwise it is refreshed once per
 * (user, provider) no matter how many callers are waiting, and the store is
 * rewritten with the merged result.
 */

import { setTimeout as sleep } from "node:timers/promises";

import {
  DEFAULT_TOKEN_LIFETIME_SECONDS,
  TOKEN_EXPIRY_BUFFER_MS,
} from "../constants";
import type { CredentialStore } from "../credentials/credential-store";
import type { CredentialInput, CredentialRecord } from "../credentials/types";
import { err, errorMessage, ok, type Result } from "../errors";
import type { ProviderRegistry } from "../providers/provider-registry";
import { logToFile } from "../utils/logger";
import type { RefreshLease, RefreshLock } from "./refresh-lock";
import { SingleFlight } from "./single-flight";
import type { TokenEndpointClient } from "./token-endpoint-client";


export interface TokenLifecycleOptions {
  store: CredentialStore;
  registry: ProviderRegistry;
  tokenClient: TokenEndpointClient;
  /**
   * Cross-instance coordination; without it refreshes are de-duplicated
   * within this process only.
   */
  refreshLock?: RefreshLock;
  refreshBufferMs?: number;
  now?: () => number;
  /**
   * How long to wait for another instance's refresh to land.
   */
  lockWaitMs?: number;
  lockPollIntervalMs?: number;
}


export class TokenLifecycleManager {
  private readonly store: CredentialStore;
  private readonly registry: ProviderRegistry;
  private readonly tokenClient: TokenEndpointClient;
  private readonly refreshLock?: RefreshLock;
  private readonly refreshBufferMs: number;
  private readonly now: () => number;
  private readonly lockWaitMs: number;
  private readonly lockPollIntervalMs: number;
  private readonly flights = new SingleFlight<Result<string>>();

  constructor(options: TokenLifecycleOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.tokenClient = options.tokenClient;
    this.refreshLock = options.refreshLock;
    this.refreshBufferMs = options.refreshBufferMs ?? TOKEN_EXPIRY_BUFFER_MS;
    this.now = options.now ?? Date.now;
    this.lockWaitMs = options.lockWaitMs ?? 10_000;
    this.lockPollIntervalMs = options.lockPollIntervalMs ?? 250;
  }

  /**
   * True while the token has more than the refresh buffer left.
   */
  isFresh(record: CredentialRecord): boolean {
    return record.expiresAt - this.now() > this.refreshBufferMs;
  }

  async getValidToken(userId: string, providerId: string): Promise<Result<string>> {
    const loaded = await this.store.get(userId, providerId);
    if (!loaded.ok) {
      return loaded;
    }

    if (this.isFresh(loaded.value)) {
      logToFile(`[tokens] using cached token for user=${userId}, provider=${providerId}`);
      return ok(loaded.value.accessToken);
    }

    logToFile(`[tokens] token expiring for user=${userId}, provider=${providerId}, refreshing`);
    return this.refresh(userId, providerId, loaded.value);
  }

  /**
   * Runs a refresh-token grant and stores the result. Concurrent calls for
   * the same user and provider share a single grant and its outcome.
   */
  refresh(userId: string, providerId: string, record?: CredentialRecord): Promise<Result<string>> {
    return this.flights.run(JSON.stringify([userId, providerId]), () =>
      this.performRefresh(userId, providerId, record)
    );
  }

  private async performRefresh(
    userId: string,
    providerId: string,
    supplied?: CredentialRecord
  ): Promise<Result<string>> {
    const latest = await this.store.get(userId, providerId);
    let current: CredentialRecord;

    if (latest.ok) {
      // A flight that finished after the caller read its record has already
      // spent the refresh token the caller holds.
      if (supplied && this.replacedSince(supplied, latest.value)) {
        return ok(latest.value.accessToken);
      }
      current = latest.value;
    } else if (
      supplied &&
      (latest.error.kind === "StoreUnavailable" || latest.error.kind === "NoCredential")
    ) {
      current = supplied;
    } else {
      return latest;
    }

    if (!current.refreshToken) {
      return err({ kind: "NoRefreshToken", userId, providerId });
    }

    const descriptor = this.registry.resolve(providerId);
    if (!descriptor.ok) {
      return descriptor;
    }

    let lease: RefreshLease | null = null;
    if (this.refreshLock) {
      try {
        lease = await this.refreshLock.acquire(userId, providerId);
      } catch (error) {
        return err({ kind: "RefreshFailed", detail: `Refresh lock unavailable: ${errorMessage(error)}` });
      }
      if (!lease) {
        return this.awaitPeerRefresh(userId, providerId, current);
      }
    }

    try {
      if (lease) {
        // The previous holder may have rotated the refresh token between our
        // read and the lease.
        const locked = await this.store.get(userId, providerId);
        if (locked.ok) {
          if (this.replacedSince(current, locked.value)) {
            logToFile(`[tokens] user=${userId}, provider=${providerId} was refreshed elsewhere`);
            return ok(locked.value.accessToken);
          }
          current = locked.value;
        }
      }

      const refreshToken = current.refreshToken;
      if (!refreshToken) {
        return err({ kind: "NoRefreshToken", userId, providerId });
      }

      const grant = await this.tokenClient.refreshToken(descriptor.value, refreshToken);
      if (!grant.ok) {
        logToFile(
          `[tokens] refresh failed for user=${userId}, provider=${providerId}: ${grant.error.status ?? "-"} ${grant.error.detail}`
        );
        return err({ kind: "RefreshFailed", status: grant.error.status, detail: grant.error.detail });
      }

      const updated: CredentialInput = {
        accessToken: grant.value.accessToken,
        refreshToken: grant.value.refreshToken ?? refreshToken,
        expiresAt: this.now() + (grant.value.expiresIn ?? DEFAULT_TOKEN_LIFETIME_SECONDS) * 1000,
        scope: grant.value.scope ?? current.scope,
        tokenType: grant.value.tokenType ?? current.tokenType,
      };

      const saved = await this.store.save(userId, providerId, updated);
      if (!saved.ok) {
        return err({
          kind: "RefreshFailed",
          detail: `Refreshed token could not be stored: ${saved.error.kind === "StoreUnavailable" ? saved.error.detail : saved.error.kind}`,
        });
      }

      logToFile(`[tokens] refreshed token for user=${userId}, provider=${providerId}`);
      return ok(saved.value.accessToken);
    } finally {
      await lease?.release();
    }
  }

  /**
   * True when `latest` carries a different, still fresh access token than
   * the record the caller started from.
   */
  private replacedSince(seen: CredentialRecord, latest: CredentialRecord): boolean {
    return latest.accessToken !== seen.accessToken && this.isFresh(latest);
  }

  /**
   * Another instance holds the refresh lease. Poll the store until its new
   * token shows up or the wait runs out.
   */
  private async awaitPeerRefresh(
    userId: string,
    providerId: string,
    current: CredentialRecord
  ): Promise<Result<string>> {
    logToFile(`[tokens] refresh for user=${userId}, provider=${providerId} running elsewhere, waiting`);
    const polls = Math.max(1, Math.ceil(this.lockWaitMs / this.lockPollIntervalMs));

    for (let i = 0; i < polls; i++) {
      await sleep(this.lockPollIntervalMs);
      const latest = await this.store.get(userId, providerId);
      if (latest.ok && latest.value.accessToken !== current.accessToken) {
        return ok(latest.value.accessToken);
      }
      if (!latest.ok && latest.error.kind === "NoCredential") {
        return latest;
      }
    }

    return err({ kind: "RefreshFailed", detail: "Refresh already in progress on another instance" });
  }
}
