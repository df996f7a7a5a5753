/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * One-time CSRF state tokens kept in the secret backend so every instance
 * sees the same set and restarts lose nothing. Redemption claims the entry
 * with a check-and-set tombstone, so of any number of concurrent redeemers
 * exactly one wins.
 */

import crypto from "node:crypto";
import { z } from "zod";

import { STATE_TOKEN_BYTES, STATE_TTL_MS, STATES_NAMESPACE } from "../constants";
import { err, errorMessage, ok, type Result } from "../errors";
import { joinPath, type SecretBackend, type SecretEntry } from "../secret-backend";
import { logToFile } from "../utils/logger";


export interface StateEntry {
  state: string;
  userId: string;
  providerId: string;
  /**
   * Issue time, epoch milliseconds.
   */
  createdAt: number;
}


export interface StateStore {
  issue(userId: string, providerId: string): Promise<Result<StateEntry>>;
  /**
   * Consumes the entry. Absent, already redeemed and expired states all
   * fail with InvalidState.
   */
  redeem(state: string): Promise<Result<StateEntry>>;
  /**
   * Removes expired and abandoned entries; resolves to how many went.
   */
  purgeExpired(): Promise<Result<number>>;
}


export interface StateStoreOptions {
  ttlMs?: number;
  now?: () => number;
}


const STATE_FORMAT = new RegExp(`^[0-9a-f]{${STATE_TOKEN_BYTES * 2}}$`);

const pendingStateSchema = z.object({
  userId: z.string().min(1),
  providerId: z.string().min(1),
  createdAt: z.number(),
});


export function generateStateToken(): string {
  return crypto.randomBytes(STATE_TOKEN_BYTES).toString("hex");
}


export class SecretBackendStateStore implements StateStore {
  private readonly backend: SecretBackend;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(backend: SecretBackend, options: StateStoreOptions = {}) {
    this.backend = backend;
    this.ttlMs = options.ttlMs ?? STATE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  private static pathFor(state: string): string {
    return joinPath(STATES_NAMESPACE, state);
  }

  private isExpired(createdAt: number): boolean {
    return this.now() - createdAt > this.ttlMs;
  }

  async issue(userId: string, providerId: string): Promise<Result<StateEntry>> {
    const entry: StateEntry = {
      state: generateStateToken(),
      userId,
      providerId,
      createdAt: this.now(),
    };

    try {
      const outcome = await this.backend.write(
        SecretBackendStateStore.pathFor(entry.state),
        { userId, providerId, createdAt: entry.createdAt },
        { cas: 0 }
      );
      if (!outcome.written) {
        return err({ kind: "StoreUnavailable", detail: "State token collision" });
      }
    } catch (error) {
      return err({ kind: "StoreUnavailable", detail: errorMessage(error) });
    }

    return ok(entry);
  }

  async redeem(state: string): Promise<Result<StateEntry>> {
    if (!STATE_FORMAT.test(state)) {
      return err({ kind: "InvalidState" });
    }
    const path = SecretBackendStateStore.pathFor(state);

    let entry: SecretEntry | null;
    try {
      entry = await this.backend.read(path);
    } catch (error) {
      return err({ kind: "StoreUnavailable", detail: errorMessage(error) });
    }
    if (!entry) {
      return err({ kind: "InvalidState" });
    }

    const pending = pendingStateSchema.safeParse(entry.data);
    if (!pending.success) {
      // A tombstone left behind by a redeemer that could not finish cleanup.
      await this.discard(path);
      return err({ kind: "InvalidState" });
    }

    try {
      const claim = await this.backend.write(
        path,
        { redeemedAt: this.now() },
        { cas: entry.version }
      );
      if (!claim.written) {
        return err({ kind: "InvalidState" });
      }
    } catch (error) {
      return err({ kind: "StoreUnavailable", detail: errorMessage(error) });
    }

    await this.discard(path);

    if (this.isExpired(pending.data.createdAt)) {
      logToFile(`[flow] expired state presented for provider=${pending.data.providerId}`);
      return err({ kind: "InvalidState" });
    }

    return ok({ state, ...pending.data });
  }

  async purgeExpired(): Promise<Result<number>> {
    let states: string[];
    try {
      states = await this.backend.list(STATES_NAMESPACE);
    } catch (error) {
      return err({ kind: "StoreUnavailable", detail: errorMessage(error) });
    }

    let purged = 0;
    for (const state of states) {
      const path = SecretBackendStateStore.pathFor(state);
      try {
        const entry = await this.backend.read(path);
        if (!entry) {
          continue;
        }
        const pending = pendingStateSchema.safeParse(entry.data);
        // Anything that is not a pending entry is a leftover tombstone.
        const stale = !pending.success || this.isExpired(pending.data.createdAt);
        if (stale && (await this.backend.delete(path))) {
          purged += 1;
        }
      } catch (error) {
        return err({ kind: "StoreUnavailable", detail: errorMessage(error) });
      }
    }

    if (purged > 0) {
      logToFile(`[flow] purged ${purged} stale state entries`);
    }
    return ok(purged);
  }

  /**
   * Removes a claimed or unreadable entry. Failure leaves a tombstone that
   * can no longer be redeemed and is swept by purgeExpired.
   */
  private async discard(path: string): Promise<void> {
    try {
      await this.backend.delete(path);
    } catch (error) {
      logToFile(`[flow] could not remove state entry: ${errorMessage(error)}`);
    }
  }
}
