/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Short-lived lease records that keep two broker instances from running the
 * same refresh grant at once. Acquisition is a check-and-set create; a lease
 * past its expiry may be taken over.
 */

import crypto from "node:crypto";
import { z } from "zod";

import { LOCKS_NAMESPACE, REFRESH_LOCK_TTL_MS } from "../constants";
import { errorMessage } from "../errors";
import { encodeKeySegment, joinPath, type SecretBackend } from "../secret-backend";
import { logToFile } from "../utils/logger";


export interface RefreshLease {
  release(): Promise<void>;
}


export interface RefreshLock {
  /**
   * Resolves to a lease, or null when another holder's lease is live.
   * Rejects when the backend cannot be reached.
   */
  acquire(userId: string, providerId: string): Promise<RefreshLease | null>;
}


export interface RefreshLockOptions {
  ttlMs?: number;
  now?: () => number;
}


const leaseSchema = z.object({
  owner: z.string(),
  expiresAt: z.number(),
});


export class SecretBackendRefreshLock implements RefreshLock {
  private readonly backend: SecretBackend;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(backend: SecretBackend, options: RefreshLockOptions = {}) {
    this.backend = backend;
    this.ttlMs = options.ttlMs ?? REFRESH_LOCK_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  async acquire(userId: string, providerId: string): Promise<RefreshLease | null> {
    const path = joinPath(LOCKS_NAMESPACE, encodeKeySegment(userId), encodeKeySegment(providerId));
    const owner = crypto.randomBytes(16).toString("hex");
    const lease = { owner, expiresAt: this.now() + this.ttlMs };

    const created = await this.backend.write(path, lease, { cas: 0 });
    if (created.written) {
      return this.leaseFor(path, owner);
    }

    const existing = await this.backend.read(path);
    if (!existing) {
      // Released between our write and read; one more attempt.
      const retried = await this.backend.write(path, lease, { cas: 0 });
      return retried.written ? this.leaseFor(path, owner) : null;
    }

    const current = leaseSchema.safeParse(existing.data);
    if (current.success && current.data.expiresAt > this.now()) {
      return null;
    }

    const takeover = await this.backend.write(path, lease, { cas: existing.version });
    if (!takeover.written) {
      return null;
    }
    logToFile(`[tokens] took over an abandoned refresh lease for provider=${providerId}`);
    return this.leaseFor(path, owner);
  }

  private leaseFor(path: string, owner: string): RefreshLease {
    return {
      release: async () => {
        try {
          const entry = await this.backend.read(path);
          const held = entry ? leaseSchema.safeParse(entry.data) : null;
          if (held?.success && held.data.owner === owner) {
            await this.backend.delete(path);
          }
        } catch (error) {
          // The lease expires on its own.
          logToFile(`[tokens] failed to release refresh lease: ${errorMessage(error)}`);
        }
      },
    };
  }
}
