/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * High-level credential API over a secret backend. Keeps one record per
 * (user, provider) at `oauth/users/{user}/{provider}` and reports every
 * outcome as a Result, keeping "not found" apart from backend failures.
 */

import { z } from "zod";

import { CREDENTIALS_NAMESPACE } from "../constants";
import { err, errorMessage, ok, type Result } from "../errors";
import {
  decodeKeySegment,
  encodeKeySegment,
  joinPath,
  type SecretBackend,
  type SecretData,
  type SecretEntry,
} from "../secret-backend";
import { logToFile } from "../utils/logger";
import type { CredentialInput, CredentialRecord } from "./types";


const storedCredentialSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  expiresAt: z.number(),
  scope: z.string(),
  tokenType: z.string().optional(),
  updatedAt: z.number(),
});


export interface CredentialStoreOptions {
  now?: () => number;
}


export class CredentialStore {
  private readonly backend: SecretBackend;
  private readonly now: () => number;

  constructor(backend: SecretBackend, options: CredentialStoreOptions = {}) {
    this.backend = backend;
    this.now = options.now ?? Date.now;
  }

  private static userPath(userId: string): string {
    return joinPath(CREDENTIALS_NAMESPACE, encodeKeySegment(userId));
  }

  private static recordPath(userId: string, providerId: string): string {
    return joinPath(CredentialStore.userPath(userId), encodeKeySegment(providerId));
  }

  /**
   * Replaces the stored record as a whole; fields absent from the input are
   * absent afterwards.
   */
  async save(
    userId: string,
    providerId: string,
    record: CredentialInput
  ): Promise<Result<CredentialRecord>> {
    const stored: CredentialRecord = {
      userId,
      providerId,
      accessToken: record.accessToken,
      expiresAt: record.expiresAt,
      scope: record.scope,
      updatedAt: this.now(),
    };
    const data: SecretData = {
      accessToken: stored.accessToken,
      expiresAt: stored.expiresAt,
      scope: stored.scope,
      updatedAt: stored.updatedAt,
    };
    if (record.refreshToken) {
      stored.refreshToken = record.refreshToken;
      data["refreshToken"] = record.refreshToken;
    }
    if (record.tokenType) {
      stored.tokenType = record.tokenType;
      data["tokenType"] = record.tokenType;
    }

    try {
      await this.backend.write(CredentialStore.recordPath(userId, providerId), data);
    } catch (error) {
      logToFile(`[store] save failed for user=${userId}, provider=${providerId}: ${errorMessage(error)}`);
      return err({ kind: "StoreUnavailable", detail: errorMessage(error) });
    }

    logToFile(`[store] saved credential for user=${userId}, provider=${providerId}`);
    return ok(stored);
  }

  async get(userId: string, providerId: string): Promise<Result<CredentialRecord>> {
    let entry: SecretEntry | null;
    try {
      entry = await this.backend.read(CredentialStore.recordPath(userId, providerId));
    } catch (error) {
      logToFile(`[store] read failed for user=${userId}, provider=${providerId}: ${errorMessage(error)}`);
      return err({ kind: "StoreUnavailable", detail: errorMessage(error) });
    }

    if (!entry) {
      return err({ kind: "NoCredential", userId, providerId });
    }

    const parsed = storedCredentialSchema.safeParse(entry.data);
    if (!parsed.success) {
      return err({
        kind: "StoreUnavailable",
        detail: `Malformed credential record for user=${userId}, provider=${providerId}`,
      });
    }

    const { refreshToken, tokenType, ...fields } = parsed.data;
    const record: CredentialRecord = { userId, providerId, ...fields };
    if (refreshToken) {
      record.refreshToken = refreshToken;
    }
    if (tokenType) {
      record.tokenType = tokenType;
    }
    return ok(record);
  }

  /**
   * Provider ids with a stored record for this user.
   */
  async list(userId: string): Promise<Result<string[]>> {
    try {
      const names = await this.backend.list(CredentialStore.userPath(userId));
      return ok(names.map(decodeKeySegment));
    } catch (error) {
      return err({ kind: "StoreUnavailable", detail: errorMessage(error) });
    }
  }

  async delete(userId: string, providerId: string): Promise<Result<boolean>> {
    try {
      const deleted = await this.backend.delete(CredentialStore.recordPath(userId, providerId));
      if (deleted) {
        logToFile(`[store] deleted credential for user=${userId}, provider=${providerId}`);
      }
      return ok(deleted);
    } catch (error) {
      return err({ kind: "StoreUnavailable", detail: errorMessage(error) });
    }
  }

  async has(userId: string, providerId: string): Promise<Result<boolean>> {
    const result = await this.get(userId, providerId);
    if (result.ok) {
      return ok(true);
    }
    if (result.error.kind === "NoCredential") {
      return ok(false);
    }
    return result;
  }
}
