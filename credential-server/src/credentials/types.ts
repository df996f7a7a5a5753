/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Persisted OAuth credential for one (user, provider) pair.
 */
export interface CredentialRecord {
  userId: string;
  providerId: string;
  accessToken: string;
  refreshToken?: string;
  /**
   * Absolute expiry, epoch milliseconds.
   */
  expiresAt: number;
  scope: string;
  tokenType?: string;
  /**
   * Stamped by the store on every save.
   */
  updatedAt: number;
}


/**
 * Token fields a caller hands to CredentialStore.save.
 */
export type CredentialInput = Pick<
  CredentialRecord,
  "accessToken" | "refreshToken" | "expiresAt" | "scope" | "tokenType"
>;
