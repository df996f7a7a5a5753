/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Shared type definitions for the secret backend subsystem: a hierarchical,
 * path-addressable key-value store with per-path versions.
 */

export type SecretData = Record<string, unknown>;


/**
 * A stored secret together with its current version. Versions start at 1 and
 * increase by one on every write to the same path.
 */
export interface SecretEntry {
  data: SecretData;
  version: number;
}


export interface WriteOptions {
  /**
   * Check-and-set: 0 means the path must not exist yet; any other value must
   * equal the current version for the write to apply.
   */
  cas?: number;
}


export type WriteOutcome =
  | { written: true; version: number }
  | { written: false; reason: "cas_mismatch" };


/**
 * Discriminator for the active backend so callers can inspect which
 * strategy the hybrid backend resolved to.
 */
export enum SecretBackendType {
  VAULT = "vault",
  ENCRYPTED_FILE = "encrypted_file",
  MEMORY = "memory",
}


/**
 * Contract for secret persistence. Paths are slash-separated segments such
 * as `oauth/users/u1/github`. Implementations throw SecretBackendError when
 * the backend cannot be reached.
 */
export interface SecretBackend {
  read(path: string): Promise<SecretEntry | null>;
  write(path: string, data: SecretData, options?: WriteOptions): Promise<WriteOutcome>;
  /**
   * Names of the leaf secrets directly under a path.
   */
  list(path: string): Promise<string[]>;
  /**
   * Removes a secret and all its versions; false when nothing was there.
   */
  delete(path: string): Promise<boolean>;
}
