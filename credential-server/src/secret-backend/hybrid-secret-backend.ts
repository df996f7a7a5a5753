/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Backend selector that uses Vault when an address and token are configured
 * and falls back to encrypted file storage otherwise. Lazily initializes the
 * underlying backend on first access with race-condition protection.
 */

import { logToFile } from "../utils/logger";
import { BaseSecretBackend } from "./base-secret-backend";
import { FileSecretBackend } from "./file-secret-backend";
import {
  SecretBackendType,
  type SecretBackend,
  type SecretData,
  type SecretEntry,
  type WriteOptions,
  type WriteOutcome,
} from "./types";
import { VaultSecretBackend, type VaultBackendOptions } from "./vault-secret-backend";


export interface HybridBackendOptions {
  vault?: VaultBackendOptions;
  secretFilePath: string;
  forceFileStorage?: boolean;
}


/**
 * Delegates every operation to either VaultSecretBackend or
 * FileSecretBackend, chosen once at initialization time.
 */
export class HybridSecretBackend extends BaseSecretBackend {
  private readonly options: HybridBackendOptions;
  private backend: SecretBackend | null = null;
  private backendType: SecretBackendType | null = null;
  private backendInitPromise: Promise<SecretBackend> | null = null;

  constructor(options: HybridBackendOptions) {
    super();
    this.options = options;
  }

  private async initializeBackend(): Promise<SecretBackend> {
    const { vault, forceFileStorage, secretFilePath } = this.options;

    if (vault && !forceFileStorage) {
      const vaultBackend = new VaultSecretBackend(vault);
      if (!(await vaultBackend.isAvailable())) {
        console.warn(`[storage] Vault at ${vault.address} is not reachable yet; requests will fail until it is`);
      }
      this.backend = vaultBackend;
      this.backendType = SecretBackendType.VAULT;
      logToFile(`[storage] using Vault at ${vault.address}`);
      return vaultBackend;
    }

    this.backend = await FileSecretBackend.create(secretFilePath);
    this.backendType = SecretBackendType.ENCRYPTED_FILE;
    logToFile(`[storage] using encrypted file ${secretFilePath}`);
    return this.backend;
  }

  /**
   * Returns the resolved backend, initializing it on first call. Uses a
   * shared promise to prevent concurrent initialization races.
   */
  private async getBackend(): Promise<SecretBackend> {
    if (this.backend !== null) {
      return this.backend;
    }

    if (!this.backendInitPromise) {
      this.backendInitPromise = this.initializeBackend();
      // A failed initialization may be retried by the next caller.
      this.backendInitPromise.catch(() => {
        this.backendInitPromise = null;
      });
    }

    return await this.backendInitPromise;
  }

  async read(path: string): Promise<SecretEntry | null> {
    const backend = await this.getBackend();
    return backend.read(path);
  }

  async write(path: string, data: SecretData, options?: WriteOptions): Promise<WriteOutcome> {
    const backend = await this.getBackend();
    return backend.write(path, data, options);
  }

  async list(path: string): Promise<string[]> {
    const backend = await this.getBackend();
    return backend.list(path);
  }

  async delete(path: string): Promise<boolean> {
    const backend = await this.getBackend();
    return backend.delete(path);
  }

  /**
   * Returns which backend was selected after initialization.
   */
  async getBackendType(): Promise<SecretBackendType> {
    await this.getBackend();
    return this.backendType ?? SecretBackendType.ENCRYPTED_FILE;
  }
}
