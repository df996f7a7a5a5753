/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { BaseSecretBackend } from "./base-secret-backend";
import type { SecretData, SecretEntry, WriteOptions, WriteOutcome } from "./types";


/**
 * Process-local backend for tests and single-instance development. Each
 * operation completes without yielding, so check-and-set writes are atomic.
 */
export class MemorySecretBackend extends BaseSecretBackend {
  private readonly entries = new Map<string, SecretEntry>();

  async read(path: string): Promise<SecretEntry | null> {
    this.validatePath(path);
    const entry = this.entries.get(path);
    return entry ? structuredClone(entry) : null;
  }

  async write(path: string, data: SecretData, options?: WriteOptions): Promise<WriteOutcome> {
    this.validatePath(path);
    const current = this.entries.get(path)?.version ?? 0;
    if (options?.cas !== undefined && options.cas !== current) {
      return { written: false, reason: "cas_mismatch" };
    }
    const version = current + 1;
    this.entries.set(path, { data: structuredClone(data), version });
    return { written: true, version };
  }

  async list(path: string): Promise<string[]> {
    this.validatePath(path);
    const prefix = `${path}/`;
    const names: string[] = [];
    for (const key of this.entries.keys()) {
      if (key.startsWith(prefix)) {
        const rest = key.slice(prefix.length);
        if (!rest.includes("/")) {
          names.push(rest);
        }
      }
    }
    return names.sort();
  }

  async delete(path: string): Promise<boolean> {
    this.validatePath(path);
    return this.entries.delete(path);
  }

  /**
   * Number of stored secrets; used by tests to assert nothing leaked.
   */
  get size(): number {
    return this.entries.size;
  }
}
