/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * HashiCorp Vault KV v2 backend spoken over the HTTP API with gaxios.
 * Versions and check-and-set map directly onto KV v2 semantics.
 */

import type { GaxiosOptions } from "gaxios";
import { z } from "zod";

import { DEFAULT_VAULT_MOUNT, HTTP_TIMEOUT_MS } from "../constants";
import { SecretBackendError, errorMessage } from "../errors";
import {
  baseRequestOptions,
  gaxiosTransport,
  idempotentRequestOptions,
  retryingRequestOptions,
  type HttpResponse,
  type HttpTransport,
} from "../utils/http-options";
import { logToFile } from "../utils/logger";
import { BaseSecretBackend } from "./base-secret-backend";
import type { SecretData, SecretEntry, WriteOptions, WriteOutcome } from "./types";


export interface VaultBackendOptions {
  address: string;
  token: string;
  mount?: string;
  namespace?: string;
  timeoutMs?: number;
  transport?: HttpTransport;
}


const readResponseSchema = z.object({
  data: z.object({
    data: z.record(z.unknown()).nullable(),
    metadata: z.object({
      version: z.number().int(),
      destroyed: z.boolean().optional(),
      deletion_time: z.string().optional(),
    }),
  }),
});

const writeResponseSchema = z.object({
  data: z.object({ version: z.number().int() }),
});

const listResponseSchema = z.object({
  data: z.object({ keys: z.array(z.string()) }),
});

const errorResponseSchema = z.object({ errors: z.array(z.string()) });


function vaultErrors(data: unknown): string {
  const parsed = errorResponseSchema.safeParse(data);
  return parsed.success ? parsed.data.errors.join("; ") : "";
}


/**
 * Stores secrets under `{mount}/data/{path}` and lists them through the
 * metadata endpoint. A soft-deleted or destroyed latest version reads as
 * absent.
 */
export class VaultSecretBackend extends BaseSecretBackend {
  private readonly address: string;
  private readonly token: string;
  private readonly mount: string;
  private readonly namespace?: string;
  private readonly timeoutMs: number;
  private readonly transport: HttpTransport;

  constructor(options: VaultBackendOptions) {
    super();
    this.address = options.address.replace(/\/+$/, "");
    this.token = options.token;
    this.mount = options.mount ?? DEFAULT_VAULT_MOUNT;
    this.namespace = options.namespace;
    this.timeoutMs = options.timeoutMs ?? HTTP_TIMEOUT_MS;
    this.transport = options.transport ?? gaxiosTransport;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { "X-Vault-Token": this.token };
    if (this.namespace) {
      headers["X-Vault-Namespace"] = this.namespace;
    }
    return headers;
  }

  private async send(options: GaxiosOptions): Promise<HttpResponse> {
    try {
      return await this.transport({ ...options, headers: this.headers() });
    } catch (error) {
      logToFile(`[vault] ${options.method ?? "GET"} ${options.url} failed: ${errorMessage(error)}`);
      throw new SecretBackendError(`Vault request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private unexpected(response: HttpResponse, action: string): SecretBackendError {
    const detail = vaultErrors(response.data);
    return new SecretBackendError(
      `Vault ${action} failed with status ${response.status}${detail ? `: ${detail}` : ""}`,
      { status: response.status }
    );
  }

  private dataUrl(path: string): string {
    return `${this.address}/v1/${this.mount}/data/${path}`;
  }

  private metadataUrl(path: string): string {
    return `${this.address}/v1/${this.mount}/metadata/${path}`;
  }

  async read(path: string): Promise<SecretEntry | null> {
    this.validatePath(path);
    const response = await this.send({
      ...idempotentRequestOptions(this.timeoutMs),
      method: "GET",
      url: this.dataUrl(path),
    });

    if (response.status === 404) {
      return null;
    }
    if (response.status !== 200) {
      throw this.unexpected(response, "read");
    }

    const parsed = readResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new SecretBackendError(`Unexpected Vault read response for ${path}`);
    }

    const { data, metadata } = parsed.data.data;
    if (data === null || metadata.destroyed || metadata.deletion_time) {
      return null;
    }
    return { data, version: metadata.version };
  }

  async write(path: string, data: SecretData, options?: WriteOptions): Promise<WriteOutcome> {
    this.validatePath(path);
    const body: { data: SecretData; options?: { cas: number } } = { data };
    if (options?.cas !== undefined) {
      body.options = { cas: options.cas };
    }

    // A plain write can be replayed; a check-and-set write must not be.
    const requestOptions =
      options?.cas === undefined
        ? retryingRequestOptions(this.timeoutMs, { attempts: 3, retryDelayMs: 250, methods: ["POST"] })
        : baseRequestOptions(this.timeoutMs);
    const response = await this.send({
      ...requestOptions,
      method: "POST",
      url: this.dataUrl(path),
      data: body,
    });

    if (response.status === 400 && vaultErrors(response.data).includes("check-and-set")) {
      return { written: false, reason: "cas_mismatch" };
    }
    if (response.status !== 200) {
      throw this.unexpected(response, "write");
    }

    const parsed = writeResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new SecretBackendError(`Unexpected Vault write response for ${path}`);
    }
    return { written: true, version: parsed.data.data.version };
  }

  async list(path: string): Promise<string[]> {
    this.validatePath(path);
    const response = await this.send({
      ...idempotentRequestOptions(this.timeoutMs),
      method: "GET",
      url: this.metadataUrl(path),
      params: { list: "true" },
    });

    if (response.status === 404) {
      return [];
    }
    if (response.status !== 200) {
      throw this.unexpected(response, "list");
    }

    const parsed = listResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new SecretBackendError(`Unexpected Vault list response for ${path}`);
    }
    // Sub-folders come back with a trailing slash.
    return parsed.data.data.keys.filter((key) => !key.endsWith("/")).sort();
  }

  async delete(path: string): Promise<boolean> {
    this.validatePath(path);
    const existing = await this.send({
      ...idempotentRequestOptions(this.timeoutMs),
      method: "GET",
      url: this.metadataUrl(path),
    });
    if (existing.status === 404) {
      return false;
    }
    if (existing.status !== 200) {
      throw this.unexpected(existing, "metadata lookup");
    }

    const response = await this.send({
      ...idempotentRequestOptions(this.timeoutMs),
      method: "DELETE",
      url: this.metadataUrl(path),
    });
    if (response.status === 404) {
      return false;
    }
    if (response.status !== 204 && response.status !== 200) {
      throw this.unexpected(response, "delete");
    }
    return true;
  }

  /**
   * Confirms the server is reachable and the token is accepted.
   */
  async isAvailable(): Promise<boolean> {
    try {
      const response = await this.send({
        ...baseRequestOptions(this.timeoutMs),
        method: "GET",
        url: `${this.address}/v1/auth/token/lookup-self`,
      });
      return response.status === 200;
    } catch {
      return false;
    }
  }
}
