/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { err, ok, type Result } from "../errors";
import { PROVIDER_CATALOG, type ProviderCatalogEntry } from "./catalog";


/**
 * Catalog entry combined with the client credentials needed to talk to the
 * provider.
 */
export interface ProviderDescriptor extends ProviderCatalogEntry {
  id: string;
  clientId: string;
  clientSecret: string;
}


export interface ClientCredentials {
  clientId?: string;
  clientSecret?: string;
}


export type ProviderCredentials = Readonly<Record<string, ClientCredentials>>;


/**
 * Resolves provider ids against the static catalog. Built once at startup
 * with the resolved client credentials and shared by the flow orchestrator
 * and the token lifecycle manager; performs no I/O.
 */
export class ProviderRegistry {
  private readonly catalog: Readonly<Record<string, ProviderCatalogEntry>>;
  private readonly credentials: ProviderCredentials;

  constructor(
    credentials: ProviderCredentials,
    catalog: Readonly<Record<string, ProviderCatalogEntry>> = PROVIDER_CATALOG
  ) {
    this.catalog = catalog;
    this.credentials = credentials;
  }

  /**
   * Returns the usable descriptor for a provider, distinguishing ids that are
   * not in the catalog from catalog entries lacking client credentials.
   */
  resolve(providerId: string): Result<ProviderDescriptor> {
    if (!Object.hasOwn(this.catalog, providerId)) {
      return err({ kind: "UnknownProvider", providerId });
    }
    const entry = this.catalog[providerId];
    const creds = Object.hasOwn(this.credentials, providerId)
      ? this.credentials[providerId]
      : undefined;

    if (!entry || !creds?.clientId || !creds.clientSecret) {
      return err({ kind: "NotConfigured", providerId });
    }

    return ok({
      ...entry,
      id: providerId,
      clientId: creds.clientId,
      clientSecret: creds.clientSecret,
    });
  }

  listSupported(): ReadonlySet<string> {
    return new Set(Object.keys(this.catalog));
  }

  isConfigured(providerId: string): boolean {
    return this.resolve(providerId).ok;
  }

  listConfigured(): string[] {
    return [...this.listSupported()].filter((id) => this.isConfigured(id));
  }

  /**
   * Display name for a catalog provider, or the id itself when unknown.
   */
  displayName(providerId: string): string {
    return Object.hasOwn(this.catalog, providerId)
      ? (this.catalog[providerId]?.name ?? providerId)
      : providerId;
  }
}
