/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Static endpoint metadata for every provider the broker knows about.
 * Client credentials are injected separately by ProviderRegistry.
 */

export interface ProviderCatalogEntry {
  name: string;
  authorizationUrl: string;
  tokenUrl: string;
  /**
   * Space-separated scopes; empty for providers that take no scope parameter.
   */
  scope: string;
  responseType: "code";
}


export const PROVIDER_CATALOG = {
  notion: {
    name: "Notion",
    authorizationUrl: "https://api.notion.com/v1/oauth/authorize",
    tokenUrl: "https://api.notion.com/v1/oauth/token",
    scope: "",
    responseType: "code",
  },
  gmail: {
    name: "Gmail",
    authorizationUrl: "https://accounts.google.com/o/oauth2/v2/auth",
    tokenUrl: "https://oauth2.googleapis.com/token",
    scope: "https://www.googleapis.com/auth/gmail.send",
    responseType: "code",
  },
  github: {
    name: "GitHub",
    authorizationUrl: "https://github.com/login/oauth/authorize",
    tokenUrl: "https://github.com/login/oauth/access_token",
    scope: "repo user",
    responseType: "code",
  },
} as const satisfies Record<string, ProviderCatalogEntry>;


export type CatalogProviderId = keyof typeof PROVIDER_CATALOG;
