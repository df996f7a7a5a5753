/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ProviderRegistry } from "../providers/provider-registry";
import { TEST_CREDENTIALS } from "../test-utils/fixtures";


describe("ProviderRegistry", () => {
  it("resolves a configured provider with its client credentials", () => {
    const registry = new ProviderRegistry(TEST_CREDENTIALS);

    const result = registry.resolve("github");

    expect(result).toEqual({
      ok: true,
      value: {
        id: "github",
        name: "GitHub",
        authorizationUrl: "https://github.com/login/oauth/authorize",
        tokenUrl: "https://github.com/login/oauth/access_token",
        scope: "repo user",
        responseType: "code",
        clientId: "github-client",
        clientSecret: "test-secret",
      },
    });
  });

  it("reports ids outside the catalog as unknown", () => {
    const registry = new ProviderRegistry(TEST_CREDENTIALS);

    expect(registry.resolve("dropbox")).toEqual({
      ok: false,
      error: { kind: "UnknownProvider", providerId: "dropbox" },
    });
    expect(registry.resolve("toString")).toEqual({
      ok: false,
      error: { kind: "UnknownProvider", providerId: "toString" },
    });
  });

  it("reports catalog providers without both credentials as not configured", () => {
    const registry = new ProviderRegistry({
      notion: { clientId: "notion-client", clientSecret: "" },
      gmail: { clientId: "google-client" },
    });

    expect(registry.resolve("notion")).toEqual({
      ok: false,
      error: { kind: "NotConfigured", providerId: "notion" },
    });
    expect(registry.resolve("gmail")).toEqual({
      ok: false,
      error: { kind: "NotConfigured", providerId: "gmail" },
    });
    expect(registry.resolve("github")).toEqual({
      ok: false,
      error: { kind: "NotConfigured", providerId: "github" },
    });
  });

  it("lists every catalog provider as supported regardless of configuration", () => {
    const registry = new ProviderRegistry({});

    expect([...registry.listSupported()].sort()).toEqual(["github", "gmail", "notion"]);
    expect(registry.listConfigured()).toEqual([]);
  });

  it("lists only configured providers", () => {
    const registry = new ProviderRegistry({
      github: { clientId: "github-client", clientSecret: "test-secret" },
    });

    expect(registry.listConfigured()).toEqual(["github"]);
    expect(registry.isConfigured("github")).toBe(true);
    expect(registry.isConfigured("notion")).toBe(false);
  });

  it("falls back to the id for display names of unknown providers", () => {
    const registry = new ProviderRegistry(TEST_CREDENTIALS);

    expect(registry.displayName("gmail")).toBe("Gmail");
    expect(registry.displayName("dropbox")).toBe("dropbox");
  });

  it("accepts a custom catalog", () => {
    const registry = new ProviderRegistry(
      { acme: { clientId: "acme-client", clientSecret: "test-secret" } },
      {
        acme: {
          name: "Acme",
          authorizationUrl: "https://acme.test/authorize",
          tokenUrl: "https://acme.test/token",
          scope: "read",
          responseType: "code",
        },
      }
    );

    const result = registry.resolve("acme");
    expect(result.ok && result.value.tokenUrl).toBe("https://acme.test/token");
    expect(registry.resolve("github")).toEqual({
      ok: false,
      error: { kind: "UnknownProvider", providerId: "github" },
    });
  });
});
