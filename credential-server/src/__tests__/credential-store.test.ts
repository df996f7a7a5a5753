/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CredentialStore } from "../credentials/credential-store";
import { SecretBackendError } from "../errors";
import { MemorySecretBackend } from "../secret-backend";
import { START_TIME, TestClock } from "../test-utils/fixtures";


function setup() {
  const clock = new TestClock();
  const backend = new MemorySecretBackend();
  const store = new CredentialStore(backend, { now: clock.now });
  return { clock, backend, store };
}


describe("CredentialStore", () => {
  it("round-trips a saved record and stamps updatedAt", async () => {
    const { store } = setup();

    const saved = await store.save("user-1", "github", {
      accessToken: "test-access",
      refreshToken: "test-refresh",
      expiresAt: START_TIME + 3_600_000,
      scope: "repo user",
      tokenType: "bearer",
    });

    const expected = {
      userId: "user-1",
      providerId: "github",
      accessToken: "test-access",
      refreshToken: "test-refresh",
      expiresAt: START_TIME + 3_600_000,
      scope: "repo user",
      tokenType: "bearer",
      updatedAt: START_TIME,
    };
    expect(saved).toEqual({ ok: true, value: expected });
    await expect(store.get("user-1", "github")).resolves.toEqual({ ok: true, value: expected });
  });

  it("replaces the whole record on save", async () => {
    const { store, clock } = setup();
    await store.save("user-1", "github", {
      accessToken: "old-access",
      refreshToken: "old-refresh",
      expiresAt: START_TIME,
      scope: "repo",
    });
    clock.advance(1000);

    await store.save("user-1", "github", {
      accessToken: "new-access",
      expiresAt: START_TIME + 1000,
      scope: "repo",
    });

    const loaded = await store.get("user-1", "github");
    expect(loaded).toEqual({
      ok: true,
      value: {
        userId: "user-1",
        providerId: "github",
        accessToken: "new-access",
        expiresAt: START_TIME + 1000,
        scope: "repo",
        updatedAt: START_TIME + 1000,
      },
    });
  });

  it("reports a missing record as NoCredential", async () => {
    const { store } = setup();

    await expect(store.get("user-1", "notion")).resolves.toEqual({
      ok: false,
      error: { kind: "NoCredential", userId: "user-1", providerId: "notion" },
    });
    await expect(store.has("user-1", "notion")).resolves.toEqual({ ok: true, value: false });
  });

  it("keeps users with path-like ids apart", async () => {
    const { store, backend } = setup();
    await store.save("a/b", "github", { accessToken: "first", expiresAt: 1, scope: "" });
    await store.save("a", "github", { accessToken: "second", expiresAt: 1, scope: "" });

    const first = await store.get("a/b", "github");
    const second = await store.get("a", "github");

    expect(first.ok && first.value.accessToken).toBe("first");
    expect(second.ok && second.value.accessToken).toBe("second");
    await expect(backend.list("oauth/users/~YS9i")).resolves.toEqual(["github"]);
    await expect(backend.list("oauth/users/a")).resolves.toEqual(["github"]);
  });

  it("lists the providers a user has connected", async () => {
    const { store } = setup();
    await store.save("alice@example.com", "notion", { accessToken: "n", expiresAt: 1, scope: "" });
    await store.save("alice@example.com", "github", { accessToken: "g", expiresAt: 1, scope: "" });
    await store.save("bob", "gmail", { accessToken: "m", expiresAt: 1, scope: "" });

    await expect(store.list("alice@example.com")).resolves.toEqual({
      ok: true,
      value: ["github", "notion"],
    });
    await expect(store.list("carol")).resolves.toEqual({ ok: true, value: [] });
  });

  it("deletes a record and reports whether one existed", async () => {
    const { store } = setup();
    await store.save("user-1", "github", { accessToken: "a", expiresAt: 1, scope: "" });

    await expect(store.delete("user-1", "github")).resolves.toEqual({ ok: true, value: true });
    await expect(store.delete("user-1", "github")).resolves.toEqual({ ok: true, value: false });
    await expect(store.has("user-1", "github")).resolves.toEqual({ ok: true, value: false });
  });

  it("reports backend failures as StoreUnavailable, not as a missing record", async () => {
    const { store, backend } = setup();
    jest
      .spyOn(backend, "read")
      .mockRejectedValue(new SecretBackendError("Vault request failed: timeout"));

    await expect(store.get("user-1", "github")).resolves.toEqual({
      ok: false,
      error: { kind: "StoreUnavailable", detail: "Vault request failed: timeout" },
    });
    await expect(store.has("user-1", "github")).resolves.toEqual({
      ok: false,
      error: { kind: "StoreUnavailable", detail: "Vault request failed: timeout" },
    });
  });

  it("reports a malformed stored record as StoreUnavailable", async () => {
    const { store, backend } = setup();
    await backend.write("oauth/users/user-1/github", { accessToken: 42 });

    await expect(store.get("user-1", "github")).resolves.toEqual({
      ok: false,
      error: {
        kind: "StoreUnavailable",
        detail: "Malformed credential record for user=user-1, provider=github",
      },
    });
  });

  it("reports failed writes as StoreUnavailable", async () => {
    const { store, backend } = setup();
    jest.spyOn(backend, "write").mockRejectedValue(new SecretBackendError("disk full"));

    await expect(
      store.save("user-1", "github", { accessToken: "a", expiresAt: 1, scope: "" })
    ).resolves.toEqual({ ok: false, error: { kind: "StoreUnavailable", detail: "disk full" } });
  });
});
