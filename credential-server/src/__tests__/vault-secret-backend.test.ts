/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { SecretBackendError } from "../errors";
import { HybridSecretBackend, SecretBackendType, VaultSecretBackend } from "../secret-backend";
import { FakeHttp, FakeVault, json } from "../test-utils/fake-http";


const ADDRESS = "http://vault.test:8200";


function setup(options: { namespace?: string } = {}) {
  const http = new FakeHttp();
  const vault = new FakeVault(http, ADDRESS);
  const backend = new VaultSecretBackend({
    address: `${ADDRESS}/`,
    token: "test-token",
    namespace: options.namespace,
    transport: http.transport,
  });
  return { http, vault, backend };
}


describe("VaultSecretBackend", () => {
  it("writes through the KV v2 data endpoint with the Vault token", async () => {
    const { http, backend } = setup();

    await expect(backend.write("oauth/users/u1/github", { accessToken: "a1" })).resolves.toEqual({
      written: true,
      version: 1,
    });

    const [request] = http.requests;
    expect(request?.method).toBe("POST");
    expect(request?.url).toBe(`${ADDRESS}/v1/secret/data/oauth/users/u1/github`);
    expect(request?.headers["X-Vault-Token"]).toBe("test-token");
    expect(request?.headers["X-Vault-Namespace"]).toBeUndefined();
    expect(request?.data).toEqual({ data: { accessToken: "a1" } });
    expect(request?.retryConfig?.httpMethodsToRetry).toEqual(["POST"]);
  });

  it("sends the namespace header when configured", async () => {
    const { http, backend } = setup({ namespace: "team-a" });

    await backend.read("oauth/users/u1/github");

    expect(http.requests[0]?.headers["X-Vault-Namespace"]).toBe("team-a");
  });

  it("reads the latest version and treats 404 as absent", async () => {
    const { backend } = setup();
    await backend.write("oauth/users/u1/github", { accessToken: "a1" });
    await backend.write("oauth/users/u1/github", { accessToken: "a2" });

    await expect(backend.read("oauth/users/u1/github")).resolves.toEqual({
      data: { accessToken: "a2" },
      version: 2,
    });
    await expect(backend.read("oauth/users/u1/notion")).resolves.toBeNull();
  });

  it("treats a soft-deleted latest version as absent", async () => {
    const http = new FakeHttp().on(
      "GET",
      `${ADDRESS}/v1/secret/data/oauth/users/u1/github`,
      json(200, {
        data: {
          data: null,
          metadata: { version: 3, destroyed: false, deletion_time: "2025-01-01T00:00:00Z" },
        },
      })
    );
    const backend = new VaultSecretBackend({ address: ADDRESS, token: "test-token", transport: http.transport });

    await expect(backend.read("oauth/users/u1/github")).resolves.toBeNull();
  });

  it("maps a check-and-set rejection to cas_mismatch", async () => {
    const { http, backend } = setup();
    await backend.write("oauth/states/s1", { n: 1 }, { cas: 0 });

    await expect(backend.write("oauth/states/s1", { n: 2 }, { cas: 0 })).resolves.toEqual({
      written: false,
      reason: "cas_mismatch",
    });
    expect(http.requests[1]?.data).toEqual({ data: { n: 2 }, options: { cas: 0 } });
    expect(http.requests[1]?.retryConfig).toBeUndefined();
  });

  it("lists leaf keys and skips sub-folders", async () => {
    const { http, backend } = setup();
    await backend.write("oauth/users/u1/notion", { a: 1 });
    await backend.write("oauth/users/u1/github", { a: 1 });
    await backend.write("oauth/users/u1/nested/deeper", { a: 1 });

    await expect(backend.list("oauth/users/u1")).resolves.toEqual(["github", "notion"]);
    await expect(backend.list("oauth/users/nobody")).resolves.toEqual([]);

    const listing = http.requests.find((request) => request.url.includes("/metadata/"));
    expect(listing?.params).toEqual({ list: "true" });
  });

  it("deletes all versions through the metadata endpoint", async () => {
    const { http, vault, backend } = setup();
    await backend.write("oauth/users/u1/github", { a: 1 });

    await expect(backend.delete("oauth/users/u1/github")).resolves.toBe(true);
    await expect(backend.delete("oauth/users/u1/github")).resolves.toBe(false);

    expect(vault.secrets.size).toBe(0);
    expect(
      http.requests.filter((request) => request.method === "DELETE").map((request) => request.url)
    ).toEqual([`${ADDRESS}/v1/secret/metadata/oauth/users/u1/github`]);
  });

  it("raises SecretBackendError when Vault is unreachable", async () => {
    const { vault, backend } = setup();
    vault.down = true;

    await expect(backend.read("oauth/users/u1/github")).rejects.toThrow(SecretBackendError);
    await expect(backend.write("oauth/users/u1/github", { a: 1 })).rejects.toThrow(
      "Vault request failed: connect ECONNREFUSED"
    );
  });

  it("raises SecretBackendError with the status for unexpected answers", async () => {
    const http = new FakeHttp().on(
      "GET",
      `${ADDRESS}/v1/secret/data/oauth/users/u1/github`,
      json(403, { errors: ["permission denied"] })
    );
    const backend = new VaultSecretBackend({ address: ADDRESS, token: "test-token", transport: http.transport });

    const failure = await backend.read("oauth/users/u1/github").catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(SecretBackendError);
    expect(failure).toMatchObject({
      status: 403,
      message: "Vault read failed with status 403: permission denied",
    });
  });

  it("reports availability through token lookup", async () => {
    const { vault, backend } = setup();

    await expect(backend.isAvailable()).resolves.toBe(true);
    vault.down = true;
    await expect(backend.isAvailable()).resolves.toBe(false);
  });
});


describe("HybridSecretBackend with Vault configured", () => {
  it("routes every operation to Vault", async () => {
    const http = new FakeHttp();
    const vault = new FakeVault(http, ADDRESS);
    const backend = new HybridSecretBackend({
      vault: { address: ADDRESS, token: "test-token", transport: http.transport },
      secretFilePath: "/nonexistent/secrets.enc",
    });

    await backend.write("oauth/users/u1/github", { accessToken: "a1" });

    await expect(backend.getBackendType()).resolves.toBe(SecretBackendType.VAULT);
    expect(vault.secrets.get("oauth/users/u1/github")).toEqual({
      data: { accessToken: "a1" },
      version: 1,
    });
  });
});
