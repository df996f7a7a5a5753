/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ProviderRegistry, type ProviderDescriptor } from "../providers/provider-registry";
import { FakeHttp, json, networkError, serverError } from "../test-utils/fake-http";
import { TEST_CREDENTIALS } from "../test-utils/fixtures";
import { GaxiosTokenEndpointClient } from "../tokens/token-endpoint-client";


const GITHUB_TOKEN_URL = "https://github.com/login/oauth/access_token";
const GOOGLE_TOKEN_URL = "https://oauth2.googleapis.com/token";
const REDIRECT_URI = "http://localhost:3000/oauth/callback/github";


function descriptor(providerId: string): ProviderDescriptor {
  const resolved = new ProviderRegistry(TEST_CREDENTIALS).resolve(providerId);
  if (!resolved.ok) {
    throw new Error(`fixture provider ${providerId} is not configured`);
  }
  return resolved.value;
}


function clientFor(http: FakeHttp) {
  return new GaxiosTokenEndpointClient({ transport: http.transport, retryDelayMs: 0 });
}


describe("GaxiosTokenEndpointClient.exchangeCode", () => {
  it("posts a form-encoded authorization-code grant and parses the JSON answer", async () => {
    const http = new FakeHttp().on(
      "POST",
      GITHUB_TOKEN_URL,
      json(200, {
        access_token: "test-access",
        refresh_token: "test-refresh",
        expires_in: 28800,
        scope: "repo,user",
        token_type: "bearer",
      })
    );

    const result = await clientFor(http).exchangeCode(descriptor("github"), "code-123", REDIRECT_URI);

    expect(result).toEqual({
      ok: true,
      value: {
        accessToken: "test-access",
        refreshToken: "test-refresh",
        expiresIn: 28800,
        scope: "repo,user",
        tokenType: "bearer",
      },
    });
    const [request] = http.requests;
    expect(request?.headers).toEqual({
      Accept: "application/json",
      "Content-Type": "application/x-www-form-urlencoded",
    });
    expect(request?.data).toBe(
      "grant_type=authorization_code&code=code-123" +
        "&redirect_uri=http%3A%2F%2Flocalhost%3A3000%2Foauth%2Fcallback%2Fgithub" +
        "&client_id=github-client&client_secret=test-secret"
    );
  });

  it("omits optional fields the provider leaves out and coerces string lifetimes", async () => {
    const http = new FakeHttp().on(
      "POST",
      GOOGLE_TOKEN_URL,
      json(200, { access_token: "test-access", expires_in: "3599", refresh_token: null })
    );

    const result = await clientFor(http).exchangeCode(descriptor("gmail"), "code-123", REDIRECT_URI);

    expect(result).toEqual({ ok: true, value: { accessToken: "test-access", expiresIn: 3599 } });
  });

  it("reads a form-encoded answer", async () => {
    const http = new FakeHttp().on(
      "POST",
      GITHUB_TOKEN_URL,
      json(200, "access_token=test-access&scope=repo&token_type=bearer")
    );

    const result = await clientFor(http).exchangeCode(descriptor("github"), "code-123", REDIRECT_URI);

    expect(result).toEqual({
      ok: true,
      value: { accessToken: "test-access", scope: "repo", tokenType: "bearer" },
    });
  });

  it("treats a 200 answer carrying an error field as a failure", async () => {
    const http = new FakeHttp().on(
      "POST",
      GITHUB_TOKEN_URL,
      json(200, {
        error: "bad_verification_code",
        error_description: "The code passed is incorrect or expired.",
      })
    );

    const result = await clientFor(http).exchangeCode(descriptor("github"), "code-123", REDIRECT_URI);

    expect(result).toEqual({
      ok: false,
      error: {
        status: 200,
        detail: "bad_verification_code: The code passed is incorrect or expired.",
        transient: false,
      },
    });
  });

  it("fails when the answer has no access token", async () => {
    const http = new FakeHttp().on("POST", GITHUB_TOKEN_URL, json(200, { token_type: "bearer" }));

    const result = await clientFor(http).exchangeCode(descriptor("github"), "code-123", REDIRECT_URI);

    expect(result).toEqual({
      ok: false,
      error: { status: 200, detail: "Token response did not contain an access token", transient: false },
    });
  });

  it("never retries a code exchange, even on a transient failure", async () => {
    const http = new FakeHttp().on(
      "POST",
      GITHUB_TOKEN_URL,
      serverError(503, "upstream unavailable"),
      json(200, { access_token: "test-access" })
    );

    const result = await clientFor(http).exchangeCode(descriptor("github"), "code-123", REDIRECT_URI);

    expect(result).toEqual({
      ok: false,
      error: { status: 503, detail: "upstream unavailable", transient: true },
    });
    expect(http.requests).toHaveLength(1);
    expect(http.requests[0]?.retryConfig).toBeUndefined();
  });

  it("reports a network failure as transient without a status", async () => {
    const http = new FakeHttp().on("POST", GITHUB_TOKEN_URL, networkError("ETIMEDOUT"));

    const result = await clientFor(http).exchangeCode(descriptor("github"), "code-123", REDIRECT_URI);

    expect(result).toEqual({ ok: false, error: { detail: "ETIMEDOUT", transient: true } });
  });
});


describe("GaxiosTokenEndpointClient.refreshToken", () => {
  it("posts a refresh-token grant", async () => {
    const http = new FakeHttp().on(
      "POST",
      GOOGLE_TOKEN_URL,
      json(200, { access_token: "test-access-2", expires_in: 3600 })
    );

    const result = await clientFor(http).refreshToken(descriptor("gmail"), "test-refresh");

    expect(result).toEqual({ ok: true, value: { accessToken: "test-access-2", expiresIn: 3600 } });
    expect(http.requests[0]?.data).toBe(
      "grant_type=refresh_token&refresh_token=test-refresh&client_id=google-client&client_secret=test-secret"
    );
  });

  it("asks gaxios to retry the POST on 5xx and dropped connections", async () => {
    const http = new FakeHttp().on("POST", GOOGLE_TOKEN_URL, json(200, { access_token: "test-access-2" }));

    await clientFor(http).refreshToken(descriptor("gmail"), "test-refresh");

    expect(http.requests[0]?.retryConfig).toMatchObject({
      retry: 1,
      noResponseRetries: 1,
      retryDelay: 0,
      httpMethodsToRetry: ["POST"],
      statusCodesToRetry: [[500, 599]],
    });
  });

  it("sizes the retry budget from the attempt count", async () => {
    const http = new FakeHttp().on("POST", GOOGLE_TOKEN_URL, json(200, { access_token: "test-access-2" }));
    const client = new GaxiosTokenEndpointClient({
      transport: http.transport,
      retryDelayMs: 0,
      refreshAttempts: 3,
    });

    await client.refreshToken(descriptor("gmail"), "test-refresh");

    expect(http.requests[0]?.retryConfig).toMatchObject({ retry: 2, noResponseRetries: 2 });
  });

  it("reports the body of a 5xx that outlasted its retries", async () => {
    const http = new FakeHttp().on("POST", GOOGLE_TOKEN_URL, serverError(500, { error: "server_error" }));

    const result = await clientFor(http).refreshToken(descriptor("gmail"), "test-refresh");

    expect(result).toEqual({
      ok: false,
      error: { status: 500, detail: "server_error", transient: true },
    });
    expect(http.requests).toHaveLength(1);
  });

  it("reports a network failure as transient", async () => {
    const http = new FakeHttp().on("POST", GOOGLE_TOKEN_URL, networkError("ECONNRESET"));

    const result = await clientFor(http).refreshToken(descriptor("gmail"), "test-refresh");

    expect(result).toEqual({ ok: false, error: { detail: "ECONNRESET", transient: true } });
  });

  it("does not retry a rejected refresh token", async () => {
    const http = new FakeHttp().on(
      "POST",
      GOOGLE_TOKEN_URL,
      json(400, { error: "invalid_grant", error_description: "Token has been expired or revoked." })
    );

    const result = await clientFor(http).refreshToken(descriptor("gmail"), "test-refresh");

    expect(result).toEqual({
      ok: false,
      error: {
        status: 400,
        detail: "invalid_grant: Token has been expired or revoked.",
        transient: false,
      },
    });
    expect(http.requests).toHaveLength(1);
  });
});
