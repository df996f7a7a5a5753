/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createCredentialBroker, type CredentialBroker } from "../broker";
import { loadConfig } from "../config";
import { MemorySecretBackend } from "../secret-backend";
import type { SessionVerifier } from "../session/session-verifier";
import { FakeHttp } from "./fake-http";
import { TestClock } from "./fixtures";


export const SESSION_TOKEN = "test-session";
export const USER_ID = "user-1";


/**
 * Accepts SESSION_TOKEN as USER_ID and rejects everything else.
 */
export const stubSessions: SessionVerifier = {
  verify: async (sessionToken) =>
    sessionToken === SESSION_TOKEN
      ? { ok: true, value: USER_ID }
      : { ok: false, error: { kind: "InvalidSession", detail: "Session not recognized" } },
};


export interface TestBroker {
  broker: CredentialBroker;
  backend: MemorySecretBackend;
  http: FakeHttp;
  clock: TestClock;
}


/**
 * A fully wired broker on in-memory storage and a fake network, with github
 * and notion configured and gmail left unconfigured.
 */
export function createTestBroker(options: { withSessions?: boolean } = {}): TestBroker {
  const backend = new MemorySecretBackend();
  const http = new FakeHttp();
  const clock = new TestClock();
  const config = loadConfig({
    OAUTH_CALLBACK_BASE_URL: "http://localhost:3000",
    OAUTH_GITHUB_CLIENT_ID: "github-client",
    OAUTH_GITHUB_CLIENT_SECRET: "test-secret",
    OAUTH_NOTION_CLIENT_ID: "notion-client",
    OAUTH_NOTION_CLIENT_SECRET: "test-secret",
    SECRET_FILE_PATH: "/nonexistent/secrets.enc",
  });

  const broker = createCredentialBroker(config, {
    backend,
    transport: http.transport,
    sessions: options.withSessions === false ? undefined : stubSessions,
    now: clock.now,
    refreshRetryDelayMs: 0,
  });
  return { broker, backend, http, clock };
}
