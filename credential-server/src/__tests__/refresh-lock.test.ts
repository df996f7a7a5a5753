/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { MemorySecretBackend } from "../secret-backend";
import { TestClock } from "../test-utils/fixtures";
import { SecretBackendRefreshLock } from "../tokens/refresh-lock";


const LOCK_PATH = "oauth/locks/user-1/github";


function setup() {
  const clock = new TestClock();
  const backend = new MemorySecretBackend();
  const lock = new SecretBackendRefreshLock(backend, { ttlMs: 30_000, now: clock.now });
  return { clock, backend, lock };
}


describe("SecretBackendRefreshLock", () => {
  it("grants one lease at a time per user and provider", async () => {
    const { lock } = setup();

    const first = await lock.acquire("user-1", "github");
    const second = await lock.acquire("user-1", "github");
    const other = await lock.acquire("user-1", "notion");

    expect(first).not.toBeNull();
    expect(second).toBeNull();
    expect(other).not.toBeNull();
  });

  it("frees the lease on release", async () => {
    const { lock, backend } = setup();
    const lease = await lock.acquire("user-1", "github");

    await lease?.release();

    await expect(backend.read(LOCK_PATH)).resolves.toBeNull();
    await expect(lock.acquire("user-1", "github")).resolves.not.toBeNull();
  });

  it("lets a new holder take over an expired lease", async () => {
    const { lock, clock } = setup();
    const stale = await lock.acquire("user-1", "github");
    clock.advance(30_001);

    const fresh = await lock.acquire("user-1", "github");

    expect(fresh).not.toBeNull();
    // The previous holder no longer owns the record and must not remove it.
    await stale?.release();
    await expect(lock.acquire("user-1", "github")).resolves.toBeNull();
  });

  it("keeps a lease that has not expired yet", async () => {
    const { lock, clock } = setup();
    await lock.acquire("user-1", "github");
    clock.advance(29_999);

    await expect(lock.acquire("user-1", "github")).resolves.toBeNull();
  });

  it("rejects when the backend is unreachable", async () => {
    const { lock, backend } = setup();
    jest.spyOn(backend, "write").mockRejectedValue(new Error("backend down"));

    await expect(lock.acquire("user-1", "github")).rejects.toThrow("backend down");
  });
});
