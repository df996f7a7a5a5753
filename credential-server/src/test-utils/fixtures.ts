/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ProviderCredentials } from "../providers/provider-registry";


export const TEST_CREDENTIALS: ProviderCredentials = {
  notion: { clientId: "notion-client", clientSecret: "test-secret" },
  gmail: { clientId: "google-client", clientSecret: "test-secret" },
  github: { clientId: "github-client", clientSecret: "test-secret" },
};


export const START_TIME = Date.UTC(2025, 0, 1, 12, 0, 0);


/**
 * Manually advanced clock shared by everything under test.
 */
export class TestClock {
  current: number;

  constructor(start = START_TIME) {
    this.current = start;
  }

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}
