/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AddressInfo } from "node:net";


/**
 * Plain object check for decoded JSON and HTTP bodies.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}


/**
 * Filesystem errors carry a string `code` such as ENOENT.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}


/**
 * `server.address()` yields AddressInfo for TCP listeners, a string for
 * pipes, and null before listening.
 */
export function isAddressInfo(address: unknown): address is AddressInfo {
  return isRecord(address) && typeof address["port"] === "number";
}
