/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Abstract base class for secret backends. Provides shared path validation
 * and the key-segment encoding used by every store built on top.
 */

import type {
  SecretBackend,
  SecretData,
  SecretEntry,
  WriteOptions,
  WriteOutcome,
} from "./types";


const SAFE_SEGMENT = /^[A-Za-z0-9_-]+$/;
const ENCODED_PREFIX = "~";


/**
 * Maps an arbitrary identifier to a path segment. Slug-like values are kept
 * verbatim so paths stay readable; anything else becomes `~` + base64url,
 * which can never collide with a verbatim segment.
 */
export function encodeKeySegment(value: string): string {
  if (SAFE_SEGMENT.test(value)) {
    return value;
  }
  return ENCODED_PREFIX + Buffer.from(value, "utf8").toString("base64url");
}


export function decodeKeySegment(segment: string): string {
  if (segment.startsWith(ENCODED_PREFIX)) {
    return Buffer.from(segment.slice(ENCODED_PREFIX.length), "base64url").toString("utf8");
  }
  return segment;
}


export function joinPath(...segments: string[]): string {
  return segments.join("/");
}


/**
 * Foundation for concrete backends. Subclasses implement the four
 * operations; this class contributes path validation.
 */
export abstract class BaseSecretBackend implements SecretBackend {
  abstract read(path: string): Promise<SecretEntry | null>;

  abstract write(
    path: string,
    data: SecretData,
    options?: WriteOptions
  ): Promise<WriteOutcome>;

  abstract list(path: string): Promise<string[]>;

  abstract delete(path: string): Promise<boolean>;

  /**
   * Rejects empty segments and relative components, which every backend
   * would otherwise interpret differently.
   */
  // oxlint-disable-next-line class-methods-use-this
  protected validatePath(path: string): void {
    if (!path) {
      throw new Error("Secret path is required");
    }
    for (const segment of path.split("/")) {
      if (!segment || segment === "." || segment === "..") {
        throw new Error(`Invalid secret path: ${path}`);
      }
    }
  }
}
