/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from "./types";
export * from "./base-secret-backend";
export * from "./memory-secret-backend";
export * from "./file-secret-backend";
export * from "./vault-secret-backend";
export * from "./hybrid-secret-backend";
