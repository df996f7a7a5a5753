/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Shared constants for the credential broker. Centralizes timing defaults and
 * secret-backend namespaces so they can be updated in one place.
 */

/**
 * How far before token expiry to trigger a proactive refresh (5 minutes).
 */
export const TOKEN_EXPIRY_BUFFER_MS = 5 * 60 * 1000;


/**
 * How long an issued CSRF state stays redeemable (10 minutes).
 */
export const STATE_TTL_MS = 10 * 60 * 1000;


/**
 * Token lifetime assumed when a provider omits expires_in.
 */
export const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;


/**
 * Per-call timeout for provider token endpoints, Vault and Kratos.
 */
export const HTTP_TIMEOUT_MS = 10_000;


/**
 * Total attempts for a refresh-token grant (first try plus retries).
 */
export const REFRESH_ATTEMPTS = 2;


/**
 * How long a cross-instance refresh lease is honoured before it is treated
 * as abandoned.
 */
export const REFRESH_LOCK_TTL_MS = 30_000;


/**
 * Number of random bytes in a CSRF state token (256 bits).
 */
export const STATE_TOKEN_BYTES = 32;


/**
 * Secret-backend namespace roots.
 */
export const CREDENTIALS_NAMESPACE = "oauth/users";
export const STATES_NAMESPACE = "oauth/states";
export const LOCKS_NAMESPACE = "oauth/locks";


/**
 * Cookie the identity service sets for browser sessions.
 */
export const KRATOS_SESSION_COOKIE = "ory_kratos_session";


/**
 * Default Vault KV v2 mount.
 */
export const DEFAULT_VAULT_MOUNT = "secret";
