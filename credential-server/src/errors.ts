/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Outcome types for the credential lifecycle. Every public operation returns
 * a Result so callers branch on the failure kind instead of catching.
 */

export type CredentialError =
  | { kind: "UnknownProvider"; providerId: string }
  | { kind: "NotConfigured"; providerId: string }
  | { kind: "InvalidState" }
  | { kind: "ProviderMismatch"; expected: string; received: string }
  | { kind: "ExchangeFailed"; status?: number; detail: string }
  | { kind: "NoCredential"; userId: string; providerId: string }
  | { kind: "NoRefreshToken"; userId: string; providerId: string }
  | { kind: "RefreshFailed"; status?: number; detail: string }
  | { kind: "StoreUnavailable"; detail: string };


export type CredentialErrorKind = CredentialError["kind"];


export type Result<T, E = CredentialError> =
  | { ok: true; value: T }
  | { ok: false; error: E };


export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}


export function err(error: CredentialError): { ok: false; error: CredentialError } {
  return { ok: false, error };
}


/**
 * Thrown by secret backends on connectivity or protocol failures. The stores
 * translate it into a StoreUnavailable outcome.
 */
export class SecretBackendError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "SecretBackendError";
    this.status = options?.status;
  }
}


/**
 * Flattens any thrown value into a single-line message.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}


/**
 * Renders a human-readable message for a credential error.
 */
export function describeCredentialError(error: CredentialError): string {
  switch (error.kind) {
    case "UnknownProvider":
      return `Unknown provider: ${error.providerId}`;
    case "NotConfigured":
      return `Provider ${error.providerId} not configured. Set its client id and client secret.`;
    case "InvalidState":
      return "Invalid or expired state token";
    case "ProviderMismatch":
      return `Provider mismatch: state was issued for ${error.expected}, callback was for ${error.received}`;
    case "ExchangeFailed":
      return withStatus("Failed to exchange code for tokens", error.status, error.detail);
    case "NoCredential":
      return `No OAuth credential for user=${error.userId}, provider=${error.providerId}`;
    case "NoRefreshToken":
      return `No refresh token available for user=${error.userId}, provider=${error.providerId}`;
    case "RefreshFailed":
      return withStatus("Token refresh failed", error.status, error.detail);
    case "StoreUnavailable":
      return `Credential store unavailable: ${error.detail}`;
  }
}


function withStatus(prefix: string, status: number | undefined, detail: string): string {
  return status === undefined
    ? `${prefix}: ${detail}`
    : `${prefix}: ${status} ${detail}`;
}


/**
 * HTTP status used by the router when an operation fails with this error.
 */
export function httpStatusFor(error: CredentialError): number {
  switch (error.kind) {
    case "UnknownProvider":
    case "InvalidState":
    case "ProviderMismatch":
    case "ExchangeFailed":
      return 400;
    case "NoCredential":
      return 404;
    case "NoRefreshToken":
      return 409;
    case "NotConfigured":
      return 500;
    case "RefreshFailed":
      return 502;
    case "StoreUnavailable":
      return 503;
  }
}
