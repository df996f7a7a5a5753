/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Turns an inbound session credential into a stable, opaque user id. The
 * broker only consumes this contract; identity logic lives in the identity
 * service behind it.
 */

import { z } from "zod";

import { HTTP_TIMEOUT_MS, KRATOS_SESSION_COOKIE } from "../constants";
import { errorMessage, type Result } from "../errors";
import {
  baseRequestOptions,
  gaxiosTransport,
  type HttpResponse,
  type HttpTransport,
} from "../utils/http-options";
import { logToFile } from "../utils/logger";
import { isRecord } from "../utils/type-guards";


export type SessionError =
  | { kind: "MissingSession" }
  | { kind: "InvalidSession"; detail: string };


export type SessionResult = Result<string, SessionError>;


export interface SessionVerifier {
  verify(sessionToken: string): Promise<SessionResult>;
}


export function describeSessionError(error: SessionError): string {
  return error.kind === "MissingSession"
    ? `No session token provided. Use the X-Session-Token header, an Authorization bearer token or the ${KRATOS_SESSION_COOKIE} cookie.`
    : `Invalid or expired session: ${error.detail}`;
}


type HeaderValue = string | string[] | undefined;


function firstHeader(value: HeaderValue): string | undefined {
  const single = Array.isArray(value) ? value[0] : value;
  const trimmed = single?.trim();
  return trimmed ? trimmed : undefined;
}


/**
 * Reads the session token from `X-Session-Token`, then an
 * `Authorization: Bearer` header, then the Kratos session cookie. Header
 * names are expected in lower case, as Node delivers them; `cookies` is the
 * map cookie-parser leaves on the request.
 */
export function extractSessionToken(
  headers: Readonly<Record<string, HeaderValue>>,
  cookies?: unknown
): string | undefined {
  const explicit = firstHeader(headers["x-session-token"]);
  if (explicit) {
    return explicit;
  }
  const authorization = firstHeader(headers["authorization"]);
  const match = authorization?.match(/^Bearer\s+(.+)$/i);
  if (match?.[1]) {
    return match[1];
  }
  const cookie = isRecord(cookies) ? cookies[KRATOS_SESSION_COOKIE] : undefined;
  return typeof cookie === "string" ? firstHeader(cookie) : undefined;
}


/**
 * Verifies the session and resolves the caller's user id in one step.
 */
export async function authenticate(
  verifier: SessionVerifier,
  sessionToken: string | undefined
): Promise<SessionResult> {
  if (!sessionToken) {
    return { ok: false, error: { kind: "MissingSession" } };
  }
  return verifier.verify(sessionToken);
}


export interface KratosSessionVerifierOptions {
  publicUrl: string;
  timeoutMs?: number;
  transport?: HttpTransport;
}


const whoamiSchema = z.object({
  active: z.boolean().optional(),
  identity: z.object({ id: z.string().min(1) }),
});


/**
 * Session verification against an Ory Kratos public API
 * (`GET /sessions/whoami`).
 */
export class KratosSessionVerifier implements SessionVerifier {
  private readonly publicUrl: string;
  private readonly timeoutMs: number;
  private readonly transport: HttpTransport;

  constructor(options: KratosSessionVerifierOptions) {
    this.publicUrl = options.publicUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? HTTP_TIMEOUT_MS;
    this.transport = options.transport ?? gaxiosTransport;
  }

  async verify(sessionToken: string): Promise<SessionResult> {
    let response: HttpResponse;
    try {
      response = await this.transport({
        ...baseRequestOptions(this.timeoutMs),
        method: "GET",
        url: `${this.publicUrl}/sessions/whoami`,
        headers: { Accept: "application/json", "X-Session-Token": sessionToken },
      });
    } catch (error) {
      logToFile(`[session] verification request failed: ${errorMessage(error)}`);
      return { ok: false, error: { kind: "InvalidSession", detail: "Session service unavailable" } };
    }

    if (response.status === 401) {
      return { ok: false, error: { kind: "InvalidSession", detail: "Session not recognized" } };
    }
    if (response.status !== 200) {
      logToFile(`[session] verification failed with status ${response.status}`);
      return {
        ok: false,
        error: { kind: "InvalidSession", detail: `Session service answered ${response.status}` },
      };
    }

    const parsed = whoamiSchema.safeParse(response.data);
    if (!parsed.success || parsed.data.active === false) {
      return { ok: false, error: { kind: "InvalidSession", detail: "Session missing identity" } };
    }
    return { ok: true, value: parsed.data.identity.id };
  }
}
