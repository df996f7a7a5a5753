/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Express routes for connecting, listing and disconnecting provider
 * accounts. Every route except the provider callback requires a verified
 * session; the callback is authenticated by its one-time state.
 */

import { Router, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";

import type { CredentialBroker } from "../broker";
import { describeCredentialError, httpStatusFor, type CredentialError } from "../errors";
import {
  authenticate,
  describeSessionError,
  extractSessionToken,
} from "../session/session-verifier";
import { logToFile } from "../utils/logger";


type RouterDeps = Pick<CredentialBroker, "registry" | "store" | "flows" | "sessions">;


const callbackQuerySchema = z.object({
  code: z.string().min(1).optional(),
  state: z.string().min(1).optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});


// Helper for async handlers
const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) =>
  (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch((err: unknown) => next(err));
  };


function sendCredentialError(res: Response, error: CredentialError) {
  res.status(httpStatusFor(error)).json({ error: describeCredentialError(error), kind: error.kind });
}


export function createOAuthRouter(deps: RouterDeps): Router {
  const router = Router();

  /**
   * Resolves the caller's user id, answering 401 itself when the session is
   * missing or rejected.
   */
  const requireUser = async (req: Request, res: Response): Promise<string | null> => {
    if (!deps.sessions) {
      res.status(500).json({ error: "Session verification is not configured" });
      return null;
    }
    const session = await authenticate(deps.sessions, extractSessionToken(req.headers, req.cookies));
    if (!session.ok) {
      res.status(401).json({ error: describeSessionError(session.error), kind: session.error.kind });
      return null;
    }
    return session.value;
  };

  router.get(
    "/oauth/connect/:provider",
    asyncHandler(async (req, res) => {
      const userId = await requireUser(req, res);
      if (userId === null) {
        return;
      }

      const provider = req.params.provider;
      const begun = await deps.flows.begin(userId, provider);
      if (!begun.ok) {
        if (begun.error.kind === "UnknownProvider") {
          res.status(400).json({
            error: `${describeCredentialError(begun.error)}. Available: ${[...deps.registry.listSupported()].join(", ")}`,
            kind: begun.error.kind,
          });
          return;
        }
        sendCredentialError(res, begun.error);
        return;
      }

      if (req.accepts(["html", "json"]) === "json") {
        res.json({ provider, authorizationUrl: begun.value });
        return;
      }
      res.redirect(begun.value);
    })
  );

  router.get(
    "/oauth/callback/:provider",
    asyncHandler(async (req, res) => {
      const provider = req.params.provider;
      const query = callbackQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: "Malformed callback parameters" });
        return;
      }
      const { code, state, error, error_description: errorDescription } = query.data;

      if (error) {
        logToFile(`[http] provider ${provider} returned error ${error}`);
        res.status(400).json({
          error: `Authorization denied by provider: ${error}${errorDescription ? ` (${errorDescription})` : ""}`,
        });
        return;
      }
      if (!code || !state) {
        res.status(400).json({ error: "Missing code or state parameter" });
        return;
      }

      const completed = await deps.flows.complete(provider, code, state);
      if (!completed.ok) {
        sendCredentialError(res, completed.error);
        return;
      }

      res.json({
        success: true,
        provider,
        message: `${deps.registry.displayName(provider)} connected successfully`,
      });
    })
  );

  router.get(
    "/oauth/providers",
    asyncHandler(async (req, res) => {
      const userId = await requireUser(req, res);
      if (userId === null) {
        return;
      }

      const listed = await deps.store.list(userId);
      if (!listed.ok) {
        sendCredentialError(res, listed.error);
        return;
      }

      res.json({
        providers: listed.value,
        supported: [...deps.registry.listSupported()],
        configured: deps.registry.listConfigured(),
      });
    })
  );

  router.delete(
    "/oauth/providers/:provider",
    asyncHandler(async (req, res) => {
      const userId = await requireUser(req, res);
      if (userId === null) {
        return;
      }

      const provider = req.params.provider;
      const deleted = await deps.store.delete(userId, provider);
      if (!deleted.ok) {
        sendCredentialError(res, deleted.error);
        return;
      }
      if (!deleted.value) {
        res.status(404).json({ error: `Provider ${provider} not connected` });
        return;
      }

      logToFile(`[http] disconnected ${provider} for user=${userId}`);
      res.json({
        success: true,
        provider,
        message: `${provider} disconnected successfully`,
      });
    })
  );

  return router;
}
