/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import cookieParser from "cookie-parser";
import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";

import type { CredentialBroker } from "../broker";
import { errorMessage } from "../errors";
import { logToFile } from "../utils/logger";
import { createOAuthRouter } from "./oauth-router";


/**
 * Builds the HTTP application around a broker without binding a port.
 */
export function createApp(broker: CredentialBroker): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use(cookieParser());

  app.get("/healthz", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use(createOAuthRouter(broker));

  // Four parameters mark this as express' error handler.
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logToFile(`[http] unhandled error: ${errorMessage(error)}`);
    console.error("[broker] request failed:", error);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
