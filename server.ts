/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import "dotenv/config";

import { createCredentialBroker } from "./credential-server/src/broker";
import { ConfigError, loadConfig } from "./credential-server/src/config";
import { createApp } from "./credential-server/src/http/app";
import { logToFile, setLoggingEnabled } from "./credential-server/src/utils/logger";
import { isAddressInfo } from "./credential-server/src/utils/type-guards";


// --- CONFIGURATION ---
function readConfig() {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[broker] ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();
if (config.debugLogging) {
  setLoggingEnabled(true);
}

// --- BROKER SETUP ---
const broker = createCredentialBroker(config);
if (!broker.sessions) {
  console.warn("[broker] KRATOS_PUBLIC_URL is not set; authenticated routes will answer 500");
}

const app = createApp(broker);

const httpServer = app.listen(config.port, config.host, () => {
  const address = httpServer.address();
  const origin = isAddressInfo(address)
    ? `http://${config.host}:${address.port}`
    : `http://${config.host}:${config.port}`;
  logToFile(`[http] listening on ${origin}`);
  console.log(`Credential broker running on ${origin}`);
  console.log(`Callback URL base: ${config.callbackBaseUrl}/oauth/callback/:provider`);
  console.log(`Configured providers: ${broker.registry.listConfigured().join(", ") || "none"}`);
});
