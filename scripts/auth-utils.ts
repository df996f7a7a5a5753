/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * CLI utility for managing stored OAuth credentials outside the servers.
 * Supports inspecting a user's connections, force-expiring tokens for
 * testing, clearing credentials, and sweeping stale CSRF states.
 */

import "dotenv/config";

import { createCredentialBroker, type CredentialBroker } from "../credential-server/src/broker";
import { loadConfig } from "../credential-server/src/config";
import type { CredentialRecord } from "../credential-server/src/credentials/types";
import { describeCredentialError } from "../credential-server/src/errors";
import { HybridSecretBackend } from "../credential-server/src/secret-backend";


function fail(message: string): never {
  console.error(`✗ ${message}`);
  process.exit(1);
}


function requireArg(value: string | undefined, name: string): string {
  if (!value) {
    showHelp();
    fail(`Missing <${name}> argument.`);
  }
  return value;
}


function printRecord(record: CredentialRecord, now: number) {
  const isExpired = record.expiresAt < now;
  console.log(`${record.providerId}:`);
  console.log(`  Access Token:  ${record.accessToken ? "✓ present" : "✗ missing"}`);
  console.log(`  Refresh Token: ${record.refreshToken ? "✓ present" : "✗ missing"}`);
  console.log(`  Scope:  ${record.scope || "(none)"}`);
  console.log(`  Expiry: ${new Date(record.expiresAt).toISOString()}`);
  console.log(`  Status: ${isExpired ? "✗ expired" : "✓ valid"}`);
  if (!isExpired) {
    const minutesLeft = Math.floor((record.expiresAt - now) / 1000 / 60);
    console.log(`  Time left: ~${minutesLeft} minutes`);
  }
  console.log(`  Updated: ${new Date(record.updatedAt).toISOString()}`);
}


async function listConnections(broker: CredentialBroker, userId: string) {
  const listed = await broker.store.list(userId);
  if (!listed.ok) {
    fail(describeCredentialError(listed.error));
  }
  if (listed.value.length === 0) {
    console.log(`No credentials stored for ${userId}.`);
    return;
  }
  for (const providerId of listed.value) {
    console.log(providerId);
  }
}


async function showStatus(broker: CredentialBroker, userId: string, providerId?: string) {
  let providers: string[];
  if (providerId) {
    providers = [providerId];
  } else {
    const listed = await broker.store.list(userId);
    if (!listed.ok) {
      fail(describeCredentialError(listed.error));
    }
    providers = listed.value;
  }

  if (providers.length === 0) {
    console.log(`No credentials found for ${userId}.`);
    return;
  }

  console.log(`Auth Status for ${userId}:`);
  const now = Date.now();
  for (const id of providers) {
    const loaded = await broker.store.get(userId, id);
    if (!loaded.ok) {
      console.log(`${id}: ${describeCredentialError(loaded.error)}`);
      continue;
    }
    printRecord(loaded.value, now);
  }
}


async function expireToken(broker: CredentialBroker, userId: string, providerId: string) {
  const loaded = await broker.store.get(userId, providerId);
  if (!loaded.ok) {
    if (loaded.error.kind === "NoCredential") {
      console.log("No credentials found to expire.");
      return;
    }
    fail(describeCredentialError(loaded.error));
  }

  const saved = await broker.store.save(userId, providerId, {
    ...loaded.value,
    expiresAt: Date.now() - 1000,
  });
  if (!saved.ok) {
    fail(describeCredentialError(saved.error));
  }
  console.log("✓ Access token expired. Next token request will trigger refresh.");
}


async function clearAuth(broker: CredentialBroker, userId: string, providerId?: string) {
  let providers: string[];
  if (providerId) {
    providers = [providerId];
  } else {
    const listed = await broker.store.list(userId);
    if (!listed.ok) {
      fail(describeCredentialError(listed.error));
    }
    providers = listed.value;
  }

  let cleared = 0;
  for (const id of providers) {
    const deleted = await broker.store.delete(userId, id);
    if (!deleted.ok) {
      fail(describeCredentialError(deleted.error));
    }
    if (deleted.value) {
      cleared += 1;
    }
  }
  console.log(`✓ Cleared ${cleared} credential(s) for ${userId}.`);
}


async function purgeStates(broker: CredentialBroker) {
  const purged = await broker.flows.purgeExpiredStates();
  if (!purged.ok) {
    fail(describeCredentialError(purged.error));
  }
  console.log(`✓ Removed ${purged.value} stale state entr${purged.value === 1 ? "y" : "ies"}.`);
}


function showHelp() {
  console.log(`
Auth Management CLI

Usage: tsx scripts/auth-utils.ts <command> [arguments]

Commands:
  status <user> [provider]   Show stored credentials and their expiry
  list <user>                List connected providers
  expire <user> <provider>   Force the access token to expire (for testing refresh)
  clear <user> [provider]    Delete stored credentials
  purge-states               Remove expired and abandoned CSRF states
  help                       Show this help message
`);
}


async function main() {
  const [command, userArg, providerArg] = process.argv.slice(2);

  if (!command || command === "help" || command === "--help" || command === "-h") {
    showHelp();
    if (!command) {
      fail("No command specified.");
    }
    return;
  }

  const config = loadConfig();
  const broker = createCredentialBroker(config);
  if (broker.backend instanceof HybridSecretBackend) {
    console.log(`Storage: ${await broker.backend.getBackendType()}`);
  }

  switch (command) {
    case "status":
      await showStatus(broker, requireArg(userArg, "user"), providerArg);
      break;
    case "list":
      await listConnections(broker, requireArg(userArg, "user"));
      break;
    case "expire":
      await expireToken(broker, requireArg(userArg, "user"), requireArg(providerArg, "provider"));
      break;
    case "clear":
      await clearAuth(broker, requireArg(userArg, "user"), providerArg);
      break;
    case "purge-states":
      await purgeStates(broker);
      break;
    default:
      showHelp();
      fail(`Unknown command: ${command}`);
  }
}


main().catch((error: unknown) => {
  console.error("✗ Command failed:", error);
  process.exit(1);
});
