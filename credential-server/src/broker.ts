/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Wires the credential lifecycle engine together from a BrokerConfig. The
 * provider registry is built once here and injected everywhere it is used.
 */

import type { BrokerConfig } from "./config";
import { CredentialStore } from "./credentials/credential-store";
import { FlowOrchestrator } from "./flow/flow-orchestrator";
import { SecretBackendStateStore, type StateStore } from "./flow/state-store";
import { ProviderRegistry } from "./providers/provider-registry";
import { HybridSecretBackend, type SecretBackend } from "./secret-backend";
import { KratosSessionVerifier, type SessionVerifier } from "./session/session-verifier";
import { SecretBackendRefreshLock } from "./tokens/refresh-lock";
import { GaxiosTokenEndpointClient } from "./tokens/token-endpoint-client";
import { TokenLifecycleManager } from "./tokens/token-lifecycle-manager";
import type { HttpTransport } from "./utils/http-options";


export interface CredentialBroker {
  registry: ProviderRegistry;
  backend: SecretBackend;
  store: CredentialStore;
  states: StateStore;
  flows: FlowOrchestrator;
  tokens: TokenLifecycleManager;
  /**
   * Null when no identity service is configured.
   */
  sessions: SessionVerifier | null;
}


export interface BrokerOverrides {
  backend?: SecretBackend;
  transport?: HttpTransport;
  sessions?: SessionVerifier;
  now?: () => number;
  refreshRetryDelayMs?: number;
}


export function createCredentialBroker(
  config: BrokerConfig,
  overrides: BrokerOverrides = {}
): CredentialBroker {
  const now = overrides.now ?? Date.now;
  const registry = new ProviderRegistry(config.providerCredentials);

  const backend =
    overrides.backend ??
    new HybridSecretBackend({
      vault: config.vault && {
        ...config.vault,
        timeoutMs: config.httpTimeoutMs,
        transport: overrides.transport,
      },
      secretFilePath: config.secretFilePath,
      forceFileStorage: config.forceFileStorage,
    });

  const store = new CredentialStore(backend, { now });
  const states = new SecretBackendStateStore(backend, { ttlMs: config.stateTtlMs, now });
  const tokenClient = new GaxiosTokenEndpointClient({
    transport: overrides.transport,
    timeoutMs: config.httpTimeoutMs,
    retryDelayMs: overrides.refreshRetryDelayMs,
  });

  const flows = new FlowOrchestrator({
    registry,
    states,
    store,
    tokenClient,
    callbackBaseUrl: config.callbackBaseUrl,
    now,
  });

  const tokens = new TokenLifecycleManager({
    store,
    registry,
    tokenClient,
    refreshLock: new SecretBackendRefreshLock(backend, { now }),
    refreshBufferMs: config.refreshBufferMs,
    now,
  });

  let sessions: SessionVerifier | null = overrides.sessions ?? null;
  if (!sessions && config.kratosPublicUrl) {
    sessions = new KratosSessionVerifier({
      publicUrl: config.kratosPublicUrl,
      timeoutMs: config.httpTimeoutMs,
      transport: overrides.transport,
    });
  }

  return { registry, backend, store, states, flows, tokens, sessions };
}
