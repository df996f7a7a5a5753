/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Process configuration, read once from the environment and validated with
 * zod. Entry points load `.env` through dotenv before calling loadConfig.
 */

import { z } from "zod";

import {
  DEFAULT_VAULT_MOUNT,
  HTTP_TIMEOUT_MS,
  STATE_TTL_MS,
  TOKEN_EXPIRY_BUFFER_MS,
} from "./constants";
import type { ProviderCredentials } from "./providers/provider-registry";
import { getDefaultSecretFilePath } from "./utils/paths";


const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

const optionalUrl = z.preprocess(emptyToUndefined, z.string().url().optional());

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const flag = z.preprocess(
  emptyToUndefined,
  z.enum(["true", "false", "1", "0"]).default("false").transform((v) => v === "true" || v === "1")
);


const envSchema = z
  .object({
    PORT: positiveInt(3000),
    HOST: z.preprocess(emptyToUndefined, z.string().default("localhost")),
    OAUTH_CALLBACK_BASE_URL: z.preprocess(
      emptyToUndefined,
      z.string().url().default("http://localhost:3000")
    ),
    OAUTH_NOTION_CLIENT_ID: optionalString,
    OAUTH_NOTION_CLIENT_SECRET: optionalString,
    OAUTH_GOOGLE_CLIENT_ID: optionalString,
    OAUTH_GOOGLE_CLIENT_SECRET: optionalString,
    OAUTH_GITHUB_CLIENT_ID: optionalString,
    OAUTH_GITHUB_CLIENT_SECRET: optionalString,
    VAULT_ADDR: optionalUrl,
    VAULT_TOKEN: optionalString,
    VAULT_MOUNT: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_VAULT_MOUNT)),
    VAULT_NAMESPACE: optionalString,
    KRATOS_PUBLIC_URL: optionalUrl,
    OAUTH_STATE_TTL_MS: positiveInt(STATE_TTL_MS),
    TOKEN_REFRESH_BUFFER_MS: positiveInt(TOKEN_EXPIRY_BUFFER_MS),
    HTTP_TIMEOUT_MS: positiveInt(HTTP_TIMEOUT_MS),
    SECRET_FILE_PATH: optionalString,
    CREDENTIAL_BROKER_FORCE_FILE_STORAGE: flag,
    DEBUG_LOG: flag,
  })
  .superRefine((env, ctx) => {
    if (Boolean(env.VAULT_ADDR) !== Boolean(env.VAULT_TOKEN)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [env.VAULT_ADDR ? "VAULT_TOKEN" : "VAULT_ADDR"],
        message: "VAULT_ADDR and VAULT_TOKEN must be set together",
      });
    }
  });


export interface VaultConfig {
  address: string;
  token: string;
  mount: string;
  namespace?: string;
}


export interface BrokerConfig {
  port: number;
  host: string;
  callbackBaseUrl: string;
  providerCredentials: ProviderCredentials;
  vault?: VaultConfig;
  kratosPublicUrl?: string;
  stateTtlMs: number;
  refreshBufferMs: number;
  httpTimeoutMs: number;
  secretFilePath: string;
  forceFileStorage: boolean;
  debugLogging: boolean;
}


export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}


/**
 * Validates the environment and maps it onto BrokerConfig. Throws
 * ConfigError listing every problem at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BrokerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  const e = parsed.data;

  const config: BrokerConfig = {
    port: e.PORT,
    host: e.HOST,
    callbackBaseUrl: e.OAUTH_CALLBACK_BASE_URL.replace(/\/+$/, ""),
    providerCredentials: {
      notion: { clientId: e.OAUTH_NOTION_CLIENT_ID, clientSecret: e.OAUTH_NOTION_CLIENT_SECRET },
      gmail: { clientId: e.OAUTH_GOOGLE_CLIENT_ID, clientSecret: e.OAUTH_GOOGLE_CLIENT_SECRET },
      github: { clientId: e.OAUTH_GITHUB_CLIENT_ID, clientSecret: e.OAUTH_GITHUB_CLIENT_SECRET },
    },
    stateTtlMs: e.OAUTH_STATE_TTL_MS,
    refreshBufferMs: e.TOKEN_REFRESH_BUFFER_MS,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    secretFilePath: e.SECRET_FILE_PATH ?? getDefaultSecretFilePath(),
    forceFileStorage: e.CREDENTIAL_BROKER_FORCE_FILE_STORAGE,
    debugLogging: e.DEBUG_LOG,
  };

  if (e.VAULT_ADDR && e.VAULT_TOKEN) {
    config.vault = {
      address: e.VAULT_ADDR,
      token: e.VAULT_TOKEN,
      mount: e.VAULT_MOUNT,
      namespace: e.VAULT_NAMESPACE,
    };
  }
  if (e.KRATOS_PUBLIC_URL) {
    config.kratosPublicUrl = e.KRATOS_PUBLIC_URL;
  }

  return config;
}
