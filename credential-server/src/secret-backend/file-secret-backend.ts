/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Encrypted file-based secret backend. Uses AES-256-GCM with a
 * machine-specific derived key to persist secrets when no Vault server is
 * configured. The master key is auto-generated on first use and stored with
 * restrictive file permissions.
 */

import * as crypto from "node:crypto";
import { promises as fs } from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { SecretBackendError } from "../errors";
import { logToFile } from "../utils/logger";
import { masterKeyPathFor } from "../utils/paths";
import { isErrnoException, isRecord } from "../utils/type-guards";
import { BaseSecretBackend } from "./base-secret-backend";
import type { SecretData, SecretEntry, WriteOptions, WriteOutcome } from "./types";


type SecretMap = Map<string, SecretEntry>;


function isSecretEntry(value: unknown): value is SecretEntry {
  return (
    isRecord(value) &&
    isRecord(value["data"]) &&
    typeof value["version"] === "number"
  );
}


/**
 * Persists secrets as one AES-256-GCM encrypted JSON document. The
 * encryption key is derived from a randomly generated master key combined
 * with machine-specific salt (hostname + username). Operations run one at a
 * time, and every save replaces the file through a rename.
 */
export class FileSecretBackend extends BaseSecretBackend {
  private readonly secretFilePath: string;
  private readonly encryptionKey: Buffer;
  private queue: Promise<unknown> = Promise.resolve();

  private constructor(secretFilePath: string, masterKey: Buffer) {
    super();
    this.secretFilePath = secretFilePath;
    this.encryptionKey = FileSecretBackend.deriveEncryptionKey(masterKey);
  }

  /**
   * Factory that loads (or generates) the master key before constructing
   * the backend, since the constructor cannot be async.
   */
  static async create(secretFilePath: string): Promise<FileSecretBackend> {
    const masterKey = await this.loadMasterKey(masterKeyPathFor(secretFilePath));
    return new FileSecretBackend(secretFilePath, masterKey);
  }

  /**
   * Reads the master key from disk, creating a new 256-bit random key with
   * mode 0600 if the file does not yet exist.
   */
  private static async loadMasterKey(masterKeyPath: string): Promise<Buffer> {
    try {
      return await fs.readFile(masterKeyPath);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        await fs.mkdir(path.dirname(masterKeyPath), { recursive: true, mode: 0o700 });
        const newKey = crypto.randomBytes(32);
        await fs.writeFile(masterKeyPath, newKey, { mode: 0o600 });
        return newKey;
      }
      throw error;
    }
  }

  private static deriveEncryptionKey(masterKey: Buffer): Buffer {
    const salt = `${os.hostname()}-${os.userInfo().username}-credential-broker`;
    return crypto.scryptSync(masterKey, salt, 32);
  }

  private encrypt(text: string): string {
    const iv = crypto.randomBytes(16);
    const cipher = crypto.createCipheriv("aes-256-gcm", this.encryptionKey, iv);

    let encrypted = cipher.update(text, "utf8", "hex");
    encrypted += cipher.final("hex");

    const authTag = cipher.getAuthTag();

    return iv.toString("hex") + ":" + authTag.toString("hex") + ":" + encrypted;
  }

  private decrypt(encryptedData: string): string {
    const [ivStr, authTagStr, encrypted, ...extra] = encryptedData.split(":");
    if (!ivStr || !authTagStr || !encrypted || extra.length > 0) {
      throw new SecretBackendError("Invalid encrypted data format");
    }

    const decipher = crypto.createDecipheriv(
      "aes-256-gcm",
      this.encryptionKey,
      Buffer.from(ivStr, "hex")
    );
    decipher.setAuthTag(Buffer.from(authTagStr, "hex"));

    let decrypted = decipher.update(encrypted, "hex", "utf8");
    decrypted += decipher.final("utf8");

    return decrypted;
  }

  /**
   * Chains an operation behind every earlier one so load-modify-save cycles
   * never interleave.
   */
  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.queue.then(operation, operation);
    this.queue = run.catch(() => undefined);
    return run;
  }

  /**
   * Reads and decrypts the secret file. A missing file is an empty store; a
   * file that fails to decrypt is reported rather than silently replaced.
   */
  private async loadSecrets(): Promise<SecretMap> {
    let data: string;
    try {
      data = await fs.readFile(this.secretFilePath, "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return new Map();
      }
      throw new SecretBackendError("Failed to read secret file", { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(this.decrypt(data));
    } catch (error) {
      logToFile("[file-backend] secret file corrupted");
      throw new SecretBackendError("Secret file corrupted or encrypted with another key", {
        cause: error,
      });
    }

    const secrets: SecretMap = new Map();
    if (isRecord(parsed)) {
      for (const [key, value] of Object.entries(parsed)) {
        if (isSecretEntry(value)) {
          secrets.set(key, value);
        }
      }
    }
    return secrets;
  }

  /**
   * Encrypts the full map into a temp file with mode 0600 and renames it over
   * the previous file.
   */
  private async saveSecrets(secrets: SecretMap): Promise<void> {
    const dir = path.dirname(this.secretFilePath);
    await fs.mkdir(dir, { recursive: true, mode: 0o700 });

    const json = JSON.stringify(Object.fromEntries(secrets));
    const tempPath = `${this.secretFilePath}.${process.pid}.${crypto.randomBytes(4).toString("hex")}.tmp`;

    try {
      await fs.writeFile(tempPath, this.encrypt(json), { mode: 0o600 });
      await fs.rename(tempPath, this.secretFilePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new SecretBackendError("Failed to write secret file", { cause: error });
    }
  }

  async read(secretPath: string): Promise<SecretEntry | null> {
    this.validatePath(secretPath);
    return this.exclusive(async () => {
      const secrets = await this.loadSecrets();
      return secrets.get(secretPath) ?? null;
    });
  }

  async write(secretPath: string, data: SecretData, options?: WriteOptions): Promise<WriteOutcome> {
    this.validatePath(secretPath);
    return this.exclusive(async (): Promise<WriteOutcome> => {
      const secrets = await this.loadSecrets();
      const current = secrets.get(secretPath)?.version ?? 0;
      if (options?.cas !== undefined && options.cas !== current) {
        return { written: false, reason: "cas_mismatch" };
      }
      const version = current + 1;
      secrets.set(secretPath, { data, version });
      await this.saveSecrets(secrets);
      return { written: true, version };
    });
  }

  async list(secretPath: string): Promise<string[]> {
    this.validatePath(secretPath);
    return this.exclusive(async () => {
      const secrets = await this.loadSecrets();
      const prefix = `${secretPath}/`;
      return [...secrets.keys()]
        .filter((key) => key.startsWith(prefix) && !key.slice(prefix.length).includes("/"))
        .map((key) => key.slice(prefix.length))
        .sort();
    });
  }

  /**
   * Removes one entry, deleting the file entirely when no entries remain.
   */
  async delete(secretPath: string): Promise<boolean> {
    this.validatePath(secretPath);
    return this.exclusive(async () => {
      const secrets = await this.loadSecrets();
      if (!secrets.delete(secretPath)) {
        return false;
      }

      if (secrets.size === 0) {
        await fs.rm(this.secretFilePath, { force: true });
      } else {
        await this.saveSecrets(secrets);
      }
      return true;
    });
  }
}
