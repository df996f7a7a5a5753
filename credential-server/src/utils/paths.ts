/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Project root detection and well-known file paths. Walks up the directory
 * tree from the current module to locate the workspace root package.json,
 * then derives absolute paths for logs and the encrypted secret file.
 */

import * as fs from "node:fs";
import path from "node:path";


let projectRoot: string | null = null;


function isWorkspaceRoot(dir: string): boolean {
  const manifest = path.join(dir, "package.json");
  if (!fs.existsSync(manifest)) {
    return false;
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf8"));
    return typeof parsed === "object" && parsed !== null && "workspaces" in parsed;
  } catch {
    return false;
  }
}


/**
 * Traverses parent directories from __dirname until it finds the package.json
 * that declares the npm workspaces, which marks the project root. Falls back
 * to the current working directory for bundled builds.
 */
export function getProjectRoot(): string {
  if (projectRoot !== null) {
    return projectRoot;
  }
  let dir = __dirname;
  while (dir !== path.dirname(dir)) {
    if (isWorkspaceRoot(dir)) {
      projectRoot = dir;
      return dir;
    }
    dir = path.dirname(dir);
  }
  projectRoot = process.cwd();
  return projectRoot;
}


/**
 * Absolute path to the debug log file.
 */
export function getLogFilePath(): string {
  return path.join(getProjectRoot(), "logs", "server.log");
}


/**
 * Default location of the AES-256-GCM encrypted secret file.
 */
export function getDefaultSecretFilePath(): string {
  return path.join(getProjectRoot(), ".credential-broker", "secrets.enc");
}


/**
 * The master key lives beside the secret file it protects.
 */
export function masterKeyPathFor(secretFilePath: string): string {
  return path.join(path.dirname(secretFilePath), "master.key");
}
