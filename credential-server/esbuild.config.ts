/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Main esbuild configuration for the credential broker MCP server. Bundles
 * src/index.ts into a single minified CommonJS file targeting Node 20.
 */

import * as esbuild from "esbuild";
import path from "node:path";


/**
 * Runs the esbuild bundler with production settings and exits on failure.
 */
async function build() {
  try {
    await esbuild.build({
      entryPoints: [path.join(__dirname, "src/index.ts")],
      bundle: true,
      platform: "node",
      target: "node20",
      outfile: path.join(__dirname, "dist/index.js"),
      minify: true,
      sourcemap: true,
      format: "cjs",
      logLevel: "info",
    });

    console.log("Build completed successfully!");
  } catch (error) {
    console.error("Build failed:", error);
    process.exit(1);
  }
}


void build();
