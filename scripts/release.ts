#!/usr/bin/env node
/**
 * Cut a release: bump the version, run tests, commit, tag and push.
 *
 * Usage:
 *   npm run release -- <X.Y.Z>
 *
 * Pushing the vX.Y.Z tag triggers the publish workflow.
 */

import { createInterface } from "node:readline/promises";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { errorMessage } from "../src/errors.js";
import { runCommand } from "../src/exec.js";
import { runRelease } from "../src/release.js";

const ROOT = join(dirname(fileURLToPath(import.meta.url)), "..");

function die(msg: string): never {
  console.error(msg);
  process.exit(1);
}

// --- Main ---

const args = process.argv.slice(2);
if (args.length !== 1) {
  console.log(`Usage: npm run release -- <new_version>
Example: npm run release -- 1.2.0`);
  process.exit(1);
}

const rl = createInterface({ input: process.stdin, output: process.stdout });

try {
  const outcome = await runRelease(args[0], {
    root: ROOT,
    run: runCommand,
    log: (line) => console.log(line),
    confirm: async () => (await rl.question("Continue with release? (y/N): ")).trim().toLowerCase() === "y",
  });
  if (outcome.status === "cancelled") {
    console.log("Release cancelled");
  } else {
    console.log(`\nRelease ${outcome.tag} pushed. CI will build and publish it.`);
  }
} catch (err) {
  die(`Release failed: ${errorMessage(err)}`);
} finally {
  rl.close();
}
