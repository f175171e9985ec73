/**
 * Release helper: bump the version, run the tests, commit, tag vX.Y.Z and push.
 * Pushing the tag is what triggers publication in CI.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { runChecked, type CommandRunner } from "./exec.js";

/** Files that carry the version string, relative to the project root. */
export const VERSION_FILES = ["package.json", "src/version.ts"];

export function isReleaseVersion(version: string): boolean {
  return /^\d+\.\d+\.\d+$/.test(version);
}

const PackageJsonSchema = z.object({ version: z.string() });

export function readCurrentVersion(root: string): string {
  const path = join(root, "package.json");
  if (!existsSync(path)) {
    throw new ConfigurationError(`package.json not found in ${root}`);
  }
  const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
  if (!parsed.success) {
    throw new ConfigurationError("Could not find version in package.json");
  }
  return parsed.data.version;
}

/** Plain text substitution of every occurrence of the quoted old version. */
export function replaceVersion(content: string, from: string, to: string): { content: string; changed: boolean } {
  const updated = content.split(`"${from}"`).join(`"${to}"`);
  return { content: updated, changed: updated !== content };
}

export type FileUpdate = { file: string; status: "updated" | "unchanged" | "missing" };

export function updateVersionFiles(root: string, from: string, to: string): FileUpdate[] {
  return VERSION_FILES.map((file) => {
    const path = join(root, file);
    if (!existsSync(path)) return { file, status: "missing" };
    const { content, changed } = replaceVersion(readFileSync(path, "utf-8"), from, to);
    if (changed) writeFileSync(path, content);
    return { file, status: changed ? "updated" : "unchanged" };
  });
}

export interface ReleaseDeps {
  root: string;
  run: CommandRunner;
  confirm: (current: string, next: string) => Promise<boolean>;
  log: (line: string) => void;
}

export type ReleaseOutcome =
  | { status: "cancelled" }
  | { status: "released"; tag: string; files: FileUpdate[] };

export async function runRelease(version: string, deps: ReleaseDeps): Promise<ReleaseOutcome> {
  const { root, run, log } = deps;
  if (!isReleaseVersion(version)) {
    throw new ConfigurationError("Version must be in format X.Y.Z (e.g. 1.2.0)");
  }

  const current = readCurrentVersion(root);
  log(`Current version: ${current}`);
  log(`New version: ${version}`);
  if (!(await deps.confirm(current, version))) {
    return { status: "cancelled" };
  }

  const files = updateVersionFiles(root, current, version);
  for (const f of files) {
    log(f.status === "missing" ? `Warning: ${f.file} not found, skipping` : `${f.file}: ${f.status}`);
  }

  log("Running tests...");
  await runChecked(run, "npm", ["test"], { cwd: root });

  const status = await runChecked(run, "git", ["status", "--porcelain"], { cwd: root });
  const changed = files.filter((f) => f.status === "updated").map((f) => f.file);
  if (status.stdout.trim() && changed.length > 0) {
    log("Committing version bump...");
    await runChecked(run, "git", ["add", ...changed], { cwd: root });
    await runChecked(run, "git", ["commit", "-m", `Bump version to ${version}`], { cwd: root });
  }

  const tag = `v${version}`;
  log(`Creating tag ${tag}`);
  await runChecked(run, "git", ["tag", "-a", tag, "-m", `Release ${version}`], { cwd: root });

  log("Pushing...");
  await runChecked(run, "git", ["push", "origin", "HEAD"], { cwd: root });
  await runChecked(run, "git", ["push", "origin", tag], { cwd: root });

  return { status: "released", tag, files };
}
