/**
 * CI secret stores. The workflow only needs "set secret by name".
 */

import { SecretStoreError, errorMessage } from "./errors.js";
import type { CommandRunner } from "./exec.js";

export interface SecretStore {
  /** Human-readable name for progress output. */
  readonly label: string;
  isAvailable(): Promise<boolean>;
  /** Throws SecretStoreError when the value could not be stored. */
  setSecret(name: string, value: string): Promise<void>;
}

/**
 * GitHub Actions secrets through the `gh` CLI. The value goes to stdin so it
 * never shows up in the process list.
 */
export class GhCliSecretStore implements SecretStore {
  readonly label = "GitHub Actions (gh)";

  constructor(
    private readonly run: CommandRunner,
    private readonly repo?: string,
  ) {}

  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.run("gh", ["--version"]);
      return result.code === 0;
    } catch {
      // spawn failure: gh is not installed
      return false;
    }
  }

  async setSecret(name: string, value: string): Promise<void> {
    const args = ["secret", "set", name];
    if (this.repo) args.push("--repo", this.repo);
    let code: number | null;
    let stderr: string;
    try {
      ({ code, stderr } = await this.run("gh", args, { input: value }));
    } catch (err) {
      throw new SecretStoreError(`Could not run gh: ${errorMessage(err)}`, name);
    }
    if (code !== 0) {
      throw new SecretStoreError(`gh secret set ${name} failed: ${stderr.trim() || `exit ${code}`}`, name);
    }
  }
}

/** Keeps secrets in a Map. Used by tests and dry runs. */
export class MemorySecretStore implements SecretStore {
  readonly label = "memory";
  readonly secrets = new Map<string, string>();

  constructor(private readonly available = true) {}

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async setSecret(name: string, value: string): Promise<void> {
    this.secrets.set(name, value);
  }
}
