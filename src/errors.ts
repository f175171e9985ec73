/**
 * Error taxonomy for the credential workflow.
 * Every component failure is one of these; nothing is retried internally.
 */

export class CredentialToolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CredentialToolError";
  }
}

/** Missing or invalid input, detected before any request is sent. */
export class ConfigurationError extends CredentialToolError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class NetworkError extends CredentialToolError {
  constructor(
    message: string,
    public readonly url: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "NetworkError";
  }
}

/** Non-2xx or malformed JSON from the Graph API. */
export class UpstreamApiError extends CredentialToolError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string,
    public readonly errorCode?: number,
    public readonly errorSubcode?: number,
  ) {
    super(message);
    this.name = "UpstreamApiError";
  }
}

export class NoPagesFoundError extends CredentialToolError {
  constructor() {
    super("No Facebook Pages found for this token (is pages_show_list granted?)");
    this.name = "NoPagesFoundError";
  }
}

export class NoInstagramAccountError extends CredentialToolError {
  constructor(public readonly pagesChecked: number) {
    super(`None of the ${pagesChecked} Facebook Page(s) has a linked Instagram Business Account`);
    this.name = "NoInstagramAccountError";
  }
}

export class TokenExchangeError extends CredentialToolError {
  constructor(
    message: string,
    public readonly body: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "TokenExchangeError";
  }
}

export class SecretStoreError extends CredentialToolError {
  constructor(
    message: string,
    public readonly secretName: string,
  ) {
    super(message);
    this.name = "SecretStoreError";
  }
}

export class CommandError extends CredentialToolError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stdout: string,
    public readonly stderr: string,
  ) {
    super(`Command failed (${exitCode ?? "signal"}): ${command}${stderr.trim() ? `\n${stderr.trim()}` : ""}`);
    this.name = "CommandError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
