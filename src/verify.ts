/**
 * Credential verification: reads the Instagram account with the token and,
 * optionally, checks the token's granted scopes.
 *
 * Upstream and transport failures are reported in the result, never thrown.
 */

import { z } from "zod";
import { extractGraphError, type GraphApi, type GraphResponse } from "./api.js";
import { errorMessage } from "./errors.js";
import { inspectToken, type LongLivedToken } from "./token.js";

export type Diagnosis =
  | "ok"
  | "expired_token"
  | "invalid_account_id"
  | "permission_denied"
  | "missing_scopes"
  | "unknown";

export interface AccountProfile {
  id: string;
  username?: string;
  mediaCount?: number;
}

export interface VerificationResult {
  ok: boolean;
  missingScopes: Set<string>;
  diagnosticMessage: string;
  diagnosis: Diagnosis;
  account?: AccountProfile;
}

export interface VerifyOptions {
  /** When set, the token must carry every one of these scopes. */
  requiredScopes?: readonly string[];
}

const AccountSchema = z.object({
  id: z.string(),
  username: z.string().optional(),
  media_count: z.number().optional(),
});

/** Maps Graph API error codes to a diagnosis. */
export function diagnoseErrorCode(code: number | undefined): Diagnosis {
  switch (code) {
    case 190:
      return "expired_token";
    case 100:
      return "invalid_account_id";
    case 10:
    case 200:
      return "permission_denied";
    default:
      return "unknown";
  }
}

function failed(diagnosis: Diagnosis, diagnosticMessage: string): VerificationResult {
  return { ok: false, missingScopes: new Set(), diagnosticMessage, diagnosis };
}

export async function verifyCredentials(
  api: GraphApi,
  token: LongLivedToken,
  accountId: string,
  options: VerifyOptions = {},
): Promise<VerificationResult> {
  let res: GraphResponse;
  try {
    res = await api("GET", accountId, token.value, { fields: "id,username,media_count" });
  } catch (err) {
    return failed("unknown", `Could not reach the Graph API: ${errorMessage(err)}`);
  }

  if (!res.ok) {
    const upstream = extractGraphError(res.body);
    if (upstream) {
      return failed(diagnoseErrorCode(upstream.code), upstream.message);
    }
    return failed("unknown", `Account lookup failed with HTTP ${res.status}`);
  }

  const parsed = AccountSchema.safeParse(res.body);
  if (!parsed.success) {
    return failed("unknown", "Account lookup returned an unexpected response");
  }
  const account: AccountProfile = {
    id: parsed.data.id,
    username: parsed.data.username,
    mediaCount: parsed.data.media_count,
  };

  const missingScopes = new Set<string>();
  if (options.requiredScopes && options.requiredScopes.length > 0) {
    let granted: Set<string>;
    try {
      granted = new Set((await inspectToken(api, token)).scopes);
    } catch (err) {
      return { ...failed("unknown", `Could not read token scopes: ${errorMessage(err)}`), account };
    }
    for (const scope of options.requiredScopes) {
      if (!granted.has(scope)) missingScopes.add(scope);
    }
  }

  if (missingScopes.size > 0) {
    return {
      ok: false,
      missingScopes,
      diagnosticMessage: `Token is missing required scope(s): ${[...missingScopes].join(", ")}`,
      diagnosis: "missing_scopes",
      account,
    };
  }

  return {
    ok: true,
    missingScopes,
    diagnosticMessage: `Verified @${account.username ?? account.id}`,
    diagnosis: "ok",
    account,
  };
}
