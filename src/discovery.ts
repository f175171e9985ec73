/**
 * Instagram Business Account discovery.
 *
 * Lists the Facebook Pages the token's user manages, then reads each page's
 * `instagram_business_account`. Pages are checked in the order the Graph API
 * returns them and the first linked account wins; when several pages carry an
 * account, the later ones are never looked at.
 */

import { z } from "zod";
import { expectOk, type GraphApi } from "./api.js";
import { NoInstagramAccountError, NoPagesFoundError } from "./errors.js";
import type { LongLivedToken } from "./token.js";

export interface InstagramAccount {
  accountId: string;
  linkedPageId: string;
  pageName?: string;
}

export interface PageCheck {
  pageId: string;
  pageName?: string;
  /** Set when the page has a linked Instagram Business Account. */
  instagramAccountId?: string;
}

export interface DiscoveryOptions {
  onPage?: (check: PageCheck) => void;
}

const PageListSchema = z.object({
  data: z.array(z.object({ id: z.string(), name: z.string().optional() })).default([]),
});

const PageDetailSchema = z.object({
  instagram_business_account: z.object({ id: z.string() }).optional(),
});

export async function listPages(
  api: GraphApi,
  token: LongLivedToken,
): Promise<Array<{ id: string; name?: string }>> {
  const res = await api("GET", "me/accounts", token.value, { fields: "id,name", limit: "100" });
  return expectOk(res, PageListSchema, "Listing Facebook Pages").data;
}

async function linkedInstagramAccount(
  api: GraphApi,
  token: LongLivedToken,
  pageId: string,
): Promise<string | undefined> {
  const res = await api("GET", pageId, token.value, { fields: "instagram_business_account" });
  if (!res.ok) return undefined;
  const parsed = PageDetailSchema.safeParse(res.body);
  return parsed.success ? parsed.data.instagram_business_account?.id : undefined;
}

export async function discoverInstagramAccount(
  api: GraphApi,
  token: LongLivedToken,
  options: DiscoveryOptions = {},
): Promise<InstagramAccount> {
  const pages = await listPages(api, token);
  if (pages.length === 0) {
    throw new NoPagesFoundError();
  }

  for (const page of pages) {
    const accountId = await linkedInstagramAccount(api, token, page.id);
    options.onPage?.({ pageId: page.id, pageName: page.name, instagramAccountId: accountId });
    if (accountId) {
      return { accountId, linkedPageId: page.id, pageName: page.name };
    }
  }

  throw new NoInstagramAccountError(pages.length);
}

/**
 * Every page the token manages with its linked account, if any. Unlike
 * discovery this reads all pages; it backs the suggestion shown when a
 * configured account ID turns out to be wrong.
 */
export async function listLinkedAccounts(api: GraphApi, token: LongLivedToken): Promise<PageCheck[]> {
  const pages = await listPages(api, token);
  const checks: PageCheck[] = [];
  for (const page of pages) {
    const instagramAccountId = await linkedInstagramAccount(api, token, page.id);
    checks.push({ pageId: page.id, pageName: page.name, instagramAccountId });
  }
  return checks;
}
