/**
 * HTML rewiring: point image references at their local copies
 */

import fs from "node:fs/promises";
import type { ApplyResult, ReferenceStrategy } from "../parsers/references.js";
import type { AssetMapping } from "../types.js";
import { hrefWithoutHash, resolveReference, webPath } from "../utils/url.js";

export interface RewriteContext {
  /** URL the document was served from; references resolve against it */
  pageUrl: URL;
  /** The HTML file being rewritten */
  documentFile: string;
  /** Directory served as "/"; local copies outside it get relative paths */
  siteRoot?: string;
  mapping: AssetMapping;
}

export interface RewriteOptions {
  dryRun?: boolean;
}

/**
 * Rewrite every reference whose resolved URL has a local copy
 * Only values that differ from their replacement count as changes.
 */
export function rewriteHtml(
  html: string,
  strategy: ReferenceStrategy,
  ctx: RewriteContext,
): ApplyResult {
  return strategy.apply(html, (reference) => {
    const url = resolveReference(reference, ctx.pageUrl);
    if (!url) return undefined;
    const localFile = ctx.mapping.get(hrefWithoutHash(url));
    if (!localFile) return undefined;
    return webPath(localFile, {
      siteRoot: ctx.siteRoot,
      documentFile: ctx.documentFile,
    });
  });
}

/**
 * Rewrite an HTML file in place; the file is written only when a
 * reference actually changed
 */
export async function rewriteFile(
  strategy: ReferenceStrategy,
  ctx: RewriteContext,
  opts: RewriteOptions = {},
): Promise<ApplyResult> {
  const original = await fs.readFile(ctx.documentFile, "utf8");
  const result = rewriteHtml(original, strategy, ctx);
  if (result.changed && !opts.dryRun) {
    await fs.writeFile(ctx.documentFile, result.html, "utf8");
  }
  return result;
}
