/**
 * Run orchestration: extract references, download through the ledger,
 * rewire the HTML
 */

import fs from "node:fs/promises";
import path from "node:path";
import pLimit, { type LimitFunction } from "p-limit";
import type { MirrorConfig } from "./config.js";
import {
  describeError,
  FilesystemError,
  PageFetchError,
  RootNotFoundError,
} from "./errors.js";
import { AssetLedger } from "./ledger.js";
import { downloadAsset, fetchPage } from "./network/fetch.js";
import {
  createReferenceStrategy,
  type ReferenceStrategy,
} from "./parsers/references.js";
import { rewriteFile } from "./processors/html.js";
import {
  type AssetCounts,
  type AssetMapping,
  type AssetOutcome,
  countOutcome,
  type DocumentReport,
  emptyCounts,
  hasLocalPath,
  type Issue,
  type RunSummary,
} from "./types.js";
import { ensureDir, isDirectory, pathExists } from "./utils/filesystem.js";
import {
  assetRelativePath,
  documentFileFor,
  hrefWithoutHash,
  isMirrorable,
  pageUrlFor,
  resolveReference,
} from "./utils/url.js";

export interface MirrorContext {
  config: MirrorConfig;
  strategy: ReferenceStrategy;
  ledger: AssetLedger;
  /** Bounds concurrent downloads across every document of the run */
  limit: LimitFunction;
}

export function createMirrorContext(
  config: MirrorConfig,
  ledger = new AssetLedger(),
): MirrorContext {
  return {
    config,
    strategy: createReferenceStrategy(config),
    ledger,
    limit: pLimit(config.concurrency),
  };
}

export interface ResolvedAssets {
  mapping: AssetMapping;
  outcomes: AssetOutcome[];
  counts: AssetCounts;
  issues: Issue[];
  references: number;
  uniqueUrls: number;
}

function display(ctx: MirrorContext, file: string): string {
  const rel = path.relative(ctx.config.siteRoot, file);
  return rel.startsWith("..") ? file : rel.split(path.sep).join("/");
}

function shorten(reference: string): string {
  return reference.length > 80 ? `${reference.slice(0, 77)}...` : reference;
}

function logOutcome(ctx: MirrorContext, outcome: AssetOutcome): void {
  switch (outcome.status) {
    case "downloaded":
      console.log(`[ok]   ${outcome.url} -> ${display(ctx, outcome.path)}`);
      break;
    case "skipped-existing":
      console.log(`[skip] ${outcome.url} (exists at ${display(ctx, outcome.path)})`);
      break;
    case "skipped-duplicate":
      console.log(`[skip] ${outcome.url} (already downloaded as ${display(ctx, outcome.path)})`);
      break;
    case "planned":
      console.log(`[plan] ${outcome.url} -> ${display(ctx, outcome.path)}`);
      break;
    case "missing":
      console.warn(`[missing] HTTP 404 for ${outcome.url}`);
      break;
    case "failed":
      console.warn(`[fail] ${outcome.url}: ${outcome.reason}`);
      break;
    case "unsupported":
      console.warn(`[warn] Unsupported scheme for ${shorten(outcome.url)}, skipping.`);
      break;
  }
}

/**
 * Local destination for an asset before its extension is known
 */
export function assetDestination(config: MirrorConfig, url: URL): string {
  const rel = assetRelativePath(url, {
    sentinel: config.sentinel,
    outputDirName: path.basename(config.outputDir),
  });
  return path.join(config.outputDir, ...rel.split("/"));
}

async function fetchAsset(ctx: MirrorContext, url: URL): Promise<AssetOutcome> {
  const destination = assetDestination(ctx.config, url);
  if (ctx.config.dryRun) {
    return { status: "planned", url: url.href, path: destination };
  }
  return downloadAsset(url, destination, { overwrite: ctx.config.overwrite });
}

/**
 * Resolve one document's references to local copies
 * Each unique URL goes through the run's ledger, so assets shared between
 * documents are fetched once.
 */
export async function resolveAssets(
  ctx: MirrorContext,
  pageUrl: URL,
  references: Iterable<string>,
  document: string,
): Promise<ResolvedAssets> {
  const unique = new Map<string, URL>();
  const unsupported = new Set<string>();
  let total = 0;

  for (const reference of references) {
    total++;
    const url = resolveReference(reference, pageUrl);
    if (!url || !isMirrorable(url)) {
      unsupported.add(url?.href ?? reference.trim());
      continue;
    }
    const href = hrefWithoutHash(url);
    if (!unique.has(href)) unique.set(href, new URL(href));
  }

  const pending = [...unique].map(([href, url]) =>
    ctx.limit(async () => {
      const outcome = await ctx.ledger.resolve(href, () => fetchAsset(ctx, url));
      logOutcome(ctx, outcome);
      return outcome;
    }),
  );

  const outcomes: AssetOutcome[] = [];
  for (const reference of unsupported) {
    const outcome: AssetOutcome = { status: "unsupported", url: reference };
    logOutcome(ctx, outcome);
    outcomes.push(outcome);
  }
  outcomes.push(...(await Promise.all(pending)));

  const mapping: AssetMapping = new Map();
  const counts = emptyCounts();
  const issues: Issue[] = [];
  for (const outcome of outcomes) {
    countOutcome(counts, outcome);
    if (hasLocalPath(outcome)) {
      mapping.set(outcome.url, outcome.path);
    } else if (outcome.status === "failed") {
      issues.push({ document, reference: outcome.url, kind: "failed", detail: outcome.reason });
    } else {
      issues.push({ document, reference: outcome.url, kind: outcome.status });
    }
  }

  return { mapping, outcomes, counts, issues, references: total, uniqueUrls: unique.size };
}

/** One-line tally of a document's asset outcomes */
export function formatCounts(counts: AssetCounts): string {
  const tally =
    `Downloaded: ${counts.downloaded}, Skipped: ${counts.skipped}, ` +
    `Missing: ${counts.missing}, Failed: ${counts.failed}`;
  return counts.planned ? `${tally}, Planned: ${counts.planned}` : tally;
}

function emptyReport(document: string, pageUrl: string): DocumentReport {
  return {
    document,
    pageUrl,
    references: 0,
    uniqueUrls: 0,
    counts: emptyCounts(),
    changed: false,
    replaced: 0,
    issues: [],
  };
}

async function rewire(
  ctx: MirrorContext,
  report: DocumentReport,
  documentFile: string,
  pageUrl: URL,
  mapping: AssetMapping,
): Promise<void> {
  if (!mapping.size) {
    console.log(`[page] No assets downloaded for ${report.document}`);
    return;
  }
  try {
    const result = await rewriteFile(
      ctx.strategy,
      { pageUrl, documentFile, siteRoot: ctx.config.siteRoot, mapping },
      { dryRun: ctx.config.dryRun },
    );
    report.changed = result.changed;
    report.replaced = result.replaced;
  } catch (err) {
    report.error = describeError(new FilesystemError(documentFile, err));
    console.warn(`[error] ${report.error}`);
    return;
  }

  if (!report.changed) {
    console.log(`[wire] No image sources updated for ${report.document}`);
  } else if (ctx.config.dryRun) {
    console.log(`[wire] Would update ${report.document} (${report.replaced} references)`);
  } else {
    console.log(`[wire] Updated ${report.document} (${report.replaced} references)`);
  }
}

function documentName(ctx: MirrorContext, file: string): string {
  const rel = path.relative(ctx.config.htmlRoot, file);
  return rel.startsWith("..") ? file : rel.split(path.sep).join("/");
}

export interface PageRequest {
  url: string;
  /** Local HTML file to rewire; inferred from the URL path under htmlRoot when omitted */
  htmlFile?: string;
}

/**
 * Single page: fetch the rendered page, download its images and rewire
 * the local HTML file
 */
export async function mirrorPage(ctx: MirrorContext, request: PageRequest): Promise<DocumentReport> {
  const pageUrl = new URL(request.url);
  if (!ctx.config.dryRun) await prepareOutput(ctx.config);

  let html: string;
  try {
    html = await fetchPage(pageUrl.href);
  } catch (err) {
    throw new PageFetchError(pageUrl.href, err);
  }

  const documentFile = request.htmlFile
    ? path.resolve(request.htmlFile)
    : documentFileFor(pageUrl, ctx.config.htmlRoot);
  const report = emptyReport(
    documentFile ? documentName(ctx, documentFile) : pageUrl.pathname,
    pageUrl.href,
  );

  const references = [...ctx.strategy.extract(html)];
  if (!references.length) {
    console.log("No image references found on the page.");
    return report;
  }

  console.log(`Found ${references.length} image references. Downloading to ${ctx.config.outputDir}.`);
  const assets = await resolveAssets(ctx, pageUrl, references, report.document);
  Object.assign(report, {
    references: assets.references,
    uniqueUrls: assets.uniqueUrls,
    counts: assets.counts,
    issues: assets.issues,
  });
  console.log(`\nCompleted downloads. ${formatCounts(assets.counts)}`);

  if (!documentFile) {
    console.log("No HTML file specified or inferred; skipping rewiring step.");
  } else if (!(await pathExists(documentFile))) {
    console.warn(`[warn] HTML file not found: ${documentFile}`);
  } else {
    await rewire(ctx, report, documentFile, pageUrl, assets.mapping);
  }
  return report;
}

/**
 * Fail the run early when nothing useful can follow
 */
export async function prepareRun(config: MirrorConfig): Promise<void> {
  if (!(await isDirectory(config.htmlRoot))) {
    throw new RootNotFoundError(config.htmlRoot);
  }
  if (!config.dryRun) await prepareOutput(config);
}

async function prepareOutput(config: MirrorConfig): Promise<void> {
  try {
    await ensureDir(config.outputDir);
  } catch (err) {
    throw new FilesystemError(config.outputDir, err);
  }
}

interface LoadedDocument {
  file: string;
  report: DocumentReport;
  pageUrl: URL;
  html?: string;
}

async function loadDocument(ctx: MirrorContext, file: string): Promise<LoadedDocument> {
  const pageUrl = new URL(pageUrlFor(ctx.config.baseUrl, ctx.config.htmlRoot, file));
  const report = emptyReport(documentName(ctx, file), pageUrl.href);
  try {
    // Structural runs read the rendered page; pattern runs scan the file itself
    const html =
      ctx.strategy.name === "structural"
        ? await fetchPage(pageUrl.href)
        : await fs.readFile(file, "utf8");
    return { file, report, pageUrl, html };
  } catch (err) {
    report.error =
      ctx.strategy.name === "structural"
        ? describeError(new PageFetchError(pageUrl.href, err))
        : describeError(err);
    console.warn(`[error] ${report.document}: ${report.error}`);
    return { file, report, pageUrl };
  }
}

/**
 * Every given HTML file: load all documents, download the union of their
 * assets through one bounded pool, then rewire each document
 */
export async function mirrorSite(ctx: MirrorContext, files: readonly string[]): Promise<DocumentReport[]> {
  await prepareRun(ctx.config);

  const documents = await Promise.all(files.map((file) => ctx.limit(() => loadDocument(ctx, file))));

  const resolved = documents.map((doc) => {
    if (doc.html === undefined) return Promise.resolve(undefined);
    const references = [...ctx.strategy.extract(doc.html)];
    if (!references.length) {
      console.log(`[skip] ${doc.report.document} (no image references)`);
      return Promise.resolve(undefined);
    }
    console.log(`[page] ${doc.report.document} (${references.length} image references)`);
    return resolveAssets(ctx, doc.pageUrl, references, doc.report.document);
  });
  const assets = await Promise.all(resolved);

  await Promise.all(
    documents.map((doc, i) => {
      const found = assets[i];
      if (!found) return Promise.resolve();
      Object.assign(doc.report, {
        references: found.references,
        uniqueUrls: found.uniqueUrls,
        counts: found.counts,
        issues: found.issues,
      });
      console.log(`[page] ${doc.report.document}: ${formatCounts(found.counts)}`);
      return ctx.limit(() => rewire(ctx, doc.report, doc.file, doc.pageUrl, found.mapping));
    }),
  );

  return documents.map((doc) => doc.report);
}

export function summarize(reports: readonly DocumentReport[]): RunSummary {
  const summary: RunSummary = {
    ...emptyCounts(),
    documents: reports.length,
    rewritten: 0,
    documentErrors: 0,
  };
  for (const report of reports) {
    summary.downloaded += report.counts.downloaded;
    summary.skipped += report.counts.skipped;
    summary.failed += report.counts.failed;
    summary.missing += report.counts.missing;
    summary.planned += report.counts.planned;
    if (report.changed) summary.rewritten++;
    if (report.error) summary.documentErrors++;
  }
  return summary;
}
