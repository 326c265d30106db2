/**
 * Network fetch utilities: rendered pages with retry, images with
 * URL-encoding variants and streamed, atomic writes
 */

import { randomBytes } from "node:crypto";
import { createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { setTimeout as delay } from "node:timers/promises";
import {
  describeError,
  FilesystemError,
  HttpStatusError,
  TransportError,
} from "../errors.js";
import type { AssetOutcome } from "../types.js";
import { withInferredExtension } from "../utils/extensions.js";
import { ensureDir, pathExists } from "../utils/filesystem.js";
import { decodeLenient } from "../utils/url.js";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

const DEFAULT_TIMEOUT_MS = 30_000;

/** Write buffer size for streamed downloads */
export const CHUNK_SIZE = 64 * 1024;

const BASE_REQUEST_HEADERS: Record<string, string> = {
  "User-Agent": DEFAULT_USER_AGENT,
  "Accept-Language": "en-US,en;q=0.9",
  "Cache-Control": "no-cache",
  Pragma: "no-cache",
  "Sec-Ch-Ua":
    '"Google Chrome";v="131", "Chromium";v="131", "Not_A Brand";v="24"',
  "Sec-Ch-Ua-Mobile": "?0",
  "Sec-Ch-Ua-Platform": '"macOS"',
};

type RequestKind = "document" | "image";

const KIND_HEADERS: Record<RequestKind, Record<string, string>> = {
  document: {
    Accept:
      "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "Sec-Fetch-Dest": "document",
    "Sec-Fetch-Mode": "navigate",
    "Upgrade-Insecure-Requests": "1",
  },
  image: {
    Accept: "image/avif,image/webp,image/apng,image/svg+xml,image/*,*/*;q=0.8",
    "Sec-Fetch-Dest": "image",
    "Sec-Fetch-Mode": "no-cors",
  },
};

let requestDelayMs = 0;
let requestTimeoutMs = DEFAULT_TIMEOUT_MS;
let requestHeaders: Record<string, string> = { ...BASE_REQUEST_HEADERS };
let baseReferer: string | null = null;

export interface RequestOptions {
  delayMs?: number;
  timeoutMs?: number;
  userAgent?: string;
  referer?: string;
}

/**
 * Configure request settings
 */
export function configureRequests(options: RequestOptions): void {
  if (options.delayMs !== undefined && options.delayMs >= 0) {
    requestDelayMs = options.delayMs;
  }
  if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
    requestTimeoutMs = options.timeoutMs;
  }
  if (options.userAgent) {
    // Keep the client hints in step with the UA's Chrome version
    const chromeMatch = options.userAgent.match(/Chrome\/(\d+)/);
    const chromeVersion = chromeMatch ? chromeMatch[1] : "131";

    requestHeaders = {
      ...requestHeaders,
      "User-Agent": options.userAgent,
      "Sec-Ch-Ua": `"Google Chrome";v="${chromeVersion}", "Chromium";v="${chromeVersion}", "Not_A Brand";v="24"`,
    };
  }
  if (options.referer) {
    baseReferer = options.referer;
  }
}

/**
 * Restore the default request settings
 */
export function resetRequests(): void {
  requestDelayMs = 0;
  requestTimeoutMs = DEFAULT_TIMEOUT_MS;
  requestHeaders = { ...BASE_REQUEST_HEADERS };
  baseReferer = null;
}

/**
 * Build headers for a specific request, including dynamic Referer
 */
function buildRequestHeaders(url: string, kind: RequestKind): Record<string, string> {
  const headers = { ...requestHeaders, ...KIND_HEADERS[kind] };

  if (baseReferer) {
    headers.Referer = baseReferer;
    headers["Sec-Fetch-Site"] = "same-origin";
  } else {
    try {
      headers.Referer = `${new URL(url).origin}/`;
      headers["Sec-Fetch-Site"] = "same-origin";
    } catch {
      headers["Sec-Fetch-Site"] = "none";
    }
  }

  return headers;
}

/**
 * Fetch once without retry, returns response even if not ok
 */
export async function fetchOnce(
  url: string,
  kind: RequestKind = "document",
): Promise<Response> {
  if (requestDelayMs > 0) {
    const jitter = Math.floor(
      Math.random() * Math.max(1, requestDelayMs * 0.2),
    );
    await delay(requestDelayMs + jitter);
  }

  return fetch(url, {
    redirect: "follow",
    headers: buildRequestHeaders(url, kind),
    signal: AbortSignal.timeout(requestTimeoutMs),
  });
}

/**
 * Fetch with basic retry and exponential backoff
 * A 404 is final and not retried.
 */
export async function fetchWithRetry(
  url: string,
  tries = 3,
  backoffMs = 400,
): Promise<Response> {
  let lastErr: unknown;

  for (let i = 0; i < tries; i++) {
    try {
      const res = await fetchOnce(url);
      if (!res.ok) {
        await discardBody(res);
        throw new HttpStatusError(url, res.status);
      }
      return res;
    } catch (e) {
      lastErr = e instanceof HttpStatusError ? e : new TransportError(url, e);
      if (e instanceof HttpStatusError && e.isNotFound) break;
      if (i < tries - 1) await delay(backoffMs * 2 ** i);
    }
  }
  throw lastErr;
}

/**
 * Fetch a rendered HTML page as text
 */
export async function fetchPage(url: string, tries = 3, backoffMs = 400): Promise<string> {
  const res = await fetchWithRetry(url, tries, backoffMs);
  return res.text();
}

async function discardBody(res: Response): Promise<void> {
  if (res.body && !res.bodyUsed) await res.body.cancel();
}

function encodeSegments(rawPath: string, keepColon: boolean): string {
  // Split before decoding so an escaped "/" stays inside its segment
  return rawPath
    .split("/")
    .map((segment) => {
      const encoded = encodeURIComponent(decodeLenient(segment));
      return keepColon ? encoded.replace(/%3A/gi, ":") : encoded;
    })
    .join("/");
}

/**
 * Request URLs to try for one asset, in order:
 * conservative encoding (":" kept), full percent-encoding when the path
 * has a ":", and the query-less form when there is a query
 */
export function buildUrlVariants(url: URL): string[] {
  const origin = `${url.protocol}//${url.host}`;
  const conservative = `${origin}${encodeSegments(url.pathname, true)}`;

  const variants = [`${conservative}${url.search}`];
  if (decodeLenient(url.pathname).includes(":")) {
    variants.push(`${origin}${encodeSegments(url.pathname, false)}${url.search}`);
  }
  if (url.search) {
    variants.push(conservative);
  }
  return [...new Set(variants)];
}

export type DownloadOutcome = Extract<
  AssetOutcome,
  { status: "downloaded" | "skipped-existing" | "missing" | "failed" }
>;

export interface DownloadOptions {
  overwrite?: boolean;
}

/**
 * Stream a response body to a sibling temp file, then rename it into place
 * so a failed transfer never replaces a good copy
 */
async function writeBody(res: Response, destination: string): Promise<void> {
  const dir = path.dirname(destination);
  try {
    await ensureDir(dir);
  } catch (err) {
    throw new FilesystemError(dir, err);
  }

  const temp = `${destination}.${randomBytes(4).toString("hex")}.part`;
  try {
    const out = createWriteStream(temp, { highWaterMark: CHUNK_SIZE });
    if (res.body) {
      await pipeline(Readable.fromWeb(res.body, { highWaterMark: CHUNK_SIZE }), out);
    } else {
      await pipeline(Readable.from([]), out);
    }
    await fs.rename(temp, destination);
  } catch (err) {
    await fs.rm(temp, { force: true });
    throw err;
  }
}

/**
 * Download one image to destination (an extension is added from the
 * Content-Type when destination has none)
 */
export async function downloadAsset(
  url: URL,
  destination: string,
  options: DownloadOptions = {},
): Promise<DownloadOutcome> {
  const href = url.href;
  let lastReason = "no request made";

  for (const variant of buildUrlVariants(url)) {
    let res: Response;
    try {
      res = await fetchOnce(variant, "image");
    } catch (err) {
      lastReason = describeError(new TransportError(variant, err));
      continue;
    }

    if (res.status === 404) {
      await discardBody(res);
      return { status: "missing", url: href };
    }
    if (!res.ok) {
      await discardBody(res);
      lastReason = describeError(new HttpStatusError(variant, res.status));
      continue;
    }

    const finalPath = withInferredExtension(
      destination,
      res.headers.get("content-type"),
    );
    if (!options.overwrite && (await pathExists(finalPath))) {
      await discardBody(res);
      return { status: "skipped-existing", url: href, path: finalPath };
    }

    try {
      await writeBody(res, finalPath);
    } catch (err) {
      return { status: "failed", url: href, reason: describeError(err) };
    }
    return { status: "downloaded", url: href, path: finalPath };
  }

  return { status: "failed", url: href, reason: lastReason };
}
