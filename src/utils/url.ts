/**
 * URL manipulation utilities and the remote URL → local path mapping
 */

import { createHash } from 'node:crypto';
import path from 'node:path';

export interface AssetPathOptions {
  /**
   * Folder name that anchors the mirror: when it appears nested deeper in
   * the remote path, everything before it is dropped. Empty disables it.
   */
  sentinel?: string;
  /** Name of the output directory, to avoid `assets/assets/...` nesting */
  outputDirName?: string;
}

const FALLBACK_NAME = 'image';

/**
 * Resolve a raw reference against the document URL
 * Returns undefined for references that are not URLs at all
 */
export function resolveReference(reference: string, base: URL | string): URL | undefined {
  const raw = reference.trim();
  if (!raw) return undefined;
  try {
    return new URL(raw, base);
  } catch {
    return undefined;
  }
}

export function isMirrorable(url: URL): boolean {
  return url.protocol === 'http:' || url.protocol === 'https:';
}

export function hrefWithoutHash(url: URL): string {
  return url.href.split('#')[0];
}

/**
 * Percent-decode, keeping malformed escape sequences as they are
 */
export function decodeLenient(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value.replace(/(?:%[0-9a-f]{2})+/gi, (run) => {
      try {
        return decodeURIComponent(run);
      } catch {
        return run;
      }
    });
  }
}

function sanitizeDirectory(segment: string, index: number): string {
  const safe = segment.replace(/[^\p{L}\p{N}_-]/gu, '_');
  return safe || `dir_${index}`;
}

function sanitizeFilename(segment: string, url: URL): string {
  const safe = segment.replace(/[^\p{L}\p{N}._-]/gu, '_');
  if (!safe || /^\.+$/.test(safe)) {
    return createHash('md5').update(url.href).digest('hex');
  }
  return safe;
}

/**
 * Map a remote asset URL to a posix path relative to the output directory
 * The extension, when missing, is added later from the response type.
 */
export function assetRelativePath(url: URL, options: AssetPathOptions = {}): string {
  const sentinel = (options.sentinel ?? 'assets').toLowerCase();
  const decoded = decodeLenient(url.pathname || url.host);
  let parts = decoded.split('/').filter(Boolean);
  if (!parts.length) parts = [FALLBACK_NAME];

  if (sentinel) {
    const at = parts.slice(0, -1).findIndex((part) => part.toLowerCase() === sentinel);
    if (at > 0) parts = parts.slice(at);
  }

  const directories = parts.slice(0, -1).map(sanitizeDirectory);
  const filename = sanitizeFilename(parts[parts.length - 1], url);
  const segments = [...directories, filename];

  const outRoot = options.outputDirName?.toLowerCase();
  if (outRoot && outRoot !== '.' && segments.length > 1 && segments[0].toLowerCase() === outRoot) {
    segments.shift();
  }
  return segments.join('/');
}

/**
 * Create a relative path from one file to another
 * Ensures the result starts with ./ for consistency
 */
export function makeRelative(fromFile: string, toFile: string): string {
  let rel = path.relative(path.dirname(fromFile), toFile);
  if (!rel.startsWith('.')) rel = `./${rel}`;
  return rel.replace(/\\/g, '/');
}

export interface WebPathOptions {
  siteRoot?: string;
  documentFile: string;
}

/**
 * Path an HTML page should use to load a local file: rooted at the site
 * root when the file lives under it, otherwise relative to the page
 */
export function webPath(localFile: string, { siteRoot, documentFile }: WebPathOptions): string {
  if (siteRoot) {
    const rel = path.relative(siteRoot, localFile);
    if (rel && !rel.startsWith('..') && !path.isAbsolute(rel)) {
      return `/${rel.split(path.sep).join('/')}`;
    }
  }
  return makeRelative(documentFile, localFile);
}

/**
 * URL a locally served copy of an HTML file is reachable at
 */
export function pageUrlFor(baseUrl: string, root: string, file: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  const relative = path.relative(root, file).split(path.sep).map(encodeURIComponent).join('/');
  return new URL(relative, base).href;
}

/**
 * HTML file under htmlRoot that a page URL was served from, if it exists
 * on disk (checked by the caller)
 */
export function documentFileFor(pageUrl: URL, htmlRoot: string): string | undefined {
  const pathname = decodeLenient(pageUrl.pathname).replace(/^\/+/, '');
  if (!pathname) return undefined;
  const candidate = path.resolve(htmlRoot, pathname);
  const rel = path.relative(htmlRoot, candidate);
  if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) return undefined;
  return candidate;
}
