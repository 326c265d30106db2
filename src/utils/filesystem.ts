/**
 * Filesystem utility functions
 */

import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/**
 * Check if a file or directory exists
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

export interface DiscoverOptions {
  /** Files or directories relative to root; everything under root when empty */
  selection?: string[];
  /** Directory names never descended into (the mirror itself, usually) */
  excludeDirs?: string[];
}

/**
 * List HTML files under root, sorted, skipping dot-folders and the
 * excluded directories. Unknown selection entries are reported and skipped.
 */
export async function discoverHtmlFiles(root: string, options: DiscoverOptions = {}): Promise<string[]> {
  const ignore = (options.excludeDirs ?? ["assets"]).map((dir) => `**/${dir}/**`);
  const globOptions = { cwd: root, absolute: true, dot: false, onlyFiles: true, ignore, caseSensitiveMatch: false };

  const selection = options.selection ?? [];
  if (!selection.length) {
    return (await fg("**/*.html", globOptions)).map(path.normalize).sort();
  }

  const found = new Set<string>();
  for (const raw of selection) {
    const target = path.resolve(root, raw);
    const relative = path.relative(root, target);
    if (relative.startsWith("..") || path.isAbsolute(relative)) {
      console.warn(`[warn] Skipping path outside the HTML root: ${raw}`);
      continue;
    }
    if (await isDirectory(target)) {
      const pattern = relative ? `${fg.escapePath(relative.split(path.sep).join("/"))}/**/*.html` : "**/*.html";
      for (const file of await fg(pattern, globOptions)) found.add(path.normalize(file));
    } else if (target.toLowerCase().endsWith(".html") && (await pathExists(target))) {
      found.add(target);
    } else {
      console.warn(`[warn] Skipping unknown path: ${raw}`);
    }
  }
  return [...found].sort();
}
