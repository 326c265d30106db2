/**
 * Image tag issue scanning and the plain-text issue log
 *
 * The log groups offending src values under the HTML file they were found
 * in, one file per unindented line:
 *
 *   about/index.html
 *     line 12: src='/img/team' -> <img src="/img/team">
 */

import type { Issue } from "../types.js";

const IMG_TAG_RE = /<img\b[^>]*>/gi;
const SRC_RE = /\bsrc\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/i;
const LOG_SRC_RE = /src=(?:'((?:[^'\\]|\\.)*)'|"((?:[^"\\]|\\.)*)")/;

export interface TagIssue {
  line: number;
  src: string;
  tag: string;
}

export interface IssueLogEntry {
  document: string;
  src: string;
  line?: number;
  tag?: string;
}

export type SrcPredicate = (src: string) => boolean;

function stripQueryAndHash(src: string): string {
  return src.split("?", 1)[0].split("#", 1)[0];
}

/**
 * True when the last path segment has no dot; empty values and data URIs
 * are never flagged
 */
export function lacksExtension(src: string): boolean {
  if (!src || src.startsWith("data:")) return false;
  const basename = stripQueryAndHash(src).split("/").pop() ?? "";
  return !basename.includes(".");
}

export function isWebp(src: string): boolean {
  if (!src) return false;
  return stripQueryAndHash(src).toLowerCase().endsWith(".webp");
}

/**
 * <img> tags whose src matches predicate, with 1-based line numbers
 */
export function findImageIssues(html: string, predicate: SrcPredicate): TagIssue[] {
  const issues: TagIssue[] = [];
  for (const match of html.matchAll(IMG_TAG_RE)) {
    const tag = match[0];
    const srcMatch = SRC_RE.exec(tag);
    if (!srcMatch) continue;
    const src = srcMatch[1] ?? srcMatch[2] ?? srcMatch[3] ?? "";
    if (!predicate(src)) continue;
    const offset = match.index ?? 0;
    const line = html.slice(0, offset).split("\n").length;
    issues.push({ line, src, tag: tag.trim() });
  }
  return issues;
}

export function issuesToLogEntries(issues: readonly Issue[]): IssueLogEntry[] {
  return issues.map((issue) => ({ document: issue.document, src: issue.reference }));
}

/** Quote a src so any quote or backslash in it reads back intact */
function quoteSrc(src: string): string {
  if (src.includes("'") && !src.includes('"')) return `"${src.replace(/\\/g, "\\\\")}"`;
  return `'${src.replace(/[\\']/g, "\\$&")}'`;
}

function unquoteSrc(quoted: string): string {
  return quoted.replace(/\\(.)/g, "$1");
}

/**
 * Render entries grouped by document, in first-seen order
 */
export function formatIssueLog(entries: readonly IssueLogEntry[]): string {
  const groups = new Map<string, IssueLogEntry[]>();
  for (const entry of entries) {
    const group = groups.get(entry.document) ?? [];
    group.push(entry);
    groups.set(entry.document, group);
  }

  const lines: string[] = [];
  for (const [document, group] of groups) {
    lines.push(document);
    for (const entry of group) {
      const where = entry.line !== undefined ? `line ${entry.line}: ` : "";
      const tag = entry.tag ? ` -> ${entry.tag}` : "";
      lines.push(`  ${where}src=${quoteSrc(entry.src)}${tag}`);
    }
  }
  return lines.length ? `${lines.join("\n")}\n` : "";
}

/**
 * (document, src) pairs from an issue log; indented lines before the
 * first document line are ignored
 */
export function parseIssueLog(text: string): Array<{ document: string; src: string }> {
  const pairs: Array<{ document: string; src: string }> = [];
  let current: string | undefined;
  for (const line of text.split(/\r?\n/)) {
    if (!line.trim()) continue;
    if (!/^\s/.test(line)) {
      current = line.trim();
      continue;
    }
    if (current === undefined) continue;
    const match = LOG_SRC_RE.exec(line);
    if (match) pairs.push({ document: current, src: unquoteSrc(match[1] ?? match[2] ?? "") });
  }
  return pairs;
}
