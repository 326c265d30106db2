/**
 * Image reference extraction and in-place replacement
 *
 * Two strategies share one capability set: "structural" walks <img src>
 * through cheerio, "pattern" matches known asset-host URLs in raw text.
 */

import * as cheerio from "cheerio";

export type StrategyName = "structural" | "pattern";

/** Returns the new value for a reference, or undefined to leave it */
export type ReplaceReference = (reference: string) => string | undefined;

export interface ApplyResult {
  html: string;
  changed: boolean;
  replaced: number;
}

export interface ReferenceStrategy {
  readonly name: StrategyName;
  /** Lazy scan; every iteration starts over */
  extract(html: string): Iterable<string>;
  apply(html: string, replace: ReplaceReference): ApplyResult;
}

function isFullDocument(html: string): boolean {
  return /<!doctype|<(?:html|head|body)[\s>]/i.test(html);
}

// Scripting off so <noscript> content parses as markup, not raw text
function loadMarkup(html: string): cheerio.CheerioAPI {
  return cheerio.load(
    html,
    { scriptingEnabled: false, sourceCodeLocationInfo: true },
    isFullDocument(html),
  );
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/"/g, "&quot;");
}

interface AttributeEdit {
  start: number;
  end: number;
  text: string;
}

/**
 * <img src> values, trimmed; tags without a src are skipped
 */
export const structuralStrategy: ReferenceStrategy = {
  name: "structural",

  extract(html) {
    return {
      *[Symbol.iterator]() {
        const $ = loadMarkup(html);
        for (const el of $("img[src]").toArray()) {
          const src = ($(el).attr("src") ?? "").trim();
          if (src) yield src;
        }
      },
    };
  },

  // Only the src attribute text is spliced back, so the rest of the
  // document keeps its original bytes
  apply(html, replace) {
    const $ = loadMarkup(html);
    const edits: AttributeEdit[] = [];
    let replaced = 0;

    $("img[src]").each((_, el) => {
      const current = $(el).attr("src") ?? "";
      const src = current.trim();
      if (!src) return;
      const next = replace(src);
      if (next === undefined || next === current) return;
      replaced++;

      const location = el.sourceCodeLocation?.attrs?.src;
      if (location) {
        const name = html.slice(location.startOffset, location.startOffset + "src".length);
        edits.push({
          start: location.startOffset,
          end: location.endOffset,
          text: `${name}="${escapeAttribute(next)}"`,
        });
      }
      $(el).attr("src", next);
    });

    if (!replaced) return { html, changed: false, replaced: 0 };
    // Without positions for every tag, fall back to serialising the tree
    if (edits.length < replaced) return { html: $.html(), changed: true, replaced };

    let out = html;
    for (const edit of edits.sort((x, y) => y.start - x.start)) {
      out = out.slice(0, edit.start) + edit.text + out.slice(edit.end);
    }
    return { html: out, changed: true, replaced };
  },
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Absolute URLs on the given hosts, bounded by whitespace, quotes,
 * parentheses or angle brackets
 */
export function hostUrlPattern(hosts: readonly string[]): RegExp {
  if (!hosts.length) {
    throw new Error("Pattern extraction needs at least one asset host");
  }
  const alternatives = hosts.map((host) => escapeRegExp(host.toLowerCase())).join("|");
  return new RegExp(`https?://(?:${alternatives})/[^\\s"'()<>]+`, "gi");
}

export function createPatternStrategy(hosts: readonly string[]): ReferenceStrategy {
  const pattern = hostUrlPattern(hosts);

  return {
    name: "pattern",

    extract(html) {
      return {
        *[Symbol.iterator]() {
          for (const match of html.matchAll(new RegExp(pattern))) {
            yield match[0];
          }
        },
      };
    },

    apply(html, replace) {
      let replaced = 0;
      const next = html.replace(new RegExp(pattern), (match) => {
        const value = replace(match);
        if (value === undefined || value === match) return match;
        replaced++;
        return value;
      });
      return replaced
        ? { html: next, changed: true, replaced }
        : { html, changed: false, replaced: 0 };
    },
  };
}

export interface StrategyConfig {
  strategy: StrategyName;
  assetHosts: readonly string[];
}

export function createReferenceStrategy(config: StrategyConfig): ReferenceStrategy {
  return config.strategy === "pattern"
    ? createPatternStrategy(config.assetHosts)
    : structuralStrategy;
}
