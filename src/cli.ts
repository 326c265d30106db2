/**
 * CLI argument parsing and command dispatch
 */

import fs from "node:fs/promises";
import path from "node:path";
import minimist from "minimist";
import { loadConfig, type MirrorConfig, type MirrorConfigInput } from "./config.js";
import { describeError, MirrorError } from "./errors.js";
import { createMirrorContext, mirrorPage, mirrorSite, summarize } from "./mirror.js";
import { configureRequests, resetRequests } from "./network/fetch.js";
import {
  findImageIssues,
  formatIssueLog,
  isWebp,
  issuesToLogEntries,
  lacksExtension,
  parseIssueLog,
  type IssueLogEntry,
} from "./processors/issues.js";
import type { DocumentReport, RunSummary } from "./types.js";
import { discoverHtmlFiles, isDirectory, pathExists } from "./utils/filesystem.js";

const USAGE = `Usage: asset-mirror <command> [options]

Commands:
  page <url> [--html-file <file>]   Mirror the images of one rendered page
  batch [paths...]                  Mirror every HTML file under --html-root
  cache [paths...] --hosts <a,b>    Mirror absolute asset-host URLs found in HTML files on disk
  scan [root] [--webp]              List <img> tags without an extension (or pointing at .webp)
  issues <file>                     List documents and src values from an issue log

Options:
  --base-url <url>       URL serving --html-root (default http://127.0.0.1:8083/)
  --html-root <dir>      Directory holding the HTML files (default .)
  --output-dir <dir>     Where images are mirrored (default <html-root>/assets)
  --site-root <dir>      Directory served as "/" (default <html-root>)
  --overwrite            Replace images that already exist locally
  --force-download       Same as --overwrite
  --dry-run              Compute everything, fetch and write nothing
  --concurrency <n>      Parallel downloads (default 4)
  --user-agent <string>  User-Agent header for every request
  --referer <url>        Referer header for every request (default: the URL's origin)
  --timeout <ms>         Per-request deadline (default 30000)
  --delay-ms <ms>        Pause before each request (default 0)
  --issue-log <file>     Write missing/failed references to this file
  --config <file>        JSON file with any of the options above`;

/** Thrown for bad invocations; the message is the usage text */
export class UsageError extends MirrorError {}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  if (value === undefined || value === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function listOption(value: unknown): string[] | undefined {
  const raw = Array.isArray(value) ? value.join(",") : optionalString(value);
  if (!raw) return undefined;
  return raw
    .split(",")
    .map((host) => host.trim())
    .filter(Boolean);
}

/**
 * Translate parsed flags to config overrides; absent flags stay undefined
 * so a config file can supply them
 */
export function overridesFromArgs(argv: minimist.ParsedArgs): MirrorConfigInput {
  const overwrite = argv.overwrite === true || argv["force-download"] === true;
  return {
    baseUrl: optionalString(argv["base-url"]),
    htmlRoot: optionalString(argv["html-root"]),
    outputDir: optionalString(argv["output-dir"]),
    siteRoot: optionalString(argv["site-root"]),
    assetHosts: listOption(argv.hosts),
    overwrite: overwrite || undefined,
    dryRun: argv["dry-run"] === true || undefined,
    concurrency: optionalNumber(argv.concurrency),
    userAgent: optionalString(argv["user-agent"]),
    referer: optionalString(argv.referer),
    timeoutMs: optionalNumber(argv.timeout),
    delayMs: optionalNumber(argv["delay-ms"]),
    issueLog: optionalString(argv["issue-log"]),
  };
}

export function parseArgs(args: string[]): minimist.ParsedArgs {
  return minimist(args, {
    boolean: ["overwrite", "force-download", "dry-run", "webp", "help"],
    string: [
      "base-url",
      "html-root",
      "output-dir",
      "site-root",
      "hosts",
      "user-agent",
      "referer",
      "html-file",
      "issue-log",
      "config",
      "concurrency",
      "timeout",
      "delay-ms",
    ],
    alias: { h: "help" },
  });
}

function printSummary(summary: RunSummary, dryRun: boolean): void {
  console.log(
    `\n[done] ${summary.documents} document(s), ${dryRun ? "would rewrite" : "rewrote"} ${summary.rewritten}. ` +
      `Downloaded: ${summary.downloaded}, Planned: ${summary.planned}, Skipped: ${summary.skipped}, ` +
      `Missing: ${summary.missing}, Failed: ${summary.failed}, Document errors: ${summary.documentErrors}`,
  );
}

async function writeIssueLog(config: MirrorConfig, reports: readonly DocumentReport[]): Promise<void> {
  if (!config.issueLog) return;
  const entries = issuesToLogEntries(reports.flatMap((report) => report.issues));
  await fs.mkdir(path.dirname(config.issueLog), { recursive: true });
  await fs.writeFile(config.issueLog, formatIssueLog(entries), "utf8");
  console.log(`[info] Wrote ${entries.length} issue(s) to ${config.issueLog}`);
}

async function setup(argv: minimist.ParsedArgs, extra: MirrorConfigInput = {}): Promise<MirrorConfig> {
  const config = await loadConfig(
    { ...overridesFromArgs(argv), ...extra },
    optionalString(argv.config),
  );
  resetRequests();
  configureRequests({
    delayMs: config.delayMs,
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
    referer: config.referer,
  });
  return config;
}

async function runPage(argv: minimist.ParsedArgs): Promise<void> {
  const url = optionalString(argv._[1]);
  if (!url) throw new UsageError(USAGE);
  try {
    new URL(url);
  } catch {
    throw new UsageError(`Invalid URL provided: ${url}`);
  }

  const config = await setup(argv, { strategy: "structural" });
  const ctx = createMirrorContext(config);
  const report = await mirrorPage(ctx, { url, htmlFile: optionalString(argv["html-file"]) });
  await writeIssueLog(config, [report]);
}

async function runSite(argv: minimist.ParsedArgs, strategy: "structural" | "pattern"): Promise<void> {
  const config = await setup(argv, { strategy });
  const ctx = createMirrorContext(config);

  const selection = argv._.slice(1).map(String);
  const excludeDirs = [path.basename(config.outputDir)];
  const files = (await isDirectory(config.htmlRoot))
    ? await discoverHtmlFiles(config.htmlRoot, { selection, excludeDirs })
    : [];

  if (files.length) {
    console.log(`[info] Processing ${files.length} HTML files found under ${config.htmlRoot}`);
  }
  const reports = await mirrorSite(ctx, files);
  if (!reports.length) {
    console.log("[info] No HTML files found to process.");
    return;
  }
  printSummary(summarize(reports), config.dryRun);
  await writeIssueLog(config, reports);
}

async function runScan(argv: minimist.ParsedArgs): Promise<void> {
  const root = path.resolve(optionalString(argv._[1]) ?? process.cwd());
  const webp = argv.webp === true;
  const files = await discoverHtmlFiles(root, { excludeDirs: [] });

  const entries: IssueLogEntry[] = [];
  for (const file of files) {
    const html = await fs.readFile(file, "utf8");
    const document = path.relative(root, file).split(path.sep).join("/");
    for (const tag of findImageIssues(html, webp ? isWebp : lacksExtension)) {
      entries.push({ document, src: tag.src, line: tag.line, tag: tag.tag });
    }
  }

  if (!entries.length) {
    console.log(
      webp
        ? "No <img> tags pointing to .webp files were found."
        : "No <img> tags with missing extensions found.",
    );
    return;
  }
  process.stdout.write(formatIssueLog(entries));
}

async function runIssues(argv: minimist.ParsedArgs): Promise<void> {
  const file = optionalString(argv._[1]);
  if (!file) throw new UsageError(USAGE);
  if (!(await pathExists(file))) {
    throw new MirrorError(`Issue file not found: ${file}`);
  }

  const pairs = parseIssueLog(await fs.readFile(file, "utf8"));
  if (!pairs.length) {
    console.log("No image issues found in the provided file.");
    return;
  }
  const documents = [...new Set(pairs.map((pair) => pair.document))].sort();
  const sources = [...new Set(pairs.map((pair) => pair.src))].sort();
  console.log("HTML files with image issues:");
  for (const document of documents) console.log(document);
  console.log("\nImage references with issues:");
  for (const src of sources) console.log(src);
}

/**
 * Parse CLI arguments and run the requested command
 */
export async function runCLI(args = process.argv.slice(2)): Promise<number> {
  const argv = parseArgs(args);
  const command = optionalString(argv._[0]);
  if (argv.help || !command) {
    console.log(USAGE);
    return argv.help ? 0 : 1;
  }

  try {
    switch (command) {
      case "page":
        await runPage(argv);
        break;
      case "batch":
        await runSite(argv, "structural");
        break;
      case "cache":
        await runSite(argv, "pattern");
        break;
      case "scan":
        await runScan(argv);
        break;
      case "issues":
        await runIssues(argv);
        break;
      default:
        throw new UsageError(`Unknown command: ${command}\n\n${USAGE}`);
    }
  } catch (err) {
    if (err instanceof MirrorError) {
      console.error(`[error] ${describeError(err)}`);
      return 1;
    }
    throw err;
  }
  return 0;
}
