/**
 * Run configuration with Zod validation
 *
 * Values come from an optional JSON file, overridden by CLI flags.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ConfigError, describeError } from "./errors.js";

export const DEFAULT_BASE_URL = "http://127.0.0.1:8083/";

export const MirrorConfigSchema = z
  .object({
    baseUrl: z.string().url().default(DEFAULT_BASE_URL),
    htmlRoot: z.string().min(1).default("."),
    // Defaults to <htmlRoot>/assets
    outputDir: z.string().min(1).optional(),
    // Directory served as "/"; defaults to htmlRoot
    siteRoot: z.string().min(1).optional(),
    strategy: z.enum(["structural", "pattern"]).default("structural"),
    assetHosts: z.array(z.string().min(1)).default([]),
    sentinel: z.string().default("assets"),
    overwrite: z.boolean().default(false),
    dryRun: z.boolean().default(false),
    concurrency: z.number().int().positive().max(64).default(4),
    userAgent: z.string().min(1).optional(),
    // Sent on every request; defaults to the requested URL's origin
    referer: z.string().url().optional(),
    timeoutMs: z.number().int().positive().default(30_000),
    delayMs: z.number().int().nonnegative().default(0),
    issueLog: z.string().min(1).optional(),
  })
  .refine((config) => config.strategy !== "pattern" || config.assetHosts.length > 0, {
    message: "assetHosts must list at least one host for the pattern strategy",
    path: ["assetHosts"],
  });

export type MirrorConfigInput = z.input<typeof MirrorConfigSchema>;

type ParsedConfig = z.output<typeof MirrorConfigSchema>;

/** Validated configuration with every path absolute */
export type MirrorConfig = Omit<ParsedConfig, "outputDir" | "siteRoot"> & {
  outputDir: string;
  siteRoot: string;
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length ? issue.path.join(".") : "config";
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate raw settings and resolve paths against cwd
 */
export function resolveConfig(input: unknown, cwd = process.cwd()): MirrorConfig {
  const result = MirrorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }

  const parsed = result.data;
  const htmlRoot = path.resolve(cwd, parsed.htmlRoot);
  return {
    ...parsed,
    htmlRoot,
    outputDir: parsed.outputDir ? path.resolve(cwd, parsed.outputDir) : path.join(htmlRoot, "assets"),
    siteRoot: parsed.siteRoot ? path.resolve(cwd, parsed.siteRoot) : htmlRoot,
    issueLog: parsed.issueLog ? path.resolve(cwd, parsed.issueLog) : undefined,
  };
}

async function loadConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigError([`${configPath}: ${describeError(err)}`]);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError([`${configPath}: expected a JSON object`]);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Merge an optional JSON config file under the given overrides
 * Paths in the file resolve against the file's own directory.
 */
export async function loadConfig(
  overrides: MirrorConfigInput,
  configPath?: string,
  cwd = process.cwd(),
): Promise<MirrorConfig> {
  if (!configPath) return resolveConfig(overrides, cwd);

  const file = path.resolve(cwd, configPath);
  const fromFile = await loadConfigFile(file);
  const fileDir = path.dirname(file);
  for (const key of ["htmlRoot", "outputDir", "siteRoot", "issueLog"]) {
    const value = fromFile[key];
    if (typeof value === "string") fromFile[key] = path.resolve(fileDir, value);
  }

  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  return resolveConfig({ ...fromFile, ...defined }, cwd);
}
