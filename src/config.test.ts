import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_BASE_URL, loadConfig, resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "asset-mirror-config-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("resolveConfig", () => {
  it("fills defaults and resolves paths", () => {
    expect(resolveConfig({}, "/work")).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      htmlRoot: "/work",
      outputDir: "/work/assets",
      siteRoot: "/work",
      strategy: "structural",
      assetHosts: [],
      sentinel: "assets",
      overwrite: false,
      dryRun: false,
      concurrency: 4,
      timeoutMs: 30000,
      delayMs: 0,
      issueLog: undefined,
    });
  });

  it("resolves explicit paths against cwd", () => {
    const config = resolveConfig({ htmlRoot: "site", outputDir: "/mirror", issueLog: "logs/issues.txt" }, "/work");
    expect(config.htmlRoot).toBe("/work/site");
    expect(config.outputDir).toBe("/mirror");
    expect(config.siteRoot).toBe("/work/site");
    expect(config.issueLog).toBe("/work/logs/issues.txt");
  });

  it("requires hosts for the pattern strategy", () => {
    expect(() => resolveConfig({ strategy: "pattern" }, "/work")).toThrow(
      "assetHosts: assetHosts must list at least one host for the pattern strategy",
    );
  });

  it("rejects bad values", () => {
    expect(() => resolveConfig({ concurrency: 0 }, "/work")).toThrow(ConfigError);
    expect(() => resolveConfig({ baseUrl: "not a url" }, "/work")).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  it("merges a JSON file under the overrides", async () => {
    const file = path.join(dir, "mirror.json");
    await fs.writeFile(file, JSON.stringify({ htmlRoot: "site", assetHosts: ["cdn.test"], concurrency: 2 }));

    const config = await loadConfig({ concurrency: 8, outputDir: undefined }, file, "/elsewhere");

    expect(config.htmlRoot).toBe(path.join(dir, "site"));
    expect(config.outputDir).toBe(path.join(dir, "site", "assets"));
    expect(config.assetHosts).toEqual(["cdn.test"]);
    expect(config.concurrency).toBe(8);
  });

  it("reports unreadable files as configuration errors", async () => {
    const file = path.join(dir, "broken.json");
    await fs.writeFile(file, "{ nope");
    await expect(loadConfig({}, file)).rejects.toBeInstanceOf(ConfigError);
    await expect(loadConfig({}, path.join(dir, "absent.json"))).rejects.toBeInstanceOf(ConfigError);
  });

  it("needs an object at the top level", async () => {
    const file = path.join(dir, "list.json");
    await fs.writeFile(file, "[]");
    await expect(loadConfig({}, file)).rejects.toThrow("expected a JSON object");
  });
});
