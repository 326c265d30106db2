import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { HttpStatusError } from "../errors.js";
import {
  buildUrlVariants,
  configureRequests,
  downloadAsset,
  fetchPage,
  resetRequests,
} from "./fetch.js";

let out: string;

function image(body: string, type = "image/png"): Response {
  return new Response(body, { status: 200, headers: { "content-type": type } });
}

function status(code: number): Response {
  return new Response("error", { status: code });
}

function stubFetch(...responses: Array<Response | Error>) {
  const fetchMock = vi.fn(async (_input: string | URL, _init?: RequestInit) => {
    const next = responses.shift();
    if (next === undefined) throw new Error("unexpected request");
    if (next instanceof Error) throw next;
    return next;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

beforeEach(async () => {
  out = await fs.mkdtemp(path.join(os.tmpdir(), "asset-mirror-fetch-"));
});

afterEach(async () => {
  resetRequests();
  await fs.rm(out, { recursive: true, force: true });
});

describe("buildUrlVariants", () => {
  it("has a single variant for plain paths", () => {
    expect(buildUrlVariants(new URL("http://h/a/b.png"))).toEqual(["http://h/a/b.png"]);
  });

  it("adds full encoding for colons and a query-less form", () => {
    expect(buildUrlVariants(new URL("http://h/img/x:y.png?w=10"))).toEqual([
      "http://h/img/x:y.png?w=10",
      "http://h/img/x%3Ay.png?w=10",
      "http://h/img/x:y.png",
    ]);
  });

  it("keeps an escaped slash inside its segment", () => {
    expect(buildUrlVariants(new URL("http://h/a%2Fb.png"))).toEqual(["http://h/a%2Fb.png"]);
    expect(buildUrlVariants(new URL("http://h/d/x%2Fy:z.png"))).toEqual([
      "http://h/d/x%2Fy:z.png",
      "http://h/d/x%2Fy%3Az.png",
    ]);
  });

  it("re-encodes decoded segments", () => {
    expect(buildUrlVariants(new URL("http://h/a b.png?x=1"))).toEqual([
      "http://h/a%20b.png?x=1",
      "http://h/a%20b.png",
    ]);
  });
});

describe("downloadAsset", () => {
  it("streams the body to the destination", async () => {
    const fetchMock = stubFetch(image("PNGDATA"));
    const destination = path.join(out, "images", "logo.png");

    const outcome = await downloadAsset(new URL("http://h/images/logo.png"), destination);

    expect(outcome).toEqual({ status: "downloaded", url: "http://h/images/logo.png", path: destination });
    expect(await fs.readFile(destination, "utf8")).toBe("PNGDATA");
    expect(await fs.readdir(path.join(out, "images"))).toEqual(["logo.png"]);
    expect(fetchMock.mock.calls[0][0]).toBe("http://h/images/logo.png");
  });

  it("sends a browser user agent", async () => {
    configureRequests({ userAgent: "Mozilla/5.0 Chrome/120.0.0.0 test" });
    const fetchMock = stubFetch(image("x"));

    await downloadAsset(new URL("http://h/a.png"), path.join(out, "a.png"));

    const headers = fetchMock.mock.calls[0][1]?.headers;
    expect(headers).toMatchObject({
      "User-Agent": "Mozilla/5.0 Chrome/120.0.0.0 test",
      "Sec-Fetch-Dest": "image",
    });
  });

  it("sends the configured referer, or the asset's origin by default", async () => {
    const fetchMock = stubFetch(image("x"), image("y"));

    await downloadAsset(new URL("https://cdn.test/a.png"), path.join(out, "a.png"));
    configureRequests({ referer: "http://h/page.html" });
    await downloadAsset(new URL("https://cdn.test/b.png"), path.join(out, "b.png"));

    expect(fetchMock.mock.calls[0][1]?.headers).toMatchObject({ Referer: "https://cdn.test/" });
    expect(fetchMock.mock.calls[1][1]?.headers).toMatchObject({ Referer: "http://h/page.html" });
  });

  it("infers a missing extension and skips the existing file on the next run", async () => {
    const url = new URL("https://cdn.test/assets/sub/img/pic");
    const destination = path.join(out, "sub", "img", "pic");
    const expected = `${destination}.webp`;

    stubFetch(image("first", "image/webp"));
    expect(await downloadAsset(url, destination)).toEqual({
      status: "downloaded",
      url: url.href,
      path: expected,
    });

    stubFetch(image("second", "image/webp"));
    expect(await downloadAsset(url, destination, { overwrite: false })).toEqual({
      status: "skipped-existing",
      url: url.href,
      path: expected,
    });
    expect(await fs.readFile(expected, "utf8")).toBe("first");
  });

  it("replaces the existing file when overwriting", async () => {
    const destination = path.join(out, "a.png");
    await fs.writeFile(destination, "old");
    stubFetch(image("new"));

    const outcome = await downloadAsset(new URL("http://h/a.png"), destination, { overwrite: true });

    expect(outcome.status).toBe("downloaded");
    expect(await fs.readFile(destination, "utf8")).toBe("new");
  });

  it("leaves the path extension-less for unknown types", async () => {
    stubFetch(image("bytes", "application/octet-stream"));
    const destination = path.join(out, "blob");

    expect(await downloadAsset(new URL("http://h/blob"), destination)).toEqual({
      status: "downloaded",
      url: "http://h/blob",
      path: destination,
    });
  });

  it("treats the first 404 as missing without trying other variants", async () => {
    const fetchMock = stubFetch(status(404), image("never"));

    const outcome = await downloadAsset(new URL("http://h/img/x:y.png?w=1"), path.join(out, "x.png"));

    expect(outcome).toEqual({ status: "missing", url: "http://h/img/x:y.png?w=1" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(await fs.readdir(out)).toEqual([]);
  });

  it("retries a colon path with full percent-encoding", async () => {
    const fetchMock = stubFetch(status(500), image("ok"));

    const outcome = await downloadAsset(new URL("http://h/img/x:y.png"), path.join(out, "x.png"));

    expect(outcome.status).toBe("downloaded");
    expect(fetchMock.mock.calls.map((call) => call[0])).toEqual([
      "http://h/img/x:y.png",
      "http://h/img/x%3Ay.png",
    ]);
  });

  it("retries without the query string", async () => {
    const fetchMock = stubFetch(status(503), image("ok"));

    const outcome = await downloadAsset(new URL("http://h/a.png?x=1"), path.join(out, "a.png"));

    expect(outcome.status).toBe("downloaded");
    expect(fetchMock.mock.calls[1][0]).toBe("http://h/a.png");
  });

  it("stops at a 404 met on a later variant", async () => {
    const fetchMock = stubFetch(status(500), status(404));

    const outcome = await downloadAsset(new URL("http://h/img/x:y.png?w=1"), path.join(out, "x.png"));

    expect(outcome.status).toBe("missing");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("reports the last cause once every variant failed", async () => {
    stubFetch(new TypeError("fetch failed"), status(502));

    const outcome = await downloadAsset(new URL("http://h/a.png?x=1"), path.join(out, "a.png"));

    expect(outcome).toEqual({
      status: "failed",
      url: "http://h/a.png?x=1",
      reason: "HTTP 502 for http://h/a.png",
    });
  });

  it("describes transport errors", async () => {
    stubFetch(new TypeError("fetch failed"));

    const outcome = await downloadAsset(new URL("http://h/a.png"), path.join(out, "a.png"));

    expect(outcome).toEqual({
      status: "failed",
      url: "http://h/a.png",
      reason: "Request to http://h/a.png failed: fetch failed",
    });
  });

  it("reports a destination that cannot be created", async () => {
    await fs.writeFile(path.join(out, "blocker"), "file");
    stubFetch(image("x"));

    const outcome = await downloadAsset(new URL("http://h/a.png"), path.join(out, "blocker", "a.png"));

    expect(outcome.status).toBe("failed");
    expect(outcome.status === "failed" && outcome.reason).toMatch(/^Cannot write /);
  });
});

describe("fetchPage", () => {
  it("returns the page text", async () => {
    stubFetch(new Response("<p>hi</p>", { status: 200, headers: { "content-type": "text/html" } }));
    expect(await fetchPage("http://h/page.html")).toBe("<p>hi</p>");
  });

  it("retries server errors", async () => {
    const fetchMock = stubFetch(status(500), new Response("ok"));
    expect(await fetchPage("http://h/page.html", 3, 0)).toBe("ok");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("does not retry a 404", async () => {
    const fetchMock = stubFetch(status(404), new Response("ok"));
    await expect(fetchPage("http://h/page.html", 3, 0)).rejects.toBeInstanceOf(HttpStatusError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
