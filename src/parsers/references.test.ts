import { describe, expect, it } from "vitest";
import {
  createPatternStrategy,
  createReferenceStrategy,
  hostUrlPattern,
  structuralStrategy,
} from "./references.js";

describe("structuralStrategy", () => {
  it("yields trimmed img sources and skips empty ones", () => {
    const html = `<img src=" a.png "><img alt="none"><img src=""><IMG SRC="b.png">`;
    expect([...structuralStrategy.extract(html)]).toEqual(["a.png", "b.png"]);
  });

  it("can be iterated again", () => {
    const refs = structuralStrategy.extract(`<img src="a.png">`);
    expect([...refs]).toEqual(["a.png"]);
    expect([...refs]).toEqual(["a.png"]);
  });

  it("recovers from malformed markup", () => {
    const html = `<div><p><img src="x.png"></div></span><table><td><img src='y.png'>`;
    expect([...structuralStrategy.extract(html)]).toEqual(["x.png", "y.png"]);
  });

  it("replaces sources in a fragment without wrapping it", () => {
    const result = structuralStrategy.apply(
      `<p><img src="https://cdn.test/a.png" alt="A"></p>`,
      (ref) => (ref === "https://cdn.test/a.png" ? "/assets/a.png" : undefined),
    );
    expect(result).toEqual({
      html: `<p><img src="/assets/a.png" alt="A"></p>`,
      changed: true,
      replaced: 1,
    });
  });

  it("keeps the document shape for full pages", () => {
    const html = `<!DOCTYPE html><html><head></head><body><img src="a.png"></body></html>`;
    const result = structuralStrategy.apply(html, () => "/assets/a.png");
    expect(result.html).toBe(
      `<!DOCTYPE html><html><head></head><body><img src="/assets/a.png"></body></html>`,
    );
  });

  it("sees images inside noscript", () => {
    const html = `<!DOCTYPE html><html><body><noscript><img src="/img/a.png"></noscript></body></html>`;
    expect([...structuralStrategy.extract(html)]).toEqual(["/img/a.png"]);
    expect(structuralStrategy.apply(html, () => "/assets/img/a.png").html).toBe(
      `<!DOCTYPE html><html><body><noscript><img src="/assets/img/a.png"></noscript></body></html>`,
    );
  });

  it("keeps head and body tags of a page without an html tag", () => {
    const result = structuralStrategy.apply(
      `<head><title>T</title></head><body><img src="https://cdn.test/a.png"></body>`,
      () => "/assets/a.png",
    );
    expect(result).toEqual({
      html: `<head><title>T</title></head><body><img src="/assets/a.png"></body>`,
      changed: true,
      replaced: 1,
    });
  });

  it("only touches the src attribute", () => {
    const html = `<div class=x><IMG data-x='1' SRC='https://cdn.test/a.png' alt=A><br/></div>\n<!-- kept -->`;
    expect(structuralStrategy.apply(html, () => `/assets/a.png?w=1&h=2`).html).toBe(
      `<div class=x><IMG data-x='1' SRC="/assets/a.png?w=1&amp;h=2" alt=A><br/></div>\n<!-- kept -->`,
    );
  });

  it("returns the input untouched when nothing changes", () => {
    const html = `<P><IMG SRC='/assets/a.png'  ></P>\n`;
    const result = structuralStrategy.apply(html, () => "/assets/a.png");
    expect(result).toEqual({ html, changed: false, replaced: 0 });
    expect(structuralStrategy.apply(html, () => undefined).html).toBe(html);
  });
});

describe("pattern strategy", () => {
  const strategy = createPatternStrategy(["cdn.test"]);

  it("matches asset-host URLs up to a boundary character", () => {
    const text = [
      `background: url(https://cdn.test/a/b.png);`,
      `<img src="https://cdn.test/c.jpg?x=1">`,
      `https://other.test/d.png`,
      `<!-- https://cdn.test/e.png -->`,
      `http://cdnxtest/f.png`,
    ].join("\n");
    expect([...strategy.extract(text)]).toEqual([
      "https://cdn.test/a/b.png",
      "https://cdn.test/c.jpg?x=1",
      "https://cdn.test/e.png",
    ]);
  });

  it("replaces every occurrence", () => {
    const text = `<img src="https://cdn.test/a.png"><a href='https://cdn.test/a.png'>x</a>`;
    const result = strategy.apply(text, () => "/assets/a.png");
    expect(result).toEqual({
      html: `<img src="/assets/a.png"><a href='/assets/a.png'>x</a>`,
      changed: true,
      replaced: 2,
    });
    expect(strategy.apply(result.html, () => "/assets/a.png")).toEqual({
      html: result.html,
      changed: false,
      replaced: 0,
    });
  });

  it("needs at least one host", () => {
    expect(() => hostUrlPattern([])).toThrow("Pattern extraction needs at least one asset host");
  });
});

describe("createReferenceStrategy", () => {
  it("selects the strategy by name", () => {
    expect(createReferenceStrategy({ strategy: "structural", assetHosts: [] })).toBe(structuralStrategy);
    expect(createReferenceStrategy({ strategy: "pattern", assetHosts: ["cdn.test"] }).name).toBe("pattern");
  });
});
