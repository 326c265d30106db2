#!/usr/bin/env node
/**
 * asset-mirror
 *
 * A TypeScript CLI to mirror the images of a static HTML site into a local
 * folder and rewire the pages to load them from there.
 * - Extracts <img src> from rendered pages, or absolute asset-host URLs from raw HTML
 * - Mirrors remote folder structure under the output directory (default ./assets)
 * - Infers missing extensions from Content-Type; retries awkward URL encodings
 * - Downloads every URL once per run, however many pages reference it
 * - Rewrites references in place; re-running changes nothing
 *
 * Usage:
 *   npm run dev -- page http://127.0.0.1:8083/about.html
 *   npm run dev -- batch --base-url http://127.0.0.1:8083/ --html-root site
 *   npm run dev -- cache --html-root site --hosts cdn.example.com --dry-run
 *
 * Node >= 20.
 */

import { runCLI } from './cli.js';

runCLI()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
