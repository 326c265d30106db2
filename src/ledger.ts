/**
 * Run-wide record of asset URLs already handled
 */

import { type AssetOutcome, hasLocalPath } from "./types.js";

export type AssetFetch = () => Promise<AssetOutcome>;

/**
 * Maps resolved URL hrefs to the local copy recorded for them. A URL is
 * fetched at most once per run: concurrent callers for the same URL share
 * the first caller's request instead of starting their own.
 */
export class AssetLedger {
  private readonly recorded = new Map<string, string>();
  private readonly inflight = new Map<string, Promise<AssetOutcome>>();

  get(url: string): string | undefined {
    return this.recorded.get(url);
  }

  record(url: string, localPath: string): void {
    this.recorded.set(url, localPath);
  }

  /**
   * Outcome for url, running fetch only if nobody has handled it yet.
   * Later and concurrent callers get `skipped-duplicate` with the recorded
   * path, or the first caller's failure.
   */
  async resolve(url: string, fetch: AssetFetch): Promise<AssetOutcome> {
    const known = this.recorded.get(url);
    if (known !== undefined) {
      return { status: "skipped-duplicate", url, path: known };
    }

    const pending = this.inflight.get(url);
    if (pending) {
      const shared = await pending;
      return hasLocalPath(shared)
        ? { status: "skipped-duplicate", url, path: shared.path }
        : shared;
    }

    const request = this.run(url, fetch);
    this.inflight.set(url, request);
    try {
      return await request;
    } finally {
      this.inflight.delete(url);
    }
  }

  private async run(url: string, fetch: AssetFetch): Promise<AssetOutcome> {
    const outcome = await fetch();
    if (hasLocalPath(outcome)) this.record(url, outcome.path);
    return outcome;
  }
}
