/**
 * Error taxonomy for the mirror run
 *
 * Per-asset errors are turned into outcomes and never abort a run.
 * RootNotFoundError, ConfigError and a FilesystemError on the output
 * directory are the fatal ones.
 */

export class MirrorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network, DNS or timeout failure before any HTTP status was received */
export class TransportError extends MirrorError {
  constructor(
    readonly url: string,
    cause: unknown,
  ) {
    super(`Request to ${url} failed: ${describeError(cause)}`, { cause });
  }
}

export class HttpStatusError extends MirrorError {
  constructor(
    readonly url: string,
    readonly status: number,
  ) {
    super(`HTTP ${status} for ${url}`);
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }
}

export class FilesystemError extends MirrorError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Cannot write ${path}: ${describeError(cause)}`, { cause });
  }
}

export class RootNotFoundError extends MirrorError {
  constructor(readonly root: string) {
    super(`HTML root not found: ${root}`);
  }
}

export class PageFetchError extends MirrorError {
  constructor(
    readonly url: string,
    cause: unknown,
  ) {
    super(`Failed to fetch page ${url}: ${describeError(cause)}`, { cause });
  }
}

export class ConfigError extends MirrorError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
  }
}

/**
 * Turn anything thrown into a single-line message
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? err.cause.message : undefined;
    if (err.message && cause && !err.message.includes(cause)) {
      return `${err.message} (${cause})`;
    }
    return err.message || err.name;
  }
  return String(err);
}
