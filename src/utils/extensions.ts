/**
 * Content-Type → file extension lookup for downloaded images
 */

import path from "node:path";

export const IMAGE_EXTENSIONS: Readonly<Record<string, string>> = {
  "image/svg+xml": ".svg",
  "image/png": ".png",
  "image/jpeg": ".jpg",
  "image/jpg": ".jpg",
  "image/gif": ".gif",
  "image/webp": ".webp",
  "image/avif": ".avif",
};

/**
 * Extension for a Content-Type header value, ignoring parameters and case
 */
export function extensionForContentType(contentType: string | null): string | undefined {
  if (!contentType) return undefined;
  const mime = contentType.split(";")[0].trim().toLowerCase();
  return Object.hasOwn(IMAGE_EXTENSIONS, mime) ? IMAGE_EXTENSIONS[mime] : undefined;
}

/**
 * Final destination for a download: an extension already on the
 * destination wins, then the response's declared type, else none
 */
export function withInferredExtension(destination: string, contentType: string | null): string {
  if (path.extname(destination)) return destination;
  const ext = extensionForContentType(contentType);
  return ext ? `${destination}${ext}` : destination;
}
