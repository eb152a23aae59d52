import { err, Result } from "neverthrow";
import { renderPrintType, renderProjection } from "../models/query.ts";
import type { SearchQuery } from "../models/query.ts";
import type { BooksError } from "../models/errors.ts";

/**
 * Service root used when a client is not given one
 */
export const GOOGLE_BOOKS_BASE_URL = "https://www.googleapis.com";

export const VOLUMES_PATH = "/books/v1/volumes";

const parseUrl = Result.fromThrowable(
  (href: string) => new URL(href),
  (e): BooksError => ({
    type: "urlConstruction",
    message: e instanceof Error ? e.message : "Invalid URL",
  }),
);

function volumesEndpoint(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, "")}${VOLUMES_PATH}`;
}

/**
 * Builds `<baseUrl>/books/v1/volumes` with the query parameters in a fixed order:
 * q, maxResults, startIndex, langRestrict, projection, printType, key.
 * The order does not depend on the order the options were set in.
 */
export function buildSearchUrl(
  query: SearchQuery,
  baseUrl: string,
  apiKey?: string,
): Result<URL, BooksError> {
  const params = new URLSearchParams();
  params.append("q", query.term);

  if (query.maxResults !== undefined) params.append("maxResults", String(query.maxResults));
  if (query.startIndex !== undefined) params.append("startIndex", String(query.startIndex));
  if (query.languageRestrict !== undefined) params.append("langRestrict", query.languageRestrict);
  if (query.projection !== undefined) {
    params.append("projection", renderProjection(query.projection));
  }
  if (query.printType !== undefined) params.append("printType", renderPrintType(query.printType));
  if (apiKey) params.append("key", apiKey);

  return parseUrl(`${volumesEndpoint(baseUrl)}?${params.toString()}`);
}

/**
 * Builds `<baseUrl>/books/v1/volumes/<id>` for a single volume lookup
 */
export function buildVolumeUrl(id: string, baseUrl: string): Result<URL, BooksError> {
  if (id.length === 0) {
    return err({
      type: "invalidArgument",
      message: "Volume id must not be empty",
    });
  }

  // URL parsing would resolve these as dot segments, even percent-encoded
  if (id === "." || id === "..") {
    return err({
      type: "invalidArgument",
      message: `Volume id must not be "${id}"`,
    });
  }

  return parseUrl(`${volumesEndpoint(baseUrl)}/${encodeURIComponent(id)}`);
}
