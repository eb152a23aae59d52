import { err, Result } from "neverthrow";
import { z } from "zod";
import type { VolumeUseCase } from "../ports/in/VolumeUseCase.ts";
import type { HttpTransport, RequestOptions } from "../ports/out/HttpTransport.ts";
import type { VolumeQuery } from "../../domain/entities/VolumeQuery.ts";
import { formatBooksError } from "../../domain/models/errors.ts";
import type { BooksError } from "../../domain/models/errors.ts";
import { volumeResponseSchema, volumeSchema } from "../../domain/models/volume.ts";
import type { Volume, VolumeResponse } from "../../domain/models/volume.ts";
import {
  buildSearchUrl,
  buildVolumeUrl,
  GOOGLE_BOOKS_BASE_URL,
} from "../../domain/services/QueryBuilder.ts";
import { resolveResponse } from "../../domain/services/ResponseResolver.ts";
import { debug, warn } from "../../config/logger.ts";

export interface BooksClientConfig {
  readonly baseUrl?: string;
  readonly apiKey?: string;
}

export function redactApiKey(url: URL): string {
  if (!url.searchParams.has("key")) {
    return url.toString();
  }

  const redacted = new URL(url);
  redacted.searchParams.set("key", "***");
  return redacted.toString();
}

/**
 * Implementation of the VolumeUseCase port
 * Each call performs exactly one GET; nothing is cached or retried
 */
export class BooksClient implements VolumeUseCase {
  readonly baseUrl: string;
  private readonly apiKey?: string;

  constructor(
    private readonly transport: HttpTransport,
    config: BooksClientConfig = {},
  ) {
    this.baseUrl = config.baseUrl ?? GOOGLE_BOOKS_BASE_URL;
    this.apiKey = config.apiKey;
  }

  async search(
    query: VolumeQuery,
    options?: RequestOptions,
  ): Promise<Result<VolumeResponse, BooksError>> {
    return await this.execute(
      buildSearchUrl(query, this.baseUrl, this.apiKey),
      volumeResponseSchema,
      options,
    );
  }

  async fetchById(id: string, options?: RequestOptions): Promise<Result<Volume, BooksError>> {
    return await this.execute(buildVolumeUrl(id, this.baseUrl), volumeSchema, options);
  }

  private async execute<S extends z.ZodTypeAny>(
    url: Result<URL, BooksError>,
    schema: S,
    options?: RequestOptions,
  ): Promise<Result<z.output<S>, BooksError>> {
    if (url.isErr()) {
      warn(formatBooksError(url.error));
      return err(url.error);
    }

    debug(`GET ${redactApiKey(url.value)}`);

    const result = (await this.transport.get(url.value, options))
      .mapErr((error): BooksError => error)
      .andThen((response) => resolveResponse(response.status, response.body, schema));

    if (result.isErr()) {
      warn(formatBooksError(result.error));
    }

    return result;
  }
}
