import { Result } from "neverthrow";
import { DependencyInjection } from "./src/application/di/DependencyInjection.ts";
import type { VolumeUseCase } from "./src/application/ports/in/VolumeUseCase.ts";
import type { HttpTransport } from "./src/application/ports/out/HttpTransport.ts";
import { FetchHttpTransport } from "./src/adapters/out/http/FetchHttpTransport.ts";
import { loadClientConfig } from "./src/config/env.ts";
import type { BooksError } from "./src/domain/models/errors.ts";

export { VolumeQuery } from "./src/domain/entities/VolumeQuery.ts";
export {
  PrintType,
  Projection,
  renderPrintType,
  renderProjection,
} from "./src/domain/models/query.ts";
export type { SearchField, SearchQuery } from "./src/domain/models/query.ts";
export {
  buildSearchUrl,
  buildVolumeUrl,
  GOOGLE_BOOKS_BASE_URL,
} from "./src/domain/services/QueryBuilder.ts";
export { isSuccessStatus, resolveResponse } from "./src/domain/services/ResponseResolver.ts";
export { BooksApiError, formatBooksError, toBooksApiError } from "./src/domain/models/errors.ts";
export type { BooksError, BooksErrorType, TransportError } from "./src/domain/models/errors.ts";
export {
  apiErrorEnvelopeSchema,
  volumeResponseSchema,
  volumeSchema,
} from "./src/domain/models/volume.ts";
export type {
  ApiErrorEnvelope,
  ApiErrorItem,
  ImageLinks,
  IndustryIdentifier,
  Volume,
  VolumeInfo,
  VolumeResponse,
} from "./src/domain/models/volume.ts";
export { BooksClient } from "./src/application/services/BooksClient.ts";
export type { BooksClientConfig } from "./src/application/services/BooksClient.ts";
export type { VolumeUseCase } from "./src/application/ports/in/VolumeUseCase.ts";
export type {
  HttpResponse,
  HttpTransport,
  RequestOptions,
} from "./src/application/ports/out/HttpTransport.ts";
export { FetchHttpTransport } from "./src/adapters/out/http/FetchHttpTransport.ts";
export type { FetchHttpTransportOptions } from "./src/adapters/out/http/FetchHttpTransport.ts";
export { loadClientConfig } from "./src/config/env.ts";
export type { ClientConfig } from "./src/config/env.ts";

export interface CreateBooksClientOptions {
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
  transport?: HttpTransport;
}

/**
 * Creates a client wired to the fetch transport unless another transport is given
 */
export function createBooksClient(options: CreateBooksClientOptions = {}): VolumeUseCase {
  const transport = options.transport ??
    new FetchHttpTransport({ timeoutMs: options.timeoutMs });

  return new DependencyInjection()
    .registerTransport(transport)
    .registerConfig({ baseUrl: options.baseUrl, apiKey: options.apiKey })
    .getVolumeUseCase();
}

/**
 * Creates a client from GOOGLE_BOOKS_* environment variables
 */
export function createBooksClientFromEnv(
  env: Record<string, string | undefined> = process.env,
): Result<VolumeUseCase, BooksError> {
  return loadClientConfig(env).map((config) => createBooksClient(config));
}
