import { Result } from "neverthrow";
import type { VolumeQuery } from "../../../domain/entities/VolumeQuery.ts";
import type { BooksError } from "../../../domain/models/errors.ts";
import type { Volume, VolumeResponse } from "../../../domain/models/volume.ts";
import type { RequestOptions } from "../out/HttpTransport.ts";

/**
 * Input port for volume lookups
 */
export interface VolumeUseCase {
  search(query: VolumeQuery, options?: RequestOptions): Promise<Result<VolumeResponse, BooksError>>;

  fetchById(id: string, options?: RequestOptions): Promise<Result<Volume, BooksError>>;
}
