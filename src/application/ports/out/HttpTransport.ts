import { Result } from "neverthrow";
import type { TransportError } from "../../../domain/models/errors.ts";

/**
 * Raw outcome of a completed HTTP exchange
 */
export interface HttpResponse {
  readonly status: number;
  readonly body: Uint8Array;
}

export interface RequestOptions {
  readonly signal?: AbortSignal;
}

/**
 * Output port for the HTTP transport
 * A non-2xx status is still a completed exchange; only failures to complete are errors
 */
export interface HttpTransport {
  get(url: URL, options?: RequestOptions): Promise<Result<HttpResponse, TransportError>>;
}
