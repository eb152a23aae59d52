import { Result, ResultAsync } from "neverthrow";
import type { TransportError } from "../../../domain/models/errors.ts";
import type {
  HttpResponse,
  HttpTransport,
  RequestOptions,
} from "../../../application/ports/out/HttpTransport.ts";

export interface FetchHttpTransportOptions {
  /** Applied only when the caller does not pass its own signal */
  readonly timeoutMs?: number;
  readonly userAgent?: string;
}

function toTransportError(e: unknown, fallback: string): TransportError {
  if (e instanceof Error) {
    return {
      type: "transport",
      message: e.name === "TimeoutError" || e.name === "AbortError"
        ? `Request aborted: ${e.message}`
        : e.message,
    };
  }

  return { type: "transport", message: fallback };
}

/**
 * HttpTransport backed by the global fetch
 */
export class FetchHttpTransport implements HttpTransport {
  constructor(private readonly options: FetchHttpTransportOptions = {}) {}

  async get(url: URL, options?: RequestOptions): Promise<Result<HttpResponse, TransportError>> {
    const headers: Record<string, string> = { "Accept": "application/json" };
    if (this.options.userAgent) headers["User-Agent"] = this.options.userAgent;

    return await ResultAsync.fromPromise(
      fetch(url, { headers, signal: this.resolveSignal(options) }),
      (e) => toTransportError(e, "Request failed"),
    )
      .andThen((response) =>
        ResultAsync.fromPromise(
          response.arrayBuffer(),
          (e) => toTransportError(e, "Failed to read response body"),
        ).map((buffer): HttpResponse => ({
          status: response.status,
          body: new Uint8Array(buffer),
        }))
      );
  }

  private resolveSignal(options?: RequestOptions): AbortSignal | undefined {
    if (options?.signal) return options.signal;
    return this.options.timeoutMs !== undefined
      ? AbortSignal.timeout(this.options.timeoutMs)
      : undefined;
  }
}
