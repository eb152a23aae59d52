/**
 * Failures produced while building, sending or resolving a volumes request
 */
export type BooksError =
  | { type: "invalidArgument"; message: string } // Rejected input, e.g. empty seed
  | { type: "urlConstruction"; message: string } // Base URL cannot be parsed
  | { type: "transport"; message: string } // HTTP call did not complete
  | { type: "deserialization"; message: string } // Body does not match its schema
  | { type: "rateLimit"; message: string } // Envelope code 429
  | {
    type: "remoteApi";
    code: number;
    message: string;
    status?: string;
    reason?: string;
  };

export type BooksErrorType = BooksError["type"];

export type TransportError = Extract<BooksError, { type: "transport" }>;

export function formatBooksError(error: BooksError): string {
  switch (error.type) {
    case "invalidArgument":
      return `Invalid argument: ${error.message}`;
    case "urlConstruction":
      return `URL construction error: ${error.message}`;
    case "transport":
      return `Transport error: ${error.message}`;
    case "deserialization":
      return `Deserialization error: ${error.message}`;
    case "rateLimit":
      return `Rate limit exceeded: ${error.message}`;
    case "remoteApi":
      return `Remote API error ${error.code}: ${error.message}${
        error.reason !== undefined ? ` (${error.reason})` : ""
      }`;
  }
}

/**
 * Error class for callers that prefer exceptions over Result values
 */
export class BooksApiError extends Error {
  readonly error: BooksError;

  constructor(error: BooksError) {
    super(formatBooksError(error));
    this.name = "BooksApiError";
    this.error = error;
  }

  get type(): BooksErrorType {
    return this.error.type;
  }
}

export function toBooksApiError(error: BooksError): BooksApiError {
  return new BooksApiError(error);
}
