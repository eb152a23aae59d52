/**
 * Metadata projection requested from the volumes service
 */
export type Projection = "full" | "lite";

export const Projection = {
  /** Includes all volume metadata (service default) */
  Full: "full",
  /** Includes only essential metadata and access information */
  Lite: "lite",
} as const satisfies Record<string, Projection>;

const projectionParams: Record<Projection, string> = {
  full: "full",
  lite: "lite",
};

export function renderProjection(projection: Projection): string {
  return projectionParams[projection];
}

/**
 * Content-category filter
 */
export type PrintType = "all" | "books" | "magazines";

export const PrintType = {
  All: "all",
  Books: "books",
  Magazines: "magazines",
} as const satisfies Record<string, PrintType>;

const printTypeParams: Record<PrintType, string> = {
  all: "all",
  books: "books",
  magazines: "magazines",
};

export function renderPrintType(printType: PrintType): string {
  return printTypeParams[printType];
}

/**
 * Field prefixes understood inside the `q` parameter
 */
export type SearchField =
  | "isbn"
  | "intitle"
  | "inauthor"
  | "inpublisher"
  | "subject"
  | "lccn"
  | "oclc";

/**
 * Accumulated search term and options
 */
export interface SearchQuery {
  readonly term: string;
  readonly maxResults?: number;
  readonly startIndex?: number;
  readonly languageRestrict?: string;
  readonly projection?: Projection;
  readonly printType?: PrintType;
}
