import { err, ok, Result } from "neverthrow";
import type { PrintType, Projection, SearchField, SearchQuery } from "../models/query.ts";
import type { BooksError } from "../models/errors.ts";
import { buildSearchUrl } from "../services/QueryBuilder.ts";

/**
 * Immutable builder for volumes search queries.
 *
 * Every method returns a new instance, so two chains started from the same
 * query never affect each other.
 *
 * @example
 * VolumeQuery.byAuthor("Victor Hugo")
 *   .map((q) => q.withLanguageRestrict("fr").withPrintType(PrintType.Books).withMaxResults(20));
 */
export class VolumeQuery implements SearchQuery {
  private constructor(private readonly state: SearchQuery) {}

  /**
   * Creates a query from a free-form search string
   */
  static newQuery(seed: string): Result<VolumeQuery, BooksError> {
    if (seed.length === 0) {
      return err({
        type: "invalidArgument",
        message: "Search string must not be empty",
      });
    }

    return ok(new VolumeQuery({ term: seed }));
  }

  static byIsbn(isbn: string): Result<VolumeQuery, BooksError> {
    return VolumeQuery.byField("isbn", isbn);
  }

  static byTitle(title: string): Result<VolumeQuery, BooksError> {
    return VolumeQuery.byField("intitle", title);
  }

  static byAuthor(author: string): Result<VolumeQuery, BooksError> {
    return VolumeQuery.byField("inauthor", author);
  }

  static byPublisher(publisher: string): Result<VolumeQuery, BooksError> {
    return VolumeQuery.byField("inpublisher", publisher);
  }

  static bySubject(subject: string): Result<VolumeQuery, BooksError> {
    return VolumeQuery.byField("subject", subject);
  }

  static byLccn(lccn: string): Result<VolumeQuery, BooksError> {
    return VolumeQuery.byField("lccn", lccn);
  }

  static byOclc(oclc: string): Result<VolumeQuery, BooksError> {
    return VolumeQuery.byField("oclc", oclc);
  }

  private static byField(field: SearchField, value: string): Result<VolumeQuery, BooksError> {
    return VolumeQuery.newQuery(`${field}:${value}`);
  }

  get term(): string {
    return this.state.term;
  }

  get maxResults(): number | undefined {
    return this.state.maxResults;
  }

  get startIndex(): number | undefined {
    return this.state.startIndex;
  }

  get languageRestrict(): string | undefined {
    return this.state.languageRestrict;
  }

  get projection(): Projection | undefined {
    return this.state.projection;
  }

  get printType(): PrintType | undefined {
    return this.state.printType;
  }

  andIsbn(isbn: string): VolumeQuery {
    return this.and("isbn", isbn);
  }

  andTitle(title: string): VolumeQuery {
    return this.and("intitle", title);
  }

  andAuthor(author: string): VolumeQuery {
    return this.and("inauthor", author);
  }

  andPublisher(publisher: string): VolumeQuery {
    return this.and("inpublisher", publisher);
  }

  andSubject(subject: string): VolumeQuery {
    return this.and("subject", subject);
  }

  andLccn(lccn: string): VolumeQuery {
    return this.and("lccn", lccn);
  }

  andOclc(oclc: string): VolumeQuery {
    return this.and("oclc", oclc);
  }

  // Ranges are not checked; the service decides what it accepts
  withMaxResults(maxResults: number): VolumeQuery {
    return this.update({ maxResults });
  }

  withStartIndex(startIndex: number): VolumeQuery {
    return this.update({ startIndex });
  }

  withLanguageRestrict(languageRestrict: string): VolumeQuery {
    return this.update({ languageRestrict });
  }

  withProjection(projection: Projection): VolumeQuery {
    return this.update({ projection });
  }

  withPrintType(printType: PrintType): VolumeQuery {
    return this.update({ printType });
  }

  /**
   * Builds the search URL against the given service root
   */
  buildUrl(baseUrl: string, apiKey?: string): Result<URL, BooksError> {
    return buildSearchUrl(this, baseUrl, apiKey);
  }

  toSearchQuery(): SearchQuery {
    return { ...this.state };
  }

  private and(field: SearchField, value: string): VolumeQuery {
    return this.update({ term: `${this.state.term} ${field}:${value}` });
  }

  private update(changes: Partial<SearchQuery>): VolumeQuery {
    return new VolumeQuery({ ...this.state, ...changes });
  }
}
