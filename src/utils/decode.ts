import { err, ok, Result } from "neverthrow";
import { z } from "zod";

const utf8 = new TextDecoder("utf-8", { fatal: true });

const parseJson = Result.fromThrowable(
  (body: Uint8Array): unknown => JSON.parse(utf8.decode(body)),
  (e) => (e instanceof Error ? e.message : "Invalid JSON"),
);

function formatIssues(issues: ReadonlyArray<z.ZodIssue>): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Decode a response body as JSON and validate it against a schema.
 * The error value is the raw parser or validator message.
 */
export function decodeJson<S extends z.ZodTypeAny>(
  body: Uint8Array,
  schema: S,
): Result<z.output<S>, string> {
  return parseJson(body).andThen((value) => {
    const parsed = schema.safeParse(value);
    return parsed.success ? ok(parsed.data) : err(formatIssues(parsed.error.issues));
  });
}
