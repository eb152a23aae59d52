import { err, Result } from "neverthrow";
import { z } from "zod";
import { apiErrorEnvelopeSchema } from "../models/volume.ts";
import type { ApiErrorEnvelope } from "../models/volume.ts";
import type { BooksError } from "../models/errors.ts";
import { decodeJson } from "../../utils/decode.ts";

const RATE_LIMIT_CODE = 429;

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function classifyApiError(detail: ApiErrorEnvelope["error"]): BooksError {
  if (detail.code === RATE_LIMIT_CODE) {
    return { type: "rateLimit", message: detail.message };
  }

  return {
    type: "remoteApi",
    code: detail.code,
    message: detail.message,
    status: detail.status,
    reason: detail.errors?.[0]?.reason,
  };
}

/**
 * Turns a completed HTTP exchange into a payload or a classified error.
 *
 * The status decides which shape the body is read as: the success schema for
 * 2xx, the service error envelope otherwise. The body is never inspected to
 * guess its shape.
 */
export function resolveResponse<S extends z.ZodTypeAny>(
  statusCode: number,
  body: Uint8Array,
  schema: S,
): Result<z.output<S>, BooksError> {
  if (isSuccessStatus(statusCode)) {
    return decodeJson(body, schema)
      .mapErr((message): BooksError => ({ type: "deserialization", message }));
  }

  return decodeJson(body, apiErrorEnvelopeSchema)
    .mapErr((message): BooksError => ({ type: "deserialization", message }))
    .andThen((envelope) => err(classifyApiError(envelope.error)));
}
