import { describe, expect, it } from "vitest";
import { isSuccessStatus, resolveResponse } from "../../../src/domain/services/ResponseResolver.ts";
import { volumeResponseSchema, volumeSchema } from "../../../src/domain/models/volume.ts";
import {
  encodeJson,
  encodeText,
  sampleVolume,
  sampleVolumeResponse,
} from "../../helpers/fixtures.ts";

describe("resolveResponse on success statuses", () => {
  it("should decode a valid search payload", () => {
    const result = resolveResponse(200, encodeJson(sampleVolumeResponse), volumeResponseSchema);

    expect(result.isOk()).toBe(true);
    const response = result._unsafeUnwrap();
    expect(response.kind).toBe("books#volumes");
    expect(response.totalItems).toBe(1);
    expect(response.items?.[0].volumeInfo.title).toBe("Test Book");
    expect(response.items?.[0].volumeInfo.printType).toBe("BOOK");
    expect(response.items?.[0].volumeInfo.industryIdentifiers).toEqual([
      { type: "ISBN_13", identifier: "9780000000001" },
      { type: "ISBN_10", identifier: "0000000001" },
    ]);
  });

  it("should accept a payload without items", () => {
    const result = resolveResponse(
      200,
      encodeJson({ kind: "books#volumes", totalItems: 0 }),
      volumeResponseSchema,
    );

    expect(result._unsafeUnwrap()).toEqual({ kind: "books#volumes", totalItems: 0 });
  });

  it("should default a missing printType to an empty string", () => {
    const body = encodeJson({ id: "v1", etag: "e1", volumeInfo: { title: "Untyped" } });

    const volume = resolveResponse(200, body, volumeSchema)._unsafeUnwrap();

    expect(volume).toEqual({ id: "v1", etag: "e1", volumeInfo: { title: "Untyped", printType: "" } });
  });

  it("should report a body with invalid UTF-8 as a deserialization error", () => {
    const prefix = encodeText('{"id":"v1","etag":"e1","volumeInfo":{"title":"Bad ');
    const suffix = encodeText('"}}');
    const body = new Uint8Array([...prefix, 0xff, 0xfe, ...suffix]);

    const result = resolveResponse(200, body, volumeSchema);

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().type).toBe("deserialization");
  });

  it("should report malformed JSON as a deserialization error", () => {
    const result = resolveResponse(200, encodeText("{not json"), volumeResponseSchema);

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().type).toBe("deserialization");
  });

  it("should report a schema mismatch with the failing fields", () => {
    const result = resolveResponse(200, encodeJson({ kind: "books#volumes" }), volumeResponseSchema);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "deserialization",
      message: "totalItems: Required",
    });
  });

  it("should not read an error envelope on a success status", () => {
    const body = encodeJson({ error: { code: 429, message: "Quota exceeded" } });

    const result = resolveResponse(200, body, volumeResponseSchema);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "deserialization",
      message: "kind: Required; totalItems: Required",
    });
  });
});

describe("resolveResponse on error statuses", () => {
  it("should classify envelope code 429 as a rate limit", () => {
    const body = encodeJson({ error: { code: 429, message: "Quota exceeded" } });

    const result = resolveResponse(429, body, volumeResponseSchema);

    expect(result._unsafeUnwrapErr()).toEqual({ type: "rateLimit", message: "Quota exceeded" });
  });

  it("should classify a 404 envelope as a remote API error without reason", () => {
    const body = encodeJson({ error: { code: 404, message: "Not Found" } });

    const error = resolveResponse(404, body, volumeSchema)._unsafeUnwrapErr();

    expect(error).toEqual({ type: "remoteApi", code: 404, message: "Not Found" });
    expect(error.type === "remoteApi" && error.reason).toBeUndefined();
  });

  it("should take the reason from the first error item", () => {
    const body = encodeJson({
      error: {
        code: 403,
        message: "Daily Limit Exceeded",
        status: "PERMISSION_DENIED",
        errors: [
          { message: "Daily Limit Exceeded", domain: "usageLimits", reason: "dailyLimitExceeded" },
          { message: "Second", domain: "global", reason: "other" },
        ],
      },
    });

    const result = resolveResponse(403, body, volumeResponseSchema);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "remoteApi",
      code: 403,
      message: "Daily Limit Exceeded",
      status: "PERMISSION_DENIED",
      reason: "dailyLimitExceeded",
    });
  });

  it("should classify by envelope code rather than HTTP status", () => {
    const rateLimited = encodeJson({ error: { code: 429, message: "Slow down" } });
    const forbidden = encodeJson({ error: { code: 403, message: "Forbidden" } });

    expect(resolveResponse(503, rateLimited, volumeResponseSchema)._unsafeUnwrapErr())
      .toEqual({ type: "rateLimit", message: "Slow down" });
    expect(resolveResponse(429, forbidden, volumeResponseSchema)._unsafeUnwrapErr())
      .toEqual({ type: "remoteApi", code: 403, message: "Forbidden" });
  });

  it("should report a body that is not an envelope as a deserialization error", () => {
    const result = resolveResponse(500, encodeJson(sampleVolumeResponse), volumeResponseSchema);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "deserialization",
      message: "error: Required",
    });
  });

  it("should report a non-JSON error body as a deserialization error", () => {
    const result = resolveResponse(502, encodeText("Bad Gateway"), volumeResponseSchema);

    expect(result._unsafeUnwrapErr().type).toBe("deserialization");
  });
});

describe("isSuccessStatus", () => {
  it("should accept only the 2xx range", () => {
    expect(isSuccessStatus(199)).toBe(false);
    expect(isSuccessStatus(200)).toBe(true);
    expect(isSuccessStatus(204)).toBe(true);
    expect(isSuccessStatus(299)).toBe(true);
    expect(isSuccessStatus(300)).toBe(false);
    expect(isSuccessStatus(404)).toBe(false);
  });
});

describe("volume payload", () => {
  it("should keep the fields of a full volume", () => {
    const volume = resolveResponse(200, encodeJson(sampleVolume), volumeSchema)._unsafeUnwrap();

    expect(volume).toEqual(sampleVolume);
  });
});
