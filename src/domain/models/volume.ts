import { z } from "zod";

const uint16 = z.number().int().min(0).max(65535);

export const industryIdentifierSchema = z.object({
  identifier: z.string(),
  type: z.string(),
});

export const imageLinksSchema = z.object({
  smallThumbnail: z.string().optional(),
  thumbnail: z.string().optional(),
});

export const volumeInfoSchema = z.object({
  title: z.string(),
  subtitle: z.string().optional(),
  authors: z.array(z.string()).optional(),
  publisher: z.string().optional(),
  publishedDate: z.string().optional(),
  description: z.string().optional(),
  industryIdentifiers: z.array(industryIdentifierSchema).optional(),
  pageCount: uint16.optional(),
  // Absent on some records; defaulted here and nowhere else
  printType: z.string().default(""),
  categories: z.array(z.string()).optional(),
  imageLinks: imageLinksSchema.optional(),
});

/**
 * A single catalog entry
 */
export const volumeSchema = z.object({
  id: z.string(),
  etag: z.string(),
  kind: z.string().optional(),
  selfLink: z.string().optional(),
  volumeInfo: volumeInfoSchema,
});

/**
 * Payload of a successful volumes search
 */
export const volumeResponseSchema = z.object({
  kind: z.string(),
  totalItems: z.number().int(),
  items: z.array(volumeSchema).optional(),
});

export const apiErrorItemSchema = z.object({
  message: z.string(),
  domain: z.string(),
  reason: z.string(),
});

/**
 * Wrapper the service uses for every non-2xx response
 */
export const apiErrorEnvelopeSchema = z.object({
  error: z.object({
    code: uint16,
    message: z.string(),
    status: z.string().optional(),
    errors: z.array(apiErrorItemSchema).optional(),
  }),
});

export type IndustryIdentifier = z.output<typeof industryIdentifierSchema>;
export type ImageLinks = z.output<typeof imageLinksSchema>;
export type VolumeInfo = z.output<typeof volumeInfoSchema>;
export type Volume = z.output<typeof volumeSchema>;
export type VolumeResponse = z.output<typeof volumeResponseSchema>;
export type ApiErrorItem = z.output<typeof apiErrorItemSchema>;
export type ApiErrorEnvelope = z.output<typeof apiErrorEnvelopeSchema>;
