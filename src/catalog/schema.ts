import { z } from "zod";
import {
  CATALOG_VERSION,
  EntryStatus,
  FailureReason,
  type CatalogDocument
} from "./types";

const CaptionSourceSchema = z.object({
  language: z.string().min(1),
  kind: z.enum(["manual", "auto"]),
  url: z.string().min(1)
});

const RemoteArtifactSchema = z.object({
  key: z.string().min(1),
  bytes: z.number().int().nonnegative()
});

export const CatalogEntrySchema = z.object({
  source_id: z.string().min(1),
  content_id: z.string().min(1),
  title: z.string(),
  topic_path: z.array(z.string()),
  duration_seconds: z.number().nonnegative().nullable().default(null),
  media_url: z.string().nullable().default(null),
  caption_urls: z.array(CaptionSourceSchema).default([]),
  status: z.nativeEnum(EntryStatus),
  attempt_count: z.number().int().nonnegative().default(0),
  last_error: z.string().nullable().default(null),
  failure_reason: z.nativeEnum(FailureReason).nullable().default(null),
  artifacts: z.record(RemoteArtifactSchema).default({}),
  discovered_at: z.string(),
  updated_at: z.string()
});

export const CatalogDocumentSchema = z
  .object({
    version: z.literal(CATALOG_VERSION),
    last_updated: z.string(),
    entries: z.record(CatalogEntrySchema)
  })
  .superRefine((doc, ctx) => {
    for (const [key, entry] of Object.entries(doc.entries)) {
      const expected = `${entry.source_id}:${entry.content_id}`;
      if (key !== expected) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["entries", key],
          message: `Entry key "${key}" does not match its ids ("${expected}")`
        });
      }
    }
  });

/**
 * Validates a parsed catalog document.
 * @returns The typed document, or the list of problems found
 */
export function parseCatalogDocument(
  raw: unknown
): { success: true; data: CatalogDocument } | { success: false; issues: string[] } {
  const result = CatalogDocumentSchema.safeParse(raw);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    issues: result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    )
  };
}
