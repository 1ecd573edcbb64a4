import { z } from "zod";
import { CATEGORIES, COMPLIANCE_CLASSES, type Category } from "./categories";

export const CategoryMetaSchema = z
  .object({
    compliance: z.enum(COMPLIANCE_CLASSES),
    hipaaIdentifier: z.number().int().min(1).max(18).optional(),
    token: z.string().min(1).max(40),
    aliases: z.array(z.string().min(1)).default([]),
  })
  .refine((m) => m.compliance !== "hipaa" || m.hipaaIdentifier !== undefined, {
    message: "hipaa categories need a hipaaIdentifier (1-18)",
    path: ["hipaaIdentifier"],
  });

/** Every category must be present: the catalog is the total replacement table. */
export const CatalogSchema = z.object({
  version: z.string().min(1),
  categories: z
    .object(
      Object.fromEntries(CATEGORIES.map((c) => [c, CategoryMetaSchema])) as Record<
        Category,
        typeof CategoryMetaSchema
      >,
    )
    .strict(),
});

export type CategoryMeta = z.infer<typeof CategoryMetaSchema>;
export type CatalogFile = z.infer<typeof CatalogSchema>;

/** Request body shared by /anonymize, /detect and CLI batch lines. */
export const RequestSchema = z.object({
  text: z.string().min(1, "text is required"),
  pseudonym: z.string().max(200).optional(),
  language: z.string().min(2).max(10).default("en"),
});

export type RequestBody = z.infer<typeof RequestSchema>;

/** Entity list the LLM is asked to return. */
export const LlmEntitiesSchema = z.object({
  entities: z
    .array(
      z.object({
        text: z.string().min(1),
        label: z.string().min(1).max(40),
        score: z.number().min(0).max(1).default(0.85),
      }),
    )
    .default([]),
});

export type LlmEntities = z.infer<typeof LlmEntitiesSchema>;

/** Presidio analyzer `/analyze` response. */
export const PresidioResultsSchema = z.array(
  z.object({
    entity_type: z.string().min(1),
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
    score: z.number(),
  }),
);
