import { z } from "zod";

const severitySchema = z.enum(["critical", "high", "medium", "low"]);

const complianceTagSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  category: z.string().min(1),
  regulatoryCodes: z.array(z.string().min(1)).default([]),
  priority: z.number().int().positive()
});

const hazardSchema = z.object({
  type: z.string().regex(/^[A-Z][A-Z0-9_]*$/),
  category: z.string().min(1),
  severity: severitySchema,
  description: z.string().min(1),
  tags: z.array(z.string().min(1)).min(1)
});

export const taxonomyDocumentSchema = z
  .object({
    version: z.literal("v1"),
    tags: z.array(complianceTagSchema).min(1),
    hazards: z.array(hazardSchema).min(1)
  })
  .superRefine((document, ctx) => {
    const tagIds = new Set<string>();
    document.tags.forEach((tag, index) => {
      if (tagIds.has(tag.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["tags", index, "id"], message: `Duplicate tag id ${tag.id}` });
      }
      tagIds.add(tag.id);
    });

    const hazardTypes = new Set<string>();
    document.hazards.forEach((hazard, index) => {
      if (hazardTypes.has(hazard.type)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["hazards", index, "type"],
          message: `Duplicate hazard type ${hazard.type}`
        });
      }
      hazardTypes.add(hazard.type);
      hazard.tags.forEach((tagId, tagIndex) => {
        if (!tagIds.has(tagId)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["hazards", index, "tags", tagIndex],
            message: `Unknown tag ${tagId}`
          });
        }
      });
    });
  });

export type TaxonomyDocument = z.infer<typeof taxonomyDocumentSchema>;
