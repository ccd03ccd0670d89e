/**
 * Generator configuration schema.
 *
 * Everything the merger, renderers and assembler treat as reserved
 * (sentinel token, documentation keys, file naming) lives here so that a
 * run is governed by one validated, frozen value.
 */

import { z } from "zod";

/**
 * One derived documentation section: the top-level key it is rendered
 * from and the documentation key it is written to.
 */
export const ReservedSectionSchema = z
  .object({
    sourceKey: z.string().min(1).describe("Top-level tree key the section is rendered from"),
    sectionKey: z.string().min(1).describe("Documentation key receiving the rendered text"),
  })
  .strict();

export type ReservedSection = z.infer<typeof ReservedSectionSchema>;

export const ReservedSectionsSchema = z
  .object({
    typeDocs: ReservedSectionSchema,
    termDefinitions: ReservedSectionSchema,
    responseFlags: ReservedSectionSchema,
  })
  .strict();

export type ReservedSections = z.infer<typeof ReservedSectionsSchema>;

export const LayerNamingSchema = z
  .object({
    /** Stem prefix stripped to obtain the display version ("xap_") */
    prefix: z.string().min(1),
    /** Definition file extension, including the dot */
    extension: z.string().regex(/^\.[A-Za-z0-9]+$/, "Extension must start with a dot"),
  })
  .strict();

export type LayerNaming = z.infer<typeof LayerNamingSchema>;

export const OutputNamingSchema = z
  .object({
    /** Extension of per-layer documents, including the dot */
    extension: z.string().regex(/^\.[A-Za-z0-9]+$/, "Extension must start with a dot"),
    indexFileName: z.string().min(1),
    indexTitle: z.string().min(1),
    /** Label preceding the version in index entries ("XAP Version") */
    versionLabel: z.string().min(1),
  })
  .strict();

export type OutputNaming = z.infer<typeof OutputNamingSchema>;

export const DocGenConfigSchema = z
  .object({
    /** Reserved token that resets a tree or sequence during merge */
    resetSentinel: z.string().min(1),
    /** Key of the documentation subtree */
    documentationKey: z.string().min(1),
    /** Key of the section order sequence inside the documentation subtree */
    orderKey: z.string().min(1),
    reservedSections: ReservedSectionsSchema,
    layers: LayerNamingSchema,
    output: OutputNamingSchema,
  })
  .strict()
  .superRefine((config, ctx) => {
    const sectionKeys = Object.values(config.reservedSections).map((s) => s.sectionKey);
    const seen = new Set<string>();
    for (const key of sectionKeys) {
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["reservedSections"],
          message: `Duplicate section key "${key}"`,
        });
      }
      seen.add(key);
    }
    if (sectionKeys.includes(config.orderKey)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["orderKey"],
        message: `Order key "${config.orderKey}" collides with a reserved section key`,
      });
    }
  });

export type DocGenConfig = z.infer<typeof DocGenConfigSchema>;
