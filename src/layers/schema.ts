/**
 * Schema for parsed definition layers.
 *
 * Hjson hands back untyped values; a layer is accepted only when its top
 * level is a mapping and every nested value is a scalar, a list or a
 * mapping of the same.
 */

import { z } from "zod";
import type { DefinitionTree, DefinitionValue } from "../types/tree.js";

export const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const DefinitionValueSchema: z.ZodType<DefinitionValue> = z.lazy(() =>
  z.union([ScalarSchema, z.array(DefinitionValueSchema), DefinitionTreeSchema])
);

export const DefinitionTreeSchema: z.ZodType<DefinitionTree> = z.lazy(() =>
  z.record(z.string(), DefinitionValueSchema)
);
