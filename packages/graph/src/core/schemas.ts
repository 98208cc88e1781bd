/**
 * zod schemas for values crossing a boundary: database rows and tool input.
 */

import * as z from "zod/v4";

export const LanguageSchema = z.enum(["typescript", "javascript", "python", "go", "rust", "java"]);
export const SymbolKindSchema = z.enum(["function", "method", "module"]);
export const RelationKindSchema = z.enum(["call", "import", "compose"]);
export const ReachSchema = z.enum(["direct", "conditional", "indirect"]);
export const ConfidenceSchema = z.enum(["resolved", "conditional", "dynamic", "external"]);

export const TargetHintSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("bare") }),
  z.object({ type: z.literal("self") }),
  z.object({ type: z.literal("member"), receiver: z.string() }),
  z.object({
    type: z.literal("module"),
    specifier: z.string(),
    resolution: z.enum(["relative", "suffix", "package"]),
  }),
  z.object({ type: z.literal("opaque") }),
]);
