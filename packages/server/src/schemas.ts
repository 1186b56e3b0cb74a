/**
 * Zod schemas for validating tool inputs and server configuration
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";

// Same shape the SDK accepts for system namespaces: "$" plus a name
const systemNamespacePattern = /^\$[A-Za-z0-9_-]+$/;

export const MAX_DEPTH_LIMIT = 1000;

const SystemNamespaceSchema = z.string().superRefine((val, ctx) => {
  if (!systemNamespacePattern.test(val)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'system namespace must start with "$" followed by letters, numbers, underscores, or hyphens',
    });
  }
});

export const SystemNamespacesSchema = z.array(SystemNamespaceSchema).max(64);

export const MaxDepthSchema = z
  .number()
  .int()
  .min(0)
  .superRefine((val, ctx) => {
    if (val > MAX_DEPTH_LIMIT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `maxDepth cannot exceed ${MAX_DEPTH_LIMIT}`,
      });
    }
  });

// Tool input schema shared by validate_query, format_query and explain_query.
// `query` is deliberately unconstrained: its shape is what the tools check.
export const QueryToolInputSchema = z.object({
  query: z.unknown(),
  maxDepth: MaxDepthSchema.optional(),
  systemNamespaces: SystemNamespacesSchema.optional(),
});

// Environment configuration (QSHAPE_MAX_DEPTH, QSHAPE_SYSTEM_NAMESPACES)
export const ServerConfigSchema = z.object({
  QSHAPE_MAX_DEPTH: z
    .string()
    .regex(/^\d+$/, "QSHAPE_MAX_DEPTH must be a non-negative integer")
    .transform((val) => Number.parseInt(val, 10))
    .pipe(MaxDepthSchema)
    .optional(),
  QSHAPE_SYSTEM_NAMESPACES: z
    .string()
    .transform((val) =>
      val
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
    )
    .pipe(SystemNamespacesSchema)
    .optional(),
});

// Tool output schemas (structuredContent of each tool result)

const QueryErrorSchema = z.object({
  kind: z.string(),
  path: z.string(),
  message: z.string(),
});

export const ValidateQueryOutputSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("ok"), query: z.object({ namespaces: z.array(z.unknown()) }) }),
  z.object({ status: z.literal("deferred") }),
  z.object({ status: z.literal("error"), error: QueryErrorSchema }),
]);

export const FormatQueryOutputSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("ok"), instaql: z.record(z.string(), z.unknown()) }),
  z.object({ status: z.literal("deferred") }),
  z.object({ status: z.literal("error"), error: QueryErrorSchema }),
]);

export const ExplainQueryOutputSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("ok"), lines: z.array(z.string()) }),
  z.object({ status: z.literal("deferred") }),
  z.object({ status: z.literal("error"), error: QueryErrorSchema }),
]);

// Export types
export type QueryToolInput = z.infer<typeof QueryToolInputSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type ValidateQueryOutput = z.infer<typeof ValidateQueryOutputSchema>;
export type FormatQueryOutput = z.infer<typeof FormatQueryOutputSchema>;
export type ExplainQueryOutput = z.infer<typeof ExplainQueryOutputSchema>;
