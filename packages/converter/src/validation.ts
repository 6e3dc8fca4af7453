/**
 * Zod schemas for converter and resolver options.
 */

import { ConfigurationError } from "@graphwire/errors";
import { type ZodType, z } from "zod";
import { type ConverterLogger, isConverterLogger } from "./logger.js";
import { TypeRegistry } from "./registry/type-registry.js";

export const ConverterOptionsSchema = z.object({
  attributeNaming: z.enum(["identity", "camelCase", "kebab-case", "snake_case"]).optional(),
  unresolvedLinkage: z.enum(["null", "stub"]).optional(),
  logger: z
    .custom<ConverterLogger>(isConverterLogger, { message: "logger must implement debug, info, warn and error" })
    .optional(),
  registry: z.instanceof(TypeRegistry).optional(),
});

export const FetchLinkResolverConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().min(100).max(120_000).optional(),
  headers: z.record(z.string()).optional(),
});

export type ConverterOptions = z.infer<typeof ConverterOptionsSchema>;
export type FetchLinkResolverConfig = z.infer<typeof FetchLinkResolverConfigSchema>;

/**
 * Parse options or fail with CONFIG_INVALID_OPTIONS.
 */
export function validateOptions<T>(schema: ZodType<T>, value: unknown, subject: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError({
      code: "CONFIG_INVALID_OPTIONS",
      message: `Invalid ${subject}: ${parsed.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ")}`,
    });
  }
  return parsed.data;
}
