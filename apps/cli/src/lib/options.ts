import type { ParseOptions } from "@bytesize/core";
import { z } from "zod";

export const OutputFormatSchema = z.enum(["text", "json", "yaml", "table"]);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const CliOptionsSchema = z.object({
  format: OutputFormatSchema.default("text"),
  quiet: z.boolean().default(false),
  verbose: z.boolean().default(false),
});
export type CliOptions = z.infer<typeof CliOptionsSchema>;

export const ParseCommandOptionsSchema = z.object({
  round: z.enum(["truncate", "half_even"]).default("truncate"),
  allowFractionalBytes: z.boolean().default(false),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validate global options collected by commander.
 *
 * @throws Error listing every invalid option
 */
export function loadCliOptions(raw: Record<string, unknown>): CliOptions {
  const result = CliOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid options: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Validate `parse` command options and map them onto library ParseOptions.
 *
 * @throws Error listing every invalid option
 */
export function loadParseOptions(raw: Record<string, unknown>): Required<ParseOptions> {
  const result = ParseCommandOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid options: ${describeIssues(result.error)}`);
  }
  return {
    rounding: result.data.round,
    allowFractionalBytes: result.data.allowFractionalBytes,
  };
}
