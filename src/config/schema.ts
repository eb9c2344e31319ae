import { z } from "zod";

const logLevels = ["trace", "debug", "info", "warn", "error", "critical"] as const;

/**
 * Plain input accepted by `ConfigurationOptions.defaults()`.
 */
export const optionsInputSchema = z
  .object({
    copyDefaults: z.boolean().optional(),
    header: z.string().optional(),
    logLevel: z.enum(logLevels).nullable().optional(),
    logStrategy: z
      .enum(["pretty", "plain", "json", "json_pretty", "none"])
      .optional(),
  })
  .strict();

export type OptionsInput = z.input<typeof optionsInputSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length === 0 ? "<input>" : issue.path.join(".");
    return `${path}: ${issue.message}`;
  });
}
