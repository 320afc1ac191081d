/**
 * Schema for `analysis_options.yaml`.
 */
import { z } from 'zod';

/**
 * Treat a missing or null section as `{}` so inner defaults apply.
 * Zod 4's `.default({})` would skip the inner schema entirely.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const SeverityOverrideSchema = z.enum(['info', 'warning', 'error', 'ignore']);

/**
 * Rules may be listed or given as a name → enabled map. Both normalise to the
 * list of enabled names, without duplicates.
 */
export const RuleListSchema = z
  .union([z.array(z.string()), z.record(z.string(), z.boolean())])
  .nullish()
  .transform((value): string[] => {
    if (value === null || value === undefined) return [];
    const names = Array.isArray(value)
      ? value
      : Object.entries(value)
          .filter(([, enabled]) => enabled)
          .map(([name]) => name);
    return [...new Set(names)];
  });

export const LinterSettingsSchema = z.object({
  rules: RuleListSchema,
});

export const AnalyzerSettingsSchema = z.object({
  /** Severity override per rule name */
  errors: z
    .record(z.string(), SeverityOverrideSchema)
    .nullish()
    .transform((value): Record<string, SeverityOverrideSetting> => value ?? {}),
});

/** An empty file parses to null and yields the defaults. */
export const AnalysisOptionsSchema = withDefaults(
  z.object({
    linter: withDefaults(LinterSettingsSchema),
    analyzer: withDefaults(AnalyzerSettingsSchema),
  })
);

export type AnalysisOptions = z.output<typeof AnalysisOptionsSchema>;
export type SeverityOverrideSetting = z.output<typeof SeverityOverrideSchema>;
