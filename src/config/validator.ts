import { z } from 'zod';

export const RunnerSettingsSchema = z.object({
  autoStart: z.boolean(),
  daemon: z.boolean(),
  copyStorage: z.boolean(),
  ignoreTaskFailures: z.boolean(),
  intervalMs: z.number().int().nonnegative(),
});

export const ConfigSchema = z.object({
  debug: z.boolean(),
  runner: RunnerSettingsSchema,
});

/** What a caller may pass to `new Runner(...)` besides the logger. */
export const RunnerOptionsSchema = RunnerSettingsSchema.partial()
  .extend({
    name: z.string().min(1).optional(),
    debug: z.boolean().optional(),
  })
  .strict();

export type RunnerSettings = z.infer<typeof RunnerSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;

/** Flattens zod issues into `path: message` lines for error reporting. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
