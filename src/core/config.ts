import { z, type ZodIssue } from "zod";

export const DEFAULT_UPGRADE_TIMEOUT_MINUTES = 5;
export const DEFAULT_BREW_PATH = "brew";

export const MaintainerConfigSchema = z
  .object({
    upgrade_timeout_minutes: z.number().positive().default(DEFAULT_UPGRADE_TIMEOUT_MINUTES),
    exclude: z.array(z.string().min(1)).default([]),
    cleanup: z.boolean().default(true),
    log_dir: z.string().min(1).optional(),
    brew_path: z.string().min(1).default(DEFAULT_BREW_PATH),
    env: z.record(z.string()).default({}),
  })
  .strict();

export type MaintainerConfig = z.infer<typeof MaintainerConfigSchema>;

export function defaultConfig(): MaintainerConfig {
  return MaintainerConfigSchema.parse({});
}

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}
