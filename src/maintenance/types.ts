import { z } from "zod";

// Persisted as last-run.json, so the report is described by a schema rather than a bare type.

export const StepNameSchema = z.enum(["update", "outdated", "upgrade", "cleanup"]);
export type StepName = z.infer<typeof StepNameSchema>;

export const StepStatusSchema = z.enum(["completed", "failed", "skipped"]);
export type StepStatus = z.infer<typeof StepStatusSchema>;

export const StepResultSchema = z.object({
  step: StepNameSchema,
  command: z.string(),
  status: StepStatusSchema,
  error: z.string().optional(),
});
export type StepResult = z.infer<typeof StepResultSchema>;

export const PackageSummarySchema = z.object({
  name: z.string(),
  kind: z.enum(["formula", "cask"]),
  installedVersions: z.array(z.string()),
  currentVersion: z.string(),
  pinned: z.boolean(),
  pinnedVersion: z.string().nullable(),
});

export const UpgradeFailureSchema = z.object({
  name: z.string(),
  reason: z.enum(["execution_failed", "input_requested", "timeout"]),
  message: z.string(),
});
export type UpgradeFailure = z.infer<typeof UpgradeFailureSchema>;

export const SkipReasonSchema = z.enum(["pinned", "excluded", "dry_run"]);
export type SkipReason = z.infer<typeof SkipReasonSchema>;

export const UpgradeSkipSchema = z.object({
  name: z.string(),
  reason: SkipReasonSchema,
});
export type UpgradeSkip = z.infer<typeof UpgradeSkipSchema>;

export const RunFailureSchema = z.object({
  step: StepNameSchema,
  message: z.string(),
  detail: z.string(),
});
export type RunFailure = z.infer<typeof RunFailureSchema>;

export const MaintenanceReportSchema = z.object({
  startedAt: z.string(),
  finishedAt: z.string(),
  status: z.enum(["completed", "failed"]),
  dryRun: z.boolean(),
  steps: z.array(StepResultSchema),
  outdated: z.array(PackageSummarySchema),
  upgraded: z.array(z.string()),
  failed: z.array(UpgradeFailureSchema),
  skipped: z.array(UpgradeSkipSchema),
  error: RunFailureSchema.optional(),
});
export type MaintenanceReport = z.infer<typeof MaintenanceReportSchema>;
