import { z } from "zod";

import { BrewError } from "../core/errors.js";

// =============================================================================
// SCHEMAS
// =============================================================================

const InstalledVersionsSchema = z
  .union([z.array(z.string()), z.string()])
  .transform((value) => (Array.isArray(value) ? value : [value]));

export const OutdatedEntrySchema = z.object({
  name: z.string().min(1),
  installed_versions: InstalledVersionsSchema.default([]),
  current_version: z.string(),
  pinned: z.boolean().default(false),
  pinned_version: z.string().nullable().default(null),
});

// `brew outdated --json` prints the v1 shape (an array of formulae);
// `--json=v2` wraps formulae and casks in an object.
const OutdatedV1Schema = z.array(OutdatedEntrySchema);
const OutdatedV2Schema = z.object({
  formulae: z.array(OutdatedEntrySchema).default([]),
  casks: z.array(OutdatedEntrySchema).default([]),
});

type OutdatedEntry = z.infer<typeof OutdatedEntrySchema>;

// =============================================================================
// TYPES
// =============================================================================

export type PackageKind = "formula" | "cask";

export type OutdatedPackage = {
  name: string;
  kind: PackageKind;
  installedVersions: string[];
  currentVersion: string;
  pinned: boolean;
  pinnedVersion: string | null;
};

// =============================================================================
// PARSING
// =============================================================================

export function parseOutdatedPackages(output: string): OutdatedPackage[] {
  const trimmed = output.trim();
  if (trimmed.length === 0) return [];

  let data: unknown;
  try {
    data = JSON.parse(trimmed);
  } catch (err) {
    throw new BrewError("execution_failed", "brew outdated returned invalid JSON", err);
  }

  const v1 = OutdatedV1Schema.safeParse(data);
  if (v1.success) {
    return v1.data.map((entry) => toPackage(entry, "formula"));
  }

  const v2 = OutdatedV2Schema.safeParse(data);
  if (v2.success) {
    return [
      ...v2.data.formulae.map((entry) => toPackage(entry, "formula")),
      ...v2.data.casks.map((entry) => toPackage(entry, "cask")),
    ];
  }

  throw new BrewError(
    "execution_failed",
    "brew outdated returned JSON in an unexpected shape",
    v2.error,
  );
}

function toPackage(entry: OutdatedEntry, kind: PackageKind): OutdatedPackage {
  return {
    name: entry.name,
    kind,
    installedVersions: entry.installed_versions,
    currentVersion: entry.current_version,
    pinned: entry.pinned,
    pinnedVersion: entry.pinned_version,
  };
}

// =============================================================================
// FORMATTING
// =============================================================================

export function formatPackage(pkg: OutdatedPackage): string {
  return (
    `${pkg.name}(available:${pkg.currentVersion}): ` +
    `|installed: ${pkg.installedVersions.join(", ")}` +
    `|pinned: ${pkg.pinned}` +
    `|pinned-version: ${pkg.pinnedVersion ?? ""}|`
  );
}

export function formatPackageList(packages: OutdatedPackage[]): string {
  return packages.map(formatPackage).join("\n");
}
