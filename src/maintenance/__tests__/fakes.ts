/**
 * Maintenance test fakes.
 * Purpose: deterministic in-memory stand-ins for brew and the event log.
 * Usage: queue results per command, run the maintainer, then assert on recorded calls.
 */

import type { CommandExecutor } from "../../brew/executor.js";
import { formatBrewCommand, type BrewCommand, type BrewEnv } from "../../brew/command.js";
import type { EventLogger, LogEvent } from "../../core/logger.js";

// =============================================================================
// COMMAND EXECUTOR
// =============================================================================

type QueuedResult = { ok: true; stdout: string } | { ok: false; error: unknown };

export class FakeCommandExecutor implements CommandExecutor {
  private readonly queue = new Map<string, QueuedResult[]>();

  readonly calls: string[] = [];
  readonly timeouts: number[] = [];

  constructor(private readonly env: BrewEnv = { HOME: "/Users/test", NONINTERACTIVE: "1" }) {}

  /** Queue stdout (or a failure) for the next run of `command`, e.g. "brew update". */
  succeed(command: string, stdout = ""): this {
    return this.enqueue(command, { ok: true, stdout });
  }

  fail(command: string, error: unknown): this {
    return this.enqueue(command, { ok: false, error });
  }

  envs(): BrewEnv {
    return { ...this.env };
  }

  async execute(cmd: BrewCommand): Promise<string> {
    return this.next(cmd);
  }

  async executeWithTimeout(cmd: BrewCommand, timeoutMs: number): Promise<void> {
    this.timeouts.push(timeoutMs);
    await this.next(cmd);
  }

  private enqueue(command: string, result: QueuedResult): this {
    const existing = this.queue.get(command) ?? [];
    existing.push(result);
    this.queue.set(command, existing);
    return this;
  }

  private async next(cmd: BrewCommand): Promise<string> {
    const command = formatBrewCommand(cmd);
    this.calls.push(command);

    // Unqueued commands succeed with no output.
    const result = this.queue.get(command)?.shift() ?? { ok: true, stdout: "" };
    if (!result.ok) throw result.error;
    return result.stdout;
  }
}

// =============================================================================
// EVENT LOG
// =============================================================================

export class RecordingLogger implements EventLogger {
  readonly events: LogEvent[] = [];

  log(event: LogEvent): void {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }
}

// =============================================================================
// BREW OUTPUT
// =============================================================================

export function outdatedJson(
  entries: Array<{ name: string; from?: string; to?: string; pinned?: boolean }>,
): string {
  return JSON.stringify(
    entries.map((entry) => ({
      name: entry.name,
      installed_versions: [entry.from ?? "1.0.0"],
      current_version: entry.to ?? "1.1.0",
      pinned: entry.pinned ?? false,
      pinned_version: entry.pinned ? (entry.from ?? "1.0.0") : null,
    })),
  );
}

export function fixedClock(startIso = "2025-01-02T03:04:05.000Z", stepMs = 1000): () => Date {
  let tick = 0;
  const start = Date.parse(startIso);
  return () => new Date(start + stepMs * tick++);
}
