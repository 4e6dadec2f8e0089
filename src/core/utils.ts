// Shared helpers for timestamps and waiting.
// Timestamps use local time, matching how Homebrew users read their log directory.

export function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

// 20250102-030405
export function formatRunStamp(date: Date): string {
  const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${day}-${time}`;
}

// 2025-01-02
export function formatDay(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

// 03:04:05
export function formatClock(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

export function minutesToMs(minutes: number): number {
  return Math.round(minutes * 60_000);
}

export function hoursToMs(hours: number): number {
  return Math.round(hours * 3_600_000);
}

// Node clamps longer delays to 1 ms.
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * setTimeout for delays past MAX_TIMER_DELAY_MS, chained in chunks.
 * Returns a function that cancels the pending timer.
 */
export function setLongTimeout(callback: () => void, ms: number): () => void {
  let remaining = Math.max(0, ms);
  let timer: NodeJS.Timeout;

  const schedule = (): void => {
    const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
    remaining -= chunk;
    timer = setTimeout(remaining > 0 ? schedule : callback, chunk);
  };
  schedule();

  return () => clearTimeout(timer);
}

/**
 * Resolves after `ms`, or early (without rejecting) once `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const onAbort = (): void => {
      cancel();
      resolve();
    };
    const cancel = setLongTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
