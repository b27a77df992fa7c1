/**
 * Format a position in seconds as `HHH:MM:SS.mmm`.
 *
 * Three-digit hours keep every timestamp the same width, so lexicographic
 * order is chronological order.
 */
export function formatTimestamp(totalSeconds: number): string {
  const totalMs = Math.max(0, Math.round(totalSeconds * 1000));
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const seconds = Math.floor((totalMs % 60_000) / 1000);
  const ms = totalMs % 1000;

  return `${String(hours).padStart(3, "0")}:${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}.${String(ms).padStart(3, "0")}`;
}

/** Position of 1-based frame `frameNumber` when frames are sampled every `interval` seconds. */
export function frameNumberToSeconds(frameNumber: number, interval: number): number {
  return Math.max(0, (frameNumber - 1) * interval);
}

/** Round to millisecond precision, the resolution every artifact uses. */
export function roundSeconds(seconds: number): number {
  return Math.round(seconds * 1000) / 1000;
}
