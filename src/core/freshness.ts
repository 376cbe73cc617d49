/**
 * Skip-if-up-to-date policy based on modification times
 */

import { stat } from "fs/promises";

export type Freshness = "needs-work" | "up-to-date";

/**
 * utimes round-trips through a double of seconds and can land just
 * under the source mtime. With this tolerance a source edited less than
 * 1 ms after its copy was made also reads as up to date, so it is only
 * applied to copies.
 */
export const MTIME_TOLERANCE_MS = 1;

async function mtimeMs(path: string): Promise<number | null> {
  try {
    return (await stat(path)).mtimeMs;
  } catch {
    return null;
  }
}

/**
 * Up to date only when the destination exists and is not older than the
 * source, less toleranceMs. Re-evaluated for every job; never creates
 * directories.
 */
export async function checkFreshness(
  sourcePath: string,
  destinationPath: string,
  toleranceMs: number = 0
): Promise<Freshness> {
  const destination = await mtimeMs(destinationPath);
  if (destination === null) {
    return "needs-work";
  }
  const source = await mtimeMs(sourcePath);
  if (source === null) {
    return "needs-work";
  }
  return destination + toleranceMs >= source ? "up-to-date" : "needs-work";
}
