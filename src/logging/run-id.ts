/**
 * Run ids. A harvest process takes one at startup; it tags every log line,
 * the provenance of stored records, the run summary and the decision
 * trail file name, so several runs on the same day must not collide.
 */

import { randomBytes } from "node:crypto";

/**
 * `YYYYMMDDTHHMMSSZ-xxxxxx`, UTC second plus a random suffix.
 */
export function generateRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().slice(0, 19).replace(/[-:]/g, "");
  return `${stamp}Z-${randomBytes(3).toString("hex")}`;
}

const RUN_ID_RE = /^\d{8}T\d{6}Z-[0-9a-f]{6}$/;

export function isRunId(value: string): boolean {
  return RUN_ID_RE.test(value);
}

let currentRunId: string | null = null;

/**
 * Start a new run. Later log lines carry the returned id.
 */
export function initRunId(now?: Date): string {
  currentRunId = generateRunId(now);
  return currentRunId;
}

/** Null until `initRunId` has been called */
export function getRunId(): string | null {
  return currentRunId;
}
