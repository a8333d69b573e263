// lib/format.ts
// Display helpers shared by the dashboard sections.

import { ApiError, type LiveMatchDto, type PlayerSearchDto, type TopPlayerPatch } from "./api";

export function matchLabel(m: LiveMatchDto) {
  return `${m.name} (${m.series})`;
}

export function playerLabel(p: PlayerSearchDto) {
  return `${p.name} (${p.team})`;
}

/**
 * Map backend/network errors to the message shown in the UI.
 */
export function describeError(err: unknown): string {
  if (err instanceof ApiError) {
    if (err.status === 429) return "API rate limit reached. Please wait a minute.";
    if (err.status === 503) return "Database unavailable. Check the backend's PostgreSQL settings.";
    return err.message;
  }
  if (err instanceof Error) {
    // fetch() rejects with a TypeError when the backend is unreachable
    if (err.name === "TypeError") return "Backend unreachable. Is the API running?";
    return err.message;
  }
  return String(err);
}

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return "—";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Columns of a row set: keys of the first row, in insertion order.
 */
export function columnsOf(rows: Array<Record<string, unknown>>): string[] {
  return rows.length > 0 ? Object.keys(rows[0]) : [];
}

/**
 * Width of a bar relative to the largest value, in percent (0..100).
 */
export function barWidth(value: number, max: number): number {
  if (max <= 0 || value <= 0) return 0;
  return Math.round((Math.min(value, max) / max) * 100);
}

/**
 * Patch for the update form. Blank inputs are left out so they keep the
 * stored value instead of being sent as 0.
 */
export function buildPatch(fields: { runs: string; average: string; hundred: string }): TopPlayerPatch {
  const patch: TopPlayerPatch = {};
  if (fields.runs.trim() !== "") patch.runs = Number(fields.runs);
  if (fields.average.trim() !== "") patch.average = Number(fields.average);
  if (fields.hundred.trim() !== "") patch.hundred = Number(fields.hundred);
  return patch;
}
