/**
 * packages/core/src/layout/dimension.ts — Sizing prop resolution.
 *
 * Why: Converts user-facing size values (numbers, percentages, "full",
 * "auto") into concrete extents against the parent's max constraint.
 */

import type { Dimension } from "./types.js";

/**
 * Resolve a single dimension relative to `parentMax`.
 *
 * - numbers are returned as-is
 * - percentages and "full" resolve against `parentMax`
 * - "auto", and percentages of an unbounded parent, resolve to `NaN`
 *   (caller decides meaning)
 */
export function resolveDimension(value: Dimension | undefined, parentMax: number): number {
  if (value === undefined || value === "auto") return Number.NaN;
  if (typeof value === "number") return value;
  if (!Number.isFinite(parentMax)) return Number.NaN;
  if (value === "full") return parentMax;
  const raw = Number.parseFloat(value.slice(0, -1));
  if (!Number.isFinite(raw)) return Number.NaN;
  return (parentMax * raw) / 100;
}

export function isAutoDimension(value: Dimension | undefined): boolean {
  return value === undefined || value === "auto";
}

export function isPercentDimension(value: Dimension | undefined): value is `${number}%` {
  return typeof value === "string" && value.endsWith("%");
}

/** Clamp `n` into [min, max]; `NaN` passes through. */
export function clampExtent(n: number, min: number | undefined, max: number | undefined): number {
  let out = n;
  if (max !== undefined && out > max) out = max;
  if (min !== undefined && out < min) out = min;
  return out;
}
