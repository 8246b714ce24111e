/**
 * packages/core/src/layout/constraints/box.ts — Two-dimensional box constraints.
 *
 * Invariants:
 *   - 0 <= minWidth <= maxWidth, 0 <= minHeight <= maxHeight
 *   - min extents are finite; max extents may be Infinity (unbounded)
 *   - values are immutable and compared structurally
 */

import type { Offset, Size } from "../types.js";
import { type LayoutProtocol, formatExtent } from "./protocol.js";

export type BoxConstraints = Readonly<{
  minWidth: number;
  maxWidth: number;
  minHeight: number;
  maxHeight: number;
}>;

export type EdgeInsets = Readonly<{ left: number; top: number; right: number; bottom: number }>;

const INF = Number.POSITIVE_INFINITY;

export function boxConstraints(c: Partial<BoxConstraints> = {}): BoxConstraints {
  return Object.freeze({
    minWidth: c.minWidth ?? 0,
    maxWidth: c.maxWidth ?? INF,
    minHeight: c.minHeight ?? 0,
    maxHeight: c.maxHeight ?? INF,
  });
}

/** Constraints satisfied only by `size`. */
export function tightConstraints(size: Size): BoxConstraints {
  return boxConstraints({
    minWidth: size.width,
    maxWidth: size.width,
    minHeight: size.height,
    maxHeight: size.height,
  });
}

/** Constraints from zero up to `size`. */
export function looseConstraints(size: Size): BoxConstraints {
  return boxConstraints({ maxWidth: size.width, maxHeight: size.height });
}

/** Tight on the given axes, unbounded elsewhere. */
export function expandConstraints(
  opts: Readonly<{ width?: number; height?: number }> = {},
): BoxConstraints {
  return boxConstraints({
    minWidth: opts.width ?? INF,
    maxWidth: opts.width ?? INF,
    minHeight: opts.height ?? INF,
    maxHeight: opts.height ?? INF,
  });
}

/** Drop the minimums, keeping the maximums. */
export function loosen(c: BoxConstraints): BoxConstraints {
  return boxConstraints({ maxWidth: c.maxWidth, maxHeight: c.maxHeight });
}

/** Pin the given axes to a value clamped into the current range. */
export function tighten(
  c: BoxConstraints,
  opts: Readonly<{ width?: number; height?: number }>,
): BoxConstraints {
  const width = opts.width === undefined ? null : clamp(opts.width, c.minWidth, c.maxWidth);
  const height = opts.height === undefined ? null : clamp(opts.height, c.minHeight, c.maxHeight);
  return boxConstraints({
    minWidth: width ?? c.minWidth,
    maxWidth: width ?? c.maxWidth,
    minHeight: height ?? c.minHeight,
    maxHeight: height ?? c.maxHeight,
  });
}

/** Shrink by insets, never below zero. */
export function deflate(c: BoxConstraints, insets: EdgeInsets): BoxConstraints {
  const horizontal = insets.left + insets.right;
  const vertical = insets.top + insets.bottom;
  const minWidth = Math.max(0, c.minWidth - horizontal);
  const minHeight = Math.max(0, c.minHeight - vertical);
  return boxConstraints({
    minWidth,
    maxWidth: Math.max(minWidth, c.maxWidth - horizontal),
    minHeight,
    maxHeight: Math.max(minHeight, c.maxHeight - vertical),
  });
}

function clamp(n: number, min: number, max: number): number {
  if (n > max) return max;
  if (n < min) return min;
  return n;
}

/** The size closest to `size` that satisfies `c`. */
export function constrain(c: BoxConstraints, size: Size): Size {
  return {
    width: clamp(size.width, c.minWidth, c.maxWidth),
    height: clamp(size.height, c.minHeight, c.maxHeight),
  };
}

/** Largest size that satisfies `c`; unbounded axes fall back to the minimum. */
export function biggest(c: BoxConstraints): Size {
  return {
    width: Number.isFinite(c.maxWidth) ? c.maxWidth : c.minWidth,
    height: Number.isFinite(c.maxHeight) ? c.maxHeight : c.minHeight,
  };
}

export function smallest(c: BoxConstraints): Size {
  return { width: c.minWidth, height: c.minHeight };
}

export function hasBoundedWidth(c: BoxConstraints): boolean {
  return Number.isFinite(c.maxWidth);
}

export function hasBoundedHeight(c: BoxConstraints): boolean {
  return Number.isFinite(c.maxHeight);
}

export function isTightBox(c: BoxConstraints): boolean {
  return c.minWidth >= c.maxWidth && c.minHeight >= c.maxHeight;
}

function isValidAxis(min: number, max: number): boolean {
  return Number.isFinite(min) && min >= 0 && !Number.isNaN(max) && min <= max;
}

export function isNormalizedBox(c: BoxConstraints): boolean {
  return isValidAxis(c.minWidth, c.maxWidth) && isValidAxis(c.minHeight, c.maxHeight);
}

export function isSatisfiedBy(c: BoxConstraints, size: Size): boolean {
  return (
    Number.isFinite(size.width) &&
    Number.isFinite(size.height) &&
    size.width >= c.minWidth &&
    size.width <= c.maxWidth &&
    size.height >= c.minHeight &&
    size.height <= c.maxHeight
  );
}

export function boxConstraintsEqual(a: BoxConstraints, b: BoxConstraints): boolean {
  return (
    a.minWidth === b.minWidth &&
    a.maxWidth === b.maxWidth &&
    a.minHeight === b.minHeight &&
    a.maxHeight === b.maxHeight
  );
}

export function boxConstraintsKey(c: BoxConstraints): string {
  return `box:${String(c.minWidth)}:${String(c.maxWidth)}:${String(c.minHeight)}:${String(c.maxHeight)}`;
}

export function describeBoxConstraints(c: BoxConstraints): string {
  const axis = (min: number, max: number, name: string): string =>
    min === max
      ? `${name}=${formatExtent(min)}`
      : `${formatExtent(min)}<=${name}<=${formatExtent(max)}`;
  const w = axis(c.minWidth, c.maxWidth, "w");
  const h = axis(c.minHeight, c.maxHeight, "h");
  return `BoxConstraints(${w}, ${h})`;
}

function containsPoint(s: Size, p: Offset): boolean {
  return p.x >= 0 && p.x < s.width && p.y >= 0 && p.y < s.height;
}

export const boxProtocol: LayoutProtocol<BoxConstraints, Size> = Object.freeze({
  name: "box",
  isNormalized: isNormalizedBox,
  isTight: isTightBox,
  equals: boxConstraintsEqual,
  cacheKey: boxConstraintsKey,
  satisfies: isSatisfiedBy,
  geometryEquals: (a: Size, b: Size) => a.width === b.width && a.height === b.height,
  contains: (_c: BoxConstraints, s: Size, p: Offset) => containsPoint(s, p),
  describe: describeBoxConstraints,
  describeGeometry: (s: Size) => `Size(${formatExtent(s.width)}, ${formatExtent(s.height)})`,
});
