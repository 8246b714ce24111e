/**
 * packages/core/src/layout/constraints/sliver.ts — Scroll-axis (sliver) constraints.
 *
 * A sliver is laid out along the scroll (main) axis of a viewport. Its
 * constraints describe how much of it is scrolled away and how much paint
 * space remains; the cross axis is a single fixed extent.
 *
 * `asBoxConstraints` is the lossy projection used when a sliver needs to lay
 * out a box-only child. Only `axis` and `crossAxisExtent` (plus the explicit
 * main-axis range) enter it, so scroll state never changes the result.
 */

import { type Axis, type Offset, crossOf, mainOf } from "../types.js";
import { type BoxConstraints, boxConstraints } from "./box.js";
import { type LayoutProtocol, formatExtent } from "./protocol.js";

export type SliverConstraints = Readonly<{
  axis: Axis;
  /** How far the sliver's start has scrolled past the viewport's leading edge. */
  scrollOffset: number;
  /** Scroll extent consumed by slivers before this one. */
  precedingScrollExtent: number;
  /** Pixels of this sliver covered by earlier slivers' paint. */
  overlap: number;
  /** Main-axis paint space left in the viewport. */
  remainingPaintExtent: number;
  crossAxisExtent: number;
  viewportMainAxisExtent: number;
  remainingCacheExtent: number;
  /** Where the cache region starts relative to scrollOffset (always <= 0). */
  cacheOrigin: number;
}>;

export type SliverGeometry = Readonly<{
  /** Scrollable extent the sliver contributes. */
  scrollExtent: number;
  /** Main-axis extent painted inside the viewport. */
  paintExtent: number;
  /** Main-axis distance to the next sliver's paint origin. */
  layoutExtent: number;
  /** Paint extent if the viewport had unlimited space. */
  maxPaintExtent: number;
  /** Main-axis extent that answers hit tests. */
  hitTestExtent: number;
}>;

export type AsBoxConstraintsOptions = Readonly<{
  minExtent?: number;
  maxExtent?: number;
  /** Overrides `constraints.crossAxisExtent`. */
  crossAxisExtent?: number;
}>;

export const ZERO_SLIVER_GEOMETRY: SliverGeometry = Object.freeze({
  scrollExtent: 0,
  paintExtent: 0,
  layoutExtent: 0,
  maxPaintExtent: 0,
  hitTestExtent: 0,
});

export function sliverConstraints(
  c: Partial<SliverConstraints> & Readonly<{ crossAxisExtent: number }>,
): SliverConstraints {
  const viewportMainAxisExtent = c.viewportMainAxisExtent ?? c.remainingPaintExtent ?? 0;
  return Object.freeze({
    axis: c.axis ?? "vertical",
    scrollOffset: c.scrollOffset ?? 0,
    precedingScrollExtent: c.precedingScrollExtent ?? 0,
    overlap: c.overlap ?? 0,
    remainingPaintExtent: c.remainingPaintExtent ?? viewportMainAxisExtent,
    crossAxisExtent: c.crossAxisExtent,
    viewportMainAxisExtent,
    remainingCacheExtent: c.remainingCacheExtent ?? c.remainingPaintExtent ?? viewportMainAxisExtent,
    cacheOrigin: c.cacheOrigin ?? 0,
  });
}

export function sliverGeometry(g: Partial<SliverGeometry> = {}): SliverGeometry {
  const scrollExtent = g.scrollExtent ?? 0;
  const paintExtent = g.paintExtent ?? 0;
  return Object.freeze({
    scrollExtent,
    paintExtent,
    layoutExtent: g.layoutExtent ?? paintExtent,
    maxPaintExtent: g.maxPaintExtent ?? scrollExtent,
    hitTestExtent: g.hitTestExtent ?? paintExtent,
  });
}

/**
 * Project sliver constraints onto box constraints: tight cross axis, main
 * axis in [minExtent, maxExtent]. Total and side-effect free.
 */
export function asBoxConstraints(
  c: SliverConstraints,
  opts: AsBoxConstraintsOptions = {},
): BoxConstraints {
  const cross = Math.max(0, opts.crossAxisExtent ?? c.crossAxisExtent);
  const minExtent = Math.max(0, opts.minExtent ?? 0);
  const maxExtent = Math.max(minExtent, opts.maxExtent ?? Number.POSITIVE_INFINITY);
  if (c.axis === "horizontal") {
    return boxConstraints({
      minWidth: minExtent,
      maxWidth: maxExtent,
      minHeight: cross,
      maxHeight: cross,
    });
  }
  return boxConstraints({
    minWidth: cross,
    maxWidth: cross,
    minHeight: minExtent,
    maxHeight: maxExtent,
  });
}

/** Portion of [from, to) (in scroll coordinates) visible in the viewport. */
export function calculatePaintOffset(c: SliverConstraints, from: number, to: number): number {
  const a = c.scrollOffset;
  const b = c.scrollOffset + c.remainingPaintExtent;
  return clamp(clamp(to, a, b) - clamp(from, a, b), 0, c.remainingPaintExtent);
}

function clamp(n: number, min: number, max: number): number {
  if (n > max) return max;
  if (n < min) return min;
  return n;
}

function isNonNegativeFinite(n: number): boolean {
  return Number.isFinite(n) && n >= 0;
}

export function isNormalizedSliver(c: SliverConstraints): boolean {
  return (
    (c.axis === "horizontal" || c.axis === "vertical") &&
    isNonNegativeFinite(c.scrollOffset) &&
    isNonNegativeFinite(c.precedingScrollExtent) &&
    Number.isFinite(c.overlap) &&
    isNonNegativeFinite(c.remainingPaintExtent) &&
    isNonNegativeFinite(c.crossAxisExtent) &&
    isNonNegativeFinite(c.viewportMainAxisExtent) &&
    isNonNegativeFinite(c.remainingCacheExtent) &&
    Number.isFinite(c.cacheOrigin) &&
    c.cacheOrigin <= 0
  );
}

export function isValidSliverGeometry(c: SliverConstraints, g: SliverGeometry): boolean {
  return (
    isNonNegativeFinite(g.scrollExtent) &&
    isNonNegativeFinite(g.paintExtent) &&
    isNonNegativeFinite(g.layoutExtent) &&
    isNonNegativeFinite(g.maxPaintExtent) &&
    isNonNegativeFinite(g.hitTestExtent) &&
    g.paintExtent <= c.remainingPaintExtent &&
    g.layoutExtent <= g.paintExtent &&
    g.hitTestExtent <= g.paintExtent
  );
}

export function sliverConstraintsEqual(a: SliverConstraints, b: SliverConstraints): boolean {
  return (
    a.axis === b.axis &&
    a.scrollOffset === b.scrollOffset &&
    a.precedingScrollExtent === b.precedingScrollExtent &&
    a.overlap === b.overlap &&
    a.remainingPaintExtent === b.remainingPaintExtent &&
    a.crossAxisExtent === b.crossAxisExtent &&
    a.viewportMainAxisExtent === b.viewportMainAxisExtent &&
    a.remainingCacheExtent === b.remainingCacheExtent &&
    a.cacheOrigin === b.cacheOrigin
  );
}

export function sliverConstraintsKey(c: SliverConstraints): string {
  return [
    "sliver",
    c.axis,
    c.scrollOffset,
    c.precedingScrollExtent,
    c.overlap,
    c.remainingPaintExtent,
    c.crossAxisExtent,
    c.viewportMainAxisExtent,
    c.remainingCacheExtent,
    c.cacheOrigin,
  ].join(":");
}

function sliverGeometryEqual(a: SliverGeometry, b: SliverGeometry): boolean {
  return (
    a.scrollExtent === b.scrollExtent &&
    a.paintExtent === b.paintExtent &&
    a.layoutExtent === b.layoutExtent &&
    a.maxPaintExtent === b.maxPaintExtent &&
    a.hitTestExtent === b.hitTestExtent
  );
}

/** Hit area: main axis in [0, hitTestExtent), cross axis in [0, crossAxisExtent). */
function sliverContains(c: SliverConstraints, g: SliverGeometry, p: Offset): boolean {
  const main = mainOf(c.axis, p);
  const cross = crossOf(c.axis, p);
  return main >= 0 && main < g.hitTestExtent && cross >= 0 && cross < c.crossAxisExtent;
}

export const sliverProtocol: LayoutProtocol<SliverConstraints, SliverGeometry> = Object.freeze({
  name: "sliver",
  isNormalized: isNormalizedSliver,
  isTight: () => false,
  equals: sliverConstraintsEqual,
  cacheKey: sliverConstraintsKey,
  satisfies: isValidSliverGeometry,
  geometryEquals: sliverGeometryEqual,
  contains: sliverContains,
  describe: (c: SliverConstraints) =>
    `SliverConstraints(${c.axis}, scrollOffset=${formatExtent(c.scrollOffset)}, ` +
    `remainingPaintExtent=${formatExtent(c.remainingPaintExtent)}, ` +
    `crossAxisExtent=${formatExtent(c.crossAxisExtent)})`,
  describeGeometry: (g: SliverGeometry) =>
    `SliverGeometry(scrollExtent=${formatExtent(g.scrollExtent)}, ` +
    `paintExtent=${formatExtent(g.paintExtent)}, layoutExtent=${formatExtent(g.layoutExtent)})`,
});
