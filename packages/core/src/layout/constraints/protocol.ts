/**
 * packages/core/src/layout/constraints/protocol.ts — Constraint family contract.
 *
 * Why: The render-object protocol is generic over constraint shape. A
 * `LayoutProtocol` bundles everything the scheduler and hit tester need to
 * know about one family (box, sliver, ...): well-formedness, tightness,
 * structural equality, a hashable cache key, and how geometry is checked
 * against the constraints it was produced for.
 */

import type { Offset } from "../types.js";

export type LayoutProtocol<C, G> = Readonly<{
  name: string;
  /** min <= max per axis, no NaN, no negative extents. */
  isNormalized(constraints: C): boolean;
  /** Exactly one geometry satisfies the constraints. */
  isTight(constraints: C): boolean;
  equals(a: C, b: C): boolean;
  /** Stable string key; equal constraints always share a key. */
  cacheKey(constraints: C): string;
  satisfies(constraints: C, geometry: G): boolean;
  geometryEquals(a: G, b: G): boolean;
  /** Whether `position` (node-local) lies inside the node's hit area. */
  contains(constraints: C, geometry: G, position: Offset): boolean;
  describe(constraints: C): string;
  describeGeometry(geometry: G): string;
}>;

export function formatExtent(n: number): string {
  if (n === Number.POSITIVE_INFINITY) return "Infinity";
  return Number.isInteger(n) ? String(n) : n.toFixed(1);
}
