/**
 * packages/core/src/layout/transform.ts — 2D affine transforms.
 *
 * A transform maps a point (x, y) to (a*x + c*y + e, b*x + d*y + f). Hit-test
 * entries carry the transform from global to local coordinates.
 */

import type { Offset } from "./types.js";

export type Transform2D = Readonly<{
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
}>;

export const IDENTITY_TRANSFORM: Transform2D = Object.freeze({ a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 });

export function translation(dx: number, dy: number): Transform2D {
  return { a: 1, b: 0, c: 0, d: 1, e: dx, f: dy };
}

export function scaling(sx: number, sy: number = sx): Transform2D {
  return { a: sx, b: 0, c: 0, d: sy, e: 0, f: 0 };
}

/** Compose so that the result applies `second` after `first`. */
export function compose(second: Transform2D, first: Transform2D): Transform2D {
  return {
    a: second.a * first.a + second.c * first.b,
    b: second.b * first.a + second.d * first.b,
    c: second.a * first.c + second.c * first.d,
    d: second.b * first.c + second.d * first.d,
    e: second.a * first.e + second.c * first.f + second.e,
    f: second.b * first.e + second.d * first.f + second.f,
  };
}

/** Inverse transform, or null when the transform is singular. */
export function invert(t: Transform2D): Transform2D | null {
  const det = t.a * t.d - t.b * t.c;
  if (det === 0 || !Number.isFinite(det)) return null;
  const a = t.d / det;
  const b = -t.b / det;
  const c = -t.c / det;
  const d = t.a / det;
  return {
    a,
    b,
    c,
    d,
    e: -(a * t.e + c * t.f),
    f: -(b * t.e + d * t.f),
  };
}

export function applyTransform(t: Transform2D, p: Offset): Offset {
  return { x: t.a * p.x + t.c * p.y + t.e, y: t.b * p.x + t.d * p.y + t.f };
}

export function isTranslationOnly(t: Transform2D): boolean {
  return t.a === 1 && t.b === 0 && t.c === 0 && t.d === 1;
}
