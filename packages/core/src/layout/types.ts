/**
 * packages/core/src/layout/types.ts — Geometry primitive type definitions.
 *
 * Why: Defines the fundamental geometric types shared by every layout
 * protocol. Coordinates are logical pixels; a node's local space has its
 * origin at the node's top-left corner.
 */

/** Point or displacement in a 2D coordinate space. */
export type Offset = Readonly<{ x: number; y: number }>;

/** Box dimensions. */
export type Size = Readonly<{ width: number; height: number }>;

/** Rectangle with position and dimensions. */
export type Rect = Readonly<{ x: number; y: number; width: number; height: number }>;

/** Scroll or stacking axis. */
export type Axis = "horizontal" | "vertical";

/** Base size value accepted by sizing props. */
export type Dimension = number | `${number}%` | "full" | "auto";

export const ZERO_OFFSET: Offset = Object.freeze({ x: 0, y: 0 });
export const ZERO_SIZE: Size = Object.freeze({ width: 0, height: 0 });

export function offset(x: number, y: number): Offset {
  return { x, y };
}

export function size(width: number, height: number): Size {
  return { width, height };
}

export function addOffsets(a: Offset, b: Offset): Offset {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function subtractOffsets(a: Offset, b: Offset): Offset {
  return { x: a.x - b.x, y: a.y - b.y };
}

/** Check if point (x,y) is inside rect (exclusive of right/bottom edges). */
export function rectContains(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.width && y >= rect.y && y < rect.y + rect.height;
}

export function flipAxis(axis: Axis): Axis {
  return axis === "horizontal" ? "vertical" : "horizontal";
}

/** Main-axis component of an offset. */
export function mainOf(axis: Axis, o: Offset): number {
  return axis === "horizontal" ? o.x : o.y;
}

/** Cross-axis component of an offset. */
export function crossOf(axis: Axis, o: Offset): number {
  return axis === "horizontal" ? o.y : o.x;
}

/** Build an offset from main/cross components along `axis`. */
export function axisOffset(axis: Axis, main: number, cross: number): Offset {
  return axis === "horizontal" ? { x: main, y: cross } : { x: cross, y: main };
}

export function mainExtentOf(axis: Axis, s: Size): number {
  return axis === "horizontal" ? s.width : s.height;
}

export function crossExtentOf(axis: Axis, s: Size): number {
  return axis === "horizontal" ? s.height : s.width;
}

export function axisSize(axis: Axis, main: number, cross: number): Size {
  return axis === "horizontal" ? { width: main, height: cross } : { width: cross, height: main };
}
