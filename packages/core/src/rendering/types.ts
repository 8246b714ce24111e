/**
 * packages/core/src/rendering/types.ts — Render-object protocol types.
 *
 * Why: A render node's behavior is supplied by a `RenderKind` capability
 * object rather than a subclass. The kind is parameterized by the constraint
 * family `C`, the geometry `G` it resolves, and its props `P`; the node
 * itself (see renderNode.ts) owns the shared state machine.
 *
 * Kind members are declared with method syntax so that a concrete
 * `RenderKind<BoxConstraints, Size, BoxProps>` is usable wherever the tree
 * stores heterogeneous nodes.
 */

import { throwCode } from "../errors.js";
import type { LayoutProtocol } from "../layout/constraints/protocol.js";
import type { Offset } from "../layout/types.js";
import type { HitTestEntry, HitTestResult } from "./hitTest.js";
import type { AnyRenderNode, RenderNode } from "./renderNode.js";

/** Stable arena index of a node inside its tree. */
export type RenderNodeId = number;

/** What a props change invalidates. */
export type Invalidation = "layout" | "paint" | "none";

/**
 * Per-child inputs a parent reads while laying out (position hints, flex
 * weights). Set by the composition layer through `RenderTree.adoptChild` or
 * `RenderTree.updateSlot`.
 */
export type ChildSlot = Readonly<{
  left?: number;
  top?: number;
  flex?: number;
}>;

export type LayoutChildOptions = Readonly<{ parentUsesSize?: boolean }>;

export type PointerEventKind = "down" | "move" | "up" | "cancel" | "wheel";

export type PointerEvent = Readonly<{
  kind: PointerEventKind;
  /** Global position. */
  position: Offset;
  pointerId: number;
  buttons?: number;
  deltaX?: number;
  deltaY?: number;
}>;

/**
 * Context handed to `performLayout`. `layoutChild` is the only way to lay out
 * a child; a parent that reads the child's geometry must say so with
 * `parentUsesSize: true`, which also makes later changes to the child dirty
 * the parent.
 */
export interface LayoutContext<G, P> {
  readonly node: AnyRenderNode;
  readonly props: P;
  readonly children: readonly AnyRenderNode[];
  /** Geometry from `performResize` when the node is sized by its parent. */
  readonly resized: G | null;
  slotOf(child: AnyRenderNode): ChildSlot;
  layoutChild<CC, CG>(
    child: RenderNode<CC, CG, unknown>,
    constraints: CC,
    options: Readonly<{ parentUsesSize: true }>,
  ): CG;
  layoutChild<CC, CG>(
    child: RenderNode<CC, CG, unknown>,
    constraints: CC,
    options?: Readonly<{ parentUsesSize?: false }>,
  ): void;
  /** Record where the child paints, in this node's local coordinates. */
  positionChild(child: AnyRenderNode, offset: Offset): void;
  /** Queue a tree mutation to run once the current pass ends. */
  defer(task: () => void): void;
  warn(key: string, detail: string): void;
}

export interface HitTestContext<G, P> {
  readonly node: AnyRenderNode;
  readonly props: P;
  readonly geometry: G;
  readonly children: readonly AnyRenderNode[];
  offsetOf(child: AnyRenderNode): Offset;
  /** Hit test `child` at a position already in the child's local space. */
  hitTestChild(result: HitTestResult, child: AnyRenderNode, position: Offset): boolean;
}

export interface EventContext<P> {
  readonly node: AnyRenderNode;
  readonly props: P;
  setProps(next: P): void;
  markNeedsLayout(): void;
  markNeedsPaint(): void;
  /** Stop delivery to the remaining entries of this dispatch. */
  stopPropagation(): void;
}

export type RenderKind<C, G, P> = Readonly<{
  name: string;
  protocol: LayoutProtocol<C, G>;
  /** Fixed for the lifetime of every node of this kind. */
  isRepaintBoundary: boolean;
  /** Maximum number of children; undefined means unlimited. */
  maxChildren?: number;
  /** True when size depends on constraints alone. Defaults to false. */
  sizedByParent?(props: P): boolean;
  /** Pure size resolution used when `sizedByParent` is true. */
  performResize?(props: P, constraints: C): G;
  /**
   * Lay out every child and return this node's geometry. Kinds sized by
   * their parent may return undefined (or the resized geometry unchanged).
   */
  performLayout(ctx: LayoutContext<G, P>, constraints: C): G | undefined;
  hitTestSelf?(ctx: HitTestContext<G, P>, position: Offset): boolean;
  hitTestChildren?(ctx: HitTestContext<G, P>, result: HitTestResult, position: Offset): boolean;
  handleEvent?(ctx: EventContext<P>, event: PointerEvent, entry: HitTestEntry): void;
  /** Defaults to "layout" whenever the props object changes. */
  propsChanged?(prev: P, next: P): Invalidation;
}>;

export function defineKind<C, G, P>(kind: RenderKind<C, G, P>): RenderKind<C, G, P> {
  if (kind.sizedByParent !== undefined && kind.performResize === undefined) {
    throwCode("ARBOR_INVALID_CONFIG", `defineKind(${kind.name}): sizedByParent requires performResize`);
  }
  return Object.freeze(kind);
}
