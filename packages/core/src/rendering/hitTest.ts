/**
 * packages/core/src/rendering/hitTest.ts — Pointer hit testing.
 *
 * Why: Resolves which nodes lie under a pointer position, innermost first, so
 * dispatch can deliver the event along that path.
 *
 * Algorithm per node:
 *   1. Skip unless the position (node-local) is inside the node's hit area,
 *      as decided by its constraint family's `contains`.
 *   2. Ask children (`hitTestChildren`), then the node itself (`hitTestSelf`).
 *   3. On a hit, append this node after any entries its children added.
 *
 * Tie-break rule: containers test children in reverse paint order, so among
 * overlapping siblings the one painted last (the later sibling) wins.
 *
 * Each entry records the global-to-local transform in effect when it was
 * added, so handlers can map later pointer positions without re-testing.
 */

import { throwCode } from "../errors.js";
import {
  IDENTITY_TRANSFORM,
  type Transform2D,
  applyTransform,
  compose,
  invert,
  translation,
} from "../layout/transform.js";
import { type Offset, subtractOffsets } from "../layout/types.js";
import type { AnyRenderNode, RenderNode } from "./renderNode.js";
import type { HitTestContext } from "./types.js";

export type HitTestEntry = Readonly<{
  target: AnyRenderNode;
  /** Position in the target's local coordinates. */
  localPosition: Offset;
  /** Maps global coordinates into the target's local space. */
  transform: Transform2D;
}>;

export class HitTestResult {
  readonly #entries: HitTestEntry[] = [];
  readonly #transforms: Transform2D[] = [IDENTITY_TRANSFORM];

  /** Innermost first. */
  get entries(): readonly HitTestEntry[] {
    return this.#entries;
  }

  get path(): readonly AnyRenderNode[] {
    return this.#entries.map((entry) => entry.target);
  }

  get currentTransform(): Transform2D {
    return this.#transforms[this.#transforms.length - 1] ?? IDENTITY_TRANSFORM;
  }

  add(target: AnyRenderNode, localPosition: Offset): void {
    this.#entries.push(Object.freeze({ target, localPosition, transform: this.currentTransform }));
  }

  /** Push a step that maps the current local space into a child's space. */
  pushTransform(step: Transform2D): void {
    this.#transforms.push(compose(step, this.currentTransform));
  }

  /** Enter a child painted at `offset` in the current local space. */
  pushOffset(offset: Offset): void {
    this.pushTransform(translation(-offset.x, -offset.y));
  }

  popTransform(): void {
    if (this.#transforms.length <= 1) {
      throwCode("ARBOR_INVALID_TREE", "popTransform: no transform to pop");
    }
    this.#transforms.pop();
  }

  addWithPaintOffset(
    offset: Offset,
    position: Offset,
    hitTest: (result: HitTestResult, transformed: Offset) => boolean,
  ): boolean {
    this.pushOffset(offset);
    try {
      return hitTest(this, subtractOffsets(position, offset));
    } finally {
      this.popTransform();
    }
  }

  /**
   * Enter a child whose paint transform maps child space into the current
   * space. A singular transform hits nothing.
   */
  addWithPaintTransform(
    paintTransform: Transform2D,
    position: Offset,
    hitTest: (result: HitTestResult, transformed: Offset) => boolean,
  ): boolean {
    const inverse = invert(paintTransform);
    if (inverse === null) return false;
    this.pushTransform(inverse);
    try {
      return hitTest(this, applyTransform(inverse, position));
    } finally {
      this.popTransform();
    }
  }
}

function createHitTestContext<C, G, P>(node: RenderNode<C, G, P>, geometry: G): HitTestContext<G, P> {
  const tree = node.tree;
  return {
    node,
    props: node.props,
    geometry,
    children: tree.childrenOf(node),
    offsetOf: (child) => tree.offsetOf(child),
    hitTestChild: (result, child, position) => hitTestNode(result, child, position),
  };
}

/** Hit test `node` at a position in its own local coordinates. */
export function hitTestNode<C, G, P>(
  result: HitTestResult,
  node: RenderNode<C, G, P>,
  position: Offset,
): boolean {
  const geometry = node.geometry;
  const constraints = node.constraints;
  if (constraints === null) return false;
  const kind = node.kind;
  if (!kind.protocol.contains(constraints, geometry, position)) return false;

  const ctx = createHitTestContext(node, geometry);
  const hit =
    (kind.hitTestChildren?.(ctx, result, position) ?? false) ||
    (kind.hitTestSelf?.(ctx, position) ?? false);
  if (hit) result.add(node, position);
  return hit;
}

/** Default container behavior: children at their paint offsets, last painted first. */
export function hitTestChildrenInReverse<G, P>(
  ctx: HitTestContext<G, P>,
  result: HitTestResult,
  position: Offset,
): boolean {
  for (let i = ctx.children.length - 1; i >= 0; i--) {
    const child = ctx.children[i];
    if (!child) continue;
    const hit = result.addWithPaintOffset(ctx.offsetOf(child), position, (r, local) =>
      ctx.hitTestChild(r, child, local),
    );
    if (hit) return true;
  }
  return false;
}

/**
 * Hit test the subtree under `root` at `position` (in root coordinates).
 * Requires an attached root with no pending layout.
 */
export function hitTest(root: AnyRenderNode, position: Offset): readonly HitTestEntry[] {
  const owner = root.owner;
  if (owner === null) {
    throwCode("ARBOR_DETACHED", `hitTest: ${root.label} is not attached to a pipeline owner`);
  }
  return owner.internal_runHitTest(() => {
    const result = new HitTestResult();
    hitTestNode(result, root, position);
    return result.entries;
  });
}
