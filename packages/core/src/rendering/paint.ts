/**
 * packages/core/src/rendering/paint.ts — Paint layers handed to a backend.
 *
 * Painting itself is a collaborator. The core only groups nodes into layers:
 * a repaint boundary paints itself and every descendant down to (but not
 * into) nested boundaries, which appear as child layers with their own cached
 * output.
 */

import { type Offset, ZERO_OFFSET, addOffsets } from "../layout/types.js";
import type { AnyRenderNode } from "./renderNode.js";

/** A node in a layer, with its offset from the layer's origin. */
export type PaintMember = Readonly<{
  node: AnyRenderNode;
  offset: Offset;
}>;

export type PaintLayer = Readonly<{
  boundary: AnyRenderNode;
  /** Nodes painted into this layer, boundary first, in paint order. */
  members: readonly PaintMember[];
  /** Nested repaint boundaries, each painted into its own layer. */
  childLayers: readonly PaintMember[];
}>;

export type PaintRequest = Readonly<{
  boundary: AnyRenderNode;
  geometry: unknown;
  members: readonly PaintMember[];
  childLayers: readonly PaintMember[];
  /** Output this backend returned for the boundary last frame, or null. */
  previous: unknown;
}>;

export type PaintBackend = Readonly<{
  paint(request: PaintRequest): unknown;
}>;

export function collectPaintLayer(boundary: AnyRenderNode): PaintLayer {
  const members: PaintMember[] = [];
  const childLayers: PaintMember[] = [];
  const tree = boundary.tree;
  const stack: PaintMember[] = [{ node: boundary, offset: ZERO_OFFSET }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) continue;
    members.push(entry);
    const children = tree.childrenOf(entry.node);
    for (const child of children) {
      if (child.isRepaintBoundary) {
        childLayers.push({ node: child, offset: addOffsets(entry.offset, tree.offsetOf(child)) });
      }
    }
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (!child || child.isRepaintBoundary) continue;
      stack.push({ node: child, offset: addOffsets(entry.offset, tree.offsetOf(child)) });
    }
  }

  return { boundary, members, childLayers };
}
