/**
 * packages/core/src/rendering/kinds/shared.ts — Helpers shared by built-in kinds.
 */

import { throwCode } from "../../errors.js";
import { type BoxConstraints, boxProtocol } from "../../layout/constraints/box.js";
import {
  type SliverConstraints,
  type SliverGeometry,
  sliverProtocol,
} from "../../layout/constraints/sliver.js";
import type { Size } from "../../layout/types.js";
import type { AnyRenderNode, RenderNode } from "../renderNode.js";

export type BoxNode = RenderNode<BoxConstraints, Size, unknown>;
export type SliverNode = RenderNode<SliverConstraints, SliverGeometry, unknown>;

export function isBoxNode(node: AnyRenderNode): node is BoxNode {
  return node.kind.protocol === boxProtocol;
}

export function isSliverNode(node: AnyRenderNode): node is SliverNode {
  return node.kind.protocol === sliverProtocol;
}

export function requireBoxChild(parent: AnyRenderNode, child: AnyRenderNode): BoxNode {
  if (!isBoxNode(child)) {
    throwCode(
      "ARBOR_INVALID_TREE",
      `${parent.label}: child ${child.label} uses ${child.kind.protocol.name} constraints, expected box`,
    );
  }
  return child;
}

export function requireSliverChild(parent: AnyRenderNode, child: AnyRenderNode): SliverNode {
  if (!isSliverNode(child)) {
    throwCode(
      "ARBOR_INVALID_TREE",
      `${parent.label}: child ${child.label} uses ${child.kind.protocol.name} constraints, expected sliver`,
    );
  }
  return child;
}

/** Non-negative finite number, or `fallback`. */
export function nonNegative(raw: number | undefined, fallback: number): number {
  if (raw === undefined || !Number.isFinite(raw)) return fallback;
  return raw < 0 ? 0 : raw;
}
