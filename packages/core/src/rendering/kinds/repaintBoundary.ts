/**
 * packages/core/src/rendering/kinds/repaintBoundary.ts — Isolates a subtree's paint.
 *
 * Layout passes straight through to the single child; paint invalidation below
 * this node stops here instead of reaching the enclosing layer.
 */

import { type BoxConstraints, boxProtocol, smallest } from "../../layout/constraints/box.js";
import type { Size } from "../../layout/types.js";
import { hitTestChildrenInReverse } from "../hitTest.js";
import { defineKind } from "../types.js";
import { requireBoxChild } from "./shared.js";

export type RepaintBoundaryProps = Readonly<{ label?: string }>;

export const repaintBoundaryKind = defineKind<BoxConstraints, Size, RepaintBoundaryProps>({
  name: "repaintBoundary",
  protocol: boxProtocol,
  isRepaintBoundary: true,
  maxChildren: 1,

  performLayout(ctx, c) {
    const raw = ctx.children[0];
    if (raw === undefined) return smallest(c);
    const child = requireBoxChild(ctx.node, raw);
    return ctx.layoutChild(child, c, { parentUsesSize: true });
  },

  hitTestChildren(ctx, result, position) {
    return hitTestChildrenInReverse(ctx, result, position);
  },

  propsChanged() {
    return "none";
  },
});
