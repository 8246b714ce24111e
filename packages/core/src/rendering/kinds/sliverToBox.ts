/**
 * packages/core/src/rendering/kinds/sliverToBox.ts — Sliver wrapping one box child.
 */

import {
  type SliverConstraints,
  type SliverGeometry,
  ZERO_SLIVER_GEOMETRY,
  asBoxConstraints,
  calculatePaintOffset,
  sliverGeometry,
  sliverProtocol,
} from "../../layout/constraints/sliver.js";
import { axisOffset, mainExtentOf } from "../../layout/types.js";
import { hitTestChildrenInReverse } from "../hitTest.js";
import { defineKind } from "../types.js";
import { requireBoxChild } from "./shared.js";

export type SliverToBoxProps = Readonly<{ label?: string }>;

export const sliverToBoxKind = defineKind<SliverConstraints, SliverGeometry, SliverToBoxProps>({
  name: "sliverToBox",
  protocol: sliverProtocol,
  isRepaintBoundary: false,
  maxChildren: 1,

  performLayout(ctx, c) {
    const raw = ctx.children[0];
    if (raw === undefined) return ZERO_SLIVER_GEOMETRY;
    const child = requireBoxChild(ctx.node, raw);
    const size = ctx.layoutChild(child, asBoxConstraints(c), { parentUsesSize: true });
    const childExtent = mainExtentOf(c.axis, size);
    ctx.positionChild(child, axisOffset(c.axis, -c.scrollOffset, 0));
    return sliverGeometry({
      scrollExtent: childExtent,
      paintExtent: calculatePaintOffset(c, 0, childExtent),
      maxPaintExtent: childExtent,
    });
  },

  hitTestChildren(ctx, result, position) {
    return hitTestChildrenInReverse(ctx, result, position);
  },
});
