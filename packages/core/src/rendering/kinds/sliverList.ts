/**
 * packages/core/src/rendering/kinds/sliverList.ts — Fixed-extent list sliver.
 *
 * Every box child is laid out tight to `itemExtent` on the main axis and to
 * the cross-axis extent, then placed relative to the sliver's visible origin
 * (children scrolled past sit at negative offsets).
 */

import {
  type SliverConstraints,
  type SliverGeometry,
  asBoxConstraints,
  calculatePaintOffset,
  sliverGeometry,
  sliverProtocol,
} from "../../layout/constraints/sliver.js";
import { axisOffset } from "../../layout/types.js";
import { hitTestChildrenInReverse } from "../hitTest.js";
import { defineKind } from "../types.js";
import { nonNegative, requireBoxChild } from "./shared.js";

export type SliverListProps = Readonly<{
  itemExtent: number;
  label?: string;
}>;

export const sliverListKind = defineKind<SliverConstraints, SliverGeometry, SliverListProps>({
  name: "sliverList",
  protocol: sliverProtocol,
  isRepaintBoundary: false,

  performLayout(ctx, c) {
    const itemExtent = nonNegative(ctx.props.itemExtent, 0);
    const itemConstraints = asBoxConstraints(c, { minExtent: itemExtent, maxExtent: itemExtent });

    ctx.children.forEach((raw, i) => {
      const child = requireBoxChild(ctx.node, raw);
      ctx.layoutChild(child, itemConstraints);
      ctx.positionChild(child, axisOffset(c.axis, i * itemExtent - c.scrollOffset, 0));
    });

    const scrollExtent = ctx.children.length * itemExtent;
    const paintExtent = calculatePaintOffset(c, 0, scrollExtent);
    return sliverGeometry({ scrollExtent, paintExtent, maxPaintExtent: scrollExtent });
  },

  hitTestChildren(ctx, result, position) {
    return hitTestChildrenInReverse(ctx, result, position);
  },
});
