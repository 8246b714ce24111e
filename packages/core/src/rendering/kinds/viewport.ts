/**
 * packages/core/src/rendering/kinds/viewport.ts — Box that scrolls sliver children.
 *
 * A viewport takes the biggest size its constraints allow and lays out its
 * sliver children one after another along `axis`. Each sliver receives the
 * part of `scrollOffset` that falls inside it and the paint extent left by the
 * slivers before it.
 */

import {
  type BoxConstraints,
  biggest,
  boxProtocol,
  hasBoundedHeight,
  hasBoundedWidth,
} from "../../layout/constraints/box.js";
import { sliverConstraints } from "../../layout/constraints/sliver.js";
import {
  type Axis,
  type Size,
  axisOffset,
  crossExtentOf,
  mainExtentOf,
} from "../../layout/types.js";
import { hitTestChildrenInReverse } from "../hitTest.js";
import { defineKind } from "../types.js";
import { nonNegative, requireSliverChild } from "./shared.js";

export type ViewportProps = Readonly<{
  /** Scroll axis. Defaults to "vertical". */
  axis?: Axis;
  scrollOffset?: number;
  /** Extra main-axis extent laid out beyond the visible area. */
  cacheExtent?: number;
  opaque?: boolean;
  label?: string;
}>;

export const viewportKind = defineKind<BoxConstraints, Size, ViewportProps>({
  name: "viewport",
  protocol: boxProtocol,
  isRepaintBoundary: false,

  sizedByParent() {
    return true;
  },

  performResize(_props, c) {
    return biggest(c);
  },

  performLayout(ctx, c) {
    const props = ctx.props;
    const axis = props.axis ?? "vertical";
    const bounded = axis === "vertical" ? hasBoundedHeight(c) : hasBoundedWidth(c);
    if (!bounded) {
      ctx.warn("unbounded", `received unbounded ${axis} constraints; using the minimum extent`);
    }

    const size = ctx.resized ?? biggest(c);
    const mainExtent = mainExtentOf(axis, size);
    const crossExtent = crossExtentOf(axis, size);
    const scrollOffset = nonNegative(props.scrollOffset, 0);
    const cacheExtent = nonNegative(props.cacheExtent, 0);

    let preceding = 0;
    let layoutOffset = 0;
    for (const raw of ctx.children) {
      const sliver = requireSliverChild(ctx.node, raw);
      const sliverScrollOffset = Math.max(0, scrollOffset - preceding);
      const remainingPaintExtent = Math.max(0, mainExtent - layoutOffset);
      const geometry = ctx.layoutChild(
        sliver,
        sliverConstraints({
          axis,
          scrollOffset: sliverScrollOffset,
          precedingScrollExtent: preceding,
          remainingPaintExtent,
          crossAxisExtent: crossExtent,
          viewportMainAxisExtent: mainExtent,
          remainingCacheExtent: remainingPaintExtent + cacheExtent,
        }),
        { parentUsesSize: true },
      );
      ctx.positionChild(sliver, axisOffset(axis, layoutOffset, 0));
      layoutOffset += geometry.layoutExtent;
      preceding += geometry.scrollExtent;
    }

    return undefined;
  },

  hitTestSelf(ctx) {
    return ctx.props.opaque === true;
  },

  hitTestChildren(ctx, result, position) {
    return hitTestChildrenInReverse(ctx, result, position);
  },
});
