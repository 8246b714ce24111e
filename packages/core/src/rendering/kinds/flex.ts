/**
 * packages/core/src/rendering/kinds/flex.ts — Row/column stacking.
 *
 * Children without a slot `flex` weight are laid out first, unbounded along
 * the main axis. The main-axis space left after them and the gaps is shared
 * among weighted children in proportion to their weight, each receiving tight
 * main-axis constraints. Under an unbounded main axis weights are ignored.
 *
 * The flex fills its bounded main axis when any child is weighted; otherwise
 * it shrink-wraps. Cross extent is the largest child's, or the full cross
 * constraint with `crossAlign: "stretch"`.
 */

import {
  type BoxConstraints,
  boxConstraints,
  boxProtocol,
  constrain,
} from "../../layout/constraints/box.js";
import {
  type Axis,
  type Size,
  axisOffset,
  axisSize,
  crossExtentOf,
  mainExtentOf,
} from "../../layout/types.js";
import { hitTestChildrenInReverse } from "../hitTest.js";
import { defineKind } from "../types.js";
import { type BoxNode, nonNegative, requireBoxChild } from "./shared.js";

export type FlexProps = Readonly<{
  /** Main axis. Defaults to "horizontal" (a row). */
  direction?: Axis;
  gap?: number;
  crossAlign?: "start" | "stretch";
  opaque?: boolean;
  label?: string;
}>;

function childConstraints(
  axis: Axis,
  minMain: number,
  maxMain: number,
  minCross: number,
  maxCross: number,
): BoxConstraints {
  if (axis === "horizontal") {
    return boxConstraints({
      minWidth: minMain,
      maxWidth: maxMain,
      minHeight: minCross,
      maxHeight: maxCross,
    });
  }
  return boxConstraints({
    minWidth: minCross,
    maxWidth: maxCross,
    minHeight: minMain,
    maxHeight: maxMain,
  });
}

export const flexKind = defineKind<BoxConstraints, Size, FlexProps>({
  name: "flex",
  protocol: boxProtocol,
  isRepaintBoundary: false,

  performLayout(ctx, c) {
    const props = ctx.props;
    const axis = props.direction ?? "horizontal";
    const gap = nonNegative(props.gap, 0);
    const maxMain = axis === "horizontal" ? c.maxWidth : c.maxHeight;
    const maxCross = axis === "horizontal" ? c.maxHeight : c.maxWidth;
    const stretch = props.crossAlign === "stretch" && Number.isFinite(maxCross);
    const minCross = stretch ? maxCross : 0;
    const boundedMain = Number.isFinite(maxMain);

    const children: BoxNode[] = ctx.children.map((raw) => requireBoxChild(ctx.node, raw));
    const mainSizes = new Array<number>(children.length).fill(0);
    let crossExtent = 0;
    let usedMain = gap * Math.max(0, children.length - 1);
    let totalFlex = 0;

    children.forEach((child, i) => {
      const weight = boundedMain ? nonNegative(ctx.slotOf(child).flex, 0) : 0;
      if (weight > 0) {
        totalFlex += weight;
        return;
      }
      const size = ctx.layoutChild(
        child,
        childConstraints(axis, 0, Number.POSITIVE_INFINITY, minCross, maxCross),
        { parentUsesSize: true },
      );
      mainSizes[i] = mainExtentOf(axis, size);
      usedMain += mainExtentOf(axis, size);
      crossExtent = Math.max(crossExtent, crossExtentOf(axis, size));
    });

    if (totalFlex > 0) {
      const perFlex = Math.max(0, maxMain - usedMain) / totalFlex;
      children.forEach((child, i) => {
        const weight = nonNegative(ctx.slotOf(child).flex, 0);
        if (weight <= 0) return;
        const extent = perFlex * weight;
        const size = ctx.layoutChild(
          child,
          childConstraints(axis, extent, extent, minCross, maxCross),
          { parentUsesSize: true },
        );
        mainSizes[i] = mainExtentOf(axis, size);
        usedMain += mainExtentOf(axis, size);
        crossExtent = Math.max(crossExtent, crossExtentOf(axis, size));
      });
    }

    let cursor = 0;
    children.forEach((child, i) => {
      ctx.positionChild(child, axisOffset(axis, cursor, 0));
      cursor += (mainSizes[i] ?? 0) + gap;
    });

    const main = totalFlex > 0 ? maxMain : usedMain;
    const cross = stretch ? maxCross : crossExtent;
    return constrain(c, axisSize(axis, main, cross));
  },

  hitTestSelf(ctx) {
    return ctx.props.opaque === true;
  },

  hitTestChildren(ctx, result, position) {
    return hitTestChildrenInReverse(ctx, result, position);
  },
});
