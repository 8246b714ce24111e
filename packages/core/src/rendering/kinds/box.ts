/**
 * packages/core/src/rendering/kinds/box.ts — General-purpose box container.
 *
 * Sizing per axis:
 *   - number: fixed extent
 *   - "N%" / "full": fraction of the parent's max constraint; an unbounded max
 *     makes the axis behave as "auto"
 *   - "auto" (default): shrink-wraps the children's extent (`left`/`top` slot
 *     position plus child size)
 *
 * `minWidth`/`maxWidth`/`minHeight`/`maxHeight` clamp the result, and the
 * incoming constraints clamp last. A box with two numeric axes is sized by its
 * parent and acts as a relayout boundary.
 *
 * Children overlap; each is laid out with loose constraints bounded by the
 * box's own extent on fixed axes.
 */

import {
  type BoxConstraints,
  boxConstraints,
  boxProtocol,
  constrain,
} from "../../layout/constraints/box.js";
import { clampExtent, resolveDimension } from "../../layout/dimension.js";
import { type Dimension, type Size, offset } from "../../layout/types.js";
import { type HitTestEntry, hitTestChildrenInReverse } from "../hitTest.js";
import { type Invalidation, type PointerEvent, defineKind } from "../types.js";
import { nonNegative, requireBoxChild } from "./shared.js";

export type BoxProps = Readonly<{
  width?: Dimension;
  height?: Dimension;
  minWidth?: number;
  maxWidth?: number;
  minHeight?: number;
  maxHeight?: number;
  /** Absorb hits on the box's own area. Defaults to false. */
  opaque?: boolean;
  /** Paint-only. */
  background?: string;
  label?: string;
  onPointer?: (event: PointerEvent, entry: HitTestEntry) => void;
}>;

function resolveAxis(
  value: Dimension | undefined,
  parentMax: number,
  min: number | undefined,
  max: number | undefined,
): number {
  return clampExtent(resolveDimension(value, parentMax), min, max);
}

function fixedSize(props: BoxProps, c: BoxConstraints): Size {
  return constrain(c, {
    width: resolveAxis(props.width, c.maxWidth, props.minWidth, props.maxWidth),
    height: resolveAxis(props.height, c.maxHeight, props.minHeight, props.maxHeight),
  });
}

function boxPropsChanged(prev: BoxProps, next: BoxProps): Invalidation {
  if (
    prev.width !== next.width ||
    prev.height !== next.height ||
    prev.minWidth !== next.minWidth ||
    prev.maxWidth !== next.maxWidth ||
    prev.minHeight !== next.minHeight ||
    prev.maxHeight !== next.maxHeight
  ) {
    return "layout";
  }
  return prev.background !== next.background ? "paint" : "none";
}

export const boxKind = defineKind<BoxConstraints, Size, BoxProps>({
  name: "box",
  protocol: boxProtocol,
  isRepaintBoundary: false,

  sizedByParent(props) {
    return typeof props.width === "number" && typeof props.height === "number";
  },

  performResize(props, c) {
    return fixedSize(props, c);
  },

  performLayout(ctx, c) {
    const props = ctx.props;
    const resized = ctx.resized;
    const width =
      resized?.width ?? resolveAxis(props.width, c.maxWidth, props.minWidth, props.maxWidth);
    const height =
      resized?.height ?? resolveAxis(props.height, c.maxHeight, props.minHeight, props.maxHeight);
    const autoWidth = Number.isNaN(width);
    const autoHeight = Number.isNaN(height);
    const innerMaxWidth = autoWidth ? c.maxWidth : Math.min(c.maxWidth, width);
    const innerMaxHeight = autoHeight ? c.maxHeight : Math.min(c.maxHeight, height);

    let contentWidth = 0;
    let contentHeight = 0;
    for (const raw of ctx.children) {
      const child = requireBoxChild(ctx.node, raw);
      const slot = ctx.slotOf(child);
      const left = nonNegative(slot.left, 0);
      const top = nonNegative(slot.top, 0);
      const childConstraints = boxConstraints({
        maxWidth: Math.max(0, innerMaxWidth - left),
        maxHeight: Math.max(0, innerMaxHeight - top),
      });
      if (autoWidth || autoHeight) {
        const childSize = ctx.layoutChild(child, childConstraints, { parentUsesSize: true });
        contentWidth = Math.max(contentWidth, left + childSize.width);
        contentHeight = Math.max(contentHeight, top + childSize.height);
      } else {
        ctx.layoutChild(child, childConstraints);
      }
      ctx.positionChild(child, offset(left, top));
    }

    if (resized !== null) return resized;
    return constrain(c, {
      width: autoWidth ? clampExtent(contentWidth, props.minWidth, props.maxWidth) : width,
      height: autoHeight ? clampExtent(contentHeight, props.minHeight, props.maxHeight) : height,
    });
  },

  hitTestSelf(ctx) {
    return ctx.props.opaque === true;
  },

  hitTestChildren(ctx, result, position) {
    return hitTestChildrenInReverse(ctx, result, position);
  },

  handleEvent(ctx, event, entry) {
    ctx.props.onPointer?.(event, entry);
  },

  propsChanged: boxPropsChanged,
});
