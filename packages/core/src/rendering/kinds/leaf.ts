/**
 * packages/core/src/rendering/kinds/leaf.ts — Childless node with an intrinsic size.
 */

import { type BoxConstraints, boxProtocol, constrain } from "../../layout/constraints/box.js";
import type { Size } from "../../layout/types.js";
import type { HitTestEntry } from "../hitTest.js";
import { type PointerEvent, defineKind } from "../types.js";
import { nonNegative } from "./shared.js";

export type LeafProps = Readonly<{
  /** Preferred width; the incoming constraints win. */
  width?: number;
  height?: number;
  /** Defaults to true. */
  opaque?: boolean;
  background?: string;
  label?: string;
  onPointer?: (event: PointerEvent, entry: HitTestEntry) => void;
}>;

export const leafKind = defineKind<BoxConstraints, Size, LeafProps>({
  name: "leaf",
  protocol: boxProtocol,
  isRepaintBoundary: false,
  maxChildren: 0,

  performLayout(ctx, c) {
    return constrain(c, {
      width: nonNegative(ctx.props.width, 0),
      height: nonNegative(ctx.props.height, 0),
    });
  },

  hitTestSelf(ctx) {
    return ctx.props.opaque !== false;
  },

  handleEvent(ctx, event, entry) {
    ctx.props.onPointer?.(event, entry);
  },

  propsChanged(prev, next) {
    if (prev.width !== next.width || prev.height !== next.height) return "layout";
    return prev.background !== next.background ? "paint" : "none";
  },
});
