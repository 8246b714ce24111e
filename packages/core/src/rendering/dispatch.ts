/**
 * packages/core/src/rendering/dispatch.ts — Pointer event delivery.
 *
 * Delivery follows the hit-test path: "bubble" (default) runs handlers
 * innermost first, "capture" outermost first. A handler can stop delivery to
 * the remaining entries; props it sets take effect through the tree's normal
 * invalidation and are visible at the next flush.
 */

import { type HitTestEntry, hitTest } from "./hitTest.js";
import type { AnyRenderNode } from "./renderNode.js";
import type { EventContext, PointerEvent } from "./types.js";

export type DispatchOrder = "bubble" | "capture";

export type DispatchOptions = Readonly<{ order?: DispatchOrder }>;

export type DispatchResult = Readonly<{
  entries: readonly HitTestEntry[];
  /** Nodes whose handler ran, in delivery order. */
  delivered: readonly AnyRenderNode[];
  stopped: boolean;
}>;

export function dispatchPointerEvent(
  root: AnyRenderNode,
  event: PointerEvent,
  options: DispatchOptions = {},
): DispatchResult {
  const entries = hitTest(root, event.position);
  const ordered = options.order === "capture" ? [...entries].reverse() : entries;
  const delivered: AnyRenderNode[] = [];
  const state = { stopped: false };

  for (const entry of ordered) {
    const target = entry.target;
    if (target.disposed || target.kind.handleEvent === undefined) continue;
    const ctx: EventContext<unknown> = {
      node: target,
      props: target.props,
      setProps: (next) => {
        target.tree.setProps(target, next);
      },
      markNeedsLayout: () => {
        target.markNeedsLayout();
      },
      markNeedsPaint: () => {
        target.markNeedsPaint();
      },
      stopPropagation: () => {
        state.stopped = true;
      },
    };
    target.kind.handleEvent?.(ctx, event, entry);
    delivered.push(target);
    if (state.stopped) break;
  }

  return Object.freeze({ entries, delivered, stopped: state.stopped });
}
