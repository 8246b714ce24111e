/**
 * packages/core/src/rendering/renderNode.ts — Render node state machine.
 *
 * Why: Every node kind shares the same layout/paint bookkeeping. This module
 * implements it once; kind-specific behavior is delegated to the node's
 * `RenderKind`.
 *
 * Layout state per node:
 *   - clean -> dirty on markNeedsLayout (or when a child that the node sizes
 *     itself from is dirtied)
 *   - dirty -> clean when layout completes with well-formed constraints
 *
 * Relayout boundary: recomputed on every layout as
 * `!parentUsesSize || sizedByParent || constraints are tight || no parent`.
 * Dirtying a non-boundary node walks up to the nearest boundary, which is the
 * only node registered with the pipeline owner.
 *
 * Paint state mirrors layout, scoped by repaint boundaries.
 *
 * Tree links (parent, children, slots, offsets) live in the owning
 * RenderTree's arena and are addressed by id.
 */

import { throwCode } from "../errors.js";
import type { Offset } from "../layout/types.js";
import type { PipelineOwner } from "./pipelineOwner.js";
import type { RenderTree } from "./renderTree.js";
import type {
  ChildSlot,
  LayoutChildOptions,
  LayoutContext,
  RenderKind,
  RenderNodeId,
} from "./types.js";

export type AnyRenderNode = RenderNode<unknown, unknown, unknown>;

export class RenderNode<C, G, P> {
  readonly id: RenderNodeId;
  readonly kind: RenderKind<C, G, P>;
  readonly tree: RenderTree;

  #props: P;
  #sizedByParent: boolean;
  #needsLayout = true;
  #needsPaint = true;
  #isRelayoutBoundary: boolean | null = null;
  #constraints: C | null = null;
  #rootConstraints: C | null = null;
  #geometry: G | null = null;
  #resizeKey: string | null = null;
  #paintOutput: unknown = null;
  #painted = false;
  #attached = false;
  #disposed = false;

  constructor(tree: RenderTree, id: RenderNodeId, kind: RenderKind<C, G, P>, props: P) {
    this.tree = tree;
    this.id = id;
    this.kind = kind;
    this.#props = props;
    this.#sizedByParent = kind.sizedByParent?.(props) ?? false;
  }

  get label(): string {
    return `${this.kind.name}#${String(this.id)}`;
  }

  get props(): P {
    return this.#props;
  }

  get sizedByParent(): boolean {
    return this.#sizedByParent;
  }

  get needsLayout(): boolean {
    return this.#needsLayout;
  }

  get needsPaint(): boolean {
    return this.#needsPaint;
  }

  /** False until the node has been laid out once. */
  get isRelayoutBoundary(): boolean {
    return this.#isRelayoutBoundary === true;
  }

  get isRepaintBoundary(): boolean {
    return this.kind.isRepaintBoundary;
  }

  /** Constraints of the last layout, or null before the first one. */
  get constraints(): C | null {
    return this.#constraints;
  }

  /** Resolved geometry. Throws ARBOR_NOT_LAID_OUT while layout is pending. */
  get geometry(): G {
    this.#assertAlive("geometry");
    if (this.#needsLayout || this.#geometry === null) {
      throwCode("ARBOR_NOT_LAID_OUT", `${this.label}: geometry read while layout is pending`);
    }
    return this.#geometry;
  }

  /** Geometry of the last completed layout, even if the node is dirty again. */
  get lastGeometry(): G | null {
    return this.#geometry;
  }

  /** Opaque handle returned by the paint backend for this repaint boundary. */
  get paintOutput(): unknown {
    return this.#paintOutput;
  }

  get hasPainted(): boolean {
    return this.#painted;
  }

  get attached(): boolean {
    return this.#attached;
  }

  get disposed(): boolean {
    return this.#disposed;
  }

  get owner(): PipelineOwner | null {
    return this.#attached ? this.tree.owner : null;
  }

  get parent(): AnyRenderNode | null {
    return this.tree.parentOf(this);
  }

  get depth(): number {
    return this.tree.depthOf(this);
  }

  /**
   * Mark layout dirty. A relayout boundary (or the root) registers itself
   * with the pipeline owner; any other node forwards to its parent. Calling it
   * again before the next flush has no further effect.
   */
  markNeedsLayout(): void {
    this.#assertAlive("markNeedsLayout");
    if (this.#needsLayout) return;
    const parent = this.tree.parentOf(this);
    if (parent === null || this.#isRelayoutBoundary === true) {
      this.#needsLayout = true;
      this.owner?.internal_scheduleLayout(this);
      return;
    }
    this.markParentNeedsLayout();
  }

  /** Mark this node dirty and forward the request to the parent. */
  markParentNeedsLayout(): void {
    this.#assertAlive("markParentNeedsLayout");
    this.#needsLayout = true;
    const parent = this.tree.parentOf(this);
    if (parent === null) {
      this.owner?.internal_scheduleLayout(this);
      return;
    }
    parent.markNeedsLayout();
  }

  /**
   * Re-read `sizedByParent` from the kind and dirty both this node and its
   * parent, since the parent may have cached the old boundary decision.
   */
  markNeedsLayoutForSizedByParentChange(): void {
    this.#assertAlive("markNeedsLayoutForSizedByParentChange");
    this.#sizedByParent = this.kind.sizedByParent?.(this.#props) ?? false;
    this.#resizeKey = null;
    this.markNeedsLayout();
    this.markParentNeedsLayout();
  }

  markNeedsPaint(): void {
    this.#assertAlive("markNeedsPaint");
    if (this.#needsPaint) return;
    this.#needsPaint = true;
    if (this.kind.isRepaintBoundary) {
      this.owner?.internal_schedulePaint(this);
      return;
    }
    const parent = this.tree.parentOf(this);
    if (parent !== null) {
      parent.markNeedsPaint();
      return;
    }
    this.owner?.internal_schedulePaint(this);
  }

  /* --- Internal API (RenderTree, PipelineOwner, LayoutContext) --- */

  /** Lay out under `constraints`; called through a parent's LayoutContext. */
  internal_layout(constraints: C, parentUsesSize: boolean): G {
    const owner = this.#requireOwner("layout");
    const protocol = this.kind.protocol;
    if (!protocol.isNormalized(constraints)) {
      throwCode(
        "ARBOR_INVALID_CONSTRAINTS",
        `${this.label}: ${protocol.describe(constraints)} is not well-formed`,
      );
    }
    const isBoundary =
      !parentUsesSize ||
      this.#sizedByParent ||
      protocol.isTight(constraints) ||
      this.tree.parentOf(this) === null;

    const previous = this.#constraints;
    const cached = this.#geometry;
    if (
      !this.#needsLayout &&
      previous !== null &&
      cached !== null &&
      protocol.equals(previous, constraints)
    ) {
      this.#isRelayoutBoundary = isBoundary;
      owner.internal_recordCacheHit();
      return cached;
    }

    this.#isRelayoutBoundary = isBoundary;
    return this.#layoutWith(owner, constraints);
  }

  /** Re-run layout of a dirty relayout boundary with its last constraints. */
  internal_layoutAsBoundary(): void {
    const owner = this.#requireOwner("layout");
    if (this.tree.parentOf(this) === null) {
      const rootConstraints = this.#rootConstraints;
      if (rootConstraints === null) {
        throwCode("ARBOR_INVALID_TREE", `${this.label}: root has no constraints`);
      }
      this.internal_layout(rootConstraints, false);
      return;
    }
    const constraints = this.#constraints;
    // Never laid out: the parent's next layout reaches this node.
    if (constraints === null) return;
    this.#layoutWith(owner, constraints);
  }

  internal_setRootConstraints(constraints: C): boolean {
    const previous = this.#rootConstraints;
    this.#rootConstraints = constraints;
    return previous === null || !this.kind.protocol.equals(previous, constraints);
  }

  /** Returns true when the new props flip `sizedByParent`. */
  internal_setProps(props: P): boolean {
    this.#props = props;
    this.#resizeKey = null;
    return (this.kind.sizedByParent?.(props) ?? false) !== this.#sizedByParent;
  }

  internal_attach(): void {
    this.#attached = true;
    if (this.#needsLayout && this.#isRelayoutBoundary !== null) {
      this.#needsLayout = false;
      this.markNeedsLayout();
    }
    if (this.#needsPaint && this.#painted) {
      this.#needsPaint = false;
      this.markNeedsPaint();
    }
  }

  /** Register a never-laid-out root for its first frame. */
  internal_scheduleInitialFrame(): void {
    const owner = this.owner;
    if (owner === null) return;
    this.#needsLayout = true;
    this.#needsPaint = true;
    owner.internal_scheduleLayout(this);
    owner.internal_schedulePaint(this);
  }

  internal_detach(): void {
    this.#attached = false;
  }

  internal_dispose(): void {
    this.#attached = false;
    this.#disposed = true;
    this.#geometry = null;
    this.#paintOutput = null;
  }

  internal_completePaint(output: unknown): void {
    this.#paintOutput = output;
    this.#painted = true;
    this.#needsPaint = false;
  }

  internal_clearNeedsPaint(): void {
    this.#needsPaint = false;
  }

  #assertAlive(method: string): void {
    if (this.#disposed) {
      throwCode("ARBOR_DISPOSED", `${method}: ${this.label} was removed from its tree`);
    }
  }

  #requireOwner(method: string): PipelineOwner {
    this.#assertAlive(method);
    const owner = this.owner;
    if (owner === null) {
      throwCode("ARBOR_DETACHED", `${method}: ${this.label} is not attached to a pipeline owner`);
    }
    return owner;
  }

  #resize(owner: PipelineOwner, constraints: C): G {
    const kind = this.kind;
    if (kind.performResize === undefined) {
      throwCode("ARBOR_INVALID_CONFIG", `${this.label}: sizedByParent without performResize`);
    }
    const key = kind.protocol.cacheKey(constraints);
    const cached = this.#geometry;
    if (this.#resizeKey === key && cached !== null) return cached;

    const geometry = kind.performResize(this.#props, constraints);
    owner.internal_recordResize();
    if (owner.config.checkGeometry && !kind.protocol.satisfies(constraints, geometry)) {
      throwCode(
        "ARBOR_GEOMETRY_VIOLATION",
        `${this.label}: performResize produced ${kind.protocol.describeGeometry(geometry)} ` +
          `outside ${kind.protocol.describe(constraints)}`,
      );
    }
    this.#resizeKey = key;
    return geometry;
  }

  #layoutWith(owner: PipelineOwner, constraints: C): G {
    const protocol = this.kind.protocol;
    this.#constraints = constraints;

    let resized: G | null = null;
    if (this.#sizedByParent) {
      resized = this.#resize(owner, constraints);
      this.#geometry = resized;
    }

    const ctx = new NodeLayoutContext<C, G, P>(this, resized, owner);
    const result = this.kind.performLayout(ctx, constraints);

    let geometry: G;
    if (resized !== null) {
      if (result !== undefined && !protocol.geometryEquals(result, resized)) {
        throwCode(
          "ARBOR_GEOMETRY_VIOLATION",
          `${this.label}: performLayout changed the size of a node sized by its parent`,
        );
      }
      geometry = resized;
    } else {
      if (result === undefined) {
        throwCode("ARBOR_GEOMETRY_VIOLATION", `${this.label}: performLayout resolved no geometry`);
      }
      geometry = result;
    }

    if (owner.config.checkGeometry) {
      if (!protocol.satisfies(constraints, geometry)) {
        throwCode(
          "ARBOR_GEOMETRY_VIOLATION",
          `${this.label}: ${protocol.describeGeometry(geometry)} does not satisfy ` +
            protocol.describe(constraints),
        );
      }
      for (const child of ctx.children) {
        if (child.needsLayout) {
          throwCode(
            "ARBOR_LAYOUT_INCOMPLETE",
            `${this.label}: performLayout left ${child.label} without layout`,
          );
        }
      }
    }

    this.#geometry = geometry;
    this.#needsLayout = false;
    owner.internal_recordLayout();
    this.markNeedsPaint();
    return geometry;
  }
}

class NodeLayoutContext<C, G, P> implements LayoutContext<G, P> {
  readonly node: RenderNode<C, G, P>;
  readonly resized: G | null;
  readonly children: readonly AnyRenderNode[];
  readonly #owner: PipelineOwner;

  constructor(node: RenderNode<C, G, P>, resized: G | null, owner: PipelineOwner) {
    this.node = node;
    this.resized = resized;
    this.children = node.tree.childrenOf(node);
    this.#owner = owner;
  }

  get props(): P {
    return this.node.props;
  }

  slotOf(child: AnyRenderNode): ChildSlot {
    return this.node.tree.slotOf(child);
  }

  layoutChild<CC, CG>(
    child: RenderNode<CC, CG, unknown>,
    constraints: CC,
    options: Readonly<{ parentUsesSize: true }>,
  ): CG;
  layoutChild<CC, CG>(
    child: RenderNode<CC, CG, unknown>,
    constraints: CC,
    options?: Readonly<{ parentUsesSize?: false }>,
  ): void;
  layoutChild<CC, CG>(
    child: RenderNode<CC, CG, unknown>,
    constraints: CC,
    options?: LayoutChildOptions,
  ): CG | undefined {
    this.#assertChild(child, "layoutChild");
    const parentUsesSize = options?.parentUsesSize === true;
    const geometry = child.internal_layout(constraints, parentUsesSize);
    return parentUsesSize ? geometry : undefined;
  }

  positionChild(child: AnyRenderNode, offset: Offset): void {
    this.#assertChild(child, "positionChild");
    this.node.tree.internal_setOffset(child, offset);
  }

  defer(task: () => void): void {
    this.#owner.defer(task);
  }

  warn(key: string, detail: string): void {
    this.#owner.internal_warn("layout", `${this.node.kind.name}:${key}`, `${this.node.label}: ${detail}`);
  }

  #assertChild(child: AnyRenderNode, method: string): void {
    if (child.tree.parentOf(child) !== this.node) {
      throwCode("ARBOR_INVALID_TREE", `${method}: ${child.label} is not a child of ${this.node.label}`);
    }
  }
}
