/**
 * packages/core/src/rendering/renderTree.ts — Arena of render nodes.
 *
 * Why: Nodes are owned by the tree, addressed by stable integer ids. Parent
 * links and child lists live in a side table so that a node never holds a
 * strong reference to its parent, and so that removal is a single arena
 * operation.
 *
 * Mutations are rejected while the attached pipeline owner runs a pass; kinds
 * that need to restructure the tree during layout queue the change with
 * `ctx.defer`.
 */

import { throwCode } from "../errors.js";
import { type Offset, ZERO_OFFSET } from "../layout/types.js";
import type { PipelineOwner } from "./pipelineOwner.js";
import { type AnyRenderNode, RenderNode } from "./renderNode.js";
import type { ChildSlot, RenderKind, RenderNodeId } from "./types.js";

type NodeLinks = {
  parent: RenderNodeId | null;
  children: RenderNodeId[];
  slot: ChildSlot;
  offset: Offset;
  depth: number;
};

const EMPTY_SLOT: ChildSlot = Object.freeze({});

export class RenderTree {
  readonly label: string;
  readonly #nodes = new Map<RenderNodeId, AnyRenderNode>();
  readonly #links = new Map<RenderNodeId, NodeLinks>();
  #nextId = 1;
  #root: AnyRenderNode | null = null;
  #owner: PipelineOwner | null = null;

  constructor(label = "tree") {
    this.label = label;
  }

  get owner(): PipelineOwner | null {
    return this.#owner;
  }

  get root(): AnyRenderNode | null {
    return this.#root;
  }

  /** Number of live nodes in the arena. */
  get size(): number {
    return this.#nodes.size;
  }

  createNode<C, G, P>(kind: RenderKind<C, G, P>, props: P): RenderNode<C, G, P> {
    const id = this.#nextId++;
    const node = new RenderNode(this, id, kind, props);
    this.#nodes.set(id, node);
    this.#links.set(id, { parent: null, children: [], slot: EMPTY_SLOT, offset: ZERO_OFFSET, depth: 0 });
    return node;
  }

  get(id: RenderNodeId): AnyRenderNode | undefined {
    return this.#nodes.get(id);
  }

  has(node: AnyRenderNode): boolean {
    return this.#nodes.get(node.id) === node;
  }

  parentOf(node: AnyRenderNode): AnyRenderNode | null {
    const parentId = this.#links.get(node.id)?.parent ?? null;
    return parentId === null ? null : (this.#nodes.get(parentId) ?? null);
  }

  childrenOf(node: AnyRenderNode): readonly AnyRenderNode[] {
    const links = this.#links.get(node.id);
    if (!links) return [];
    const out: AnyRenderNode[] = [];
    for (const id of links.children) {
      const child = this.#nodes.get(id);
      if (child) out.push(child);
    }
    return out;
  }

  slotOf(node: AnyRenderNode): ChildSlot {
    return this.#links.get(node.id)?.slot ?? EMPTY_SLOT;
  }

  /** Paint offset of `node` in its parent's coordinates. */
  offsetOf(node: AnyRenderNode): Offset {
    return this.#links.get(node.id)?.offset ?? ZERO_OFFSET;
  }

  depthOf(node: AnyRenderNode): number {
    return this.#links.get(node.id)?.depth ?? 0;
  }

  /** True when `ancestor` is `node` or one of its ancestors. */
  isAncestorOrSelf(ancestor: AnyRenderNode, node: AnyRenderNode): boolean {
    let current: AnyRenderNode | null = node;
    while (current !== null) {
      if (current === ancestor) return true;
      current = this.parentOf(current);
    }
    return false;
  }

  /**
   * Install `node` as the root with the constraints its layout starts from.
   * Calling it again for the current root only updates the constraints;
   * installing a different node destroys the previous root's subtree.
   */
  setRoot<C, G, P>(node: RenderNode<C, G, P>, constraints: C): void {
    this.#assertMutable("setRoot");
    this.#assertOwned(node, "setRoot");
    if (this.#root === node) {
      if (node.internal_setRootConstraints(constraints)) node.markNeedsLayout();
      return;
    }
    if (this.parentOf(node) !== null) {
      throwCode("ARBOR_INVALID_TREE", `setRoot: ${node.label} already has a parent`);
    }
    const previous = this.#root;
    if (previous !== null) this.#destroySubtree(previous);

    this.#root = node;
    node.internal_setRootConstraints(constraints);
    this.#setDepth(node, 0);
    if (this.#owner !== null) {
      this.#attachSubtree(node);
      node.internal_scheduleInitialFrame();
    }
  }

  setRootConstraints<C, G, P>(node: RenderNode<C, G, P>, constraints: C): void {
    if (this.#root !== node) {
      throwCode("ARBOR_INVALID_TREE", `setRootConstraints: ${node.label} is not the root`);
    }
    this.setRoot(node, constraints);
  }

  adoptChild(
    parent: AnyRenderNode,
    child: AnyRenderNode,
    slot: ChildSlot = EMPTY_SLOT,
    index?: number,
  ): void {
    this.#assertMutable("adoptChild");
    this.#assertAdoptable(parent, child, "adoptChild");
    const parentLinks = this.#linksOf(parent);
    const max = parent.kind.maxChildren;
    if (max !== undefined && parentLinks.children.length >= max) {
      throwCode(
        "ARBOR_INVALID_TREE",
        `adoptChild: ${parent.label} accepts at most ${String(max)} child(ren)`,
      );
    }
    this.#link(parent, child, slot, index);
  }

  /** Remove `child` from `parent` and destroy its subtree. */
  dropChild(parent: AnyRenderNode, child: AnyRenderNode): void {
    this.#assertMutable("dropChild");
    this.#unlink(parent, child, "dropChild");
    this.#destroySubtree(child);
    parent.markNeedsLayout();
  }

  /** Swap `oldChild` for `newChild` at the same index; the slot carries over unless given. */
  replaceChild(
    parent: AnyRenderNode,
    oldChild: AnyRenderNode,
    newChild: AnyRenderNode,
    slot?: ChildSlot,
  ): void {
    this.#assertMutable("replaceChild");
    this.#assertOwned(parent, "replaceChild");
    this.#assertOwned(oldChild, "replaceChild");
    const index = this.#linksOf(parent).children.indexOf(oldChild.id);
    if (index < 0 || this.parentOf(oldChild) !== parent) {
      throwCode(
        "ARBOR_INVALID_TREE",
        `replaceChild: ${oldChild.label} is not a child of ${parent.label}`,
      );
    }
    // Nothing is unlinked until the replacement is known to be valid.
    this.#assertAdoptable(parent, newChild, "replaceChild");

    const keptSlot = slot ?? this.slotOf(oldChild);
    this.#unlink(parent, oldChild, "replaceChild");
    this.#destroySubtree(oldChild);
    this.#link(parent, newChild, keptSlot, index);
  }

  updateSlot(child: AnyRenderNode, slot: ChildSlot): void {
    this.#assertMutable("updateSlot");
    const links = this.#linksOf(child);
    links.slot = slot;
    this.parentOf(child)?.markNeedsLayout();
  }

  /** Replace props and apply the invalidation the kind reports for the change. */
  setProps<C, G, P>(node: RenderNode<C, G, P>, props: P): void {
    this.#assertMutable("setProps");
    this.#assertOwned(node, "setProps");
    const prev = node.props;
    if (prev === props) return;
    const invalidation = node.kind.propsChanged?.(prev, props) ?? "layout";
    const flipped = node.internal_setProps(props);
    if (flipped) {
      node.markNeedsLayoutForSizedByParentChange();
      return;
    }
    if (invalidation === "layout") node.markNeedsLayout();
    else if (invalidation === "paint") node.markNeedsPaint();
  }

  /** Pre-order walk from the root, children in paint order. */
  visit(fn: (node: AnyRenderNode, depth: number) => void): void {
    const root = this.#root;
    if (root === null) return;
    const stack: AnyRenderNode[] = [root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) continue;
      fn(node, this.depthOf(node));
      const children = this.childrenOf(node);
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child) stack.push(child);
      }
    }
  }

  /** Destroy every node. A tree attached to an owner must be detached first. */
  dispose(): void {
    if (this.#owner !== null) {
      throwCode("ARBOR_INVALID_TREE", `dispose: ${this.label} is still attached to an owner`);
    }
    for (const node of this.#nodes.values()) node.internal_dispose();
    this.#nodes.clear();
    this.#links.clear();
    this.#root = null;
  }

  /* --- Internal API (PipelineOwner, LayoutContext) --- */

  internal_attach(owner: PipelineOwner): void {
    this.#owner = owner;
    const root = this.#root;
    if (root === null) return;
    this.#attachSubtree(root);
    if (root.needsLayout) root.internal_scheduleInitialFrame();
  }

  internal_detach(): void {
    for (const node of this.#nodes.values()) node.internal_detach();
    this.#owner = null;
  }

  internal_setOffset(child: AnyRenderNode, offset: Offset): void {
    this.#linksOf(child).offset = offset;
  }

  #linksOf(node: AnyRenderNode): NodeLinks {
    const links = this.#links.get(node.id);
    if (!links || this.#nodes.get(node.id) !== node) {
      throwCode("ARBOR_INVALID_TREE", `${node.label} does not belong to ${this.label}`);
    }
    return links;
  }

  #assertOwned(node: AnyRenderNode, method: string): void {
    if (node.disposed) {
      throwCode("ARBOR_DISPOSED", `${method}: ${node.label} was removed from its tree`);
    }
    if (!this.has(node)) {
      throwCode("ARBOR_INVALID_TREE", `${method}: ${node.label} does not belong to ${this.label}`);
    }
  }

  #assertAdoptable(parent: AnyRenderNode, child: AnyRenderNode, method: string): void {
    this.#assertOwned(parent, method);
    this.#assertOwned(child, method);
    if (this.parentOf(child) !== null || this.#root === child) {
      throwCode("ARBOR_INVALID_TREE", `${method}: ${child.label} already has a parent`);
    }
    if (this.isAncestorOrSelf(child, parent)) {
      throwCode("ARBOR_INVALID_TREE", `${method}: ${child.label} would become its own ancestor`);
    }
  }

  #assertMutable(method: string): void {
    this.#owner?.internal_assertIdle(method, "ARBOR_MUTATION_DURING_PASS");
  }

  #unlink(parent: AnyRenderNode, child: AnyRenderNode, method: string): void {
    this.#assertOwned(parent, method);
    this.#assertOwned(child, method);
    const parentLinks = this.#linksOf(parent);
    const index = parentLinks.children.indexOf(child.id);
    if (index < 0) {
      throwCode("ARBOR_INVALID_TREE", `${method}: ${child.label} is not a child of ${parent.label}`);
    }
    parentLinks.children.splice(index, 1);
    this.#linksOf(child).parent = null;
  }

  #link(parent: AnyRenderNode, child: AnyRenderNode, slot: ChildSlot, index?: number): void {
    const parentLinks = this.#linksOf(parent);
    const at =
      index === undefined
        ? parentLinks.children.length
        : Math.max(0, Math.min(parentLinks.children.length, Math.trunc(index)));
    parentLinks.children.splice(at, 0, child.id);
    const childLinks = this.#linksOf(child);
    childLinks.parent = parent.id;
    childLinks.slot = slot;
    childLinks.offset = ZERO_OFFSET;
    this.#setDepth(child, parentLinks.depth + 1);

    if (parent.attached) this.#attachSubtree(child);
    parent.markNeedsLayout();
  }

  #setDepth(node: AnyRenderNode, depth: number): void {
    const stack: Array<readonly [RenderNodeId, number]> = [[node.id, depth]];
    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) continue;
      const links = this.#links.get(entry[0]);
      if (!links) continue;
      links.depth = entry[1];
      for (const childId of links.children) stack.push([childId, entry[1] + 1]);
    }
  }

  #attachSubtree(node: AnyRenderNode): void {
    const stack: AnyRenderNode[] = [node];
    while (stack.length > 0) {
      const current = stack.pop();
      if (!current) continue;
      current.internal_attach();
      const children = this.childrenOf(current);
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child) stack.push(child);
      }
    }
  }

  #destroySubtree(node: AnyRenderNode): void {
    const owner = this.#owner;
    const stack: AnyRenderNode[] = [node];
    while (stack.length > 0) {
      const current = stack.pop();
      if (!current) continue;
      stack.push(...this.childrenOf(current));
      if (owner !== null && owner.internal_forget(current)) {
        owner.internal_warn(
          "layout",
          `drop:${current.kind.name}`,
          `${current.label} was removed with pending work; its dirty entry is skipped`,
        );
      }
      current.internal_dispose();
      this.#nodes.delete(current.id);
      this.#links.delete(current.id);
    }
    if (this.#root === node) this.#root = null;
  }
}

export function createRenderTree(label?: string): RenderTree {
  return new RenderTree(label);
}
