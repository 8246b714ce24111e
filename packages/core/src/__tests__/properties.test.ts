/**
 * Seeded property checks over randomly generated box/flex/leaf trees.
 */

import { type Rng, assert, createRng, describe, test } from "@arbor-ui/testkit";
import { type BoxConstraints, boxConstraints } from "../layout/constraints/box.js";
import { asBoxConstraints, sliverConstraints } from "../layout/constraints/sliver.js";
import { applyTransform } from "../layout/transform.js";
import { type Dimension, type Size, offset } from "../layout/types.js";
import { hitTest } from "../rendering/hitTest.js";
import { type BoxProps, boxKind } from "../rendering/kinds/box.js";
import { type FlexProps, flexKind } from "../rendering/kinds/flex.js";
import { type LeafProps, leafKind } from "../rendering/kinds/leaf.js";
import { PipelineOwner } from "../rendering/pipelineOwner.js";
import type { AnyRenderNode, RenderNode } from "../rendering/renderNode.js";
import { RenderTree } from "../rendering/renderTree.js";
import type { ChildSlot } from "../rendering/types.js";

const SEEDS = 40;
const EPSILON = 1e-9;

type LeafSpec = { kind: "leaf"; props: LeafProps };
type ChildSpec = Readonly<{ slot: ChildSlot; spec: Spec }>;
type BoxSpec = Readonly<{ kind: "box"; props: BoxProps; children: readonly ChildSpec[] }>;
type FlexSpec = Readonly<{ kind: "flex"; props: FlexProps; children: readonly ChildSpec[] }>;
type Spec = LeafSpec | BoxSpec | FlexSpec;

type LeafBinding = Readonly<{ spec: LeafSpec; node: RenderNode<BoxConstraints, Size, LeafProps> }>;

const DIMENSIONS: readonly Dimension[] = ["auto", "50%", "full", 24, 60];

function genLeaf(rng: Rng): LeafSpec {
  return { kind: "leaf", props: { width: rng.int(0, 40), height: rng.int(0, 40) } };
}

function genChildren(rng: Rng, depth: number, container: "box" | "flex"): ChildSpec[] {
  const count = rng.int(0, 3);
  const children: ChildSpec[] = [];
  for (let i = 0; i < count; i++) {
    const slot: ChildSlot =
      container === "box"
        ? { left: rng.int(0, 10), top: rng.int(0, 10) }
        : rng.float() < 0.3
          ? { flex: rng.int(1, 3) }
          : {};
    children.push({ slot, spec: genSpec(rng, depth + 1) });
  }
  return children;
}

function genSpec(rng: Rng, depth: number): Spec {
  if (depth > 0 && (depth >= 3 || rng.float() < 0.4)) return genLeaf(rng);
  if (rng.float() < 0.5) {
    return {
      kind: "box",
      props: { width: rng.pick(DIMENSIONS), height: rng.pick(DIMENSIONS) },
      children: genChildren(rng, depth, "box"),
    };
  }
  return {
    kind: "flex",
    props: {
      direction: rng.pick(["horizontal", "vertical"] as const),
      gap: rng.int(0, 3),
      crossAlign: rng.pick(["start", "stretch"] as const),
    },
    children: genChildren(rng, depth, "flex"),
  };
}

function build(tree: RenderTree, spec: Spec, leaves: LeafBinding[]): AnyRenderNode {
  switch (spec.kind) {
    case "leaf": {
      const node = tree.createNode(leafKind, spec.props);
      leaves.push({ spec, node });
      return node;
    }
    case "box":
    case "flex": {
      const parent =
        spec.kind === "box"
          ? tree.createNode(boxKind, spec.props)
          : tree.createNode(flexKind, spec.props);
      for (const child of spec.children) {
        tree.adoptChild(parent, build(tree, child.spec, leaves), child.slot);
      }
      return parent;
    }
  }
}

type Scene = Readonly<{
  owner: PipelineOwner;
  tree: RenderTree;
  root: AnyRenderNode;
  leaves: readonly LeafBinding[];
}>;

function mount(spec: Spec, constraints: BoxConstraints): Scene {
  const owner = new PipelineOwner({ devMode: false });
  const tree = new RenderTree();
  owner.attachTree(tree);
  const leaves: LeafBinding[] = [];
  const root = build(tree, spec, leaves);
  tree.setRoot(root, constraints);
  owner.flushLayout();
  return { owner, tree, root, leaves };
}

function rootConstraintsFor(rng: Rng): BoxConstraints {
  return boxConstraints({ maxWidth: rng.int(20, 120), maxHeight: rng.int(20, 120) });
}

/** Preorder list of every node's label, geometry and offset. */
function layoutSignature(tree: RenderTree): string[] {
  const out: string[] = [];
  tree.visit((node) => {
    out.push(JSON.stringify({ label: node.label, g: node.geometry, o: tree.offsetOf(node) }));
  });
  return out;
}

describe("layout properties", () => {
  test("every node's geometry satisfies its constraints", () => {
    for (let seed = 1; seed <= SEEDS; seed++) {
      const rng = createRng(seed);
      const { tree } = mount(genSpec(rng, 0), rootConstraintsFor(rng));
      tree.visit((node) => {
        const c = node.constraints;
        assert.notEqual(c, null, `seed ${seed}: ${node.label} has no constraints`);
        assert.equal(
          node.kind.protocol.satisfies(c, node.geometry),
          true,
          `seed ${seed}: ${node.label}`,
        );
      });
    }
  });

  test("a second flush does no work", () => {
    for (let seed = 1; seed <= SEEDS; seed++) {
      const rng = createRng(seed);
      const { owner } = mount(genSpec(rng, 0), rootConstraintsFor(rng));
      owner.resetStats();
      owner.flushLayout();
      assert.equal(owner.stats().nodesLaidOut, 0, `seed ${seed}`);
      assert.equal(owner.stats().layoutRounds, 0, `seed ${seed}`);
    }
  });

  test("incremental relayout matches a fresh layout", () => {
    for (let seed = 1; seed <= SEEDS; seed++) {
      const rng = createRng(seed);
      const spec = genSpec(rng, 0);
      const constraints = rootConstraintsFor(rng);
      const scene = mount(spec, constraints);
      if (scene.leaves.length === 0) continue;

      for (let step = 0; step < 3; step++) {
        const leaf = rng.pick(scene.leaves);
        const props: LeafProps = { width: rng.int(0, 40), height: rng.int(0, 40) };
        leaf.spec.props = props;
        scene.tree.setProps(leaf.node, props);
      }
      scene.owner.flushLayout();

      const fresh = mount(spec, constraints);
      assert.deepEqual(layoutSignature(scene.tree), layoutSignature(fresh.tree), `seed ${seed}`);
    }
  });

  test("forcing a node to relayout reproduces the same layout", () => {
    for (let seed = 1; seed <= SEEDS; seed++) {
      const rng = createRng(seed);
      const { owner, tree } = mount(genSpec(rng, 0), rootConstraintsFor(rng));
      const before = layoutSignature(tree);
      const nodes: AnyRenderNode[] = [];
      tree.visit((node) => {
        nodes.push(node);
      });
      rng.pick(nodes).markNeedsLayout();
      owner.flushLayout();
      assert.deepEqual(layoutSignature(tree), before, `seed ${seed}`);
    }
  });

  test("hit paths run from the target up to the root", () => {
    for (let seed = 1; seed <= SEEDS; seed++) {
      const rng = createRng(seed);
      const { tree, root } = mount(genSpec(rng, 0), rootConstraintsFor(rng));
      for (let probe = 0; probe < 10; probe++) {
        const point = offset(rng.int(0, 120), rng.int(0, 120));
        const entries = hitTest(root, point);
        if (entries.length === 0) continue;

        assert.equal(entries[entries.length - 1]?.target, root, `seed ${seed}`);
        for (let i = 0; i + 1 < entries.length; i++) {
          const inner = entries[i];
          const outer = entries[i + 1];
          assert.ok(inner && outer);
          assert.equal(tree.parentOf(inner.target), outer.target, `seed ${seed}`);
        }
        for (const entry of entries) {
          const mapped = applyTransform(entry.transform, point);
          assert.ok(Math.abs(mapped.x - entry.localPosition.x) < EPSILON, `seed ${seed}`);
          assert.ok(Math.abs(mapped.y - entry.localPosition.y) < EPSILON, `seed ${seed}`);
        }
      }
    }
  });
});

describe("sliver projection properties", () => {
  test("asBoxConstraints depends only on axis and cross extent", () => {
    const rng = createRng(7);
    for (let i = 0; i < 50; i++) {
      const axis = rng.pick(["horizontal", "vertical"] as const);
      const crossAxisExtent = rng.int(0, 200);
      const a = sliverConstraints({
        axis,
        crossAxisExtent,
        scrollOffset: rng.int(0, 500),
        precedingScrollExtent: rng.int(0, 500),
        remainingPaintExtent: rng.int(0, 300),
      });
      const b = sliverConstraints({
        axis,
        crossAxisExtent,
        scrollOffset: rng.int(0, 500),
        remainingPaintExtent: rng.int(0, 300),
        remainingCacheExtent: rng.int(0, 300),
      });
      assert.deepEqual(asBoxConstraints(a), asBoxConstraints(b));
      assert.deepEqual(
        asBoxConstraints(a, { minExtent: 5, maxExtent: 9 }),
        asBoxConstraints(b, { minExtent: 5, maxExtent: 9 }),
      );
    }
  });
});
