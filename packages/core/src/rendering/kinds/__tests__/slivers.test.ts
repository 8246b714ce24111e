import { assert, describe, test, throwsCode } from "@arbor-ui/testkit";
import { boxConstraints } from "../../../layout/constraints/box.js";
import { offset } from "../../../layout/types.js";
import { createHarness } from "../../__tests__/harness.js";
import { hitTest } from "../../hitTest.js";
import { leafKind } from "../leaf.js";
import { sliverListKind } from "../sliverList.js";
import { sliverToBoxKind } from "../sliverToBox.js";
import { viewportKind } from "../viewport.js";

const VIEWPORT_100x50 = boxConstraints({ maxWidth: 100, maxHeight: 50 });

/**
 * viewport#1 100x50, vertical
 *   sliverToBox#2
 *     header leaf#3 (30 tall)
 *   sliverList#4, itemExtent 20
 *     items leaf#5..leaf#8
 */
function buildScroller(scrollOffset = 0) {
  const h = createHarness();
  const viewport = h.tree.createNode(viewportKind, { scrollOffset });
  const toBox = h.tree.createNode(sliverToBoxKind, {});
  const header = h.tree.createNode(leafKind, { width: 999, height: 30 });
  const list = h.tree.createNode(sliverListKind, { itemExtent: 20 });
  h.tree.adoptChild(viewport, toBox);
  h.tree.adoptChild(toBox, header);
  h.tree.adoptChild(viewport, list);
  const items = [0, 1, 2, 3].map(() => {
    const item = h.tree.createNode(leafKind, {});
    h.tree.adoptChild(list, item);
    return item;
  });
  h.tree.setRoot(viewport, VIEWPORT_100x50);
  h.owner.flushLayout();
  return { ...h, viewport, toBox, header, list, items };
}

describe("viewport and slivers", () => {
  test("slivers are laid out in sequence inside the viewport", () => {
    const { tree, viewport, toBox, header, list, items } = buildScroller();

    assert.deepEqual(viewport.geometry, { width: 100, height: 50 });
    assert.deepEqual(header.geometry, { width: 100, height: 30 });
    assert.deepEqual(toBox.geometry, {
      scrollExtent: 30,
      paintExtent: 30,
      layoutExtent: 30,
      maxPaintExtent: 30,
      hitTestExtent: 30,
    });
    assert.deepEqual(tree.offsetOf(list), { x: 0, y: 30 });
    assert.deepEqual(list.geometry, {
      scrollExtent: 80,
      paintExtent: 20,
      layoutExtent: 20,
      maxPaintExtent: 80,
      hitTestExtent: 20,
    });
    assert.deepEqual(
      items.map((item) => tree.offsetOf(item).y),
      [0, 20, 40, 60],
    );
    assert.deepEqual(items[0]?.geometry, { width: 100, height: 20 });
  });

  test("hit tests pass through the sliver to the item", () => {
    const { viewport } = buildScroller();
    const entries = hitTest(viewport, offset(10, 35));
    assert.deepEqual(
      entries.map((entry) => entry.target.label),
      ["leaf#5", "sliverList#4", "viewport#1"],
    );
    assert.deepEqual(entries[0]?.localPosition, { x: 10, y: 5 });
  });

  test("scrolling hands each sliver its share of the offset", () => {
    const { owner, tree, viewport, toBox, list, items } = buildScroller();
    tree.setProps(viewport, { scrollOffset: 40 });
    owner.flushLayout();

    assert.equal(toBox.geometry.paintExtent, 0);
    assert.deepEqual(tree.offsetOf(list), { x: 0, y: 0 });
    assert.deepEqual(list.geometry, {
      scrollExtent: 80,
      paintExtent: 50,
      layoutExtent: 50,
      maxPaintExtent: 80,
      hitTestExtent: 50,
    });
    assert.deepEqual(
      items.map((item) => tree.offsetOf(item).y),
      [-10, 10, 30, 50],
    );

    const entries = hitTest(viewport, offset(10, 5));
    assert.deepEqual(
      entries.map((entry) => entry.target.label),
      ["leaf#5", "sliverList#4", "viewport#1"],
    );
    assert.deepEqual(entries[0]?.localPosition, { x: 10, y: 15 });
  });

  test("a horizontal viewport scrolls along x", () => {
    const h = createHarness();
    const viewport = h.tree.createNode(viewportKind, { axis: "horizontal" });
    const list = h.tree.createNode(sliverListKind, { itemExtent: 30 });
    const a = h.tree.createNode(leafKind, {});
    const b = h.tree.createNode(leafKind, {});
    h.tree.adoptChild(viewport, list);
    h.tree.adoptChild(list, a);
    h.tree.adoptChild(list, b);
    h.tree.setRoot(viewport, boxConstraints({ maxWidth: 50, maxHeight: 10 }));
    h.owner.flushLayout();

    assert.deepEqual(a.geometry, { width: 30, height: 10 });
    assert.deepEqual(h.tree.offsetOf(b), { x: 30, y: 0 });
    assert.equal(list.geometry.scrollExtent, 60);
    assert.equal(list.geometry.paintExtent, 50);
  });

  test("an empty sliverToBox has zero geometry", () => {
    const h = createHarness();
    const viewport = h.tree.createNode(viewportKind, {});
    const toBox = h.tree.createNode(sliverToBoxKind, {});
    h.tree.adoptChild(viewport, toBox);
    h.tree.setRoot(viewport, VIEWPORT_100x50);
    h.owner.flushLayout();

    assert.equal(toBox.geometry.scrollExtent, 0);
    assert.equal(toBox.geometry.paintExtent, 0);
  });

  test("unbounded scroll-axis constraints warn and use the minimum", () => {
    const h = createHarness();
    const viewport = h.tree.createNode(viewportKind, {});
    h.tree.setRoot(viewport, boxConstraints({ maxWidth: 100 }));
    h.owner.flushLayout();

    assert.deepEqual(viewport.geometry, { width: 100, height: 0 });
    assert.deepEqual(h.warnings, [
      "[arbor][layout] viewport#1: received unbounded vertical constraints; using the minimum extent",
    ]);
  });

  test("a viewport rejects box children", () => {
    const h = createHarness();
    const viewport = h.tree.createNode(viewportKind, {});
    const leaf = h.tree.createNode(leafKind, { width: 1, height: 1 });
    h.tree.adoptChild(viewport, leaf);
    h.tree.setRoot(viewport, VIEWPORT_100x50);
    throwsCode(() => h.owner.flushLayout(), "ARBOR_INVALID_TREE");
  });
});
