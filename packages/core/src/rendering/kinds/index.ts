export { type BoxProps, boxKind } from "./box.js";
export { type FlexProps, flexKind } from "./flex.js";
export { type LeafProps, leafKind } from "./leaf.js";
export { type RepaintBoundaryProps, repaintBoundaryKind } from "./repaintBoundary.js";
export { type SliverListProps, sliverListKind } from "./sliverList.js";
export { type SliverToBoxProps, sliverToBoxKind } from "./sliverToBox.js";
export { type ViewportProps, viewportKind } from "./viewport.js";
export {
  type BoxNode,
  type SliverNode,
  isBoxNode,
  isSliverNode,
  requireBoxChild,
  requireSliverChild,
} from "./shared.js";
