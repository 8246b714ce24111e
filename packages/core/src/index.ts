/**
 * @arbor-ui/core
 *
 * Layout and hit-testing core for a retained-mode render tree.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors and configuration
// =============================================================================

export {
  ArborError,
  type ArborErrorCategory,
  type ArborErrorCode,
  errorCategory,
  isArborError,
} from "./errors.js";

export {
  type PipelineOwnerOptions,
  type ResolvedPipelineConfig,
  type WarnSink,
  resolvePipelineConfig,
} from "./config.js";

export {
  type DevWarnings,
  type WarnChannel,
  createDevWarnings,
  formatWarning,
} from "./diagnostics/devWarnings.js";

// =============================================================================
// Geometry and constraints
// =============================================================================

export {
  type Axis,
  type Dimension,
  type Offset,
  type Rect,
  type Size,
  ZERO_OFFSET,
  ZERO_SIZE,
  addOffsets,
  axisOffset,
  axisSize,
  crossExtentOf,
  crossOf,
  flipAxis,
  mainExtentOf,
  mainOf,
  offset,
  rectContains,
  size,
  subtractOffsets,
} from "./layout/types.js";

export {
  IDENTITY_TRANSFORM,
  type Transform2D,
  applyTransform,
  compose,
  invert,
  isTranslationOnly,
  scaling,
  translation,
} from "./layout/transform.js";

export {
  clampExtent,
  isAutoDimension,
  isPercentDimension,
  resolveDimension,
} from "./layout/dimension.js";

export { type LayoutProtocol, formatExtent } from "./layout/constraints/protocol.js";

export {
  type BoxConstraints,
  type EdgeInsets,
  biggest,
  boxConstraints,
  boxConstraintsEqual,
  boxConstraintsKey,
  boxProtocol,
  constrain,
  deflate,
  describeBoxConstraints,
  expandConstraints,
  hasBoundedHeight,
  hasBoundedWidth,
  isNormalizedBox,
  isSatisfiedBy,
  isTightBox,
  loosen,
  looseConstraints,
  smallest,
  tighten,
  tightConstraints,
} from "./layout/constraints/box.js";

export {
  type AsBoxConstraintsOptions,
  type SliverConstraints,
  type SliverGeometry,
  ZERO_SLIVER_GEOMETRY,
  asBoxConstraints,
  calculatePaintOffset,
  isNormalizedSliver,
  isValidSliverGeometry,
  sliverConstraints,
  sliverConstraintsEqual,
  sliverConstraintsKey,
  sliverGeometry,
  sliverProtocol,
} from "./layout/constraints/sliver.js";

// =============================================================================
// Render tree and pipeline
// =============================================================================

export {
  type ChildSlot,
  type EventContext,
  type HitTestContext,
  type Invalidation,
  type LayoutChildOptions,
  type LayoutContext,
  type PointerEvent,
  type PointerEventKind,
  type RenderKind,
  type RenderNodeId,
  defineKind,
} from "./rendering/types.js";

export { type AnyRenderNode, RenderNode } from "./rendering/renderNode.js";
export { RenderTree, createRenderTree } from "./rendering/renderTree.js";
export {
  PipelineOwner,
  type PipelinePhase,
  type PipelineStats,
  createPipelineOwner,
} from "./rendering/pipelineOwner.js";
export {
  type PaintBackend,
  type PaintLayer,
  type PaintMember,
  type PaintRequest,
  collectPaintLayer,
} from "./rendering/paint.js";
export {
  type HitTestEntry,
  HitTestResult,
  hitTest,
  hitTestChildrenInReverse,
  hitTestNode,
} from "./rendering/hitTest.js";
export {
  type DispatchOptions,
  type DispatchOrder,
  type DispatchResult,
  dispatchPointerEvent,
} from "./rendering/dispatch.js";

// =============================================================================
// Built-in kinds
// =============================================================================

export * from "./rendering/kinds/index.js";
