/**
 * packages/core/src/rendering/pipelineOwner.ts — Dirty-list scheduler.
 *
 * Why: Nodes never lay themselves out when dirtied. They register the nearest
 * relayout (or repaint) boundary here, and the host drains the lists once per
 * frame:
 *
 *   flushLayout: shallow boundaries first, so a parent's relayout that reaches
 *     a dirty descendant lays it out once and the descendant's own entry
 *     becomes a no-op. Entries created while draining are handled in further
 *     rounds before the call returns.
 *   flushPaint: deepest boundaries first, so a parent layer always sees the
 *     fresh output of nested layers.
 *
 * Passes are exclusive: tree mutation and nested flushes throw while a pass
 * runs. Work queued through `defer` drains after each pass.
 */

import {
  type PipelineOwnerOptions,
  type ResolvedPipelineConfig,
  resolvePipelineConfig,
} from "../config.js";
import { type DevWarnings, type WarnChannel, createDevWarnings } from "../diagnostics/devWarnings.js";
import { type ArborErrorCode, throwCode } from "../errors.js";
import { collectPaintLayer } from "./paint.js";
import type { AnyRenderNode } from "./renderNode.js";
import type { RenderTree } from "./renderTree.js";

export type PipelinePhase = "idle" | "layout" | "paint" | "hitTest";

export type PipelineStats = Readonly<{
  layoutRounds: number;
  nodesLaidOut: number;
  layoutCacheHits: number;
  resizes: number;
  layersPainted: number;
  deferredRun: number;
}>;

type MutableStats = { -readonly [K in keyof PipelineStats]: PipelineStats[K] };

const DEFERRED_WARN_THRESHOLD = 256;

function emptyStats(): MutableStats {
  return {
    layoutRounds: 0,
    nodesLaidOut: 0,
    layoutCacheHits: 0,
    resizes: 0,
    layersPainted: 0,
    deferredRun: 0,
  };
}

function byDepthAscending(a: AnyRenderNode, b: AnyRenderNode): number {
  return a.depth - b.depth;
}

export class PipelineOwner {
  readonly config: ResolvedPipelineConfig;
  readonly #warnings: DevWarnings;
  readonly #trees = new Set<RenderTree>();
  readonly #layoutQueue = new Set<AnyRenderNode>();
  readonly #paintQueue = new Set<AnyRenderNode>();
  readonly #deferred: Array<() => void> = [];
  #phase: PipelinePhase = "idle";
  #flushing = false;
  #disposed = false;
  #visualUpdateRequested = false;
  #stats: MutableStats = emptyStats();

  constructor(options?: PipelineOwnerOptions) {
    this.config = resolvePipelineConfig(options);
    this.#warnings = createDevWarnings({ devMode: this.config.devMode, warn: this.config.warn });
  }

  get phase(): PipelinePhase {
    return this.#phase;
  }

  get disposed(): boolean {
    return this.#disposed;
  }

  get trees(): readonly RenderTree[] {
    return [...this.#trees];
  }

  get hasPendingLayout(): boolean {
    for (const node of this.#layoutQueue) {
      if (this.#isLive(node) && node.needsLayout) return true;
    }
    return false;
  }

  /** Live relayout boundaries waiting for the next `flushLayout`. */
  pendingLayout(): readonly AnyRenderNode[] {
    return [...this.#layoutQueue].filter((node) => this.#isLive(node) && node.needsLayout);
  }

  /** Live repaint boundaries waiting for the next `flushPaint`. */
  pendingPaint(): readonly AnyRenderNode[] {
    return [...this.#paintQueue].filter((node) => this.#isLive(node) && node.needsPaint);
  }

  stats(): PipelineStats {
    return Object.freeze({ ...this.#stats });
  }

  resetStats(): void {
    this.#stats = emptyStats();
  }

  attachTree(tree: RenderTree): void {
    this.#assertUsable("attachTree");
    this.internal_assertIdle("attachTree", "ARBOR_MUTATION_DURING_PASS");
    if (this.#trees.has(tree)) return;
    if (tree.owner !== null) {
      throwCode("ARBOR_INVALID_TREE", `attachTree: ${tree.label} is attached to another owner`);
    }
    this.#trees.add(tree);
    tree.internal_attach(this);
  }

  detachTree(tree: RenderTree): void {
    this.internal_assertIdle("detachTree", "ARBOR_MUTATION_DURING_PASS");
    if (!this.#trees.delete(tree)) return;
    tree.internal_detach();
    for (const node of [...this.#layoutQueue]) if (node.tree === tree) this.#layoutQueue.delete(node);
    for (const node of [...this.#paintQueue]) if (node.tree === tree) this.#paintQueue.delete(node);
  }

  /** Detach every tree and refuse further use. Calling it twice is a no-op. */
  dispose(): void {
    if (this.#disposed) return;
    this.internal_assertIdle("dispose", "ARBOR_REENTRANT_CALL");
    for (const tree of [...this.#trees]) this.detachTree(tree);
    this.#deferred.length = 0;
    this.#disposed = true;
  }

  /** Run `task` now when idle, otherwise once the current pass ends. */
  defer(task: () => void): void {
    this.#assertUsable("defer");
    if (this.#phase === "idle") {
      task();
      return;
    }
    this.#deferred.push(task);
    if (this.#deferred.length === DEFERRED_WARN_THRESHOLD) {
      this.#warnings.warn(
        "layout",
        "deferred-growth",
        `${String(DEFERRED_WARN_THRESHOLD)} deferred mutations queued during one ${this.#phase} pass`,
      );
    }
  }

  flushLayout(): void {
    this.#beginFlush("flushLayout");
    try {
      let rounds = 0;
      while (this.#layoutQueue.size > 0) {
        if (rounds >= this.config.maxLayoutRounds) {
          const pending = this.pendingLayout()
            .map((node) => node.label)
            .join(", ");
          throwCode(
            "ARBOR_LAYOUT_FEEDBACK_LOOP",
            `flushLayout: still dirty after ${String(rounds)} rounds (${pending})`,
          );
        }
        rounds++;
        this.#runPass("layout", () => {
          this.#layoutRound();
        });
      }
      this.#visualUpdateRequested = false;
    } finally {
      this.#flushing = false;
    }
  }

  flushPaint(): void {
    this.#beginFlush("flushPaint");
    try {
      if (this.hasPendingLayout) {
        throwCode("ARBOR_LAYOUT_PENDING", "flushPaint: layout is pending; call flushLayout first");
      }
      this.#runPass("paint", () => {
        const dirty = [...this.#paintQueue].filter((node) => this.#isLive(node));
        this.#paintQueue.clear();
        dirty.sort((a, b) => b.depth - a.depth);
        for (const node of dirty) {
          if (node.needsPaint) this.#paintLayer(node);
        }
      });
      this.#visualUpdateRequested = false;
    } finally {
      this.#flushing = false;
    }
  }

  flushFrame(): void {
    this.flushLayout();
    this.flushPaint();
  }

  /* --- Internal API (RenderNode, RenderTree, hit testing) --- */

  internal_scheduleLayout(node: AnyRenderNode): void {
    if (this.#disposed) return;
    this.#layoutQueue.add(node);
    this.#requestVisualUpdate();
  }

  internal_schedulePaint(node: AnyRenderNode): void {
    if (this.#disposed) return;
    this.#paintQueue.add(node);
    this.#requestVisualUpdate();
  }

  /** Drop `node` from both queues; returns true when it had a pending entry. */
  internal_forget(node: AnyRenderNode): boolean {
    const hadLayout = this.#layoutQueue.delete(node) && node.needsLayout;
    const hadPaint = this.#paintQueue.delete(node) && node.needsPaint && node.hasPainted;
    return hadLayout || hadPaint;
  }

  internal_assertIdle(method: string, code: ArborErrorCode): void {
    if (this.#phase !== "idle") {
      throwCode(code, `${method}: not allowed during the ${this.#phase} pass`);
    }
  }

  internal_runHitTest<T>(run: () => T): T {
    this.#assertUsable("hitTest");
    if (this.#flushing || this.#phase !== "idle") {
      throwCode("ARBOR_REENTRANT_CALL", `hitTest: not allowed during the ${this.#phase} pass`);
    }
    if (this.hasPendingLayout) {
      throwCode("ARBOR_LAYOUT_PENDING", "hitTest: layout is pending; call flushLayout first");
    }
    return this.#runPass("hitTest", run);
  }

  internal_warn(channel: WarnChannel, key: string, detail: string): void {
    this.#warnings.warn(channel, key, detail);
  }

  internal_recordLayout(): void {
    this.#stats.nodesLaidOut++;
  }

  internal_recordCacheHit(): void {
    this.#stats.layoutCacheHits++;
  }

  internal_recordResize(): void {
    this.#stats.resizes++;
  }

  #isLive(node: AnyRenderNode): boolean {
    return !node.disposed && node.owner === this;
  }

  #assertUsable(method: string): void {
    if (this.#disposed) throwCode("ARBOR_DISPOSED", `${method}: pipeline owner was disposed`);
  }

  #beginFlush(method: string): void {
    this.#assertUsable(method);
    if (this.#flushing || this.#phase !== "idle") {
      throwCode("ARBOR_REENTRANT_CALL", `${method}: a ${this.#phase} pass is already running`);
    }
    this.#flushing = true;
  }

  #runPass<T>(phase: PipelinePhase, run: () => T): T {
    this.#phase = phase;
    let result: T;
    try {
      result = run();
    } catch (err) {
      // A failed pass discards the work it deferred.
      this.#deferred.length = 0;
      throw err;
    } finally {
      this.#phase = "idle";
    }
    this.#drainDeferred();
    return result;
  }

  #drainDeferred(): void {
    while (this.#deferred.length > 0) {
      const task = this.#deferred.shift();
      if (!task) continue;
      this.#stats.deferredRun++;
      task();
    }
  }

  #layoutRound(): void {
    const dirty = [...this.#layoutQueue].filter((node) => this.#isLive(node));
    this.#layoutQueue.clear();
    dirty.sort(byDepthAscending);
    this.#stats.layoutRounds++;

    let i = 0;
    try {
      for (; i < dirty.length; i++) {
        const node = dirty[i];
        if (!node || !node.needsLayout) continue;
        node.internal_layoutAsBoundary();
      }
    } finally {
      // Keep unprocessed entries so a failed flush can be retried.
      for (let j = i; j < dirty.length; j++) {
        const node = dirty[j];
        if (node && this.#isLive(node)) this.#layoutQueue.add(node);
      }
    }
  }

  #paintLayer(boundary: AnyRenderNode): void {
    const layer = collectPaintLayer(boundary);
    for (const nested of layer.childLayers) {
      if (nested.node.needsPaint || !nested.node.hasPainted) this.#paintLayer(nested.node);
    }

    const painter = this.config.painter;
    let output: unknown = null;
    if (painter === null) {
      this.#warnings.warn(
        "paint",
        "no-painter",
        "flushPaint ran without a paint backend; layers keep a null paint output",
      );
    } else {
      output = painter.paint({
        boundary,
        geometry: boundary.geometry,
        members: layer.members,
        childLayers: layer.childLayers,
        previous: boundary.paintOutput,
      });
    }
    boundary.internal_completePaint(output);
    for (const member of layer.members) member.node.internal_clearNeedsPaint();
    this.#stats.layersPainted++;
  }

  #requestVisualUpdate(): void {
    if (this.#visualUpdateRequested) return;
    this.#visualUpdateRequested = true;
    this.config.onNeedsVisualUpdate?.();
  }
}

export function createPipelineOwner(options?: PipelineOwnerOptions): PipelineOwner {
  return new PipelineOwner(options);
}
