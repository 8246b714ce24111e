/**
 * packages/core/src/config.ts — Pipeline owner configuration.
 *
 * Why: Applies defaults to user-provided options and validates them once, so
 * the scheduler reads a frozen, fully-populated config on every frame.
 */

import { throwCode } from "./errors.js";
import type { PaintBackend } from "./rendering/paint.js";

export type WarnSink = (message: string) => void;

export type PipelineOwnerOptions = Readonly<{
  /** Enables dev warnings. Defaults to `NODE_ENV !== "production"`. */
  devMode?: boolean;
  /** Receives dev warnings. Defaults to `console.warn`. */
  warn?: WarnSink;
  /**
   * Upper bound on layout rounds inside one `flushLayout` call. A round drains
   * the dirty set once, then runs deferred mutations.
   */
  maxLayoutRounds?: number;
  /** Verify geometry against constraints and child layout after every node. */
  checkGeometry?: boolean;
  /** Receives each repaint boundary's layer during `flushPaint`. */
  painter?: PaintBackend | null;
  /** Called once per frame when the first dirty entry is scheduled. */
  onNeedsVisualUpdate?: () => void;
}>;

export type ResolvedPipelineConfig = Readonly<{
  devMode: boolean;
  warn: WarnSink;
  maxLayoutRounds: number;
  checkGeometry: boolean;
  painter: PaintBackend | null;
  onNeedsVisualUpdate: (() => void) | null;
}>;

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

function defaultWarn(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

/** Default configuration values. */
const DEFAULT_CONFIG: ResolvedPipelineConfig = Object.freeze({
  devMode: NODE_ENV !== "production",
  warn: defaultWarn,
  maxLayoutRounds: 32,
  checkGeometry: true,
  painter: null,
  onNeedsVisualUpdate: null,
});

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) {
    throwCode("ARBOR_INVALID_CONFIG", `${name} must be a positive integer`);
  }
  return v;
}

/** Apply defaults to user-provided options, validating all values. */
export function resolvePipelineConfig(
  options: PipelineOwnerOptions | undefined,
): ResolvedPipelineConfig {
  if (!options) return DEFAULT_CONFIG;
  const maxLayoutRounds =
    options.maxLayoutRounds === undefined
      ? DEFAULT_CONFIG.maxLayoutRounds
      : requirePositiveInt("maxLayoutRounds", options.maxLayoutRounds);
  if (options.warn !== undefined && typeof options.warn !== "function") {
    throwCode("ARBOR_INVALID_CONFIG", "warn must be a function");
  }
  const painter = options.painter ?? null;
  if (painter !== null && typeof painter.paint !== "function") {
    throwCode("ARBOR_INVALID_CONFIG", "painter.paint must be a function");
  }

  return Object.freeze({
    devMode: options.devMode === undefined ? DEFAULT_CONFIG.devMode : options.devMode === true,
    warn: options.warn ?? DEFAULT_CONFIG.warn,
    maxLayoutRounds,
    checkGeometry: options.checkGeometry !== false,
    painter,
    onNeedsVisualUpdate:
      typeof options.onNeedsVisualUpdate === "function" ? options.onNeedsVisualUpdate : null,
  });
}
