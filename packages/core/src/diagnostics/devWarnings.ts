/**
 * packages/core/src/diagnostics/devWarnings.ts — Deduplicated dev-mode warnings.
 *
 * Warnings are emitted at most once per key and only in dev mode. Each carries
 * a `[arbor][<channel>]` prefix so hosts can filter them.
 */

import type { WarnSink } from "../config.js";

export type WarnChannel = "layout" | "paint" | "hit-test";

export type DevWarnings = Readonly<{
  warn: (channel: WarnChannel, key: string, detail: string) => void;
  /** Number of distinct warnings emitted so far. */
  count: () => number;
  reset: () => void;
}>;

type DevWarningsContext = Readonly<{
  devMode: boolean;
  warn: WarnSink;
}>;

export function formatWarning(channel: WarnChannel, detail: string): string {
  return `[arbor][${channel}] ${detail}`;
}

export function createDevWarnings(ctx: DevWarningsContext): DevWarnings {
  const warned = new Set<string>();

  return Object.freeze({
    warn: (channel: WarnChannel, key: string, detail: string) => {
      if (!ctx.devMode) return;
      const dedupeKey = `${channel}:${key}`;
      if (warned.has(dedupeKey)) return;
      warned.add(dedupeKey);
      ctx.warn(formatWarning(channel, detail));
    },
    count: () => warned.size,
    reset: () => {
      warned.clear();
    },
  });
}
