/**
 * packages/core/src/errors.ts — Error codes and the ArborError class.
 *
 * Every failure in the core is a programming error. Codes fall in two groups:
 *   - contract: malformed inputs or kind implementations breaking the layout
 *     protocol (ill-formed constraints, geometry outside its constraints,
 *     layout of a detached node)
 *   - usage: calls made in the wrong order (mutating the tree during a pass,
 *     reading geometry that is still dirty, painting before layout)
 *
 * Neither group is retryable; the split only lets callers tell "not ready yet"
 * apart from "malformed".
 */

export type ArborErrorCode =
  | "ARBOR_INVALID_CONSTRAINTS"
  | "ARBOR_GEOMETRY_VIOLATION"
  | "ARBOR_LAYOUT_INCOMPLETE"
  | "ARBOR_DETACHED"
  | "ARBOR_INVALID_TREE"
  | "ARBOR_LAYOUT_FEEDBACK_LOOP"
  | "ARBOR_INVALID_CONFIG"
  | "ARBOR_MUTATION_DURING_PASS"
  | "ARBOR_REENTRANT_CALL"
  | "ARBOR_NOT_LAID_OUT"
  | "ARBOR_LAYOUT_PENDING"
  | "ARBOR_DISPOSED";

export type ArborErrorCategory = "contract" | "usage";

const USAGE_CODES: ReadonlySet<ArborErrorCode> = new Set<ArborErrorCode>([
  "ARBOR_MUTATION_DURING_PASS",
  "ARBOR_REENTRANT_CALL",
  "ARBOR_NOT_LAID_OUT",
  "ARBOR_LAYOUT_PENDING",
  "ARBOR_DISPOSED",
]);

export function errorCategory(code: ArborErrorCode): ArborErrorCategory {
  return USAGE_CODES.has(code) ? "usage" : "contract";
}

/**
 * Error class for every contract and usage violation raised by the core.
 * The `code` property identifies the specific violation.
 */
export class ArborError extends Error {
  override readonly name = "ArborError";
  readonly code: ArborErrorCode;
  readonly category: ArborErrorCategory;

  constructor(code: ArborErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;
    this.category = errorCategory(code);

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ArborError);
    }
  }
}

export function isArborError(value: unknown, code?: ArborErrorCode): value is ArborError {
  if (!(value instanceof ArborError)) return false;
  return code === undefined || value.code === code;
}

export function throwCode(code: ArborErrorCode, detail: string): never {
  throw new ArborError(code, detail);
}
