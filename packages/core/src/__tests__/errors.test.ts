import { assert, describe, test, throwsCode } from "@arbor-ui/testkit";
import { ArborError, errorCategory, isArborError, throwCode } from "../errors.js";

describe("ArborError", () => {
  test("carries its code and category", () => {
    const err = new ArborError("ARBOR_INVALID_CONSTRAINTS", "minWidth > maxWidth");
    assert.equal(err.name, "ArborError");
    assert.equal(err.code, "ARBOR_INVALID_CONSTRAINTS");
    assert.equal(err.category, "contract");
    assert.equal(err.message, "minWidth > maxWidth");
    assert.ok(err instanceof Error);
  });

  test("defaults the message to the code", () => {
    assert.equal(new ArborError("ARBOR_DISPOSED").message, "ARBOR_DISPOSED");
  });

  test("splits codes into contract and usage", () => {
    assert.equal(errorCategory("ARBOR_GEOMETRY_VIOLATION"), "contract");
    assert.equal(errorCategory("ARBOR_LAYOUT_FEEDBACK_LOOP"), "contract");
    assert.equal(errorCategory("ARBOR_DETACHED"), "contract");
    assert.equal(errorCategory("ARBOR_MUTATION_DURING_PASS"), "usage");
    assert.equal(errorCategory("ARBOR_NOT_LAID_OUT"), "usage");
    assert.equal(errorCategory("ARBOR_LAYOUT_PENDING"), "usage");
  });

  test("isArborError narrows and optionally matches a code", () => {
    const err = new ArborError("ARBOR_INVALID_TREE");
    assert.equal(isArborError(err), true);
    assert.equal(isArborError(err, "ARBOR_INVALID_TREE"), true);
    assert.equal(isArborError(err, "ARBOR_DETACHED"), false);
    assert.equal(isArborError(new Error("ARBOR_INVALID_TREE")), false);
    assert.equal(isArborError("ARBOR_INVALID_TREE"), false);
  });

  test("throwCode throws an ArborError with the detail", () => {
    const err = throwsCode(
      () => throwCode("ARBOR_REENTRANT_CALL", "flushLayout: nested"),
      "ARBOR_REENTRANT_CALL",
    );
    assert.equal(isArborError(err) ? err.message : null, "flushLayout: nested");
  });
});
