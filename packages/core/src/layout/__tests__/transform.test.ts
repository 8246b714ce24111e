import { assert, describe, test } from "@arbor-ui/testkit";
import {
  IDENTITY_TRANSFORM,
  applyTransform,
  compose,
  invert,
  isTranslationOnly,
  scaling,
  translation,
} from "../transform.js";

describe("transform", () => {
  test("translation moves points", () => {
    assert.deepEqual(applyTransform(translation(-10, -5), { x: 15, y: 7 }), { x: 5, y: 2 });
  });

  test("compose applies the first transform, then the second", () => {
    const t = compose(translation(1, 2), scaling(3));
    assert.deepEqual(applyTransform(t, { x: 2, y: 4 }), { x: 7, y: 14 });
  });

  test("invert undoes a scale plus translation", () => {
    const t = compose(translation(10, 20), scaling(2));
    const inv = invert(t);
    assert.ok(inv !== null);
    assert.deepEqual(applyTransform(inv, { x: 14, y: 28 }), { x: 2, y: 4 });
  });

  test("singular transforms have no inverse", () => {
    assert.equal(invert(scaling(0)), null);
  });

  test("identity is translation-only", () => {
    assert.equal(isTranslationOnly(IDENTITY_TRANSFORM), true);
    assert.equal(isTranslationOnly(scaling(2)), false);
  });
});
