import { assert, describe, test } from "@arbor-ui/testkit";
import { createDevWarnings, formatWarning } from "../devWarnings.js";

describe("dev warnings", () => {
  test("prefixes the channel", () => {
    assert.equal(formatWarning("paint", "no backend"), "[arbor][paint] no backend");
  });

  test("emits each key once", () => {
    const lines: string[] = [];
    const warnings = createDevWarnings({ devMode: true, warn: (m) => lines.push(m) });

    warnings.warn("layout", "a", "first");
    warnings.warn("layout", "a", "again");
    warnings.warn("hit-test", "a", "other channel");

    assert.deepEqual(lines, ["[arbor][layout] first", "[arbor][hit-test] other channel"]);
    assert.equal(warnings.count(), 2);
  });

  test("reset allows a key to warn again", () => {
    const lines: string[] = [];
    const warnings = createDevWarnings({ devMode: true, warn: (m) => lines.push(m) });
    warnings.warn("layout", "k", "x");
    warnings.reset();
    warnings.warn("layout", "k", "x");
    assert.equal(lines.length, 2);
  });

  test("stays silent outside dev mode", () => {
    const lines: string[] = [];
    const warnings = createDevWarnings({ devMode: false, warn: (m) => lines.push(m) });
    warnings.warn("layout", "k", "x");
    assert.equal(lines.length, 0);
    assert.equal(warnings.count(), 0);
  });
});
