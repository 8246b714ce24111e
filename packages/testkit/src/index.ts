export { createRng, type Rng } from "./rng.js";
export { assert, describe, test, throwsCode } from "./nodeTest.js";
