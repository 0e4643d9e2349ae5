export { assert, describe, test } from "./nodeTest.js";
export { nextMacrotask, sleep } from "./timing.js";
