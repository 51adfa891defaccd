export { assert, describe, test } from "./nodeTest.js";
export { type CapturedWarnings, captureWarnings } from "./warnings.js";
