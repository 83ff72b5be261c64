import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

export { createRng, type Rng } from "./rng.js";
export { assert, describe, test };
