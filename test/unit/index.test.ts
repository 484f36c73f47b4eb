import assert from "node:assert/strict";
import { test } from "vitest";

import * as stackbridge from "../../src/index.js";

test("package entry exposes the public surface", () => {
  assert.equal(stackbridge.STACKBRIDGE_VERSION, "0.1.0");
  assert.equal(typeof stackbridge.LuaEngine, "function");
  assert.equal(typeof stackbridge.CallableHandle.openFromTable, "function");
  assert.equal(typeof stackbridge.getValue, "function");
  assert.equal(typeof stackbridge.referenceFor, "function");
  assert.equal(typeof stackbridge.createEngineFromSource, "function");
  assert.equal(typeof stackbridge.abortOnFailure, "function");
});

test("the entry points work together", () => {
  const engine = stackbridge.createEngineFromSource({ source: "function twice(x) return x * 2 end" });
  const twice = stackbridge.CallableHandle.openFromTable(engine, { key: "twice" });
  assert.ok(twice);
  twice.putArgument("int32", 21);
  const outcome = twice.invoke(1);
  assert.equal(stackbridge.abortOnFailure("twice", outcome, {}), false);
  assert.equal(stackbridge.getValue(engine, "int32").value, 42);
  twice.close();
  engine.close();
});
