import assert from "node:assert/strict";
import { test } from "vitest";

import { createEngineFromSource, loadConfigFile } from "../../src/api.js";
import { BridgeError } from "../../src/core/errors.js";
import { getValue } from "../../src/runtime/index.js";
import { fixturePath } from "../support/helpers.js";

const catchBridgeError = (fn: () => unknown): BridgeError => {
  try {
    fn();
  } catch (error) {
    if (error instanceof BridgeError) {
      return error;
    }
    throw error;
  }
  assert.fail("expected a BridgeError");
};

test("createEngineFromSource runs the script", () => {
  const engine = createEngineFromSource({ source: "limit = 3" });
  assert.equal(getValue(engine, "int32", { key: "limit" }).value, 3);
  engine.close();
});

test("createEngineFromSource passes engine options through", () => {
  const engine = createEngineFromSource({ source: "bare = string == nil", openLibs: false });
  assert.equal(getValue(engine, "boolean", { key: "bare" }).value, true);
  engine.close();
});

test("script failures become BridgeErrors with the engine status", () => {
  const runtime = catchBridgeError(() => createEngineFromSource({ source: "error('boom', 0)" }));
  assert.equal(runtime.code, "API_SCRIPT_LOAD");
  assert.equal(runtime.status, "runtime");
  assert.equal(runtime.message, 'Cannot run script "config": boom');

  const syntax = catchBridgeError(() => createEngineFromSource({ source: "x = = 1", chunkName: "init" }));
  assert.equal(syntax.status, "syntax");
  assert.ok(syntax.message.startsWith('Cannot run script "init": init:1:'));
});

test("loadConfigFile reads a script from disk", () => {
  const engine = loadConfigFile(fixturePath("config.lua"));
  assert.equal(getValue(engine, "string", { key: "version" }).value, "1.2.0");
  engine.close();
});

test("loadConfigFile reports unreadable and broken files", () => {
  const missing = fixturePath("missing.lua");
  const unreadable = catchBridgeError(() => loadConfigFile(missing));
  assert.equal(unreadable.code, "API_SCRIPT_READ");
  assert.ok(unreadable.message.startsWith(`Cannot read script file ${missing}: `));

  const broken = fixturePath("broken.lua");
  const failed = catchBridgeError(() => loadConfigFile(broken));
  assert.equal(failed.code, "API_SCRIPT_LOAD");
  assert.equal(failed.status, "syntax");
  assert.ok(failed.message.startsWith(`Cannot run script file ${broken}: `));
});
