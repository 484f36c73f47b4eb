import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { test } from "vitest";

import { NO_ERRORS } from "../../../src/core/errors.js";
import { LuaEngine, getValue, openTable, statusFromCode, typeTagFromCode } from "../../../src/runtime/index.js";
import { expectCode } from "../../support/helpers.js";

test("run executes a chunk and leaves the stack balanced", () => {
  const engine = new LuaEngine();
  const outcome = engine.run("answer = 6 * 7");
  assert.deepEqual(outcome, { status: "ok", flags: NO_ERRORS, message: null, resultCount: 0 });
  assert.equal(engine.top(), 0);
  assert.deepEqual(getValue(engine, "int32", { key: "answer" }), { value: 42, flags: NO_ERRORS });
  engine.close();
});

test("run keeps requested results on the stack", () => {
  const engine = new LuaEngine();
  const outcome = engine.run("return 1, 'two'", "results", 2);
  assert.equal(outcome.status, "ok");
  assert.equal(outcome.resultCount, 2);
  assert.equal(engine.top(), 2);
  assert.equal(engine.typeAt(1), "number");
  assert.equal(engine.typeAt(-1), "string");
  engine.setTop(0);
  engine.close();
});

test("syntax and runtime failures are returned, not thrown", () => {
  const engine = new LuaEngine();
  const syntax = engine.run("x = = 1", "bad");
  assert.equal(syntax.status, "syntax");
  assert.equal(syntax.flags.fatal, true);
  assert.ok(syntax.message?.startsWith("bad:1:"));
  assert.equal(engine.top(), 0);

  const runtime = engine.run("error('boom', 0)");
  assert.deepEqual(runtime, {
    status: "runtime",
    flags: { nonExistent: false, wrongType: false, fatal: true },
    message: "boom",
    resultCount: 0,
  });
  assert.equal(engine.top(), 0);

  const tableError = engine.run("error({})");
  assert.equal(tableError.message, "(error object is a table value)");
  assert.equal(engine.top(), 0);
  engine.close();
});

test("load leaves the compiled chunk on top", () => {
  const engine = new LuaEngine();
  const outcome = engine.load("return 5", "five");
  assert.equal(outcome.status, "ok");
  assert.equal(outcome.resultCount, 1);
  assert.equal(engine.typeAt(-1), "function");
  engine.pop(1);

  const failed = engine.load("return +", "broken");
  assert.equal(failed.status, "syntax");
  assert.equal(engine.top(), 0);
  engine.close();
});

test("runFile reads scripts from disk", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "stackbridge-engine-"));
  const file = path.join(dir, "settings.lua");
  fs.writeFileSync(file, "limit = 12\n");
  const engine = new LuaEngine();
  assert.equal(engine.runFile(file).status, "ok");
  assert.equal(getValue(engine, "int32", { key: "limit" }).value, 12);
  engine.close();
});

test("typeAt reports none outside the stack and pushCopy duplicates", () => {
  const engine = new LuaEngine({ openLibs: false });
  assert.equal(engine.typeAt(0), "none");
  assert.equal(engine.typeAt(1), "none");
  assert.equal(engine.typeAt(-1), "none");
  engine.run("return true", "flag", 1);
  engine.pushCopy();
  assert.equal(engine.top(), 2);
  assert.equal(engine.typeAt(2), "boolean");
  engine.setTop(0);
  engine.close();
});

test("openLibs false leaves the standard library out", () => {
  const engine = new LuaEngine({ openLibs: false });
  assert.equal(engine.run("return string", "probe", 1).status, "ok");
  assert.equal(engine.typeAt(-1), "nil");
  engine.pop(1);
  engine.close();
});

test("close is allowed once and refuses open handles", () => {
  const engine = new LuaEngine();
  const handle = openTable(engine);
  assert.ok(handle);
  expectCode(() => engine.close(), "ENGINE_SCOPES_OPEN");
  engine.setTop(0);
  const other = new LuaEngine();
  other.close();
  assert.equal(other.closed, true);
  expectCode(() => other.close(), "ENGINE_CLOSED");
  expectCode(() => other.top(), "ENGINE_CLOSED");
});

test("status and type codes map to names", () => {
  assert.equal(statusFromCode(0), "ok");
  assert.equal(statusFromCode(2), "runtime");
  assert.equal(statusFromCode(3), "syntax");
  assert.equal(statusFromCode(4), "memory");
  expectCode(() => statusFromCode(99), "ENGINE_STATUS_UNKNOWN");
  assert.equal(typeTagFromCode(5), "table");
  assert.equal(typeTagFromCode(42), "none");
});
