import assert from "node:assert/strict";
import { test } from "vitest";

import { ScopeStack } from "../../../src/runtime/scopes.js";
import { expectCode } from "../../support/helpers.js";

test("scopes open and close in LIFO order", () => {
  const scopes = new ScopeStack();
  const outer = { slot: 1, generation: scopes.enter("table", 1) };
  const inner = { slot: 3, generation: scopes.enter("callable", 3) };
  assert.equal(scopes.depth, 2);
  assert.equal(scopes.isLive(outer), true);

  expectCode(() => scopes.leave(outer), "BRIDGE_SCOPE_ORDER");
  assert.equal(scopes.depth, 2);

  assert.equal(scopes.leave(inner), "callable");
  assert.equal(scopes.leave(outer), "table");
  assert.equal(scopes.depth, 0);
});

test("a scope cannot open at or below the last one", () => {
  const scopes = new ScopeStack();
  scopes.enter("table", 2);
  expectCode(() => scopes.enter("table", 2), "BRIDGE_SCOPE_ORDER");
  expectCode(() => scopes.enter("callable", 1), "BRIDGE_SCOPE_ORDER");
  assert.equal(scopes.depth, 1);
});

test("closed and truncated handles are reported", () => {
  const scopes = new ScopeStack();
  const token = { slot: 2, generation: scopes.enter("table", 2) };
  expectCode(() => scopes.assertLive(token, 1), "BRIDGE_STACK_CORRUPT");
  scopes.assertLive(token, 2);
  scopes.leave(token);
  expectCode(() => scopes.assertLive(token, 5), "BRIDGE_HANDLE_STALE");
  expectCode(() => scopes.leave(token), "BRIDGE_HANDLE_STALE");
});

test("a reused slot gets a new generation", () => {
  const scopes = new ScopeStack();
  const first = { slot: 1, generation: scopes.enter("table", 1) };
  scopes.leave(first);
  const second = { slot: 1, generation: scopes.enter("table", 1) };
  assert.notEqual(first.generation, second.generation);
  assert.equal(scopes.isLive(first), false);
  assert.equal(scopes.isLive(second), true);
});
