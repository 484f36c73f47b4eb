import assert from "node:assert/strict";
import { test } from "vitest";

import {
  CallableHandle,
  closeTable,
  getArray,
  getValue,
  hasValue,
  openTable,
  setArray,
  setValue,
  type LuaEngine,
} from "../../../src/runtime/index.js";
import type { TableHandle } from "../../../src/core/types.js";
import { engineWith } from "../../support/helpers.js";

/** Small deterministic generator so failures replay. */
const lcg = (seed: number): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
};

const SOURCE = `
root = { count = 1, nested = { 1, 2, 3 } }
function echo(...) return ... end
`;

const step = (engine: LuaEngine, table: TableHandle, pick: number, index: number): void => {
  switch (pick) {
    case 0:
      setValue(engine, table, { key: `k${index % 7}` }, "int32", index);
      break;
    case 1:
      getValue(engine, "string", { table, key: `k${index % 7}` });
      break;
    case 2:
      setArray(engine, table, { position: (index % 4) + 1 }, "float64", [index, index / 2]);
      break;
    case 3:
      getArray(engine, "int32", { table, key: "nested" });
      break;
    case 4:
      hasValue(engine, { table, position: 1 });
      break;
    default: {
      const echo = CallableHandle.openFromTable(engine, { key: "echo" });
      assert.ok(echo);
      echo.putArgument("int32", index);
      echo.invoke("all");
      echo.close();
    }
  }
};

test("random operation sequences leave the stack where they found it", () => {
  for (const seed of [1, 7, 42, 2024]) {
    const random = lcg(seed);
    const engine = engineWith(SOURCE);
    const root = openTable(engine, { key: "root" });
    assert.ok(root);
    for (let i = 0; i < 200; i += 1) {
      step(engine, root, Math.floor(random() * 6), i);
      assert.equal(engine.top(), root.slot, `seed ${seed}, step ${i}`);
      assert.equal(engine.scopes.depth, 1);
    }
    closeTable(engine, root);
    assert.equal(engine.top(), 0);
    engine.close();
  }
});
