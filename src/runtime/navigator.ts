import * as fengari from "fengari";

import { BridgeError } from "../core/errors.js";
import type { ElementSelector, LuaTypeTag, TableHandle } from "../core/types.js";
import { typeTagFromCode, type LuaEngine, type LuaState } from "./engine.js";

const { lua, to_luastring } = fengari;

export const assertTableLive = (engine: LuaEngine, handle: TableHandle): void => {
  engine.scopes.assertLive(handle, engine.top());
  if (engine.typeAt(handle.slot) !== "table") {
    throw new BridgeError(
      "BRIDGE_STACK_CORRUPT",
      `Slot ${handle.slot} no longer holds a table.`
    );
  }
};

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

/** Throws for positions that cannot index a table. Call before pushing anything. */
export const assertPosition = (position: number): void => {
  if (!Number.isSafeInteger(position)) {
    throw new BridgeError("BRIDGE_POSITION_INVALID", `Position ${position} is not an integer.`);
  }
};

// lua_rawgeti/lua_rawseti only take 32-bit indices; wider positions go through a number key.
const fitsRawIndex = (position: number): boolean => position >= INT32_MIN && position <= INT32_MAX;

/** Pushes `t[position]` for the table at the absolute `slot` and returns its type code. */
export const rawGetPosition = (L: LuaState, slot: number, position: number): number => {
  if (fitsRawIndex(position)) {
    return lua.lua_rawgeti(L, slot, position);
  }
  lua.lua_pushnumber(L, position);
  return lua.lua_rawget(L, slot);
};

/** Pops the top value into `t[position]` for the table at the absolute `slot`. */
export const rawSetPosition = (L: LuaState, slot: number, position: number): void => {
  if (fitsRawIndex(position)) {
    lua.lua_rawseti(L, slot, position);
    return;
  }
  lua.lua_pushnumber(L, position);
  lua.lua_insert(L, -2);
  lua.lua_rawset(L, slot);
};

/**
 * Pushes the selected element and reports its type.
 * An empty selector pushes nothing and reports the current top.
 */
export const pushElement = (engine: LuaEngine, selector: ElementSelector = {}): LuaTypeTag => {
  const L = engine.state;
  const { table, key, position } = selector;
  if (table) {
    assertTableLive(engine, table);
    if (key !== undefined) {
      lua.lua_pushstring(L, to_luastring(key));
      return typeTagFromCode(lua.lua_rawget(L, table.slot));
    }
    if (position !== undefined) {
      assertPosition(position);
      return typeTagFromCode(rawGetPosition(L, table.slot, position));
    }
    lua.lua_pushnil(L);
    return "nil";
  }
  if (key !== undefined) {
    return typeTagFromCode(lua.lua_getglobal(L, to_luastring(key)));
  }
  if (position !== undefined) {
    assertPosition(position);
    // A position needs a table to index into.
    lua.lua_pushnil(L);
    return "nil";
  }
  return engine.typeAt(-1);
};

/** Same resolution as pushElement; the resolved value stays on the stack. */
export const typeOf = (engine: LuaEngine, selector: ElementSelector = {}): LuaTypeTag =>
  pushElement(engine, selector);

const isEmptySelector = (selector: ElementSelector): boolean =>
  !selector.table && selector.key === undefined && selector.position === undefined;

const registerTable = (engine: LuaEngine, slot: number): TableHandle => {
  const generation = engine.scopes.enter("table", slot);
  return { kind: "table", slot, generation };
};

/**
 * Opens `table[key]`, a global, or a brand-new table when the selector is
 * empty. Returns null and leaves the stack unchanged when the target is not a table.
 */
export const openTable = (engine: LuaEngine, selector: ElementSelector = {}): TableHandle | null => {
  const L = engine.state;
  if (isEmptySelector(selector)) {
    lua.lua_newtable(L);
    return registerTable(engine, lua.lua_gettop(L));
  }
  const type = pushElement(engine, selector);
  if (type !== "table") {
    lua.lua_pop(L, 1);
    return null;
  }
  return registerTable(engine, lua.lua_gettop(L));
};

/** Opens the table already on top of the stack without pushing. */
export const adoptTable = (engine: LuaEngine): TableHandle | null => {
  if (engine.typeAt(-1) !== "table") {
    return null;
  }
  return registerTable(engine, engine.top());
};

export const closeTable = (engine: LuaEngine, handle: TableHandle): void => {
  const top = engine.top();
  if (top < handle.slot) {
    engine.scopes.assertLive(handle, top);
  }
  engine.scopes.leave(handle);
  engine.setTop(handle.slot - 1);
};

/** Opens the selected table for the duration of `body` and always closes it. */
export const withTable = <T>(
  engine: LuaEngine,
  selector: ElementSelector,
  body: (handle: TableHandle | null) => T
): T => {
  const handle = openTable(engine, selector);
  if (!handle) {
    return body(null);
  }
  try {
    return body(handle);
  } finally {
    closeTable(engine, handle);
  }
};

/** Starts iteration: pushes the first key/value pair, or nothing when the table is empty. */
export const firstEntry = (engine: LuaEngine, handle: TableHandle): boolean => {
  assertTableLive(engine, handle);
  lua.lua_pushnil(engine.state);
  return lua.lua_next(engine.state, handle.slot) !== 0;
};

/** Expects the current key on top; replaces it with the next pair or pops it at the end. */
export const nextEntry = (engine: LuaEngine, handle: TableHandle): boolean => {
  assertTableLive(engine, handle);
  if (engine.top() <= handle.slot) {
    throw new BridgeError("BRIDGE_ITERATION_KEY", "No iteration key above the table handle.");
  }
  return lua.lua_next(engine.state, handle.slot) !== 0;
};

/** Total number of entries, hash part included. Walks the whole table. */
export const countEntries = (engine: LuaEngine, handle: TableHandle): number => {
  let count = 0;
  let more = firstEntry(engine, handle);
  while (more) {
    count += 1;
    engine.pop(1);
    more = nextEntry(engine, handle);
  }
  return count;
};

export const sequenceLength = (engine: LuaEngine, handle: TableHandle): number => {
  assertTableLive(engine, handle);
  return lua.lua_rawlen(engine.state, handle.slot);
};

/** String and number keys of a table in engine order; other key types are skipped. */
export const collectKeys = (engine: LuaEngine, handle: TableHandle): Array<string | number> => {
  const L = engine.state;
  const keys: Array<string | number> = [];
  let more = firstEntry(engine, handle);
  while (more) {
    const keyType = engine.typeAt(-2);
    if (keyType === "string") {
      keys.push(lua.lua_tojsstring(L, -2));
    } else if (keyType === "number") {
      keys.push(lua.lua_tonumber(L, -2));
    }
    engine.pop(1);
    more = nextEntry(engine, handle);
  }
  return keys;
};
