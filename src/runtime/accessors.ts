import * as fengari from "fengari";

import { BridgeError, NO_ERRORS, hasErrors, makeFlags } from "../core/errors.js";
import type {
  ArrayOptions,
  ElementSelector,
  ErrorFlags,
  ExtractOptions,
  Extracted,
  ScalarKind,
  ScalarValue,
  SlotTarget,
  TableHandle,
} from "../core/types.js";
import type { LuaEngine } from "./engine.js";
import { extractTop, pushScalar } from "./extraction.js";
import {
  adoptTable,
  assertPosition,
  assertTableLive,
  closeTable,
  openTable,
  pushElement,
  rawSetPosition,
  sequenceLength,
} from "./navigator.js";

const { lua, to_luastring } = fengari;

/**
 * Reads the selected element as `kind`. Net stack effect is zero, except
 * with an empty selector, where the value on top is consumed.
 */
export const getValue = <K extends ScalarKind>(
  engine: LuaEngine,
  kind: K,
  selector: ElementSelector = {},
  options: ExtractOptions<ScalarValue<K>> = {}
): Extracted<ScalarValue<K>> => {
  pushElement(engine, selector);
  return extractTop(engine, kind, options);
};

export const hasValue = (engine: LuaEngine, selector: ElementSelector = {}): boolean => {
  const before = engine.top();
  const type = pushElement(engine, selector);
  engine.setTop(before);
  return type !== "nil" && type !== "none";
};

const assertTarget = (target: SlotTarget): void => {
  if (target.key === undefined && target.position === undefined) {
    throw new BridgeError("BRIDGE_TARGET_MISSING", "A store needs a key or a position.");
  }
  if (target.key === undefined && target.position !== undefined) {
    assertPosition(target.position);
  }
};

/**
 * Stores the value on top of the stack into `table[key]` or `table[position]`,
 * popping it. An unusable target pops the value and throws.
 */
export const setFromTop = (engine: LuaEngine, table: TableHandle, target: SlotTarget): void => {
  const L = engine.state;
  assertTableLive(engine, table);
  if (engine.top() <= table.slot) {
    throw new BridgeError("BRIDGE_STACK_EMPTY", "No value above the table handle to store.");
  }
  try {
    assertTarget(target);
  } catch (error) {
    engine.pop(1);
    throw error;
  }
  if (target.key !== undefined) {
    lua.lua_pushstring(L, to_luastring(target.key));
    lua.lua_insert(L, -2);
    lua.lua_rawset(L, table.slot);
    return;
  }
  if (target.position !== undefined) {
    rawSetPosition(L, table.slot, target.position);
  }
};

export const setValue = <K extends ScalarKind>(
  engine: LuaEngine,
  table: TableHandle,
  target: SlotTarget,
  kind: K,
  value: ScalarValue<K>
): void => {
  assertTableLive(engine, table);
  assertTarget(target);
  pushScalar(engine, kind, value);
  setFromTop(engine, table, target);
};

export const setGlobalValue = <K extends ScalarKind>(
  engine: LuaEngine,
  name: string,
  kind: K,
  value: ScalarValue<K>
): void => {
  pushScalar(engine, kind, value);
  lua.lua_setglobal(engine.state, to_luastring(name));
};

/** Builds a sequence table from `values` and leaves it on top of the stack. */
export const pushArray = <K extends ScalarKind>(
  engine: LuaEngine,
  kind: K,
  values: readonly ScalarValue<K>[]
): void => {
  const handle = openTable(engine);
  if (!handle) {
    throw new BridgeError("BRIDGE_STACK_CORRUPT", "Could not create a table.");
  }
  try {
    for (let i = 0; i < values.length; i += 1) {
      setValue(engine, handle, { position: i + 1 }, kind, values[i]);
    }
  } catch (error) {
    closeTable(engine, handle);
    throw error;
  }
  engine.scopes.leave(handle);
};

export const setArray = <K extends ScalarKind>(
  engine: LuaEngine,
  table: TableHandle,
  target: SlotTarget,
  kind: K,
  values: readonly ScalarValue<K>[]
): void => {
  assertTableLive(engine, table);
  assertTarget(target);
  pushArray(engine, kind, values);
  setFromTop(engine, table, target);
};

/**
 * Reads the sequence part of the selected table. Every element is read even
 * when some fail; the flags are those of the first failing element.
 */
export const getArray = <K extends ScalarKind>(
  engine: LuaEngine,
  kind: K,
  selector: ElementSelector,
  options: ArrayOptions<ScalarValue<K>> = {}
): Extracted<ScalarValue<K>[]> => {
  const type = pushElement(engine, selector);
  const arrayHandle = type === "table" ? adoptTable(engine) : null;
  if (!arrayHandle) {
    if (type !== "none") {
      engine.pop(1);
    }
    const reason = type === "nil" || type === "none" ? { nonExistent: true } : { wrongType: true };
    if (options.defaultValue !== undefined) {
      return { value: options.defaultValue, flags: makeFlags(reason) };
    }
    return { value: [], flags: makeFlags({ ...reason, fatal: true }) };
  }

  const values: ScalarValue<K>[] = [];
  let flags: ErrorFlags = NO_ERRORS;
  try {
    const length = sequenceLength(engine, arrayHandle);
    for (let position = 1; position <= length; position += 1) {
      const element = getValue(engine, kind, { table: arrayHandle, position }, {
        defaultValue: options.elementDefault,
        maxLength: options.maxLength,
      });
      values.push(element.value);
      if (!hasErrors(flags) && hasErrors(element.flags)) {
        flags = element.flags;
      }
    }
  } finally {
    closeTable(engine, arrayHandle);
  }
  return { value: values, flags };
};
