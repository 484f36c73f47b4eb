import * as fengari from "fengari";

import { BridgeError, NO_ERRORS, makeFlags } from "../core/errors.js";
import type {
  ExtractOptions,
  Extracted,
  LuaTypeTag,
  ScalarKind,
  ScalarValue,
  ScalarValueMap,
} from "../core/types.js";
import type { LuaEngine, LuaState } from "./engine.js";

const { lua, to_luastring } = fengari;

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

type Conversion<T> = { ok: true; value: T } | { ok: false };

type Converters = {
  [K in ScalarKind]: (
    L: LuaState,
    type: LuaTypeTag,
    maxLength: number | undefined
  ) => Conversion<ScalarValueMap[K]>;
};

type Pushers = {
  [K in ScalarKind]: (L: LuaState, value: ScalarValueMap[K]) => void;
};

const ZERO_VALUES: ScalarValueMap = {
  boolean: false,
  int32: 0,
  int64: 0n,
  float32: 0,
  float64: 0,
  string: "",
  pointer: null,
};

const MISMATCH = { ok: false } as const;

const readFiniteNumber = (L: LuaState, type: LuaTypeTag): number | null => {
  if (type !== "number") {
    return null;
  }
  const value = lua.lua_tonumber(L, -1);
  return Number.isFinite(value) ? value : null;
};

const isInt32 = (value: number): boolean =>
  Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;

const truncateCodePoints = (value: string, maxLength: number | undefined): string => {
  if (maxLength === undefined || value.length <= maxLength) {
    return value;
  }
  return Array.from(value).slice(0, Math.max(0, maxLength)).join("");
};

const CONVERTERS: Converters = {
  boolean: (L, type) => (type === "boolean" ? { ok: true, value: lua.lua_toboolean(L, -1) } : MISMATCH),
  int32: (L, type) => {
    const value = readFiniteNumber(L, type);
    if (value === null) return MISMATCH;
    // Adding 0 turns -0 into 0.
    const truncated = Math.trunc(value) + 0;
    return isInt32(truncated) ? { ok: true, value: truncated } : MISMATCH;
  },
  int64: (L, type) => {
    const value = readFiniteNumber(L, type);
    return value === null ? MISMATCH : { ok: true, value: BigInt(Math.trunc(value)) };
  },
  float32: (L, type) => {
    if (type !== "number") return MISMATCH;
    return { ok: true, value: Math.fround(lua.lua_tonumber(L, -1)) };
  },
  float64: (L, type) => (type === "number" ? { ok: true, value: lua.lua_tonumber(L, -1) } : MISMATCH),
  string: (L, type, maxLength) =>
    type === "string"
      ? { ok: true, value: truncateCodePoints(lua.lua_tojsstring(L, -1), maxLength) }
      : MISMATCH,
  pointer: (L, type) =>
    type === "lightuserdata" ? { ok: true, value: lua.lua_touserdata(L, -1) } : MISMATCH,
};

const PUSHERS: Pushers = {
  boolean: (L, value) => lua.lua_pushboolean(L, value),
  int32: (L, value) => {
    if (!isInt32(value)) {
      throw new BridgeError("BRIDGE_VALUE_RANGE", `Value ${value} is not a 32-bit integer.`);
    }
    lua.lua_pushinteger(L, value);
  },
  int64: (L, value) => {
    const asNumber = Number(value);
    if (!Number.isSafeInteger(asNumber)) {
      throw new BridgeError("BRIDGE_VALUE_RANGE", `Value ${value} does not fit in a Lua number exactly.`);
    }
    if (isInt32(asNumber)) {
      lua.lua_pushinteger(L, asNumber);
    } else {
      lua.lua_pushnumber(L, asNumber);
    }
  },
  float32: (L, value) => lua.lua_pushnumber(L, Math.fround(value)),
  float64: (L, value) => lua.lua_pushnumber(L, value),
  string: (L, value) => lua.lua_pushstring(L, to_luastring(value)),
  pointer: (L, value) => lua.lua_pushlightuserdata(L, value),
};

export const zeroValue = <K extends ScalarKind>(kind: K): ScalarValue<K> => ZERO_VALUES[kind];

/**
 * Converts the value on top of the stack and pops it, whatever the outcome.
 * Absent or mismatched values fall back to `defaultValue`; with no default
 * the result is the kind's zero value flagged fatal.
 */
export const extractTop = <K extends ScalarKind>(
  engine: LuaEngine,
  kind: K,
  options: ExtractOptions<ScalarValue<K>> = {}
): Extracted<ScalarValue<K>> => {
  const L = engine.state;
  if (lua.lua_gettop(L) === 0) {
    throw new BridgeError("BRIDGE_STACK_EMPTY", `Cannot extract ${kind} from an empty stack.`);
  }
  const type = engine.typeAt(-1);
  const absent = type === "nil" || type === "none";
  const converted: Conversion<ScalarValue<K>> = absent
    ? MISMATCH
    : CONVERTERS[kind](L, type, options.maxLength);
  lua.lua_pop(L, 1);

  if (converted.ok) {
    return { value: converted.value, flags: NO_ERRORS };
  }

  const reason = absent ? { nonExistent: true } : { wrongType: true };
  if (options.defaultValue !== undefined) {
    return { value: options.defaultValue, flags: makeFlags(reason) };
  }
  return { value: zeroValue(kind), flags: makeFlags({ ...reason, fatal: true }) };
};

export const pushScalar = <K extends ScalarKind>(
  engine: LuaEngine,
  kind: K,
  value: ScalarValue<K>
): void => {
  PUSHERS[kind](engine.state, value);
};
