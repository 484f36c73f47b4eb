import fs from "node:fs";

import * as fengari from "fengari";

import { BridgeError, NO_ERRORS, makeFlags } from "../core/errors.js";
import type { CallOutcome, EngineStatus, LuaTypeTag } from "../core/types.js";
import { ScopeStack } from "./scopes.js";

const { lua, lauxlib, lualib, to_luastring } = fengari;

export type LuaState = fengari.lua_State;

const TYPE_TAGS: ReadonlyMap<number, LuaTypeTag> = new Map<number, LuaTypeTag>([
  [lua.LUA_TNONE, "none"],
  [lua.LUA_TNIL, "nil"],
  [lua.LUA_TBOOLEAN, "boolean"],
  [lua.LUA_TLIGHTUSERDATA, "lightuserdata"],
  [lua.LUA_TNUMBER, "number"],
  [lua.LUA_TSTRING, "string"],
  [lua.LUA_TTABLE, "table"],
  [lua.LUA_TFUNCTION, "function"],
  [lua.LUA_TUSERDATA, "userdata"],
  [lua.LUA_TTHREAD, "thread"],
]);

const STATUSES: ReadonlyMap<number, EngineStatus> = new Map<number, EngineStatus>([
  [lua.LUA_OK, "ok"],
  [lua.LUA_YIELD, "yield"],
  [lua.LUA_ERRRUN, "runtime"],
  [lua.LUA_ERRSYNTAX, "syntax"],
  [lua.LUA_ERRMEM, "memory"],
  [lua.LUA_ERRGCMM, "gc"],
  [lua.LUA_ERRERR, "handler"],
]);

export const typeTagFromCode = (code: number): LuaTypeTag => TYPE_TAGS.get(code) ?? "none";

export const statusFromCode = (code: number): EngineStatus => {
  const status = STATUSES.get(code);
  if (!status) {
    throw new BridgeError("ENGINE_STATUS_UNKNOWN", `Unknown engine status code ${code}.`);
  }
  return status;
};

/** Pops the error value a failed load or call left on top and returns its text. */
export const popErrorMessage = (L: LuaState): string => {
  const type = typeTagFromCode(lua.lua_type(L, -1));
  const message =
    type === "string" ? lua.lua_tojsstring(L, -1) : `(error object is a ${type} value)`;
  lua.lua_pop(L, 1);
  return message;
};

export const failedOutcome = (status: EngineStatus, message: string): CallOutcome => ({
  status,
  flags: makeFlags({ fatal: true }),
  message,
  resultCount: 0,
});

export interface LuaEngineOptions {
  openLibs?: boolean;
}

/**
 * One embedded Lua interpreter. Owns the value stack and the registry;
 * every other component borrows it and must not outlive it.
 */
export class LuaEngine {
  readonly scopes = new ScopeStack();
  private current: LuaState | null;
  private references = 0;

  constructor(options: LuaEngineOptions = {}) {
    this.current = lauxlib.luaL_newstate();
    if (options.openLibs ?? true) {
      lualib.luaL_openlibs(this.current);
    }
  }

  get state(): LuaState {
    if (!this.current) {
      throw new BridgeError("ENGINE_CLOSED", "Engine instance is closed.");
    }
    return this.current;
  }

  get closed(): boolean {
    return this.current === null;
  }

  get liveReferences(): number {
    return this.references;
  }

  trackReference(delta: 1 | -1): void {
    this.references += delta;
  }

  top(): number {
    return lua.lua_gettop(this.state);
  }

  setTop(index: number): void {
    lua.lua_settop(this.state, index);
  }

  pop(count: number): void {
    lua.lua_pop(this.state, count);
  }

  pushCopy(index = -1): void {
    lua.lua_pushvalue(this.state, index);
  }

  typeAt(index: number): LuaTypeTag {
    const L = this.state;
    if (index === 0 || Math.abs(index) > lua.lua_gettop(L)) {
      return "none";
    }
    return typeTagFromCode(lua.lua_type(L, index));
  }

  load(source: string, chunkName = "chunk"): CallOutcome {
    const L = this.state;
    const buffer = to_luastring(source);
    const code = lauxlib.luaL_loadbuffer(L, buffer, buffer.length, to_luastring(`=${chunkName}`));
    return this.settle(L, code, 1);
  }

  run(source: string, chunkName = "chunk", expectedResults = 0): CallOutcome {
    return this.runBuffer(to_luastring(source), `=${chunkName}`, expectedResults);
  }

  runFile(filePath: string, expectedResults = 0): CallOutcome {
    const source = fs.readFileSync(filePath, "utf8");
    return this.runBuffer(to_luastring(source), `@${filePath}`, expectedResults);
  }

  close(): void {
    const L = this.state;
    if (this.scopes.depth > 0) {
      throw new BridgeError(
        "ENGINE_SCOPES_OPEN",
        `Cannot close engine with ${this.scopes.depth} open handle(s).`
      );
    }
    lua.lua_close(L);
    this.current = null;
  }

  private runBuffer(buffer: Uint8Array, chunkName: string, expectedResults: number): CallOutcome {
    const L = this.state;
    const base = lua.lua_gettop(L);
    const loaded = lauxlib.luaL_loadbuffer(L, buffer, buffer.length, to_luastring(chunkName));
    if (loaded !== lua.LUA_OK) {
      return this.settle(L, loaded, 0);
    }
    const code = lua.lua_pcall(L, 0, expectedResults, 0);
    return this.settle(L, code, lua.lua_gettop(L) - base);
  }

  private settle(L: LuaState, code: number, resultCount: number): CallOutcome {
    const status = statusFromCode(code);
    if (status !== "ok") {
      return failedOutcome(status, popErrorMessage(L));
    }
    return { status, flags: NO_ERRORS, message: null, resultCount };
  }
}
