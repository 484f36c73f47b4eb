/**
 * Declarations for the parts of the fengari Lua VM this package calls.
 * Fengari strings are byte arrays; convert with to_luastring / to_jsstring.
 */
declare module "fengari" {
  export type LuaString = Uint8Array;

  // Opaque Lua thread state.
  export interface lua_State {
    readonly __luaState?: never;
  }

  export namespace lua {
    const LUA_OK: number;
    const LUA_YIELD: number;
    const LUA_ERRRUN: number;
    const LUA_ERRSYNTAX: number;
    const LUA_ERRMEM: number;
    const LUA_ERRGCMM: number;
    const LUA_ERRERR: number;

    const LUA_MULTRET: number;

    const LUA_TNONE: number;
    const LUA_TNIL: number;
    const LUA_TBOOLEAN: number;
    const LUA_TLIGHTUSERDATA: number;
    const LUA_TNUMBER: number;
    const LUA_TSTRING: number;
    const LUA_TTABLE: number;
    const LUA_TFUNCTION: number;
    const LUA_TUSERDATA: number;
    const LUA_TTHREAD: number;

    const LUA_REGISTRYINDEX: number;

    function lua_close(L: lua_State): void;

    function lua_gettop(L: lua_State): number;
    function lua_settop(L: lua_State, idx: number): void;
    function lua_pop(L: lua_State, n: number): void;
    function lua_pushvalue(L: lua_State, idx: number): void;
    function lua_insert(L: lua_State, idx: number): void;

    function lua_type(L: lua_State, idx: number): number;

    function lua_toboolean(L: lua_State, idx: number): boolean;
    function lua_tonumber(L: lua_State, idx: number): number;
    function lua_tojsstring(L: lua_State, idx: number): string;
    function lua_touserdata(L: lua_State, idx: number): unknown;
    function lua_topointer(L: lua_State, idx: number): unknown;
    function lua_rawlen(L: lua_State, idx: number): number;

    function lua_pushnil(L: lua_State): void;
    function lua_pushboolean(L: lua_State, b: boolean): void;
    function lua_pushnumber(L: lua_State, n: number): void;
    function lua_pushinteger(L: lua_State, n: number): void;
    function lua_pushstring(L: lua_State, s: LuaString): void;
    function lua_pushlightuserdata(L: lua_State, p: unknown): void;

    function lua_newtable(L: lua_State): void;
    function lua_rawget(L: lua_State, idx: number): number;
    function lua_rawset(L: lua_State, idx: number): void;
    function lua_rawgeti(L: lua_State, idx: number, n: number): number;
    function lua_rawseti(L: lua_State, idx: number, n: number): void;
    function lua_next(L: lua_State, idx: number): number;

    function lua_getglobal(L: lua_State, name: LuaString): number;
    function lua_setglobal(L: lua_State, name: LuaString): void;

    function lua_pcall(L: lua_State, nargs: number, nresults: number, msgh: number): number;
  }

  export namespace lauxlib {
    const LUA_REFNIL: number;

    function luaL_newstate(): lua_State;
    function luaL_loadbuffer(L: lua_State, buff: LuaString, size: number, name: LuaString): number;
    function luaL_ref(L: lua_State, t: number): number;
    function luaL_unref(L: lua_State, t: number, ref: number): void;
  }

  export namespace lualib {
    function luaL_openlibs(L: lua_State): void;
  }

  export function to_luastring(str: string): LuaString;
}
