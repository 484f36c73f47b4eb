import * as fengari from "fengari";

import { BridgeError } from "../core/errors.js";
import type { ElementSelector, LuaTypeTag } from "../core/types.js";
import { typeTagFromCode, type LuaEngine } from "./engine.js";
import { pushElement } from "./navigator.js";

const { lua, lauxlib } = fengari;

/**
 * A registry entry holding a script value beyond its stack lifetime.
 * The entry stays until `release()` is called.
 */
export class ScriptReference {
  readonly key: number;
  private readonly engine: LuaEngine;
  private released = false;

  constructor(engine: LuaEngine, key: number) {
    this.engine = engine;
    this.key = key;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** True when the referenced value was nil; such references push nil. */
  get isNil(): boolean {
    return this.key === lauxlib.LUA_REFNIL;
  }

  push(): LuaTypeTag {
    this.assertHeld();
    return typeTagFromCode(lua.lua_rawgeti(this.engine.state, lua.LUA_REGISTRYINDEX, this.key));
  }

  release(): void {
    this.assertHeld();
    this.released = true;
    if (this.isNil) {
      return;
    }
    lauxlib.luaL_unref(this.engine.state, lua.LUA_REGISTRYINDEX, this.key);
    this.engine.trackReference(-1);
  }

  private assertHeld(): void {
    if (this.released) {
      throw new BridgeError("BRIDGE_REFERENCE_RELEASED", `Reference ${this.key} was already released.`);
    }
  }
}

/**
 * Resolves the selector like pushElement, then moves the value into the
 * registry. With an empty selector the current top is consumed.
 */
export const referenceFor = (engine: LuaEngine, selector: ElementSelector = {}): ScriptReference => {
  const type = pushElement(engine, selector);
  if (type === "none") {
    throw new BridgeError("BRIDGE_STACK_EMPTY", "Nothing on the stack to reference.");
  }
  const key = lauxlib.luaL_ref(engine.state, lua.LUA_REGISTRYINDEX);
  const reference = new ScriptReference(engine, key);
  if (!reference.isNil) {
    engine.trackReference(1);
  }
  return reference;
};

export const referenceToTop = (reference: ScriptReference): LuaTypeTag => reference.push();

export const releaseReference = (reference: ScriptReference): void => {
  reference.release();
};
