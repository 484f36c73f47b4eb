import * as fengari from "fengari";

import { BridgeError, NO_ERRORS } from "../core/errors.js";
import type {
  CallOutcome,
  CallableState,
  ElementSelector,
  ScalarKind,
  ScalarValue,
  ScopeToken,
} from "../core/types.js";
import { failedOutcome, popErrorMessage, statusFromCode, type LuaEngine } from "./engine.js";
import { pushArray } from "./accessors.js";
import { pushScalar } from "./extraction.js";
import { pushElement } from "./navigator.js";
import type { ScriptReference } from "./references.js";

const { lua } = fengari;

const IDENTITY_BITS = 64;
const identities = new WeakMap<object, bigint>();
let identityCounter = 0n;

const isIdentifiable = (value: unknown): value is object =>
  (typeof value === "object" && value !== null) || typeof value === "function";

const identityOf = (value: unknown): bigint => {
  if (!isIdentifiable(value)) {
    return 0n;
  }
  const known = identities.get(value);
  if (known !== undefined) {
    return known;
  }
  identityCounter += 1n;
  // Spread sequential ids over the 64-bit space (splitmix64 finaliser).
  let mixed = BigInt.asUintN(IDENTITY_BITS, identityCounter * 0x9e3779b97f4a7c15n);
  mixed = BigInt.asUintN(IDENTITY_BITS, (mixed ^ (mixed >> 30n)) * 0xbf58476d1ce4e5b9n);
  mixed = BigInt.asUintN(IDENTITY_BITS, (mixed ^ (mixed >> 27n)) * 0x94d049bb133111ebn);
  mixed ^= mixed >> 31n;
  identities.set(value, mixed);
  return mixed;
};

export type ResultCount = number | "all";

/**
 * A script function parked on the stack at `baseSlot`, plus the arguments
 * pushed for the next call. The function survives calls, so one handle can
 * be invoked repeatedly; close() removes it and everything above it.
 */
export class CallableHandle {
  readonly baseSlot: number;
  readonly identity: bigint;
  private readonly engine: LuaEngine;
  private readonly generation: number;
  private argCount = 0;
  private closed = false;

  private constructor(engine: LuaEngine, baseSlot: number) {
    this.engine = engine;
    this.baseSlot = baseSlot;
    this.identity = identityOf(lua.lua_topointer(engine.state, baseSlot));
    this.generation = engine.scopes.enter("callable", baseSlot);
  }

  static openFromTable(engine: LuaEngine, selector: ElementSelector): CallableHandle | null {
    pushElement(engine, selector);
    return CallableHandle.bindTop(engine);
  }

  static openFromReference(engine: LuaEngine, reference: ScriptReference): CallableHandle | null {
    reference.push();
    return CallableHandle.bindTop(engine);
  }

  /** Binds a copy of the value on top; the original stays where it is. */
  static openFromTop(engine: LuaEngine): CallableHandle | null {
    if (engine.top() === 0) {
      return null;
    }
    engine.pushCopy(-1);
    return CallableHandle.bindTop(engine);
  }

  private static bindTop(engine: LuaEngine): CallableHandle | null {
    if (engine.typeAt(-1) !== "function") {
      engine.pop(1);
      return null;
    }
    return new CallableHandle(engine, engine.top());
  }

  get state(): CallableState {
    if (this.closed) return "closed";
    return this.argCount < 0 ? "invoked" : "bound";
  }

  get argumentCount(): number {
    return this.argCount;
  }

  putArgument<K extends ScalarKind>(kind: K, value: ScalarValue<K>): void {
    this.beginArgument();
    pushScalar(this.engine, kind, value);
    this.argCount += 1;
  }

  putArray<K extends ScalarKind>(kind: K, values: readonly ScalarValue<K>[]): void {
    this.beginArgument();
    pushArray(this.engine, kind, values);
    this.argCount += 1;
  }

  /** Counts the value already on top of the stack as the next argument. */
  putTop(): void {
    this.beginArgument();
    if (this.engine.top() <= this.baseSlot + this.argCount) {
      throw new BridgeError("BRIDGE_STACK_EMPTY", "No value on top to use as an argument.");
    }
    this.argCount += 1;
  }

  /**
   * Calls the function with the pending arguments. On success the results
   * are left on the stack; on failure the error value is popped into `message`.
   */
  invoke(expectedResults: ResultCount = 0): CallOutcome {
    this.assertOpen();
    const L = this.engine.state;
    const args = Math.max(this.argCount, 0);
    const callBase = lua.lua_gettop(L) - args;
    lua.lua_pushvalue(L, this.baseSlot);
    lua.lua_insert(L, -(args + 1));
    const nresults = expectedResults === "all" ? lua.LUA_MULTRET : expectedResults;
    const status = statusFromCode(lua.lua_pcall(L, args, nresults, 0));
    this.argCount = -1;
    if (status !== "ok") {
      return failedOutcome(status, popErrorMessage(L));
    }
    return { status, flags: NO_ERRORS, message: null, resultCount: lua.lua_gettop(L) - callBase };
  }

  close(): void {
    this.assertOpen();
    this.engine.scopes.leave(this.token());
    this.engine.setTop(this.baseSlot - 1);
    this.closed = true;
  }

  private beginArgument(): void {
    this.assertOpen();
    if (this.argCount < 0) {
      this.argCount = 0;
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new BridgeError("BRIDGE_CALLABLE_CLOSED", "Callable handle is closed.");
    }
    this.engine.scopes.assertLive(this.token(), this.engine.top());
  }

  private token(): ScopeToken {
    return { slot: this.baseSlot, generation: this.generation };
  }
}
