export type LuaTypeTag =
  | "none"
  | "nil"
  | "boolean"
  | "lightuserdata"
  | "number"
  | "string"
  | "table"
  | "function"
  | "userdata"
  | "thread";

export interface ScalarValueMap {
  boolean: boolean;
  int32: number;
  int64: bigint;
  float32: number;
  float64: number;
  string: string;
  pointer: unknown;
}

export type ScalarKind = keyof ScalarValueMap;

export type ScalarValue<K extends ScalarKind> = ScalarValueMap[K];

export type EngineStatus = "ok" | "yield" | "runtime" | "syntax" | "memory" | "gc" | "handler";

export interface ErrorFlags {
  readonly nonExistent: boolean;
  readonly wrongType: boolean;
  readonly fatal: boolean;
}

export type ErrorFlagName = keyof ErrorFlags;

export type ScopeKind = "table" | "callable";

export interface ScopeToken {
  readonly slot: number;
  readonly generation: number;
}

export interface TableHandle extends ScopeToken {
  readonly kind: "table";
}

/**
 * Where a value is read from. A table with key/position reads an element,
 * a key alone reads a global, an empty selector means the current stack top.
 * The key wins when both key and position are given.
 */
export interface ElementSelector {
  table?: TableHandle;
  key?: string;
  position?: number;
}

export interface SlotTarget {
  key?: string;
  position?: number;
}

export interface Extracted<T> {
  value: T;
  flags: ErrorFlags;
}

export interface ExtractOptions<T> {
  defaultValue?: T;
  /** Strings longer than this many code points are cut to fit. */
  maxLength?: number;
}

export interface ArrayOptions<T> extends ExtractOptions<T[]> {
  elementDefault?: T;
}

export interface CallOutcome {
  status: EngineStatus;
  flags: ErrorFlags;
  message: string | null;
  resultCount: number;
}

export type CallableState = "bound" | "invoked" | "closed";
