import assert from "node:assert/strict";
import path from "node:path";

import { createEngineFromSource } from "../../src/api.js";
import { BridgeError } from "../../src/core/errors.js";
import type { LuaEngine } from "../../src/runtime/index.js";

export const fixturePath = (name: string): string => path.resolve("test", "fixtures", name);

export const expectCode = (fn: () => unknown, code: string): void => {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof BridgeError, `expected BridgeError, got ${String(error)}`);
    assert.equal(error.code, code);
    return true;
  });
};

export const engineWith = (source: string): LuaEngine => createEngineFromSource({ source });

/** Collects lines written by a CLI command. */
export const captureLines = (): { lines: string[]; writeLine: (line: string) => void } => {
  const lines: string[] = [];
  return { lines, writeLine: (line) => lines.push(line) };
};
