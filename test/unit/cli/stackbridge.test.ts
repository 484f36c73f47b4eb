import assert from "node:assert/strict";
import { afterEach, test, vi } from "vitest";

import { runStackbridgeCli } from "../../../src/cli/stackbridge.js";
import { fixturePath } from "../../support/helpers.js";

afterEach(() => {
  vi.restoreAllMocks();
});

const captureStream = (stream: NodeJS.WriteStream): string[] => {
  const chunks: string[] = [];
  vi.spyOn(stream, "write").mockImplementation((chunk: string | Uint8Array) => {
    chunks.push(String(chunk));
    return true;
  });
  return chunks;
};

test("help prints usage", () => {
  const out = captureStream(process.stdout);
  assert.equal(runStackbridgeCli(["--help"]), 0);
  assert.equal(out.length, 1);
  assert.ok(out[0]?.startsWith("stackbridge\n  get --file"));
});

test("modes dispatch to their commands", () => {
  const out = captureStream(process.stdout);
  assert.equal(runStackbridgeCli(["get", "--file", fixturePath("config.lua"), "--global", "version"]), 0);
  assert.deepEqual(out, ["RESULT:OK\n", 'VALUE_JSON:"1.2.0"\n', "FLAGS:NONE\n"]);
});

test("unknown modes fail", () => {
  const err = captureStream(process.stderr);
  assert.equal(runStackbridgeCli(["serve"]), 1);
  assert.ok(err[0]?.startsWith("Unknown mode: serve\n"));
});
