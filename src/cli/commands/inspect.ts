import { abortOnFailure, describeFlags, makeFlags, type FailureSink } from "../../core/errors.js";
import type { Extracted, ScalarValue, SlotTarget } from "../../core/types.js";
import { collectKeys, countEntries, getValue, zeroValue, type LuaEngine } from "../../runtime/index.js";
import {
  emitError,
  getRequiredFlag,
  makeCliError,
  parseFlags,
  parseKind,
  toJson,
  type CliKind,
  type WriteLine,
} from "../core/args.js";
import { parsePath, withPathTable } from "../core/path-walker.js";
import { withScriptFile } from "../core/source-loader.js";

const defaultWriteLine: WriteLine = (line) => {
  process.stdout.write(`${line}\n`);
};

const readValue = <K extends CliKind>(
  engine: LuaEngine,
  kind: K,
  globalName: string,
  segments: readonly SlotTarget[]
): Extracted<ScalarValue<K>> => {
  const last = segments[segments.length - 1];
  if (!last) {
    return getValue(engine, kind, { key: globalName });
  }
  return withPathTable(engine, globalName, segments.slice(0, -1), (table) =>
    table
      ? getValue(engine, kind, { table, ...last })
      : { value: zeroValue(kind), flags: makeFlags({ nonExistent: true, fatal: true }) }
  );
};

const compareKeys = (a: string | number, b: string | number): number => {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  return a.localeCompare(b);
};

const GET_FLAGS = ["file", "global", "path", "kind"] as const;
const KEYS_FLAGS = ["file", "global", "path"] as const;

const runGet = (args: string[], writeLine: WriteLine): number => {
  const flags = parseFlags(args, GET_FLAGS);
  const file = getRequiredFlag(flags, "file");
  const globalName = getRequiredFlag(flags, "global");
  const kind = parseKind(flags.kind, "string");
  const segments = parsePath(flags.path);

  const result = withScriptFile(file, (engine) => readValue(engine, kind, globalName, segments));
  const sink: FailureSink = {};
  if (abortOnFailure(`get ${globalName}`, result, sink)) {
    throw makeCliError(sink.code ?? "VALUE_FATAL", sink.message ?? "Value is not usable.");
  }
  writeLine("RESULT:OK");
  writeLine(`VALUE_JSON:${toJson(result.value)}`);
  const names = describeFlags(result.flags);
  writeLine(`FLAGS:${names.length > 0 ? names.join(",") : "NONE"}`);
  return 0;
};

const runKeys = (args: string[], writeLine: WriteLine): number => {
  const flags = parseFlags(args, KEYS_FLAGS);
  const file = getRequiredFlag(flags, "file");
  const globalName = getRequiredFlag(flags, "global");
  const segments = parsePath(flags.path);

  const listing = withScriptFile(file, (engine) =>
    withPathTable(engine, globalName, segments, (table) =>
      table ? { count: countEntries(engine, table), keys: collectKeys(engine, table) } : null
    )
  );
  if (!listing) {
    const where = [globalName, flags.path].filter(Boolean).join(".");
    throw makeCliError("CLI_TABLE_NOT_FOUND", `No table at ${where}`);
  }
  const keys = [...listing.keys].sort(compareKeys);
  writeLine("RESULT:OK");
  writeLine(`COUNT:${listing.count}`);
  for (const key of keys) {
    writeLine(`KEY_JSON:${toJson(key)}`);
  }
  return 0;
};

export const runGetCommand = (argv: string[], writeLine: WriteLine = defaultWriteLine): number => {
  try {
    return runGet(argv, writeLine);
  } catch (error) {
    return emitError(writeLine, error);
  }
};

export const runKeysCommand = (argv: string[], writeLine: WriteLine = defaultWriteLine): number => {
  try {
    return runKeys(argv, writeLine);
  } catch (error) {
    return emitError(writeLine, error);
  }
};
