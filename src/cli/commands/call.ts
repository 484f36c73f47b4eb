import { abortOnFailure, type FailureSink } from "../../core/errors.js";
import type { ElementSelector } from "../../core/types.js";
import { CallableHandle, getValue, type LuaEngine } from "../../runtime/index.js";
import {
  emitError,
  getRequiredFlag,
  makeCliError,
  parseCount,
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

type CliArgument =
  | { kind: "boolean"; value: boolean }
  | { kind: "float64"; value: number }
  | { kind: "string"; value: string };

export const parseArgument = (raw: string): CliArgument => {
  if (raw === "true" || raw === "false") {
    return { kind: "boolean", value: raw === "true" };
  }
  const asNumber = Number(raw);
  if (raw.trim() !== "" && Number.isFinite(asNumber)) {
    return { kind: "float64", value: asNumber };
  }
  return { kind: "string", value: raw };
};

const callFunction = (
  engine: LuaEngine,
  selector: ElementSelector,
  label: string,
  args: readonly CliArgument[],
  resultCount: number,
  resultKind: CliKind
): unknown[] => {
  const callable = CallableHandle.openFromTable(engine, selector);
  if (!callable) {
    throw makeCliError("CLI_FUNCTION_NOT_FOUND", `No function at ${label}`);
  }
  try {
    for (const arg of args) {
      if (arg.kind === "boolean") callable.putArgument("boolean", arg.value);
      else if (arg.kind === "float64") callable.putArgument("float64", arg.value);
      else callable.putArgument("string", arg.value);
    }
    const outcome = callable.invoke(resultCount);
    const sink: FailureSink = {};
    if (abortOnFailure(`call ${label}`, outcome, sink)) {
      throw makeCliError(sink.code ?? "ENGINE_RUNTIME", sink.message ?? "Call failed.");
    }
    const results: unknown[] = [];
    for (let i = 0; i < resultCount; i += 1) {
      results.push(getValue(engine, resultKind).value);
    }
    return results.reverse();
  } finally {
    callable.close();
  }
};

const CALL_FLAGS = ["file", "function", "args", "results", "kind"] as const;

const runCall = (args: string[], writeLine: WriteLine): number => {
  const flags = parseFlags(args, CALL_FLAGS);
  const file = getRequiredFlag(flags, "file");
  const target = getRequiredFlag(flags, "function");
  const resultKind = parseKind(flags.kind, "float64");
  const resultCount = parseCount(flags.results, "results", 1);
  const callArgs = flags.args === undefined ? [] : flags.args.split(",").map(parseArgument);

  const segments = parsePath(target);
  const globalName = segments[0]?.key;
  const last = segments[segments.length - 1];
  if (globalName === undefined || !last) {
    throw makeCliError("CLI_FUNCTION_INVALID", `Invalid function path: ${target}`);
  }

  const results = withScriptFile(file, (engine) => {
    if (segments.length === 1) {
      return callFunction(engine, { key: globalName }, target, callArgs, resultCount, resultKind);
    }
    return withPathTable(engine, globalName, segments.slice(1, -1), (table) => {
      if (!table) {
        throw makeCliError("CLI_FUNCTION_NOT_FOUND", `No function at ${target}`);
      }
      return callFunction(engine, { table, ...last }, target, callArgs, resultCount, resultKind);
    });
  });

  writeLine("RESULT:OK");
  writeLine(`COUNT:${results.length}`);
  for (const result of results) {
    writeLine(`VALUE_JSON:${toJson(result)}`);
  }
  return 0;
};

export const runCallCommand = (argv: string[], writeLine: WriteLine = defaultWriteLine): number => {
  try {
    return runCall(argv, writeLine);
  } catch (error) {
    return emitError(writeLine, error);
  }
};
