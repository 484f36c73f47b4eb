import { BridgeError } from "../../core/errors.js";
import type { ScalarKind } from "../../core/types.js";

export type WriteLine = (line: string) => void;

export type CliKind = Exclude<ScalarKind, "pointer">;

const CLI_KINDS: readonly CliKind[] = ["boolean", "int32", "int64", "float32", "float64", "string"];

export const makeCliError = (code: string, message: string): Error & { code: string } =>
  Object.assign(new Error(message), { code });

export type Flags<Name extends string> = Partial<Record<Name, string>>;

const isKnownFlag = <Name extends string>(known: readonly Name[], name: string): name is Name =>
  known.some((flag) => flag === name);

/**
 * Reads `--name value` and `--name=value` pairs. Only the names in `known`
 * are accepted, each at most once.
 */
export const parseFlags = <Name extends string>(
  args: readonly string[],
  known: readonly Name[]
): Flags<Name> => {
  const flags: Flags<Name> = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith("--")) {
      throw makeCliError("CLI_ARG_FORMAT", `Unexpected argument: ${token}`);
    }
    const equals = token.indexOf("=");
    const name = equals === -1 ? token.slice(2) : token.slice(2, equals);
    if (!isKnownFlag(known, name)) {
      const expected = known.map((flag) => `--${flag}`).join(", ");
      throw makeCliError("CLI_ARG_UNKNOWN", `Unknown argument --${name}. Expected ${expected}`);
    }
    if (flags[name] !== undefined) {
      throw makeCliError("CLI_ARG_DUPLICATE", `Argument --${name} given more than once`);
    }
    let value: string | undefined;
    if (equals === -1) {
      value = args[i + 1];
      i += 1;
    } else {
      value = token.slice(equals + 1);
    }
    if (value === undefined || value === "" || value.startsWith("--")) {
      throw makeCliError("CLI_ARG_MISSING", `Missing value for --${name}`);
    }
    flags[name] = value;
  }
  return flags;
};

export const getRequiredFlag = <Name extends string>(flags: Flags<Name>, name: Name): string => {
  const value = flags[name];
  if (value === undefined) {
    throw makeCliError("CLI_ARG_REQUIRED", `Missing required argument --${name}`);
  }
  return value;
};

const isCliKind = (value: string): value is CliKind =>
  CLI_KINDS.some((kind) => kind === value);

export const parseKind = (raw: string | undefined, fallback: CliKind): CliKind => {
  if (raw === undefined) {
    return fallback;
  }
  if (!isCliKind(raw)) {
    throw makeCliError("CLI_KIND_INVALID", `Unknown value kind "${raw}". Use ${CLI_KINDS.join("/")}.`);
  }
  return raw;
};

export const parseCount = (raw: string | undefined, name: string, fallback: number): number => {
  if (raw === undefined) {
    return fallback;
  }
  const count = Number.parseInt(raw, 10);
  if (Number.isNaN(count) || count < 0) {
    throw makeCliError("CLI_COUNT_PARSE", `Invalid --${name}: ${raw}`);
  }
  return count;
};

export const toJson = (value: unknown): string =>
  JSON.stringify(typeof value === "bigint" ? value.toString() : value);

export const emitError = (writeLine: WriteLine, error: unknown): number => {
  const code =
    error instanceof BridgeError
      ? error.code
      : typeof error === "object" && error !== null && "code" in error
        ? String(error.code)
        : "CLI_ERROR";
  const message = error instanceof Error ? error.message : "Unknown CLI error.";
  writeLine("RESULT:ERROR");
  writeLine(`ERROR_CODE:${code}`);
  writeLine(`ERROR_MSG_JSON:${JSON.stringify(message)}`);
  return 1;
};
