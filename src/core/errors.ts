import type { EngineStatus, ErrorFlagName, ErrorFlags } from "./types.js";

export class BridgeError extends Error {
  readonly code: string;
  readonly status?: EngineStatus;

  constructor(code: string, message: string, status?: EngineStatus) {
    super(message);
    this.name = "BridgeError";
    this.code = code;
    this.status = status;
  }
}

export const NO_ERRORS: ErrorFlags = Object.freeze({
  nonExistent: false,
  wrongType: false,
  fatal: false,
});

const FLAG_NAMES: readonly ErrorFlagName[] = ["nonExistent", "wrongType", "fatal"];

export const makeFlags = (set: Partial<ErrorFlags> = {}): ErrorFlags => ({
  nonExistent: set.nonExistent ?? false,
  wrongType: set.wrongType ?? false,
  fatal: set.fatal ?? false,
});

export const mergeFlags = (a: ErrorFlags, b: ErrorFlags): ErrorFlags => ({
  nonExistent: a.nonExistent || b.nonExistent,
  wrongType: a.wrongType || b.wrongType,
  fatal: a.fatal || b.fatal,
});

export const hasErrors = (flags: ErrorFlags): boolean =>
  flags.nonExistent || flags.wrongType || flags.fatal;

export const describeFlags = (flags: ErrorFlags): ErrorFlagName[] =>
  FLAG_NAMES.filter((name) => flags[name]);

export interface FailureOutcome {
  flags: ErrorFlags;
  status?: EngineStatus;
  message?: string | null;
}

export interface FailureSink {
  message?: string;
  code?: string;
}

const failureCode = (outcome: FailureOutcome): string => {
  if (outcome.status !== undefined && outcome.status !== "ok") {
    return `ENGINE_${outcome.status.toUpperCase()}`;
  }
  const names = describeFlags(outcome.flags);
  return names.length > 0 ? `VALUE_${names.join("_").toUpperCase()}` : "VALUE_FATAL";
};

const failureText = (outcome: FailureOutcome): string => {
  if (outcome.message) {
    return outcome.message;
  }
  const names = describeFlags(outcome.flags);
  return names.length > 0 ? names.join(", ") : "unknown failure";
};

/**
 * Fail-fast helper for setup code. Returns false when the outcome is usable.
 * On failure the message and code go into `sink` when one is given;
 * otherwise the context and engine text are printed and the process exits.
 */
export const abortOnFailure = (
  context: string,
  outcome: FailureOutcome,
  sink?: FailureSink
): boolean => {
  const failed = outcome.flags.fatal || (outcome.status !== undefined && outcome.status !== "ok");
  if (!failed) {
    return false;
  }
  if (sink) {
    sink.message = failureText(outcome);
    sink.code = failureCode(outcome);
    return true;
  }
  process.stderr.write(`${context}: ${failureText(outcome)}\n`);
  return process.exit(1);
};
