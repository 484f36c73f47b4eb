import { BridgeError } from "./core/errors.js";
import type { CallOutcome, EngineStatus } from "./core/types.js";
import { LuaEngine, type LuaEngineOptions } from "./runtime/index.js";

export interface CreateEngineFromSourceOptions extends LuaEngineOptions {
  source: string;
  chunkName?: string;
}

const failLoad = (
  engine: LuaEngine,
  context: string,
  message: string | null,
  status: EngineStatus
): never => {
  engine.close();
  throw new BridgeError("API_SCRIPT_LOAD", `${context}: ${message ?? "unknown error"}`, status);
};

/** Runs `source` in a fresh engine; the engine is closed again if the script fails. */
export const createEngineFromSource = (options: CreateEngineFromSourceOptions): LuaEngine => {
  const engine = new LuaEngine({ openLibs: options.openLibs });
  const chunkName = options.chunkName ?? "config";
  const outcome = engine.run(options.source, chunkName);
  if (outcome.status !== "ok") {
    return failLoad(engine, `Cannot run script "${chunkName}"`, outcome.message, outcome.status);
  }
  return engine;
};

export const loadConfigFile = (filePath: string, options: LuaEngineOptions = {}): LuaEngine => {
  const engine = new LuaEngine(options);
  let outcome: CallOutcome;
  try {
    outcome = engine.runFile(filePath);
  } catch (error) {
    engine.close();
    const message = error instanceof Error ? error.message : String(error);
    throw new BridgeError("API_SCRIPT_READ", `Cannot read script file ${filePath}: ${message}`);
  }
  if (outcome.status !== "ok") {
    return failLoad(engine, `Cannot run script file ${filePath}`, outcome.message, outcome.status);
  }
  return engine;
};
