import fs from "node:fs";
import path from "node:path";

import { loadConfigFile } from "../../api.js";
import type { LuaEngine } from "../../runtime/index.js";
import { makeCliError } from "./args.js";

const isLuaFile = (file: string): boolean => file.endsWith(".lua");

export const resolveScriptFile = (scriptFile: string): string => {
  const resolved = path.resolve(scriptFile);
  if (!fs.existsSync(resolved)) {
    throw makeCliError("CLI_SCRIPT_NOT_FOUND", `Script file does not exist: ${resolved}`);
  }
  const stat = fs.statSync(resolved);
  if (!stat.isFile()) {
    throw makeCliError("CLI_SCRIPT_NOT_FOUND", `Script path is not a file: ${resolved}`);
  }
  if (!isLuaFile(resolved)) {
    throw makeCliError("CLI_SCRIPT_EXTENSION", `Script file must end in .lua: ${resolved}`);
  }
  return resolved;
};

export const openScriptFile = (scriptFile: string): LuaEngine => loadConfigFile(resolveScriptFile(scriptFile));

/**
 * Runs `body` against a freshly loaded script, then closes the engine.
 * An error from `body` wins over a failed close.
 */
export const withScriptFile = <T>(scriptFile: string, body: (engine: LuaEngine) => T): T => {
  const engine = openScriptFile(scriptFile);
  let result: T;
  try {
    result = body(engine);
  } catch (error) {
    if (engine.scopes.depth === 0) {
      engine.close();
    }
    throw error;
  }
  engine.close();
  return result;
};
