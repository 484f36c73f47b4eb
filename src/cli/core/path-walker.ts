import type { SlotTarget, TableHandle } from "../../core/types.js";
import { withTable, type LuaEngine } from "../../runtime/index.js";
import { makeCliError } from "./args.js";

const POSITION_PATTERN = /^[1-9]\d*$/;

/** "servers.1.host" -> key "servers", position 1, key "host". */
export const parsePath = (raw: string | undefined): SlotTarget[] => {
  if (raw === undefined || raw.trim() === "") {
    return [];
  }
  const parts = raw.split(".").map((part) => part.trim());
  if (parts.some((part) => part === "")) {
    throw makeCliError("CLI_PATH_INVALID", `Empty segment in path "${raw}"`);
  }
  return parts.map((part) => (POSITION_PATTERN.test(part) ? { position: Number(part) } : { key: part }));
};

const walk = <T>(
  engine: LuaEngine,
  parent: TableHandle,
  segments: readonly SlotTarget[],
  index: number,
  body: (table: TableHandle | null) => T
): T => {
  if (index === segments.length) {
    return body(parent);
  }
  return withTable(engine, { table: parent, ...segments[index] }, (child) =>
    child ? walk(engine, child, segments, index + 1, body) : body(null)
  );
};

/**
 * Opens the global table and each nested table along `segments`, runs `body`
 * on the innermost one (or null when a step is missing), then closes them all.
 */
export const withPathTable = <T>(
  engine: LuaEngine,
  globalName: string,
  segments: readonly SlotTarget[],
  body: (table: TableHandle | null) => T
): T =>
  withTable(engine, { key: globalName }, (root) =>
    root ? walk(engine, root, segments, 0, body) : body(null)
  );
