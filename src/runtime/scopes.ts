import { BridgeError } from "../core/errors.js";
import type { ScopeKind, ScopeToken } from "../core/types.js";

interface OpenScope {
  kind: ScopeKind;
  slot: number;
  generation: number;
}

/**
 * Open table and callable handles in the order they were opened.
 * Handles only stay valid while their generation is still on this stack.
 */
export class ScopeStack {
  private readonly scopes: OpenScope[] = [];
  private nextGeneration = 1;

  get depth(): number {
    return this.scopes.length;
  }

  enter(kind: ScopeKind, slot: number): number {
    const last = this.scopes[this.scopes.length - 1];
    if (last && slot <= last.slot) {
      throw new BridgeError(
        "BRIDGE_SCOPE_ORDER",
        `Cannot open a ${kind} handle at slot ${slot} below the open ${last.kind} handle at slot ${last.slot}.`
      );
    }
    const generation = this.nextGeneration;
    this.nextGeneration += 1;
    this.scopes.push({ kind, slot, generation });
    return generation;
  }

  isLive(token: ScopeToken): boolean {
    return this.scopes.some((scope) => scope.generation === token.generation && scope.slot === token.slot);
  }

  assertLive(token: ScopeToken, top: number): void {
    if (!this.isLive(token)) {
      throw new BridgeError(
        "BRIDGE_HANDLE_STALE",
        `Handle for slot ${token.slot} (generation ${token.generation}) is closed.`
      );
    }
    if (top < token.slot) {
      throw new BridgeError(
        "BRIDGE_STACK_CORRUPT",
        `Stack top ${top} is below the open handle at slot ${token.slot}.`
      );
    }
  }

  leave(token: ScopeToken): ScopeKind {
    const last = this.scopes[this.scopes.length - 1];
    if (!last || last.generation !== token.generation) {
      if (this.isLive(token)) {
        throw new BridgeError(
          "BRIDGE_SCOPE_ORDER",
          `Handle at slot ${token.slot} closed before the handle opened after it at slot ${last?.slot}.`
        );
      }
      throw new BridgeError(
        "BRIDGE_HANDLE_STALE",
        `Handle for slot ${token.slot} (generation ${token.generation}) is already closed.`
      );
    }
    this.scopes.pop();
    return last.kind;
  }
}
