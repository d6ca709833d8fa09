// test/helpers.ts
import type { Result } from "../src/types.js";

export function assert(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new Error(`Assertion failed: ${message}`);
  }
}

export function assertOk<E, T>(result: Result<E, T>, message: string): T {
  if ("err" in result) {
    throw new Error(`Expected ok but got error: ${String(result.err)} - ${message}`);
  }
  return result.ok;
}

export function assertErr<E, T>(result: Result<E, T>, message: string): E {
  if ("ok" in result) {
    throw new Error(`Expected error but got ok: ${String(result.ok)} - ${message}`);
  }
  return result.err;
}

/** Runs `fn` and returns what it threw; fails when it returns normally. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
}
