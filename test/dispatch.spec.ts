// ./test/dispatch.spec.ts
import { describe, expect, test } from "vitest";
import { annotate } from "../src/algebra.js";
import {
  createDispatchFunction,
  type DispatchHandler,
  DispatchTable,
} from "../src/dispatch.js";
import { ConstructionError, PatternLookupError } from "../src/errors.js";
import { Something } from "../src/something.js";
import { Any, Ellipsis, type Pattern, showPattern } from "../src/types.js";
import { Callable, List, Literal, Tuple, union } from "../src/typing.js";
import { assert, assertErr, assertOk, thrown } from "./helpers.js";

function doubleOrSuffix() {
  return new Map<Pattern, DispatchHandler>([
    [Number, (x) => Number(x) * 2],
    [String, (x) => `${String(x)}_`],
  ]);
}

describe("DispatchTable", () => {
  test("first compatible key wins", () => {
    const table = new DispatchTable(
      new Map<Pattern, string>([
        [Object, "object"],
        [Number, "number"],
      ]),
    );
    expect(table.lookup(1)).toBe("object");

    const reversed = new DispatchTable(
      new Map<Pattern, string>([
        [Number, "number"],
        [Object, "object"],
      ]),
    );
    expect(reversed.lookup(1)).toBe("number");
    expect(reversed.lookup("a")).toBe("object");
  });

  test("lookup derives unions for mixed collections", () => {
    const table = new DispatchTable(
      new Map<Pattern, string>([
        [List.of(Number), "numbers"],
        [List.of(union(Number, String)), "mixed"],
      ]),
    );
    expect(table.lookup([1, 2])).toBe("numbers");
    expect(table.lookup([1, "a"])).toBe("mixed");
    expect(table.lookup([])).toBe("numbers");
  });

  test("a miss throws PatternLookupError", () => {
    const table = new DispatchTable(new Map<Pattern, string>([[Number, "number"]]));
    const error = thrown(() => table.lookup("text"));
    assert(error instanceof PatternLookupError, "should be a lookup error");
    expect(error.code).toBe("L001");
    expect(error.item).toBe("text");
    expect(error.message).toBe("No match for 'text'");
  });

  test("find and get do not throw", () => {
    const table = new DispatchTable(new Map<Pattern, string>([[Number, "number"]]));
    expect(assertOk(table.find(3), "3 is a number")).toBe("number");
    const miss = assertErr(table.find("text"), "text is not a number");
    expect(miss).toBeInstanceOf(PatternLookupError);
    expect(table.get("text")).toBeUndefined();
    expect(table.get("text", "fallback")).toBe("fallback");
    expect(table.get(3, "fallback")).toBe("number");
  });

  test("equal keys collapse into the first position with the last value", () => {
    const table = new DispatchTable(
      new Map<Pattern, string>([
        [List.of(Number), "a"],
        [String, "b"],
        [List.of(Number), "c"],
      ]),
    );
    expect(table.size).toBe(2);
    expect([...table.keys()].map(showPattern)).toEqual(["List[Number]", "String"]);
    expect([...table.values()]).toEqual(["c", "b"]);
  });

  test("membership is by pattern equality", () => {
    const table = new DispatchTable(new Map<Pattern, string>([[List.of(Number), "numbers"]]));
    expect(table.has(List.of(Number))).toBe(true);
    expect(table.has(Array)).toBe(false);
    expect(table.handlerFor(List.of(Number))).toBe("numbers");
    expect(table.handlerFor(Array)).toBeUndefined();
  });

  test("copies keep the order", () => {
    const table = new DispatchTable(
      new Map<Pattern, string>([
        [String, "string"],
        [Number, "number"],
      ]),
    );
    const copy = new DispatchTable(table);
    expect([...copy].map(([key, value]) => `${showPattern(key)}=${value}`)).toEqual([
      "String=string",
      "Number=number",
    ]);
  });

  test("structural interfaces as keys", () => {
    class Doubler {
      run(x: number): number {
        return x * 2;
      }
    }
    annotate(Doubler.prototype.run, [Number], Number);
    const table = new DispatchTable(
      new Map<Pattern, string>([
        [Something.of({ run: Callable.of([[Number], Number]) }), "runner"],
        [Object, "other"],
      ]),
    );
    expect(table.lookup(new Doubler())).toBe("runner");
    expect(table.lookup({})).toBe("other");
  });

  test("mixed collections of conforming classes match a structural element key", () => {
    class Doubler {
      run(x: number): number {
        return x * 2;
      }
    }
    class Tripler {
      run(x: number): number {
        return x * 3;
      }
    }
    annotate(Doubler.prototype.run, [Number], Number);
    annotate(Tripler.prototype.run, [Number], Number);
    const Runner = Something.of({ run: Callable.of([[Number], Number]) });
    const table = new DispatchTable(new Map<Pattern, string>([[List.of(Runner), "runners"]]));
    expect(table.get([new Doubler(), new Doubler()], "miss")).toBe("runners");
    expect(table.get([new Doubler(), new Tripler()], "miss")).toBe("runners");
    expect(table.get([new Doubler(), 3], "miss")).toBe("miss");
  });

  test("construction rejects more than one argument", () => {
    const error = thrown(() => Reflect.construct(DispatchTable, [new Map(), new Map()]));
    assert(error instanceof ConstructionError, "should be a construction error");
    expect(error.code).toBe("C001");
  });

  test("construction rejects anything but a mapping", () => {
    const error = thrown(() => Reflect.construct(DispatchTable, [123]));
    assert(error instanceof ConstructionError, "should be a construction error");
    expect(error.code).toBe("C002");
    expect(error.message).toBe("DispatchTable accepts only a Map or a DispatchTable, got 123");
  });

  test("construction rejects keys that are not patterns", () => {
    const error = thrown(() => Reflect.construct(DispatchTable, [new Map([["x", 1]])]));
    assert(error instanceof ConstructionError, "should be a construction error");
    expect(error.code).toBe("C003");
    expect(error.details).toEqual({ key: "'x'" });
  });
});

describe("createDispatchFunction", () => {
  test("rejects sources that are not mappings", () => {
    const error = thrown(() => Reflect.apply(createDispatchFunction, undefined, [123]));
    assert(error instanceof ConstructionError, "should be a construction error");
    expect(error.code).toBe("C004");
  });

  test("wraps a Map", () => {
    const fn = createDispatchFunction(doubleOrSuffix());
    expect(fn(2)).toBe(4);
    expect(fn("2")).toBe("2_");
    expect(fn.table.size).toBe(2);
  });

  test("wraps a DispatchTable as is", () => {
    const table = new DispatchTable(doubleOrSuffix());
    const fn = createDispatchFunction(table);
    expect(fn.table).toBe(table);
    expect(fn(2)).toBe(4);
    expect(fn("2")).toBe("2_");
  });

  test("forwards every argument", () => {
    const fn = createDispatchFunction(
      new Map<Pattern, DispatchHandler>([
        [Number, (x, y) => Number(x) * Number(y)],
        [String, (x, y) => `${String(x)}${String(y)}`],
      ]),
    );
    expect(fn(2, 3)).toBe(6);
    expect(fn("2", 3)).toBe("23");
  });

  test("understands agrees with dispatch", () => {
    const fn = createDispatchFunction(doubleOrSuffix());
    expect(fn.understands(1)).toBe(true);
    expect(fn.understands("2")).toBe(true);
    expect(fn.understands(true)).toBe(false);
    expect(() => fn(true)).toThrow(PatternLookupError);
  });

  test("a call without arguments is a TypeError", () => {
    const fn = createDispatchFunction(doubleOrSuffix());
    expect(() => fn()).toThrow(TypeError);
  });

  test("annotated handlers take exactly their parameters", () => {
    const fn = createDispatchFunction(
      new Map<Pattern, DispatchHandler<number>>([
        [Number, annotate((x: unknown) => Number(x), [Number], Number)],
      ]),
    );
    expect(fn(1)).toBe(1);
    expect(() => fn(1, 2)).toThrow(TypeError);
  });

  test("other handlers take at least their declared parameters", () => {
    const fn = createDispatchFunction(
      new Map<Pattern, DispatchHandler<number>>([
        [Number, (x, y) => Number(x) + Number(y)],
      ]),
    );
    expect(fn(1, 2)).toBe(3);
    expect(() => fn(1)).toThrow("handler expects at least 2 arguments, got 1");
  });

  test("complex keys", () => {
    const size = union(Number, Literal.of(Any));
    const type = union(Function, Literal.of(Any));
    const fn = createDispatchFunction(
      new Map<Pattern, DispatchHandler<string>>([
        [size, () => "size"],
        [type, () => "type"],
        [Tuple.of([size, type]), () => "size and type"],
        [Tuple.of([size, Ellipsis]), () => "sizes"],
        [Tuple.of([Tuple.of([size, Ellipsis]), type]), () => "sizes and type"],
        [Tuple.of([Tuple.of([Literal.of(Any), Ellipsis]), Literal.of(Any)]), () => "literal"],
      ]),
    );
    expect(fn.table.size).toBe(6);
    expect(fn(5)).toBe("size");
    expect(fn([1, 2])).toBe("sizes");
  });
});
