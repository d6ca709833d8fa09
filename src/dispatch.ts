import { getType, registeredSignature, subclassOf } from "./algebra.js";
import {
  ConstructionError,
  ErrorCodes,
  PatternLookupError,
} from "./errors.js";
import { logger } from "./logger.js";
import {
  EllipsisMarker,
  err,
  isTypeAnnotation,
  ok,
  type Pattern,
  patternsEqual,
  type Result,
  showPattern,
  showValue,
  Subscribed,
} from "./types.js";

const log = logger.child("dispatch");

export type PatternMapping<V> = ReadonlyMap<Pattern, V> | DispatchTable<V>;

const bucketOf = (pattern: Pattern): string =>
  pattern instanceof Subscribed ? `#${pattern.hashCode()}` : showPattern(pattern);

/**
 * An ordered pattern → value table looked up by compatibility instead of
 * equality.
 *
 * `lookup(item)` derives the pattern of `item` (with unions for mixed
 * collections) and returns the value of the **first** entry, in insertion
 * order, whose key is a supertype of it.
 *
 * Keys equal as patterns collapse into one entry at the first key's position,
 * holding the last value given for them.
 *
 * @example
 * ```ts
 * const table = new DispatchTable(new Map<Pattern, string>([
 *   [Number, "number"],
 *   [List.of(Number), "numbers"],
 * ]));
 * table.lookup(3);           // "number"
 * table.lookup([1, 2]);      // "numbers"
 * table.get("x", "nothing"); // "nothing"
 * ```
 */
export class DispatchTable<V> implements Iterable<[Pattern, V]> {
  private readonly table: [Pattern, V][] = [];

  /** @throws ConstructionError unless given exactly one mapping whose keys are all patterns */
  constructor(...args: [mapping: PatternMapping<V>]) {
    if (args.length > 1)
      throw new ConstructionError(
        ErrorCodes.TOO_MANY_ARGUMENTS,
        `DispatchTable accepts exactly one mapping, got ${args.length} arguments`,
        { count: args.length },
      );
    const [mapping] = args;
    if (!(mapping instanceof Map) && !(mapping instanceof DispatchTable))
      throw new ConstructionError(
        ErrorCodes.NOT_A_MAPPING,
        `DispatchTable accepts only a Map or a DispatchTable, got ${showValue(mapping)}`,
      );

    const buckets = new Map<string, number[]>();
    for (const [key, value] of mapping.entries()) {
      if (!isTypeAnnotation(key))
        throw new ConstructionError(
          ErrorCodes.NON_PATTERN_KEY,
          `DispatchTable keys must be type patterns, got ${showValue(key)}`,
          { key: showValue(key) },
        );
      const bucket = buckets.get(bucketOf(key)) ?? [];
      const index = bucket.find((i) => {
        const entry = this.table[i];
        return entry !== undefined && patternsEqual(entry[0], key);
      });
      if (index !== undefined) {
        this.table[index] = [key, value];
        continue;
      }
      bucket.push(this.table.length);
      buckets.set(bucketOf(key), bucket);
      this.table.push([key, value]);
    }
    log.debug(`table built with ${this.table.length} entries`);
  }

  get size(): number {
    return this.table.length;
  }

  /** Non-throwing lookup. */
  find(item: unknown): Result<PatternLookupError, V> {
    const itemType = getType(item, { useUnion: true });
    for (const [key, value] of this.table) {
      if (subclassOf(itemType, key)) return ok(value);
    }
    log.debug(`no match for ${showPattern(itemType)}`);
    return err(new PatternLookupError(item));
  }

  /** @throws PatternLookupError when no key accepts `item` */
  lookup(item: unknown): V {
    const found = this.find(item);
    if ("err" in found) throw found.err;
    return found.ok;
  }

  get(item: unknown): V | undefined;
  get<D>(item: unknown, fallback: D): V | D;
  get<D>(item: unknown, fallback?: D): V | D | undefined {
    const found = this.find(item);
    return "ok" in found ? found.ok : fallback;
  }

  /** True iff a key *equal* to `pattern` is present. */
  has(pattern: Pattern): boolean {
    return this.table.some(([key]) => patternsEqual(key, pattern));
  }

  /** The value stored under a key *equal* to `pattern`. */
  handlerFor(pattern: Pattern): V | undefined {
    return this.table.find(([key]) => patternsEqual(key, pattern))?.[1];
  }

  keys(): IterableIterator<Pattern> {
    return this.table.map(([key]) => key)[Symbol.iterator]();
  }

  values(): IterableIterator<V> {
    return this.table.map(([, value]) => value)[Symbol.iterator]();
  }

  entries(): IterableIterator<[Pattern, V]> {
    return this.table.map(([key, value]): [Pattern, V] => [key, value])[
      Symbol.iterator
    ]();
  }

  [Symbol.iterator](): IterableIterator<[Pattern, V]> {
    return this.entries();
  }
}

export type DispatchHandler<R = unknown> = (...args: unknown[]) => R;

/**
 * A function that forwards each call to the handler registered for the
 * pattern of its first argument.
 */
export interface PatternDispatchFunction<R = unknown> {
  (...args: unknown[]): R;
  readonly table: DispatchTable<DispatchHandler<R>>;
  /** True iff a call with `value` as first argument would find a handler. */
  understands(value: unknown): boolean;
}

/**
 * Handlers never fail on their own when given too few or too many arguments,
 * so the count is checked here: exactly the registered arity for handlers
 * passed through `annotate`, at least `handler.length` for the others.
 */
function checkArity(handler: DispatchHandler, count: number): void {
  const signature = registeredSignature(handler);
  const name = handler.name || "handler";
  if (signature !== undefined && !(signature.params instanceof EllipsisMarker)) {
    const expected = signature.params.length;
    if (count !== expected)
      throw new TypeError(`${name} expects ${expected} arguments, got ${count}`);
    return;
  }
  if (count < handler.length)
    throw new TypeError(
      `${name} expects at least ${handler.length} arguments, got ${count}`,
    );
}

/**
 * Wraps a `DispatchTable` (or a `Map`, wrapped in one) into a function.
 *
 * @throws ConstructionError for any other source
 *
 * @example
 * ```ts
 * const describe = createDispatchFunction(new Map<Pattern, DispatchHandler<string>>([
 *   [Number, (n) => `number ${String(n)}`],
 *   [String, (s) => `string ${String(s)}`],
 * ]));
 * describe(2);             // "number 2"
 * describe.understands(true); // false
 * ```
 */
export function createDispatchFunction<R>(
  source: PatternMapping<DispatchHandler<R>>,
): PatternDispatchFunction<R> {
  let table: DispatchTable<DispatchHandler<R>>;
  if (source instanceof DispatchTable) table = source;
  else if (source instanceof Map)
    table = new DispatchTable<DispatchHandler<R>>(source);
  else
    throw new ConstructionError(
      ErrorCodes.INVALID_DISPATCH_SOURCE,
      `expected a DispatchTable or a Map, got ${showValue(source)}`,
    );

  const dispatch = (...args: unknown[]): R => {
    if (args.length === 0)
      throw new TypeError("a dispatch function needs at least one argument");
    const [first] = args;
    const handler = table.lookup(first);
    checkArity(handler, args.length);
    log.debug(`routing ${showValue(first)} to ${handler.name || "handler"}`);
    return handler(...args);
  };

  return Object.assign(dispatch, {
    table,
    understands: (value: unknown): boolean => "ok" in table.find(value),
  });
}
