import { murmurHash3 } from "./hash.js";

/**
 * Any JavaScript constructor usable as a *plain type* pattern.
 *
 * **What it represents**
 * A degenerate pattern whose origin is itself and which carries no arguments:
 * `Number`, `String`, `Boolean`, `Object`, `Array`, `Map`, user classes, …
 *
 * `BigInt` and `Symbol` have no construct signature in the standard library
 * typings, so they are listed explicitly.
 */
export type Constructor = abstract new (...args: never[]) => unknown;
export type PlainType = Constructor | BigIntConstructor | SymbolConstructor;

/**
 * A pattern that is neither a constructor nor a parametrized pattern.
 *
 * The only instance the engine ships is {@link Any}.
 */
export class SpecialForm {
  constructor(readonly name: string) {
    Object.freeze(this);
  }

  toString(): string {
    return this.name;
  }
}

/**
 * The gradual pattern: every value is an instance of `Any`, and `Any` is
 * compatible with every pattern in both directions.
 */
export const Any = new SpecialForm("Any");

/**
 * Marker for "zero or more of the previous" inside pattern arguments, as in
 * `Tuple.of([Number, Ellipsis])`, or "any parameters" in
 * `Callable.of([Ellipsis, String])`.
 *
 * The marker is not a pattern on its own.
 */
export class EllipsisMarker {
  toString(): string {
    return "...";
  }
}

export const Ellipsis = Object.freeze(new EllipsisMarker());

/**
 * The identity of a parametrizable type, as seen from a pattern built from it.
 *
 * `base` is the plain type that values of the parametrized pattern are built
 * from at runtime (`Array` for lists, `Function` for callables). The oracle
 * uses it to compare a parametrized pattern with a plain type.
 */
export interface Origin {
  readonly name: string;
  readonly base?: PlainType;
}

const hashes = new WeakMap<object, number>();

/**
 * A *parametrized* pattern: an origin together with its arguments.
 *
 * **What it represents**
 * `List.of(Number)` is a `Subscribed` whose `origin` is `List` and whose
 * `args` is `Number`. Patterns are frozen once {@link PatternOrigin.of}
 * returns them.
 *
 * **Equality**
 * Two patterns are equal when they share the same origin and their arguments
 * are deeply equal ({@link argumentsEqual}), no matter how many times the pair
 * was parametrized. {@link Subscribed.hashCode} is consistent with that.
 *
 * **Hooks**
 * Concrete pattern classes may define:
 * - `afterSubscription(args)`: runs once, right after construction; throws
 *   `PatternValidationError` to reject the arguments
 * - `instanceCheck(value)`: overrides the oracle's `instanceOf`
 * - `subclassCheck(candidate)`: overrides the oracle's `subclassOf` when this
 *   pattern is the supertype
 */
export class Subscribed<A = unknown> {
  constructor(
    readonly origin: Origin,
    readonly args: A,
  ) {}

  afterSubscription?(args: A): void;
  instanceCheck?(value: unknown): boolean;
  subclassCheck?(candidate: Pattern): boolean;

  equals(other: unknown): boolean {
    return (
      other instanceof Subscribed &&
      other.origin === this.origin &&
      argumentsEqual(this.args, other.args)
    );
  }

  /**
   * Stable text form of (origin, arguments); the input of {@link hashCode}.
   * Subclasses that relax equality must relax this encoding the same way.
   */
  encode(): string {
    return `${this.origin.name}[${encodeArgument(this.args)}]`;
  }

  hashCode(): number {
    const memo = hashes.get(this);
    if (memo !== undefined) return memo;
    const hash = murmurHash3(this.encode());
    hashes.set(this, hash);
    return hash;
  }

  toString(): string {
    return `${this.origin.name}[${showArgument(this.args)}]`;
  }
}

/**
 * Every value the engine accepts as a pattern.
 *
 * @see {@link isTypeAnnotation}
 */
export type Pattern = PlainType | SpecialForm | Subscribed;

/**
 * A type that can be parametrized into new patterns.
 *
 * **What it represents**
 * `origin.of(args)` is the indexing operation `T[args]`: it builds a fresh
 * pattern through `create`, runs the pattern's `afterSubscription` hook once,
 * freezes the pattern and returns it.
 *
 * The members of the parametrized pattern come from the class `create`
 * instantiates, so a pattern keeps every behavior its origin defines for it.
 *
 * **Example**
 * ```ts
 * import { PatternOrigin, Subscribed } from "typeshape";
 *
 * class Sized extends Subscribed<number> {}
 * const Vector = new PatternOrigin("Vector", (o, n: number) => new Sized(o, n), Array);
 *
 * Vector.of(3).equals(Vector.of(3)); // true
 * Vector.of(3).toString();           // "Vector[3]"
 * ```
 */
export class PatternOrigin<A, P extends Subscribed<A> = Subscribed<A>>
  implements Origin
{
  constructor(
    readonly name: string,
    private readonly create: (origin: Origin, args: A) => P,
    readonly base?: PlainType,
  ) {}

  of(args: A): P {
    const pattern = this.create(this, args);
    pattern.afterSubscription?.(args);
    Object.freeze(pattern);
    return pattern;
  }

  toString(): string {
    return this.name;
  }
}

export type Result<TErr, TOk> = { ok: TOk } | { err: TErr };

export const ok = <T>(val: T) => ({ ok: val });

export const err = <T>(val: T) => ({ err: val });

/**
 * True for constructors: functions that own a `prototype` whose `constructor`
 * points back at them. Class declarations, built-in constructors and
 * `function` declarations qualify; arrow functions, methods, bound and
 * generator functions do not.
 */
export function isPlainType(value: unknown): value is PlainType {
  if (typeof value !== "function") return false;
  if (!Object.prototype.hasOwnProperty.call(value, "prototype")) return false;
  const proto: unknown = value.prototype;
  return (
    typeof proto === "object" &&
    proto !== null &&
    Object.prototype.hasOwnProperty.call(proto, "constructor") &&
    Reflect.get(proto, "constructor") === value
  );
}

/** True iff `value` can be used as a pattern. */
export function isTypeAnnotation(value: unknown): value is Pattern {
  return (
    isPlainType(value) ||
    value instanceof SpecialForm ||
    value instanceof Subscribed
  );
}

/**
 * Deep equality of pattern arguments.
 *
 * Patterns compare with {@link Subscribed.equals}, arrays and maps
 * element-wise (maps in iteration order), everything else with `Object.is`.
 */
export function argumentsEqual(left: unknown, right: unknown): boolean {
  if (Object.is(left, right)) return true;
  if (left instanceof Subscribed && right instanceof Subscribed)
    return left.equals(right);
  if (Array.isArray(left) && Array.isArray(right)) {
    if (left.length !== right.length) return false;
    return left.every((item: unknown, i) => argumentsEqual(item, right[i]));
  }
  if (left instanceof Map && right instanceof Map) {
    if (left.size !== right.size) return false;
    const leftEntries: [unknown, unknown][] = [...left.entries()];
    const rightEntries: [unknown, unknown][] = [...right.entries()];
    return leftEntries.every(([key, value], i) => {
      const other = rightEntries[i];
      return (
        other !== undefined &&
        argumentsEqual(key, other[0]) &&
        argumentsEqual(value, other[1])
      );
    });
  }
  return false;
}

export const patternsEqual = (left: Pattern, right: Pattern): boolean =>
  argumentsEqual(left, right);

export function encodeArgument(arg: unknown): string {
  if (arg instanceof EllipsisMarker) return "...";
  if (isPlainType(arg)) return `T:${arg.name}`;
  if (arg instanceof SpecialForm) return `S:${arg.name}`;
  if (arg instanceof Subscribed) return arg.encode();
  if (Array.isArray(arg))
    return `[${arg.map((item: unknown) => encodeArgument(item)).join(",")}]`;
  if (arg instanceof Map) {
    const entries: [unknown, unknown][] = [...arg.entries()];
    const body = entries
      .map(([key, value]) => `${encodeArgument(key)}:${encodeArgument(value)}`)
      .join(",");
    return `{${body}}`;
  }
  if (typeof arg === "string") return JSON.stringify(arg);
  if (typeof arg === "symbol") return `symbol:${arg.description ?? ""}`;
  if (typeof arg === "function") return `function:${arg.name}`;
  if (typeof arg === "object" && arg !== null) return "object";
  return `${typeof arg}:${String(arg)}`;
}

/**
 * Pretty-prints a pattern.
 *
 * @example
 * ```ts
 * showPattern(Number);                          // "Number"
 * showPattern(List.of(Number));                 // "List[Number]"
 * showPattern(Tuple.of([Number, Ellipsis]));    // "Tuple[Number, ...]"
 * showPattern(Callable.of([[Number], String])); // "Callable[[Number], String]"
 * ```
 */
export function showPattern(pattern: Pattern): string {
  if (isPlainType(pattern)) return pattern.name || "<anonymous>";
  return pattern.toString();
}

export function showArgument(arg: unknown): string {
  if (arg instanceof EllipsisMarker) return "...";
  if (isTypeAnnotation(arg)) return showPattern(arg);
  if (Array.isArray(arg))
    return arg
      .map((item: unknown) =>
        Array.isArray(item) ? `[${showArgument(item)}]` : showArgument(item),
      )
      .join(", ");
  return showValue(arg);
}

/** Readable rendering of an arbitrary runtime value, for diagnostics. */
export function showValue(value: unknown): string {
  if (typeof value === "string") return `'${value}'`;
  if (typeof value === "bigint") return `${value}n`;
  if (typeof value === "symbol") return value.toString();
  if (typeof value === "function")
    return isPlainType(value)
      ? `[class ${value.name || "<anonymous>"}]`
      : `[function ${value.name || "<anonymous>"}]`;
  if (value === null || typeof value !== "object") return String(value);
  if (value instanceof SpecialForm || value instanceof Subscribed)
    return value.toString();
  if (Array.isArray(value))
    return `[${value.map((item: unknown) => showValue(item)).join(", ")}]`;
  const proto: unknown = Object.getPrototypeOf(value);
  const ctor: unknown =
    typeof proto === "object" && proto !== null
      ? Reflect.get(proto, "constructor")
      : undefined;
  return isPlainType(ctor) ? `<${ctor.name} object>` : "<object>";
}
