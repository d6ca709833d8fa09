import { PatternValidationError } from "./errors.js";
import {
  Any,
  EllipsisMarker,
  encodeArgument,
  isTypeAnnotation,
  type Origin,
  type Pattern,
  PatternOrigin,
  patternsEqual,
  showArgument,
  showValue,
  Subscribed,
} from "./types.js";

function requirePattern(origin: Origin, position: string | number, value: unknown) {
  if (!isTypeAnnotation(value))
    throw new PatternValidationError(
      origin.name,
      position,
      `argument ${position} is not a type pattern: ${showValue(value)}`,
    );
}

function requireList(origin: Origin, value: unknown): unknown[] {
  if (!Array.isArray(value))
    throw new PatternValidationError(
      origin.name,
      0,
      `expected a list of patterns, got ${showValue(value)}`,
    );
  return value;
}

/**
 * `Union.of([A, B])`: values of `A` or of `B`.
 *
 * Member order does not matter for equality or hashing. Prefer {@link union},
 * which flattens nested unions and drops duplicates.
 */
export class UnionPattern extends Subscribed<readonly Pattern[]> {
  afterSubscription(args: readonly Pattern[]): void {
    const members = requireList(this.origin, args);
    if (members.length === 0)
      throw new PatternValidationError(
        this.origin.name,
        0,
        "a union needs at least one member",
      );
    members.forEach((member, i) => requirePattern(this.origin, i, member));
  }

  equals(other: unknown): boolean {
    if (!(other instanceof UnionPattern)) return false;
    const covers = (from: readonly Pattern[], to: readonly Pattern[]) =>
      from.every((m) => to.some((n) => patternsEqual(m, n)));
    return covers(this.args, other.args) && covers(other.args, this.args);
  }

  encode(): string {
    const members = [...new Set(this.args.map(encodeArgument))].sort();
    return `${this.origin.name}[${members.join(",")}]`;
  }
}

export const Union = new PatternOrigin(
  "Union",
  (origin: Origin, args: readonly Pattern[]) => new UnionPattern(origin, args),
);

/**
 * Builds the smallest pattern equivalent to the union of `members`: nested
 * unions are flattened, duplicates removed, `Any` absorbs everything and a
 * single remaining member is returned as is.
 */
export function union(...members: Pattern[]): Pattern {
  const flat: Pattern[] = [];
  for (const member of members.flatMap((m) =>
    m instanceof UnionPattern ? [...m.args] : [m],
  )) {
    if (member === Any) return Any;
    if (!flat.some((seen) => patternsEqual(seen, member))) flat.push(member);
  }
  const [only] = flat;
  if (flat.length === 1 && only !== undefined) return only;
  return Union.of(flat);
}

/** `Literal.of(x)`: exactly the value `x` (compared with `Object.is`). */
export class LiteralPattern extends Subscribed<unknown> {
  afterSubscription(value: unknown): void {
    const primitive =
      value === null || (typeof value !== "object" && typeof value !== "function");
    if (!primitive && !isTypeAnnotation(value))
      throw new PatternValidationError(
        this.origin.name,
        0,
        `literal values must be primitives or patterns, got ${showValue(value)}`,
      );
  }

  toString(): string {
    return `${this.origin.name}[${showArgument(this.args)}]`;
  }
}

export const Literal = new PatternOrigin(
  "Literal",
  (origin: Origin, value: unknown) => new LiteralPattern(origin, value),
);

export const Optional = (pattern: Pattern): Pattern =>
  union(pattern, Literal.of(null), Literal.of(undefined));

export type TupleArgs = readonly (Pattern | EllipsisMarker)[];

/**
 * `Tuple.of([A, B])`: arrays of exactly two elements, `A` then `B`.
 * `Tuple.of([A, Ellipsis])`: arrays of any length whose elements are all `A`.
 */
export class TuplePattern extends Subscribed<TupleArgs> {
  afterSubscription(args: TupleArgs): void {
    const items = requireList(this.origin, args);
    items.forEach((item, i) => {
      if (!(item instanceof EllipsisMarker)) return requirePattern(this.origin, i, item);
      if (i !== 1 || items.length !== 2)
        throw new PatternValidationError(
          this.origin.name,
          i,
          "'...' is only allowed as the second of two arguments",
        );
    });
  }

  get variadic(): boolean {
    return this.args.length === 2 && this.args[1] instanceof EllipsisMarker;
  }

  get elements(): Pattern[] {
    return this.args.filter(
      (item): item is Pattern => !(item instanceof EllipsisMarker),
    );
  }
}

export const Tuple = new PatternOrigin(
  "Tuple",
  (origin: Origin, args: TupleArgs) => new TuplePattern(origin, args),
  Array,
);

/** Patterns with a single element pattern as argument. */
export class ElementPattern extends Subscribed<Pattern> {
  afterSubscription(element: Pattern): void {
    requirePattern(this.origin, 0, element);
  }
}

export const List = new PatternOrigin(
  "List",
  (origin: Origin, element: Pattern) => new ElementPattern(origin, element),
  Array,
);

export const SetOf = new PatternOrigin(
  "SetOf",
  (origin: Origin, element: Pattern) => new ElementPattern(origin, element),
  Set,
);

/** `TypeOf.of(T)`: the patterns (classes included) that are subtypes of `T`. */
export const TypeOf = new PatternOrigin(
  "TypeOf",
  (origin: Origin, element: Pattern) => new ElementPattern(origin, element),
  Function,
);

/**
 * `Receiver.of(C)`: the implicit `this` of an instance method of `C`, as the
 * first parameter of the method's unbound `Callable`. Compares like `C`.
 */
export const Receiver = new PatternOrigin(
  "Receiver",
  (origin: Origin, type: Pattern) => new ElementPattern(origin, type),
);

export class MapOfPattern extends Subscribed<readonly [Pattern, Pattern]> {
  afterSubscription(args: readonly [Pattern, Pattern]): void {
    const items = requireList(this.origin, args);
    if (items.length !== 2)
      throw new PatternValidationError(
        this.origin.name,
        items.length,
        "expected a key pattern and a value pattern",
      );
    items.forEach((item, i) => requirePattern(this.origin, i, item));
  }
}

export const MapOf = new PatternOrigin(
  "MapOf",
  (origin: Origin, args: readonly [Pattern, Pattern]) => new MapOfPattern(origin, args),
  Map,
);

export type CallableParams = readonly Pattern[] | EllipsisMarker;
export type CallableArgs = readonly [params: CallableParams, returns: Pattern];

/**
 * `Callable.of([[A, B], R])`: functions taking `A` and `B` and returning `R`.
 * `Callable.of([Ellipsis, R])` leaves the parameters unconstrained.
 */
export class CallablePattern extends Subscribed<CallableArgs> {
  afterSubscription(args: CallableArgs): void {
    const items = requireList(this.origin, args);
    const [params, returns] = items;
    if (items.length !== 2)
      throw new PatternValidationError(
        this.origin.name,
        items.length,
        "expected a parameter list and a return pattern",
      );
    if (!(params instanceof EllipsisMarker))
      requireList(this.origin, params).forEach((param, i) =>
        requirePattern(this.origin, `parameter ${i}`, param),
      );
    requirePattern(this.origin, "return", returns);
  }

  get params(): CallableParams {
    return this.args[0];
  }

  get returns(): Pattern {
    return this.args[1];
  }

  toString(): string {
    const params =
      this.params instanceof EllipsisMarker
        ? "..."
        : `[${showArgument(this.params)}]`;
    return `${this.origin.name}[${params}, ${showArgument(this.returns)}]`;
  }
}

export const Callable = new PatternOrigin(
  "Callable",
  (origin: Origin, args: CallableArgs) => new CallablePattern(origin, args),
  Function,
);

export const isElementOf = (
  pattern: unknown,
  origin: Origin,
): pattern is ElementPattern =>
  pattern instanceof ElementPattern && pattern.origin === origin;
