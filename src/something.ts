import { getArgsAndReturnType, getType, instanceOf, subclassOf } from "./algebra.js";
import { getConfig } from "./config.js";
import { PatternValidationError } from "./errors.js";
import { Callable, CallablePattern, isElementOf, Receiver } from "./typing.js";
import {
  Any,
  EllipsisMarker,
  encodeArgument,
  isPlainType,
  isTypeAnnotation,
  type Origin,
  type Pattern,
  PatternOrigin,
  patternsEqual,
  type PlainType,
  showPattern,
  showValue,
  Subscribed,
} from "./types.js";

/**
 * Attribute name → pattern, keys in sorted order.
 */
export type Signature = ReadonlyMap<string, Pattern>;

/**
 * Accepted ways of spelling a signature. All three normalize to the same
 * {@link Signature}, whatever their order.
 */
export type SignatureInput =
  | Readonly<Record<string, Pattern>>
  | ReadonlyMap<string, Pattern>
  | ReadonlyArray<readonly [string, Pattern]>;

const isSignatureMap = (
  input: SignatureInput,
): input is ReadonlyMap<string, Pattern> => input instanceof Map;

const isSignaturePairs = (
  input: SignatureInput,
): input is ReadonlyArray<readonly [string, Pattern]> => Array.isArray(input);

function signatureEntries(input: SignatureInput): (readonly [string, Pattern])[] {
  if (isSignatureMap(input)) return [...input.entries()];
  if (isSignaturePairs(input))
    return input
      .filter((pair) => Array.isArray(pair) && pair.length === 2)
      .map(([name, pattern]) => [String(name), pattern] as const);
  if (typeof input !== "object" || input === null) return [];
  return Object.entries(input);
}

function normalizeSignature(input: SignatureInput): Signature {
  const entries = signatureEntries(input).sort(([left], [right]) =>
    left < right ? -1 : left > right ? 1 : 0,
  );
  return new Map(entries);
}

/**
 * Renders a signature entry: plain types by name, the ellipsis as `...`,
 * other functions by their bare name.
 */
function typeRepr(value: unknown): string {
  if (isPlainType(value)) return value.name || "<anonymous>";
  if (value instanceof EllipsisMarker) return "...";
  if (typeof value === "function") return value.name || "<anonymous>";
  if (isTypeAnnotation(value)) return showPattern(value);
  return showValue(value);
}

/**
 * A structural interface: "has these attributes, with these patterns".
 *
 * **Instances**
 * A value is an instance when every signature attribute is present, truthy
 * and an instance of its pattern.
 *
 * **Subtypes**
 * A class (or another structural interface) is a subtype when it has every
 * signature attribute with a compatible pattern. Instance methods read off a
 * class carry a `Receiver` first parameter (see {@link SomethingOrigin.like});
 * it is dropped on both sides before comparing, and when checking the
 * attributes of an instance.
 *
 * @example
 * ```ts
 * const Named = Something.of({ name: String });
 * instanceOf({ name: "ada" }, Named); // true
 * instanceOf({ name: "" }, Named);    // false: falsy attribute
 * ```
 */
export class SomethingPattern extends Subscribed<SignatureInput> {
  private readonly sorted: Signature;

  constructor(origin: Origin, args: SignatureInput) {
    super(origin, args);
    this.sorted = normalizeSignature(args);
  }

  afterSubscription(args: SignatureInput): void {
    const raw: unknown = args;
    if (typeof raw !== "object" || raw === null)
      throw new PatternValidationError(
        this.origin.name,
        0,
        `expected attribute patterns, got ${showValue(raw)}`,
      );
    if (Array.isArray(raw))
      raw.forEach((pair: unknown, i) => {
        if (!Array.isArray(pair) || pair.length !== 2 || typeof pair[0] !== "string")
          throw new PatternValidationError(
            this.origin.name,
            i,
            `expected a [name, pattern] pair, got ${showValue(pair)}`,
          );
      });
    for (const [name, pattern] of this.sorted)
      if (!isTypeAnnotation(pattern))
        throw new PatternValidationError(
          this.origin.name,
          name,
          `attribute '${name}' is not a type pattern: ${showValue(pattern)}`,
        );
  }

  signature(): Signature {
    return this.sorted;
  }

  instanceCheck(value: unknown): boolean {
    if (value === null || value === undefined) return false;
    const target: object = Object(value);
    for (const [name, pattern] of this.sorted) {
      const attr: unknown = Reflect.get(target, name);
      if (!attr || !instanceOf(attr, dropReceiver(pattern))) return false;
    }
    return true;
  }

  subclassCheck(candidate: Pattern): boolean {
    let derived: SomethingPattern;
    if (candidate instanceof SomethingPattern) derived = candidate;
    else if (isPlainType(candidate)) derived = Something.like(candidate);
    else return false;

    for (const [name, expected] of this.sorted) {
      const found = derived.sorted.get(name);
      if (found === undefined) return false;
      if (!subclassOf(dropReceiver(found), dropReceiver(expected))) return false;
    }
    return true;
  }

  equals(other: unknown): boolean {
    if (!(other instanceof SomethingPattern)) return false;
    if (other.sorted.size !== this.sorted.size) return false;
    for (const [name, pattern] of this.sorted) {
      const theirs = other.sorted.get(name);
      if (theirs === undefined || !patternsEqual(pattern, theirs)) return false;
    }
    return true;
  }

  encode(): string {
    const entries = [...this.sorted].map(
      ([name, pattern]) => `${JSON.stringify(name)}:${encodeArgument(pattern)}`,
    );
    return `${this.origin.name}[${entries.join(",")}]`;
  }

  toString(): string {
    const entries = [...this.sorted].map(
      ([name, pattern]) => `'${name}': ${typeRepr(pattern)}`,
    );
    return `${this.origin.name}[${entries.join(", ")}]`;
  }
}

const FUNCTION_BOOKKEEPING = new Set([
  "length",
  "name",
  "prototype",
  "arguments",
  "caller",
]);

function attributeNames(target: object, stop: object): string[] {
  const names = new Set<string>();
  for (
    let current: object | null = target;
    current !== null && current !== stop;
    current = Object.getPrototypeOf(current)
  )
    for (const name of Object.getOwnPropertyNames(current)) names.add(name);
  names.delete("constructor");
  if (typeof target === "function")
    for (const name of FUNCTION_BOOKKEEPING) names.delete(name);
  return [...names];
}

function findDescriptor(
  start: object,
  name: string,
  stop: object,
): PropertyDescriptor | undefined {
  for (
    let current: object | null = start;
    current !== null && current !== stop;
    current = Object.getPrototypeOf(current)
  ) {
    const descriptor = Object.getOwnPropertyDescriptor(current, name);
    if (descriptor) return descriptor;
  }
  return undefined;
}

const isBound = (fn: unknown): boolean =>
  typeof fn === "function" &&
  fn.name.startsWith("bound ") &&
  !Object.prototype.hasOwnProperty.call(fn, "prototype");

/**
 * The function stored under `name` on the prototype chain of `type`, when it
 * is an instance method: found on the prototype rather than on the
 * constructor, and not a bound function. Such methods take their receiver
 * implicitly.
 */
function instanceMethod(type: PlainType, name: string): unknown {
  const proto: unknown = type.prototype;
  if (typeof proto !== "object" || proto === null) return undefined;
  const descriptor = findDescriptor(proto, name, Object.prototype);
  if (descriptor === undefined || !("value" in descriptor)) return undefined;
  const value: unknown = descriptor.value;
  return typeof value === "function" && !isBound(value) ? value : undefined;
}

/** `Callable[[Receiver[C], ...P], T]` → `Callable[[...P], T]`; anything else unchanged. */
function dropReceiver(pattern: Pattern): Pattern {
  if (!(pattern instanceof CallablePattern)) return pattern;
  const [params, returns] = getArgsAndReturnType(pattern);
  if (params instanceof EllipsisMarker) return pattern;
  const [first] = params;
  if (!isElementOf(first, Receiver)) return pattern;
  return Callable.of([params.slice(1), returns]);
}

/** `Callable[[...P], T]` → `Callable[[Receiver[type], ...P], T]`. */
function withReceiver(type: PlainType, pattern: Pattern): Pattern {
  if (!(pattern instanceof CallablePattern)) return pattern;
  const [params, returns] = getArgsAndReturnType(pattern);
  if (params instanceof EllipsisMarker) return pattern;
  return Callable.of([[Receiver.of(type), ...params], returns]);
}

function classAttributes(type: PlainType, visible: (name: string) => boolean) {
  const attributes = new Map<string, Pattern>();
  for (const name of attributeNames(type, Function.prototype))
    if (visible(name)) attributes.set(name, getType(Reflect.get(type, name)));

  const proto: unknown = type.prototype;
  if (typeof proto !== "object" || proto === null) return attributes;
  for (const name of attributeNames(proto, Object.prototype)) {
    if (!visible(name)) continue;
    const descriptor = findDescriptor(proto, name, Object.prototype);
    if (descriptor === undefined) continue;
    // Accessors need an instance to be read.
    if (!("value" in descriptor)) {
      attributes.set(name, Any);
    } else if (instanceMethod(type, name) !== undefined) {
      attributes.set(name, withReceiver(type, getType(descriptor.value)));
    } else {
      attributes.set(name, getType(descriptor.value));
    }
  }
  return attributes;
}

function valueAttributes(value: unknown, visible: (name: string) => boolean) {
  const attributes = new Map<string, Pattern>();
  if (value === null || value === undefined) return attributes;
  const target: object = Object(value);
  const stop = typeof target === "function" ? Function.prototype : Object.prototype;
  for (const name of attributeNames(target, stop))
    if (visible(name)) attributes.set(name, getType(Reflect.get(target, name)));
  return attributes;
}

export class SomethingOrigin extends PatternOrigin<SignatureInput, SomethingPattern> {
  constructor() {
    super(
      "Something",
      (origin: Origin, args: SignatureInput) => new SomethingPattern(origin, args),
      Object,
    );
  }

  /**
   * Derives the structural interface of `obj` from its attributes.
   *
   * For a class, both its static members and the members of its prototype are
   * listed; prototype members win on a name clash. Instance methods are
   * recorded unbound, with `Receiver.of(Class)` as an extra first parameter,
   * since a method read off a class needs its receiver passed in. Accessors on the
   * prototype are recorded as `Any`.
   *
   * For any other value, its own and inherited properties are listed (up to
   * `Object.prototype`, or `Function.prototype` for functions) with the
   * pattern of their current value.
   *
   * @param excludePrivate - skip names starting with one of the configured
   *   `privatePrefixes` (`_` and `#` by default)
   */
  like(obj: unknown, excludePrivate: boolean = true): SomethingPattern {
    const prefixes = excludePrivate ? getConfig().privatePrefixes : [];
    const visible = (name: string) => !prefixes.some((p) => name.startsWith(p));
    return this.of(
      isPlainType(obj) ? classAttributes(obj, visible) : valueAttributes(obj, visible),
    );
  }
}

export const Something = new SomethingOrigin();

/** Structural description of a parametrized pattern. */
export const TypingType = Something.of({ origin: PatternOrigin, args: Any });
