import {
  Callable,
  type CallableParams,
  CallablePattern,
  isElementOf,
  List,
  LiteralPattern,
  Literal,
  MapOf,
  MapOfPattern,
  Receiver,
  SetOf,
  TuplePattern,
  TypeOf,
  union,
  UnionPattern,
} from "./typing.js";
import {
  Any,
  EllipsisMarker,
  isPlainType,
  isTypeAnnotation,
  type Pattern,
  patternsEqual,
  type PlainType,
  SpecialForm,
  Subscribed,
} from "./types.js";

export type GetTypeOptions = {
  /** Describe mixed collections with a `Union` of their element patterns. */
  useUnion?: boolean;
};

type AnyFunction = (...args: never[]) => unknown;

const signatures = new WeakMap<object, CallablePattern>();

/**
 * Registers the `Callable` pattern of a function.
 *
 * JavaScript keeps no parameter annotations at runtime, so unannotated
 * functions are described by their arity alone: `(a, b) => …` is
 * `Callable[[Any, Any], Any]`.
 *
 * @example
 * ```ts
 * const double = annotate((x: number) => x * 2, [Number], Number);
 * showPattern(getType(double)); // "Callable[[Number], Number]"
 * ```
 */
export function annotate<F extends AnyFunction>(
  fn: F,
  params: CallableParams,
  returns: Pattern,
): F {
  signatures.set(fn, Callable.of([params, returns]));
  return fn;
}

export const registeredSignature = (fn: AnyFunction): CallablePattern | undefined =>
  signatures.get(fn);

/** The registered signature of `fn`, or `Callable[[Any × length], Any]`. */
const signatureOf = (fn: Function): CallablePattern =>
  signatures.get(fn) ??
  Callable.of([Array.from({ length: fn.length }, () => Any), Any]);

/** `class` declarations throw when called without `new`. */
const isClassSyntax = (fn: Function): boolean =>
  Function.prototype.toString.call(fn).startsWith("class");

function primitiveWrapper(value: unknown): PlainType | undefined {
  switch (typeof value) {
    case "number":
      return Number;
    case "string":
      return String;
    case "boolean":
      return Boolean;
    case "bigint":
      return BigInt;
    case "symbol":
      return Symbol;
    default:
      return undefined;
  }
}

/**
 * Common pattern of a collection's elements. Without `useUnion`, mixed
 * elements widen to `Object`, or to `Any` when one of them is nullish.
 */
function elementType(items: unknown[], options: GetTypeOptions): Pattern {
  const found: Pattern[] = [];
  for (const item of items) {
    const type = getType(item, options);
    if (!found.some((seen) => patternsEqual(seen, type))) found.push(type);
  }
  const [first] = found;
  if (first === undefined) return Any;
  if (found.length === 1) return first;
  if (options.useUnion) return union(...found);
  return items.some((item) => item === null || item === undefined) ? Any : Object;
}

/**
 * Derives the pattern of a runtime value.
 *
 * | value                 | pattern                                   |
 * | --------------------- | ----------------------------------------- |
 * | `null`, `undefined`   | `Literal[null]`, `Literal[undefined]`     |
 * | `1`, `"a"`, `true`    | `Number`, `String`, `Boolean`             |
 * | an annotated function | its registered signature                  |
 * | a class, a pattern    | `TypeOf[it]`                              |
 * | any other function    | `Callable` by arity                       |
 * | `[1, 2]`              | `List[Number]` (`List[Any]` when empty)   |
 * | `new Map([["a", 1]])` | `MapOf[String, Number]`                   |
 * | `new Set([1])`        | `SetOf[Number]`                           |
 * | other objects         | their constructor (`Object` without one)  |
 */
export function getType(value: unknown, options: GetTypeOptions = {}): Pattern {
  if (value === null || value === undefined) return Literal.of(value);
  const wrapper = primitiveWrapper(value);
  if (wrapper !== undefined) return wrapper;
  if (typeof value === "function") {
    const registered = signatures.get(value);
    if (registered !== undefined) return registered;
  }
  if (isTypeAnnotation(value)) return TypeOf.of(value);
  if (typeof value === "function") return signatureOf(value);
  if (Array.isArray(value)) return List.of(elementType(value, options));
  if (value instanceof Map) {
    const entries: [unknown, unknown][] = [...value.entries()];
    return MapOf.of([
      elementType(entries.map(([key]) => key), options),
      elementType(entries.map(([, item]) => item), options),
    ]);
  }
  if (value instanceof Set) return SetOf.of(elementType([...value], options));
  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== "object" || proto === null) return Object;
  const ctor: unknown = Reflect.get(proto, "constructor");
  return isPlainType(ctor) ? ctor : Object;
}

export function isSubclassOfPlain(sub: PlainType, sup: PlainType): boolean {
  if (sub === sup || sup === Object) return true;
  const proto: unknown = sub.prototype;
  return proto instanceof sup;
}

function isInstanceOfPlain(value: unknown, type: PlainType): boolean {
  if (value === null || value === undefined) return false;
  if (type === Object) return true;
  const wrapper = primitiveWrapper(value);
  if (wrapper !== undefined) return isSubclassOfPlain(wrapper, type);
  return value instanceof type;
}

/**
 * True iff `value` satisfies `pattern`.
 *
 * `Object` accepts every value except `null` and `undefined`; primitives are
 * instances of their wrapper constructors.
 */
export function instanceOf(value: unknown, pattern: Pattern): boolean {
  if (pattern === Any) return true;
  if (pattern instanceof SpecialForm) return false;
  if (isPlainType(pattern)) return isInstanceOfPlain(value, pattern);
  if (isElementOf(pattern, Receiver)) return instanceOf(value, pattern.args);
  if (pattern.instanceCheck) return pattern.instanceCheck(value);

  if (pattern instanceof UnionPattern)
    return pattern.args.some((member) => instanceOf(value, member));
  if (pattern instanceof LiteralPattern) return Object.is(value, pattern.args);
  if (pattern instanceof TuplePattern) {
    if (!Array.isArray(value)) return false;
    const [head] = pattern.elements;
    if (pattern.variadic && head !== undefined)
      return value.every((item: unknown) => instanceOf(item, head));
    return (
      value.length === pattern.elements.length &&
      pattern.elements.every((element, i) => instanceOf(value[i], element))
    );
  }
  if (isElementOf(pattern, List))
    return (
      Array.isArray(value) &&
      value.every((item: unknown) => instanceOf(item, pattern.args))
    );
  if (isElementOf(pattern, SetOf))
    return (
      value instanceof Set &&
      [...value].every((item: unknown) => instanceOf(item, pattern.args))
    );
  if (isElementOf(pattern, TypeOf))
    return isTypeAnnotation(value) && subclassOf(value, pattern.args);
  if (pattern instanceof MapOfPattern) {
    if (!(value instanceof Map)) return false;
    const [keyType, valueType] = pattern.args;
    const entries: [unknown, unknown][] = [...value.entries()];
    return entries.every(
      ([key, item]) => instanceOf(key, keyType) && instanceOf(item, valueType),
    );
  }
  if (pattern instanceof CallablePattern)
    return (
      typeof value === "function" &&
      !isClassSyntax(value) &&
      subclassOf(signatureOf(value), pattern)
    );
  return false;
}

function paramsCompatible(sub: CallableParams, sup: CallableParams): boolean {
  if (sub instanceof EllipsisMarker || sup instanceof EllipsisMarker) return true;
  if (sub.length !== sup.length) return false;
  // Parameters are contravariant.
  return sup.every((param, i) => {
    const own = sub[i];
    return own !== undefined && subclassOf(param, own);
  });
}

function tupleSubclass(sub: Pattern, sup: TuplePattern): boolean {
  const [head] = sup.elements;
  if (sup.variadic && head !== undefined) {
    if (sub instanceof TuplePattern) {
      const [subHead] = sub.elements;
      if (sub.variadic && subHead !== undefined) return subclassOf(subHead, head);
      return sub.elements.every((element) => subclassOf(element, head));
    }
    return isElementOf(sub, List) && subclassOf(sub.args, head);
  }
  return (
    sub instanceof TuplePattern &&
    !sub.variadic &&
    sub.elements.length === sup.elements.length &&
    sub.elements.every((element, i) => {
      const target = sup.elements[i];
      return target !== undefined && subclassOf(element, target);
    })
  );
}

/**
 * True iff every value satisfying `sub` also satisfies `sup`.
 *
 * `Any` is compatible with everything on either side, unions distribute,
 * plain types follow the prototype chain with `Object` at the top, and a
 * parametrized pattern sits below a plain type when its origin's `base`
 * does. Same-origin patterns compare their arguments: collections
 * covariantly, callables contravariantly in their parameters.
 */
export function subclassOf(sub: Pattern, sup: Pattern): boolean {
  if (sub === Any || sup === Any) return true;
  if (patternsEqual(sub, sup)) return true;
  if (isElementOf(sub, Receiver)) return subclassOf(sub.args, sup);
  if (isElementOf(sup, Receiver)) return subclassOf(sub, sup.args);
  // Left-hand unions and literals resolve before any subclassCheck hook.
  if (sub instanceof UnionPattern)
    return sub.args.every((member) => subclassOf(member, sup));
  if (sub instanceof LiteralPattern) return instanceOf(sub.args, sup);
  if (sup instanceof Subscribed && sup.subclassCheck) return sup.subclassCheck(sub);

  if (sup instanceof UnionPattern)
    return sup.args.some((member) => subclassOf(sub, member));
  if (sup instanceof LiteralPattern) return false;
  if (sub instanceof SpecialForm || sup instanceof SpecialForm) return false;

  if (isPlainType(sup)) {
    if (isPlainType(sub)) return isSubclassOfPlain(sub, sup);
    const base = sub.origin.base;
    return base !== undefined && isSubclassOfPlain(base, sup);
  }
  if (!(sub instanceof Subscribed)) return false;

  if (sup instanceof TuplePattern) return tupleSubclass(sub, sup);
  if (isElementOf(sup, List)) {
    if (isElementOf(sub, List)) return subclassOf(sub.args, sup.args);
    return (
      sub instanceof TuplePattern &&
      sub.elements.every((element) => subclassOf(element, sup.args))
    );
  }
  if (isElementOf(sup, SetOf))
    return isElementOf(sub, SetOf) && subclassOf(sub.args, sup.args);
  if (isElementOf(sup, TypeOf))
    return isElementOf(sub, TypeOf) && subclassOf(sub.args, sup.args);
  if (sup instanceof MapOfPattern)
    return (
      sub instanceof MapOfPattern &&
      subclassOf(sub.args[0], sup.args[0]) &&
      subclassOf(sub.args[1], sup.args[1])
    );
  if (sup instanceof CallablePattern)
    return (
      sub instanceof CallablePattern &&
      paramsCompatible(sub.params, sup.params) &&
      subclassOf(sub.returns, sup.returns)
    );
  return false;
}

/** Parameter and return patterns of a `Callable` pattern. */
export function getArgsAndReturnType(
  pattern: CallablePattern,
): [params: CallableParams, returns: Pattern] {
  return [pattern.params, pattern.returns];
}
