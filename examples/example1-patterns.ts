// example1-patterns.ts
import {
  Callable,
  Ellipsis,
  getType,
  instanceOf,
  List,
  MapOf,
  Optional,
  showPattern,
  subclassOf,
  Tuple,
  union,
} from "../src/index.js";

async function main() {
  // Parametrized patterns are values: build them anywhere, compare by content
  const numbers = List.of(Number);
  console.log(showPattern(numbers), numbers.equals(List.of(Number))); // "List[Number]" true

  console.log(instanceOf([1, 2, 3], numbers)); // true
  console.log(instanceOf([1, "two"], numbers)); // false
  console.log(instanceOf(null, Optional(String))); // true

  // Derived patterns
  console.log(showPattern(getType(new Map([["a", [1, 2]]])))); // "MapOf[String, List[Number]]"
  console.log(showPattern(getType([1, "a"], { useUnion: true }))); // "List[Union[Number, String]]"

  // Subtyping
  console.log(subclassOf(List.of(Number), Tuple.of([Number, Ellipsis]))); // true
  console.log(subclassOf(MapOf.of([String, Number]), MapOf.of([String, union(Number, String)]))); // true
  console.log(
    subclassOf(Callable.of([[Object], Number]), Callable.of([[Number], Object])), // true
  );
}

main().catch((e: unknown) => {
  console.error("Error:", e instanceof Error ? e.message : e);
  process.exit(1);
});
