// example3-dispatch.ts
import {
  configure,
  createDispatchFunction,
  type DispatchHandler,
  List,
  type Pattern,
  PatternLookupError,
  Something,
  Tuple,
  Ellipsis,
} from "../src/index.js";

async function main() {
  configure({ logLevel: "debug" });

  const describe = createDispatchFunction(
    new Map<Pattern, DispatchHandler<string>>([
      [Number, (n) => `number ${String(n)}`],
      [Tuple.of([Number, Number]), (pair) => `pair ${String(pair)}`],
      [List.of(Number), (items) => `numbers ${String(items)}`],
      [Something.of({ length: Number }), (sized) => `sized ${String(sized)}`],
    ]),
  );

  console.log(describe(3)); // "number 3"
  console.log(describe([1, 2, 3])); // "numbers 1,2,3"
  console.log(describe("abc")); // "sized abc"
  console.log(describe.understands(Tuple.of([Number, Ellipsis]))); // false

  try {
    describe(true);
  } catch (e) {
    if (!(e instanceof PatternLookupError)) throw e;
    console.log(e.message); // "No match for true"
  }
}

main().catch((e: unknown) => {
  console.error("Error:", e instanceof Error ? e.message : e);
  process.exit(1);
});
