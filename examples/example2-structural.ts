// example2-structural.ts
import {
  annotate,
  Callable,
  instanceOf,
  Something,
  subclassOf,
} from "../src/index.js";

class Celsius {
  constructor(readonly degrees: number) {}

  convert(scale: string): number {
    return scale === "F" ? this.degrees * 1.8 + 32 : this.degrees;
  }
}
annotate(Celsius.prototype.convert, [String], Number);

async function main() {
  const Convertible = Something.of({ convert: Callable.of([[String], Number]) });
  console.log(String(Convertible)); // "Something['convert': Callable[[String], Number]]"

  // The receiver of `convert` is not part of the comparison
  console.log(subclassOf(Celsius, Convertible)); // true
  console.log(instanceOf(new Celsius(21), Convertible)); // true
  console.log(instanceOf({ convert: 3 }, Convertible)); // false

  // Interfaces read off existing values
  console.log(String(Something.like(new Celsius(0)))); // "Something['convert': Callable[[String], Number], 'degrees': Number]"
}

main().catch((e: unknown) => {
  console.error("Error:", e instanceof Error ? e.message : e);
  process.exit(1);
});
