/**
 * Type tests for curryer, checked by the type-check rather than run.
 */
import { expectTypeOf } from "vitest";
import {
  curry,
  method,
  named,
  type Curried,
  type EagerCurried,
  type CurryFailure,
  type Result,
} from "./index";

const add = (a: number, b: number) => a + b;

// Lazy nodes
const lazy = curry()(add, { params: ["a", "b"] });
expectTypeOf(lazy).toEqualTypeOf<Curried<number>>();
expectTypeOf(lazy(1)).toEqualTypeOf<Curried<number>>();
expectTypeOf(lazy(1)(named({ b: 2 }))()).toEqualTypeOf<number>();
expectTypeOf(lazy.attempt()).toEqualTypeOf<Result<number, CurryFailure>>();
expectTypeOf(lazy.attempt(1)).toEqualTypeOf<Result<Curried<number>, CurryFailure>>();

// Eager nodes
const eager = curry({ lazy: false })(add, { params: ["a", "b"] });
expectTypeOf(eager).toEqualTypeOf<EagerCurried<number>>();
expectTypeOf(eager(1, 2)).toEqualTypeOf<number | EagerCurried<number>>();
expectTypeOf(eager()).toEqualTypeOf<number>();

// Methods keep their return type
class Greeter {
  greet(name: string): string {
    return `Hello, ${name}`;
  }
}
const greeter = new Greeter();
expectTypeOf(curry()(method(greeter, greeter.greet), { params: ["name"] })).toEqualTypeOf<Curried<string>>();
