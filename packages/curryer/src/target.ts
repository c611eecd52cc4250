/**
 * What a curried node ultimately calls: a free function, or a method paired
 * with the instance it is bound to.
 */

export type AnyFunction<R = unknown> = (...args: never[]) => R;

/**
 * A method together with its receiver. Currying one pre-binds the `this` slot.
 *
 * @example
 * ```typescript
 * const counter = new Counter();
 * const add = curry()(method(counter, counter.addProduct), { params: ['x', 'y'] });
 * add(2)(3)(); // counter.addProduct(2, 3)
 * ```
 */
export class BoundMethod<R = unknown> {
  constructor(
    public readonly instance: object,
    public readonly fn: AnyFunction<R>
  ) {}
}

export function method<R>(instance: object, fn: AnyFunction<R>): BoundMethod<R> {
  return new BoundMethod(instance, fn);
}

export function isBoundMethod(value: unknown): value is BoundMethod {
  return value instanceof BoundMethod;
}

export type CurryTarget<R> = AnyFunction<R> | BoundMethod<R>;
