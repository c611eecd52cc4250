/**
 * Keyword values for a curried call.
 *
 * JavaScript calls are positional only, so values meant for a parameter by
 * name travel inside a `named()` marker. A call may mix markers and positional
 * values in any order; positional values are always resolved first.
 *
 * @example
 * ```typescript
 * f(1, 2, named({ z: 9 }));
 * ```
 */
export class NamedArguments {
  readonly values: Readonly<Record<string, unknown>>;

  constructor(values: Readonly<Record<string, unknown>>) {
    this.values = Object.freeze({ ...values });
  }

  /** Entries in key order */
  entries(): Array<[string, unknown]> {
    return Object.entries(this.values);
  }
}

export function named(values: Readonly<Record<string, unknown>>): NamedArguments {
  return new NamedArguments(values);
}

export function isNamedArguments(value: unknown): value is NamedArguments {
  return value instanceof NamedArguments;
}
