/**
 * Parameter model of a curried function.
 *
 * Functions carry no parameter names at run time, so every curried function is
 * described by an explicit declaration: its parameter names in order and the
 * defaults of its trailing parameters. A leading `"this"` declares the receiver
 * the same way a TypeScript `this` parameter does.
 *
 * @example
 * ```typescript
 * const signature = defineSignature({
 *   name: 'f',
 *   params: ['a', 'b', 'x'],
 *   defaults: { x: 5 },
 * });
 * signature.required; // ['a', 'b']
 * ```
 */

import { MissingArgumentError, SignatureError } from "./errors";

export const RECEIVER = "this";

export interface SignatureDeclaration {
  /** Name used in error messages; defaults to the function's own name */
  readonly name?: string;
  /** Parameter names in declaration order */
  readonly params: readonly string[];
  /** Default values for a suffix of `params` */
  readonly defaults?: Readonly<Record<string, unknown>>;
}

export interface Signature {
  readonly name: string;
  readonly params: readonly string[];
  readonly defaults: ReadonlyMap<string, unknown>;
  /** First parameter is the receiver, passed to the function as `this` */
  readonly hasReceiver: boolean;
  /** Number of declared parameters, receiver included */
  readonly arity: number;
  /** Parameters without a default */
  readonly required: readonly string[];
}

/**
 * Validate a declaration and build its Signature.
 *
 * @param fallbackName - used when the declaration has no `name`
 * @throws {SignatureError} on rest parameters or a malformed declaration
 */
export function defineSignature(declaration: SignatureDeclaration, fallbackName?: string): Signature {
  if (typeof declaration !== "object" || declaration === null) {
    throw new SignatureError({
      reason: "invalid_declaration",
      functionName: fallbackName,
      detail: "expected a declaration object",
    });
  }

  const name = declaration.name || fallbackName || "anonymous";
  const invalid = (detail: string) =>
    new SignatureError({ reason: "invalid_declaration", functionName: name, detail });

  const { params } = declaration;
  if (!isList(params)) {
    throw invalid("params must be an array of parameter names");
  }

  const seen = new Set<string>();
  params.forEach((param: unknown, index) => {
    if (typeof param !== "string" || param.length === 0) {
      throw invalid(`parameter ${index} is not a name`);
    }
    if (param.startsWith("...")) {
      throw new SignatureError({ reason: "variadic", functionName: name });
    }
    if (param === RECEIVER && index !== 0) {
      throw invalid(`'${RECEIVER}' must be the first parameter`);
    }
    if (seen.has(param)) {
      throw invalid(`duplicate parameter '${param}'`);
    }
    seen.add(param);
  });

  const defaults = new Map<string, unknown>();
  for (const [param, value] of Object.entries(declaration.defaults ?? {})) {
    if (!seen.has(param)) {
      throw invalid(`default given for unknown parameter '${param}'`);
    }
    if (param === RECEIVER) {
      throw invalid(`'${RECEIVER}' cannot have a default`);
    }
    defaults.set(param, value);
  }

  // Defaults are only allowed on a suffix, keep them in declaration order
  const ordered = new Map<string, unknown>();
  let defaulted = false;
  for (const param of params) {
    if (defaults.has(param)) {
      defaulted = true;
      ordered.set(param, defaults.get(param));
    } else if (defaulted) {
      throw invalid(`non-default parameter '${param}' follows default parameter`);
    }
  }

  return Object.freeze({
    name,
    params: Object.freeze([...params]),
    defaults: ordered,
    hasReceiver: params[0] === RECEIVER,
    arity: params.length,
    required: Object.freeze(params.filter((param) => !ordered.has(param))),
  });
}

function isList(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

/**
 * The same signature with a receiver slot in front, for bound methods whose
 * declaration leaves `"this"` out.
 */
export function withReceiver(signature: Signature): Signature {
  if (signature.hasReceiver) return signature;
  const params = Object.freeze([RECEIVER, ...signature.params]);
  return Object.freeze({
    ...signature,
    params,
    hasReceiver: true,
    arity: params.length,
    required: Object.freeze([RECEIVER, ...signature.required]),
  });
}

/**
 * Bindings for every defaulted parameter, used to seed a node with `useDefaults`.
 */
export function defaultBindings(signature: Signature): Map<string, unknown> {
  return new Map(signature.defaults);
}

export interface CallArguments {
  readonly receiver: unknown;
  readonly args: readonly unknown[];
}

/**
 * Calling convention: the receiver and the positional argument list for a
 * set of bindings. Unbound parameters take their declared default.
 *
 * @throws {MissingArgumentError} when a required parameter is unbound
 */
export function argumentsFor(signature: Signature, bound: ReadonlyMap<string, unknown>): CallArguments {
  const missing = signature.required.filter((param) => !bound.has(param));
  if (missing.length > 0) {
    throw new MissingArgumentError({ functionName: signature.name, missing });
  }

  const params = signature.hasReceiver ? signature.params.slice(1) : signature.params;
  return {
    receiver: signature.hasReceiver ? bound.get(RECEIVER) : undefined,
    args: params.map((param) => (bound.has(param) ? bound.get(param) : signature.defaults.get(param))),
  };
}
