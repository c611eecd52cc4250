/**
 * curry(): validates the currying policy and returns a specializer that turns
 * functions into binding nodes.
 *
 * @example
 * ```typescript
 * const f = curry()(
 *   (a: number, b: number, x = 5) => [a, b, x],
 *   { name: 'f', params: ['a', 'b', 'x'], defaults: { x: 5 } }
 * );
 *
 * f(1)(2)();               // [1, 2, 5]
 * f(1, named({ x: 9 }))(2)(); // [1, 2, 9]
 * ```
 */

import { ConfigurationError, SignatureError } from "./errors";
import {
  createEagerNode,
  createLazyNode,
  type Curried,
  type EagerCurried,
  type NodeState,
  type PolicyFlags,
} from "./node";
import {
  RECEIVER,
  defaultBindings,
  defineSignature,
  withReceiver,
  type SignatureDeclaration,
} from "./signature";
import { isBoundMethod, type CurryTarget } from "./target";

// =============================================================================
// Options
// =============================================================================

export interface CurryOptions {
  /** Wait for an explicit empty call before invoking (default: true) */
  lazy?: boolean;
  /** Allow named values to replace bound parameters (default: false) */
  allowOverride?: boolean;
  /** Pre-bind the declared defaults when a function is curried (default: false) */
  useDefaults?: boolean;
  /** Logger function */
  logger?: (message: string) => void;
}

export const DEFAULT_CURRY_OPTIONS: Readonly<PolicyFlags> = Object.freeze({
  lazy: true,
  allowOverride: false,
  useDefaults: false,
});

type FlagName = keyof PolicyFlags;

const OPTION_NAMES: ReadonlySet<string> = new Set([
  "lazy",
  "allowOverride",
  "useDefaults",
  "logger",
]);

function readFlag(options: CurryOptions, name: FlagName): boolean {
  const value: unknown = options[name];
  if (value === undefined) return DEFAULT_CURRY_OPTIONS[name];
  if (typeof value !== "boolean") {
    throw new ConfigurationError({ option: name });
  }
  return value;
}

function resolveOptions(options: CurryOptions | undefined): PolicyFlags & {
  logger: (message: string) => void;
} {
  if (options === undefined) {
    return { ...DEFAULT_CURRY_OPTIONS, logger: () => {} };
  }
  // A function here means curry was applied straight to the target
  if (typeof options !== "object" || options === null || Array.isArray(options)) {
    throw new ConfigurationError();
  }
  for (const name of Object.keys(options)) {
    if (!OPTION_NAMES.has(name)) {
      throw new ConfigurationError({ option: name });
    }
  }

  const logger: unknown = options.logger;
  if (logger !== undefined && typeof logger !== "function") {
    throw new ConfigurationError({ option: "logger" });
  }

  return {
    lazy: readFlag(options, "lazy"),
    allowOverride: readFlag(options, "allowOverride"),
    useDefaults: readFlag(options, "useDefaults"),
    logger: options.logger ?? (() => {}),
  };
}

// =============================================================================
// Specializers
// =============================================================================

/**
 * Curries `target` according to `declaration`.
 *
 * @throws {SignatureError} when `target` is not callable or the declaration is invalid
 */
export type LazySpecializer = <R>(target: CurryTarget<R>, declaration: SignatureDeclaration) => Curried<R>;

export type EagerSpecializer = <R>(
  target: CurryTarget<R>,
  declaration: SignatureDeclaration
) => EagerCurried<R>;

/**
 * Create a specializer for the given policy.
 *
 * @throws {ConfigurationError} when options are not an options object or a flag is not a boolean
 */
export function curry(options: CurryOptions & { lazy: false }): EagerSpecializer;
export function curry(options?: CurryOptions & { lazy?: true }): LazySpecializer;
export function curry(options?: CurryOptions): LazySpecializer | EagerSpecializer;
export function curry(options?: CurryOptions): LazySpecializer | EagerSpecializer {
  const { logger, ...policy } = resolveOptions(options);

  function rootState<R>(target: CurryTarget<R>, declaration: SignatureDeclaration): NodeState<R> {
    if (typeof target !== "function" && !isBoundMethod(target)) {
      throw new SignatureError({ reason: "not_callable" });
    }

    const fn = isBoundMethod(target) ? target.fn : target;
    if (typeof fn !== "function") {
      throw new SignatureError({ reason: "not_callable" });
    }
    const declared = defineSignature(declaration, fn.name);
    const signature = isBoundMethod(target) ? withReceiver(declared) : declared;

    const bindings = policy.useDefaults ? defaultBindings(signature) : new Map<string, unknown>();
    if (isBoundMethod(target)) {
      bindings.set(RECEIVER, target.instance);
    }

    logger(`Curried ${signature.name}() with ${signature.arity} parameters (${bindings.size} pre-bound)`);
    return {
      fn,
      signature,
      bindings,
      policy,
      receiverBound: isBoundMethod(target),
      logger,
    };
  }

  if (policy.lazy) {
    return <R>(target: CurryTarget<R>, declaration: SignatureDeclaration) =>
      createLazyNode(rootState(target, declaration));
  }
  return <R>(target: CurryTarget<R>, declaration: SignatureDeclaration) =>
    createEagerNode(rootState(target, declaration));
}
