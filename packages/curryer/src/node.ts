/**
 * Binding nodes: immutable partial applications.
 *
 * Every call on a node resolves its values against a private copy of the
 * node's bindings, then either calls the target or returns a fresh node. The
 * node that was called never changes, so any number of nodes can branch from
 * one partial application without seeing each other's bindings.
 */

import {
  ArityExceededError,
  OverrideNotAllowedError,
  UnknownParameterError,
  isCurryError,
  type CurryFailure,
} from "./errors";
import { isNamedArguments } from "./named";
import { ok, err, type Result } from "./result";
import { argumentsFor, type Signature } from "./signature";
import type { AnyFunction } from "./target";

// =============================================================================
// Types
// =============================================================================

export interface PolicyFlags {
  /** Require an explicit empty call even once every parameter is bound */
  readonly lazy: boolean;
  /** Let named values replace parameters that are already bound */
  readonly allowOverride: boolean;
  /** Seed new nodes with the declared defaults */
  readonly useDefaults: boolean;
}

export interface NodeState<R> {
  readonly fn: AnyFunction<R>;
  readonly signature: Signature;
  readonly bindings: ReadonlyMap<string, unknown>;
  readonly policy: PolicyFlags;
  /** The receiver slot was filled from a bound method and is never a free slot */
  readonly receiverBound: boolean;
  readonly logger: (message: string) => void;
}

/** Checked arguments for the target, ready to apply */
interface Invocation {
  readonly receiver: unknown;
  readonly args: readonly unknown[];
  readonly size: number;
}

type Step<R> = { done: true; call: Invocation } | { done: false; state: NodeState<R> };

interface CurriedInfo {
  readonly signature: Signature;
  readonly lazy: boolean;
  /** Copy of the current bindings */
  bindings(): ReadonlyMap<string, unknown>;
  /** Unbound parameters in declaration order */
  pending(): readonly string[];
}

/**
 * A lazily curried function. Calls with values return a new node; the empty
 * call invokes the target.
 */
export interface Curried<R> extends CurriedInfo {
  readonly lazy: true;
  (): R;
  (...values: [unknown, ...unknown[]]): Curried<R>;
  /** Same as calling the node, with curry errors returned as `Err` */
  attempt(): Result<R, CurryFailure>;
  attempt(...values: [unknown, ...unknown[]]): Result<Curried<R>, CurryFailure>;
}

/**
 * An eagerly curried function: the call that binds the last parameter returns
 * the target's result instead of a node.
 */
export interface EagerCurried<R> extends CurriedInfo {
  readonly lazy: false;
  (): R;
  (...values: [unknown, ...unknown[]]): R | EagerCurried<R>;
  attempt(): Result<R, CurryFailure>;
  attempt(...values: [unknown, ...unknown[]]): Result<R | EagerCurried<R>, CurryFailure>;
}

// =============================================================================
// Resolution
// =============================================================================

function firstFreeSlot<R>(state: NodeState<R>, bindings: ReadonlyMap<string, unknown>): string {
  const { signature } = state;
  const slots = state.receiverBound ? signature.params.slice(1) : signature.params;
  const slot = slots.find((param) => !bindings.has(param));
  if (slot === undefined) {
    throw new ArityExceededError({ functionName: signature.name, arity: signature.arity });
  }
  return slot;
}

function setArgument<R>(
  state: NodeState<R>,
  bindings: Map<string, unknown>,
  param: string,
  value: unknown
): void {
  const { signature } = state;
  if (!signature.params.includes(param)) {
    throw new UnknownParameterError({ functionName: signature.name, parameter: param });
  }
  if (bindings.has(param) && !state.policy.allowOverride) {
    throw new OverrideNotAllowedError({ functionName: signature.name, parameter: param });
  }
  bindings.set(param, value);
}

function prepare<R>(state: NodeState<R>, bindings: ReadonlyMap<string, unknown>): Step<R> {
  const { receiver, args } = argumentsFor(state.signature, bindings);
  return { done: true, call: { receiver, args, size: bindings.size } };
}

function invoke<R>(state: NodeState<R>, call: Invocation): R {
  state.logger(`Invoking ${state.signature.name}() with ${call.size} bound arguments`);
  return Reflect.apply(state.fn, call.receiver, call.args);
}

/**
 * One call on a node. Positional values fill the left-most free slot in the
 * order given, then named values are applied in order. The target is not
 * called here; a completed step carries its checked arguments.
 */
function advance<R>(state: NodeState<R>, values: readonly unknown[]): Step<R> {
  if (values.length === 0) {
    return prepare(state, state.bindings);
  }

  const bindings = new Map(state.bindings);
  for (const value of values) {
    if (!isNamedArguments(value)) {
      setArgument(state, bindings, firstFreeSlot(state, bindings), value);
    }
  }
  for (const marker of values.filter(isNamedArguments)) {
    for (const [param, value] of marker.entries()) {
      setArgument(state, bindings, param, value);
    }
  }

  if (!state.policy.lazy && bindings.size === state.signature.arity) {
    return prepare(state, bindings);
  }
  return { done: false, state: { ...state, bindings } };
}

/** Resolves one call, returning curry errors as `Err` */
function attempted<R>(state: NodeState<R>, values: readonly unknown[]): Result<Step<R>, CurryFailure> {
  try {
    return ok(advance(state, values));
  } catch (error) {
    if (isCurryError(error)) return err(error);
    throw error;
  }
}

function describe<R>(state: NodeState<R>) {
  return {
    signature: state.signature,
    bindings: (): ReadonlyMap<string, unknown> => new Map(state.bindings),
    pending: (): readonly string[] =>
      state.signature.params.filter((param) => !state.bindings.has(param)),
  };
}

function rename<F extends object>(fn: F, name: string): F {
  return Object.defineProperty(fn, "name", { value: name, configurable: true });
}

// =============================================================================
// Node Factories
// =============================================================================

export function createLazyNode<R>(state: NodeState<R>): Curried<R> {
  const settle = (step: Step<R>): R | Curried<R> =>
    step.done ? invoke(state, step.call) : createLazyNode(step.state);

  function node(): R;
  function node(...values: [unknown, ...unknown[]]): Curried<R>;
  function node(...values: unknown[]): R | Curried<R> {
    return settle(advance(state, values));
  }

  function attempt(): Result<R, CurryFailure>;
  function attempt(...values: [unknown, ...unknown[]]): Result<Curried<R>, CurryFailure>;
  function attempt(...values: unknown[]): Result<R | Curried<R>, CurryFailure> {
    // The target runs after the try, so errors from its body propagate
    const step = attempted(state, values);
    return step.ok ? ok(settle(step.value)) : step;
  }

  return rename(Object.assign(node, describe(state), { lazy: true as const, attempt }), state.signature.name);
}

export function createEagerNode<R>(state: NodeState<R>): EagerCurried<R> {
  const settle = (step: Step<R>): R | EagerCurried<R> =>
    step.done ? invoke(state, step.call) : createEagerNode(step.state);

  function node(): R;
  function node(...values: [unknown, ...unknown[]]): R | EagerCurried<R>;
  function node(...values: unknown[]): R | EagerCurried<R> {
    return settle(advance(state, values));
  }

  function attempt(): Result<R, CurryFailure>;
  function attempt(...values: [unknown, ...unknown[]]): Result<R | EagerCurried<R>, CurryFailure>;
  function attempt(...values: unknown[]): Result<R | EagerCurried<R>, CurryFailure> {
    // The target runs after the try, so errors from its body propagate
    const step = attempted(state, values);
    return step.ok ? ok(settle(step.value)) : step;
  }

  return rename(Object.assign(node, describe(state), { lazy: false as const, attempt }), state.signature.name);
}
