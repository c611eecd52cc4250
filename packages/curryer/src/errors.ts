/**
 * curryer/errors
 *
 * Error types for every way currying can fail. Each carries a `_tag`
 * discriminant and the structured fields its message is built from.
 *
 * @example
 * ```typescript
 * import { isOverrideNotAllowedError } from 'curryer/errors';
 *
 * try {
 *   add(1)(named({ a: 2 }));
 * } catch (error) {
 *   if (isOverrideNotAllowedError(error)) {
 *     console.log(error.parameter); // "a"
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Class
// =============================================================================

export type CurryErrorTag =
  | "ConfigurationError"
  | "SignatureError"
  | "ArityExceededError"
  | "UnknownParameterError"
  | "OverrideNotAllowedError"
  | "MissingArgumentError";

/**
 * Base class of all errors raised by curryer.
 */
export abstract class CurryError extends Error {
  abstract readonly _tag: CurryErrorTag;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Thrown by `curry()` when its options are not an options object, or when a
 * flag is not a genuine boolean.
 *
 * @example
 * ```typescript
 * curry({ lazy: "yes" });
 * // ConfigurationError: curry used with bad parameters or none at all.
 * ```
 */
export class ConfigurationError extends CurryError {
  readonly _tag = "ConfigurationError";
  /** Name of the offending option, when a single option is at fault */
  readonly option?: string;

  constructor(props: { option?: string } = {}) {
    super("curry used with bad parameters or none at all.");
    this.name = "ConfigurationError";
    this.option = props.option;
  }
}

export type SignatureErrorReason = "not_callable" | "variadic" | "invalid_declaration";

/**
 * Thrown at specialization time when the target cannot be curried.
 */
export class SignatureError extends CurryError {
  readonly _tag = "SignatureError";
  readonly reason: SignatureErrorReason;
  readonly functionName?: string;

  constructor(props: {
    reason: SignatureErrorReason;
    functionName?: string;
    /** Explanation for `invalid_declaration` */
    detail?: string;
  }) {
    super(signatureMessage(props));
    this.name = "SignatureError";
    this.reason = props.reason;
    this.functionName = props.functionName;
  }
}

function signatureMessage(p: {
  reason: SignatureErrorReason;
  functionName?: string;
  detail?: string;
}): string {
  const name = p.functionName ?? "anonymous";
  switch (p.reason) {
    case "not_callable":
      return "First argument must be a function or a bound method.";
    case "variadic":
      return `Currying variadic function ${name}() is ambiguous.`;
    case "invalid_declaration":
      return `Invalid signature for ${name}(): ${p.detail ?? "malformed declaration"}`;
  }
}

/**
 * Thrown when a positional value arrives and every parameter is already bound.
 *
 * @example
 * ```typescript
 * f(1, 2, 3, 4, 5, 6, 7, 8);
 * // ArityExceededError: f() takes 7 positional arguments but more were given
 * ```
 */
export class ArityExceededError extends CurryError {
  readonly _tag = "ArityExceededError";
  readonly functionName: string;
  /** Total number of declared parameters, receiver included */
  readonly arity: number;

  constructor(props: { functionName: string; arity: number }) {
    super(`${props.functionName}() takes ${props.arity} positional arguments but more were given`);
    this.name = "ArityExceededError";
    this.functionName = props.functionName;
    this.arity = props.arity;
  }
}

/**
 * Thrown when a named value does not match any declared parameter.
 */
export class UnknownParameterError extends CurryError {
  readonly _tag = "UnknownParameterError";
  readonly functionName: string;
  readonly parameter: string;

  constructor(props: { functionName: string; parameter: string }) {
    super(`${props.functionName}() got an unexpected keyword argument '${props.parameter}'`);
    this.name = "UnknownParameterError";
    this.functionName = props.functionName;
    this.parameter = props.parameter;
  }
}

/**
 * Thrown when a named value targets a bound parameter and overriding is off.
 */
export class OverrideNotAllowedError extends CurryError {
  readonly _tag = "OverrideNotAllowedError";
  readonly functionName: string;
  readonly parameter: string;

  constructor(props: { functionName: string; parameter: string }) {
    super(
      `Curried function ${props.functionName}() does not allow overriding given parameter '${props.parameter}'.`
    );
    this.name = "OverrideNotAllowedError";
    this.functionName = props.functionName;
    this.parameter = props.parameter;
  }
}

/**
 * Thrown when a curried function is forced before every required parameter
 * has a value.
 *
 * @example
 * ```typescript
 * f(1, 2, 3)();
 * // MissingArgumentError: f() missing 1 required positional argument: 'd'
 * ```
 */
export class MissingArgumentError extends CurryError {
  readonly _tag = "MissingArgumentError";
  readonly functionName: string;
  readonly missing: readonly string[];

  constructor(props: { functionName: string; missing: readonly string[] }) {
    const count = props.missing.length;
    super(
      `${props.functionName}() missing ${count} required positional argument${count === 1 ? "" : "s"}: ${listNames(props.missing)}`
    );
    this.name = "MissingArgumentError";
    this.functionName = props.functionName;
    this.missing = [...props.missing];
  }
}

// 'a' / 'a' and 'b' / 'a', 'b', and 'c'
function listNames(names: readonly string[]): string {
  const quoted = names.map((n) => `'${n}'`);
  if (quoted.length <= 2) return quoted.join(" and ");
  return `${quoted.slice(0, -1).join(", ")}, and ${quoted[quoted.length - 1]}`;
}

// =============================================================================
// Union Type
// =============================================================================

/**
 * Union of every error curryer raises, for exhaustive handling on `_tag`.
 */
export type CurryFailure =
  | ConfigurationError
  | SignatureError
  | ArityExceededError
  | UnknownParameterError
  | OverrideNotAllowedError
  | MissingArgumentError;

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error was raised by curryer.
 */
export function isCurryError(error: unknown): error is CurryFailure {
  return error instanceof CurryError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return isCurryError(error) && error._tag === "ConfigurationError";
}

export function isSignatureError(error: unknown): error is SignatureError {
  return isCurryError(error) && error._tag === "SignatureError";
}

export function isArityExceededError(error: unknown): error is ArityExceededError {
  return isCurryError(error) && error._tag === "ArityExceededError";
}

export function isUnknownParameterError(error: unknown): error is UnknownParameterError {
  return isCurryError(error) && error._tag === "UnknownParameterError";
}

export function isOverrideNotAllowedError(error: unknown): error is OverrideNotAllowedError {
  return isCurryError(error) && error._tag === "OverrideNotAllowedError";
}

export function isMissingArgumentError(error: unknown): error is MissingArgumentError {
  return isCurryError(error) && error._tag === "MissingArgumentError";
}
