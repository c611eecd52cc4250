/**
 * curryer
 *
 * Curried functions with named parameters, defaults and an explicit
 * completion policy.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { curry, named } from 'curryer';
 *
 * const area = curry()(
 *   (width: number, height: number, unit = 'cm') => `${width * height}${unit}`,
 *   { params: ['width', 'height', 'unit'], defaults: { unit: 'cm' } }
 * );
 *
 * const wide = area(10);
 * wide(2)();                      // "20cm"
 * wide(3, named({ unit: 'mm' }))(); // "30mm"
 * ```
 *
 * ## Entry Points
 *
 * - `curryer` - curry, named, method and the Curryer namespace
 * - `curryer/errors` - error classes and type guards
 * - `curryer/result` - Result types used by `attempt()`
 */

import * as result from "./result";
import { curry, DEFAULT_CURRY_OPTIONS } from "./curry";
import { named, isNamedArguments } from "./named";
import { method, isBoundMethod } from "./target";
import { defineSignature } from "./signature";
import { isCurryError } from "./errors";

// =============================================================================
// Curryer namespace (single export)
// =============================================================================

const Curryer = {
  ...result,
  curry,
  named,
  method,
  defineSignature,
  isNamedArguments,
  isBoundMethod,
  isCurryError,
  DEFAULT_CURRY_OPTIONS,
} as const;

export { Curryer };

// =============================================================================
// Named value exports (tree-shake friendly)
// =============================================================================

export { curry, DEFAULT_CURRY_OPTIONS } from "./curry";
export { named, isNamedArguments, NamedArguments } from "./named";
export { method, isBoundMethod, BoundMethod } from "./target";
export { defineSignature } from "./signature";
export { ok, err, isOk, isErr } from "./result";
export {
  CurryError,
  ConfigurationError,
  SignatureError,
  ArityExceededError,
  UnknownParameterError,
  OverrideNotAllowedError,
  MissingArgumentError,
  isCurryError,
} from "./errors";

// =============================================================================
// Type exports (cannot live on runtime object)
// =============================================================================

export type { CurryOptions, LazySpecializer, EagerSpecializer } from "./curry";
export type { Curried, EagerCurried, PolicyFlags } from "./node";
export type { Signature, SignatureDeclaration } from "./signature";
export type { AnyFunction, CurryTarget } from "./target";
export type { Ok, Err, Result } from "./result";
export type { CurryFailure, CurryErrorTag, SignatureErrorReason } from "./errors";
