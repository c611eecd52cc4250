/**
 * curryer/errors entry point
 */
export {
  // Base class
  CurryError,
  // Error types
  ConfigurationError,
  SignatureError,
  ArityExceededError,
  UnknownParameterError,
  OverrideNotAllowedError,
  MissingArgumentError,
  // Union and tag types
  type CurryFailure,
  type CurryErrorTag,
  type SignatureErrorReason,
  // Type guards
  isCurryError,
  isConfigurationError,
  isSignatureError,
  isArityExceededError,
  isUnknownParameterError,
  isOverrideNotAllowedError,
  isMissingArgumentError,
} from "./errors";
