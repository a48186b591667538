export {
  ReadabilityError,
  ErrorCode,
  wrapError,
  isReadabilityError,
  getErrorCode,
  type ErrorContext,
  type SerializedError,
} from "./ReadabilityError";

export { ReadabilityConfigError } from "./ConfigError";
export { LexiconError } from "./LexiconError";
export { AnnotationContractError } from "./AnnotationError";
export { AnnotatorNetworkError } from "./NetworkError";
