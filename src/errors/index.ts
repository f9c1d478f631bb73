export {
  ReviewError,
  ErrorCode,
  wrapError,
  isReviewError,
  getErrorCode,
  type ErrorContext,
  type SerializedError,
} from "./ReviewError";

export { ReviewParseError } from "./ParseError";
export { ReviewRuleError } from "./RuleError";
export { ReviewValidationError } from "./ValidationError";
export { ReviewRunError, isCancellation } from "./RunError";
