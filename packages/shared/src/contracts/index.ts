export { ERROR_CODES, type ErrorCode } from "./error-codes";
export {
  VALIDATION_CODES,
  VALIDATION_SEVERITIES,
  type ValidationCode,
} from "./validation-codes";
