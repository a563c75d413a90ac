export { BaseError, type BaseErrorOptions, type SerializeOptions, serializeError } from "./core/base-error"
export {
  ConfigurationError,
  ConversionError,
  DuplicateKeyError,
  IllegalValueError,
  type NameCollision,
  NameCollisionError,
} from "./core/config-errors"
export type {
  AppError,
  ConfigErrorCode,
  ErrorCode,
  ErrorContext,
  SerializedError,
} from "./ports/error"
