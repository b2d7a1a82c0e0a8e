
export {
  AppError,
  ErrorCode,
  ErrorKind,
  type ErrorCodeType,
  type ErrorKindType,
  Errors,
  isAppError,
  getErrorMessage,
  ensureAppError,
  errorKindOf,
  kindOfCode,
  wrapDependency,
  type ErrorMetadata,
} from "./app-error";
