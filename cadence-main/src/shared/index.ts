export { devLog, devWarn, devError, createScopedLogger, errorMessage } from "./debug-log.js";
export type { ScopedLogger } from "./debug-log.js";
export {
  CadenceError,
  ConfigLoadError,
  InvalidFormatError,
  InvalidSpecError,
  UnknownBlockReferenceError,
  AlertDeliveryError,
} from "./errors.js";
export type { CadenceErrorCode } from "./errors.js";
export { readJsonFile, readJsonDocument, writeJsonFileAtomic, isObject } from "./io.js";
export type { JsonReadResult } from "./io.js";
