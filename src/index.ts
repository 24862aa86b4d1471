/**
 * tg-schema: typed decoding for Telegram Bot API payloads
 *
 * Public API surface for programmatic usage.
 */

export {
  fieldTypes,
  required,
  optional,
  describeDescriptor,
  type FieldType,
  type FieldSpec,
  type FieldMap,
  type OpenEnum,
  type TypeDescriptor,
  type TypeDefinition,
  type EntityDefinition,
  type VariantDefinition,
  type FieldDefinition,
  type IntegerWidth,
} from "./schema/fields.js";
export { RegistryBuilder, TypeRegistry } from "./schema/registry.js";
export {
  DecodeError,
  MissingRequiredFieldError,
  TypeMismatchError,
  IntegerOutOfRangeError,
  NoMatchingVariantError,
  AmbiguousVariantError,
  UnknownFieldError,
  MalformedInputError,
  RegistryError,
  type DecodeErrorCode,
} from "./shared/errors.js";
export { parseDocument, stringifyDocument } from "./shared/wire.js";
export { formatPath } from "./shared/utils.js";
export { telegramRegistry, telegramFields } from "./telegram/schema.js";
export {
  ApiError,
  decodeApiResponse,
  encodeApiResponse,
  unwrapApiResponse,
  type ApiResponse,
} from "./telegram/response.js";
export {
  decodeMethodParams,
  decodeMethodResponse,
  encodeMethodParams,
  encodeMethodResponse,
  hasMethodParams,
  isTelegramMethod,
  methodParamsType,
  methodResultType,
  updateTypeOf,
  METHODS_WITH_PARAMS,
  TELEGRAM_METHODS,
  type MethodParams,
  type MethodResults,
  type MethodWithParams,
  type TelegramMethod,
} from "./telegram/methods.js";
export { MESSAGE_ENTITY_KINDS, PARSE_MODES, UPDATE_TYPES } from "./telegram/types.js";
export type * from "./telegram/types.js";
export type * from "./shared/types.js";
