/**
 * Bot API response envelope.
 *
 * Every method answers `{ ok: true, result }` or
 * `{ ok: false, error_code, description, parameters? }`. The envelope is
 * decoded here; `result` is decoded against the caller's type with paths
 * rooted at `result`.
 */

import { toDocumentValue } from "../decoder/decode.js";
import type { FieldType } from "../schema/fields.js";
import { DecodeError, MissingRequiredFieldError, TypeMismatchError, UnknownFieldError } from "../shared/errors.js";
import type { DecodeOptions, DecodeResult, DocumentValue, EncodeOptions, UnknownField } from "../shared/types.js";
import { childPath, describeValue, isRecord } from "../shared/utils.js";
import { telegramRegistry } from "./schema.js";
import type { ApiFailureBody, ResponseParameters } from "./types.js";

/** Envelope keys besides `result`; anything else is drift. */
const ENVELOPE_KEYS = new Set(["ok", "result", "description"]);

/** An `ok: false` answer from the Bot API. */
export class ApiError extends Error {
  readonly errorCode: number;
  readonly description: string;
  readonly parameters: ResponseParameters | undefined;

  constructor(errorCode: number, description: string, parameters?: ResponseParameters) {
    super(`Telegram API error: ${description} (${errorCode})`);
    this.name = "ApiError";
    this.errorCode = errorCode;
    this.description = description;
    this.parameters = parameters;
    Object.setPrototypeOf(this, ApiError.prototype);
  }

  /** Seconds to wait before repeating the request (flood control). */
  get retryAfter(): number | undefined {
    return this.parameters?.retry_after;
  }

  /** The group became a supergroup with this id. */
  get migrateToChatId(): bigint | undefined {
    return this.parameters?.migrate_to_chat_id;
  }
}

export type ApiResponse<T> = { ok: true; result: T; description?: string } | { ok: false; error: ApiError };

/**
 * Decode a Bot API envelope. Structural problems anywhere in it are a failed
 * `DecodeResult`; a well-formed `ok: false` answer is a successful decode
 * whose value carries the `ApiError`.
 */
export function decodeApiResponse<T>(
  document: unknown,
  resultType: FieldType<T>,
  options?: DecodeOptions,
): DecodeResult<ApiResponse<T>> {
  const base = options?.path ?? "";
  if (!isRecord(document)) {
    return { ok: false, error: new TypeMismatchError(base, "ApiResponse", describeValue(document)) };
  }

  const ok = document["ok"];
  if (ok === undefined || ok === null) {
    return { ok: false, error: new MissingRequiredFieldError(childPath(base, "ok")) };
  }
  if (typeof ok !== "boolean") {
    return { ok: false, error: new TypeMismatchError(childPath(base, "ok"), "boolean", describeValue(ok)) };
  }

  if (!ok) {
    const failure = telegramRegistry.decode(document, "ApiFailureBody", options);
    if (!failure.ok) return failure;
    const body = failure.value;
    return {
      ...failure,
      value: { ok: false, error: new ApiError(body.error_code, body.description, body.parameters) },
    };
  }

  const result = document["result"];
  if (result === undefined || result === null) {
    return { ok: false, error: new MissingRequiredFieldError(childPath(base, "result")) };
  }
  const description = document["description"];
  if (description !== undefined && description !== null && typeof description !== "string") {
    return {
      ok: false,
      error: new TypeMismatchError(childPath(base, "description"), "string", describeValue(description)),
    };
  }

  // Envelope extras belong to the envelope itself, not to the result.
  const extras: UnknownField[] = [];
  for (const [key, value] of Object.entries(document)) {
    if (ENVELOPE_KEYS.has(key) || value === undefined) continue;
    const path = childPath(base, key);
    if (options?.strict === true) return { ok: false, error: new UnknownFieldError(path, key) };
    try {
      extras.push({ path, entityPath: base, key, value: toDocumentValue(value, path) });
    } catch (err) {
      if (err instanceof DecodeError) return { ok: false, error: err };
      throw err;
    }
  }

  const decoded = telegramRegistry.decodeAs(result, resultType, { ...options, path: childPath(base, "result") });
  if (!decoded.ok) return decoded;

  const response: ApiResponse<T> =
    typeof description === "string"
      ? { ok: true, result: decoded.value, description }
      : { ok: true, result: decoded.value };
  return {
    ok: true,
    value: response,
    unknownFields: Object.freeze([...extras, ...decoded.unknownFields]),
    unknownEnumValues: decoded.unknownEnumValues,
  };
}

/**
 * Turn a decoded envelope back into a document. The `unknownFields` of the
 * decode (and its `path`, if one was given) restore undeclared keys both on
 * the envelope and inside `result`.
 * @throws DecodeError when the result does not match `resultType`
 */
export function encodeApiResponse<T>(
  response: ApiResponse<T>,
  resultType: FieldType<T>,
  options: EncodeOptions = {},
): DocumentValue {
  const base = options.path ?? "";
  if (!response.ok) {
    const { error } = response;
    const body: ApiFailureBody =
      error.parameters === undefined
        ? { ok: false, error_code: error.errorCode, description: error.description }
        : { ok: false, error_code: error.errorCode, description: error.description, parameters: error.parameters };
    return telegramRegistry.encode(body, "ApiFailureBody", options);
  }

  const envelope: Record<string, DocumentValue> = {
    ok: true,
    result: telegramRegistry.encodeAs(response.result, resultType, { ...options, path: childPath(base, "result") }),
  };
  if (response.description !== undefined) envelope["description"] = response.description;
  for (const extra of options.unknownFields ?? []) {
    if (extra.entityPath === base && !(extra.key in envelope)) envelope[extra.key] = extra.value;
  }
  return envelope;
}

/**
 * Return `result` from a decoded envelope.
 * @throws DecodeError when the envelope did not decode
 * @throws ApiError when the Bot API answered `ok: false`
 */
export function unwrapApiResponse<T>(decoded: DecodeResult<ApiResponse<T>>): T {
  if (!decoded.ok) throw decoded.error;
  const response = decoded.value;
  if (!response.ok) throw response.error;
  return response.result;
}
