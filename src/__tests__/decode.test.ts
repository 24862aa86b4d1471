/**
 * @fileoverview Record decoding against the Telegram registry
 *
 * Tests cover:
 * - Required, optional and null fields
 * - Field paths in errors, through nested entities and arrays
 * - Unknown fields in lenient and strict mode
 * - Open and closed enums
 * - Immutability of decoded values
 */

import { describe, it, expect } from "vitest";
import { telegramRegistry } from "../telegram/schema.js";
import type { TelegramTypeName } from "../telegram/types.js";

const privateChat = { id: 5, type: "private", first_name: "Bob" };

function decodeOk<K extends TelegramTypeName>(document: unknown, type: K, strict = false) {
  const result = telegramRegistry.decode(document, type, { strict });
  if (!result.ok) throw new Error(`expected success, got ${result.error.message}`);
  return result;
}

function decodeErr(document: unknown, type: TelegramTypeName, strict = false) {
  const result = telegramRegistry.decode(document, type, { strict });
  if (result.ok) throw new Error("expected failure");
  return result.error;
}

describe("decode", () => {
  describe("fields", () => {
    it("should decode a user with optional fields present", () => {
      const { value, unknownFields } = decodeOk(
        { id: 1234, is_bot: false, first_name: "Ada", username: "ada_test" },
        "User",
      );

      expect(value).toEqual({ id: 1234n, is_bot: false, first_name: "Ada", username: "ada_test" });
      expect(unknownFields).toEqual([]);
    });

    it("should omit absent optional fields instead of setting undefined", () => {
      const { value } = decodeOk({ id: 1, is_bot: true, first_name: "Bot" }, "User");

      expect("last_name" in value).toBe(false);
      expect(Object.keys(value)).toEqual(["id", "is_bot", "first_name"]);
    });

    it("should treat null as absent for optional fields", () => {
      const { value, unknownFields } = decodeOk(
        { id: 1, is_bot: false, first_name: "Ada", last_name: null },
        "User",
      );

      expect("last_name" in value).toBe(false);
      expect(unknownFields).toEqual([]);
    });

    it("should report a missing required field", () => {
      const error = decodeErr({ is_bot: false, first_name: "Ada" }, "User");

      expect(error.code).toBe("MISSING_REQUIRED_FIELD");
      expect(error.path).toBe("id");
      expect(error.message).toBe("Missing required field id");
    });

    it("should treat null as absent for required fields", () => {
      const error = decodeErr({ id: 1, is_bot: null, first_name: "Ada" }, "User");

      expect(error.code).toBe("MISSING_REQUIRED_FIELD");
      expect(error.path).toBe("is_bot");
    });

    it("should report the first failing field in declaration order", () => {
      const error = decodeErr({ first_name: 7 }, "User");

      expect(error.path).toBe("id");
    });

    it("should reject a non-object at the root", () => {
      const error = decodeErr("nope", "User");

      expect(error.code).toBe("TYPE_MISMATCH");
      expect(error.path).toBe("");
      expect(error.message).toBe("Type mismatch at <root>: expected User, found string");
    });

    it("should reject a boolean given as a string", () => {
      const error = decodeErr({ id: 1, is_bot: "false", first_name: "Ada" }, "User");

      expect(error.message).toBe("Type mismatch at is_bot: expected boolean, found string");
    });
  });

  describe("paths", () => {
    it("should report the full path through nested entities", () => {
      const error = decodeErr(
        {
          message_id: 1,
          date: 10,
          chat: privateChat,
          reply_to_message: {
            message_id: 2,
            date: 9,
            chat: privateChat,
            from: { id: "x", is_bot: false, first_name: "B" },
          },
        },
        "Message",
      );

      expect(error.code).toBe("TYPE_MISMATCH");
      expect(error.path).toBe("reply_to_message.from.id");
      expect(error.message).toBe("Type mismatch at reply_to_message.from.id: expected int64, found string");
    });

    it("should include array indices in the path", () => {
      const error = decodeErr(
        {
          message_id: 1,
          date: 10,
          chat: privateChat,
          photo: [
            { file_id: "a", width: 1, height: 1 },
            { width: 2, height: 2 },
          ],
        },
        "Message",
      );

      expect(error.code).toBe("MISSING_REQUIRED_FIELD");
      expect(error.path).toBe("photo[1].file_id");
    });

    it("should decode nested arrays such as keyboard rows", () => {
      const { value } = decodeOk(
        {
          keyboard: [[{ text: "Yes" }, { text: "No" }], [{ text: "Share", request_contact: true }]],
          resize_keyboard: true,
        },
        "ReplyKeyboardMarkup",
      );

      expect(value.keyboard).toEqual([[{ text: "Yes" }, { text: "No" }], [{ text: "Share", request_contact: true }]]);
    });

    it("should reject an object where an array is expected", () => {
      const error = decodeErr({ total_count: 1, photos: { file_id: "a" } }, "UserProfilePhotos");

      expect(error.message).toBe("Type mismatch at photos: expected array of array of PhotoSize, found object");
    });
  });

  describe("unknown fields", () => {
    it("should preserve unknown fields in lenient mode", () => {
      const { value, unknownFields } = decodeOk(
        { id: 1, is_bot: false, first_name: "Ada", is_premium: true },
        "User",
      );

      expect("is_premium" in value).toBe(false);
      expect(unknownFields).toEqual([{ path: "is_premium", entityPath: "", key: "is_premium", value: true }]);
    });

    it("should record the enclosing entity path of nested unknown fields", () => {
      const { unknownFields } = decodeOk(
        {
          message_id: 1,
          date: 10,
          chat: { ...privateChat, has_private_forwards: true },
        },
        "Message",
      );

      expect(unknownFields).toEqual([
        { path: "chat.has_private_forwards", entityPath: "chat", key: "has_private_forwards", value: true },
      ]);
    });

    it("should freeze preserved unknown values", () => {
      const { unknownFields } = decodeOk(
        { id: 1, is_bot: false, first_name: "Ada", emoji_status: { custom_emoji_id: "e1" } },
        "User",
      );

      expect(unknownFields[0]?.value).toEqual({ custom_emoji_id: "e1" });
      expect(Object.isFrozen(unknownFields[0]?.value)).toBe(true);
    });

    it("should reject unknown fields in strict mode", () => {
      const error = decodeErr({ id: 1, is_bot: false, first_name: "Ada", is_premium: true }, "User", true);

      expect(error.code).toBe("UNKNOWN_FIELD");
      expect(error.path).toBe("is_premium");
      expect(error.message).toBe("Unknown field is_premium");
    });

    it("should record unknown keys whose value is null", () => {
      const { unknownFields } = decodeOk({ id: 1, is_bot: false, first_name: "Ada", is_premium: null }, "User");

      expect(unknownFields).toEqual([{ path: "is_premium", entityPath: "", key: "is_premium", value: null }]);
    });

    it("should reject unknown keys whose value is null in strict mode", () => {
      const error = decodeErr({ id: 1, is_bot: false, first_name: "Ada", is_premium: null }, "User", true);

      expect(error.code).toBe("UNKNOWN_FIELD");
      expect(error.path).toBe("is_premium");
    });

    it("should still treat a declared optional field set to null as absent", () => {
      const { value, unknownFields } = decodeOk({ id: 1, is_bot: false, first_name: "Ada", last_name: null }, "User");

      expect("last_name" in value).toBe(false);
      expect(unknownFields).toEqual([]);
    });
  });

  describe("enums", () => {
    it("should accept a declared value of an open enum without drift", () => {
      const { value, unknownEnumValues } = decodeOk({ type: "bold", offset: 0, length: 4 }, "MessageEntity");

      expect(value.type).toBe("bold");
      expect(unknownEnumValues).toEqual([]);
    });

    it("should accept and record an unrecognized value of an open enum", () => {
      const { value, unknownEnumValues } = decodeOk({ type: "spoiler", offset: 0, length: 4 }, "MessageEntity");

      expect(value.type).toBe("spoiler");
      expect(unknownEnumValues).toEqual([{ path: "type", value: "spoiler" }]);
    });

    it("should reject an unrecognized open enum value in strict mode", () => {
      const error = decodeErr({ type: "spoiler", offset: 0, length: 4 }, "MessageEntity", true);

      expect(error.code).toBe("TYPE_MISMATCH");
      expect(error.path).toBe("type");
      expect(error).toMatchObject({ actual: '"spoiler"' });
    });

    it("should reject an unrecognized value of a closed enum", () => {
      const error = decodeErr({ point: "nose", x_shift: 0, y_shift: 0, scale: 1 }, "MaskPosition");

      expect(error).toMatchObject({
        code: "TYPE_MISMATCH",
        path: "point",
        expected: 'one of "forehead" | "eyes" | "mouth" | "chin"',
        actual: '"nose"',
      });
    });
  });

  describe("immutability", () => {
    it("should freeze decoded objects and arrays", () => {
      const { value } = decodeOk(
        {
          message_id: 1,
          date: 10,
          chat: privateChat,
          photo: [{ file_id: "a", width: 1, height: 1 }],
        },
        "Message",
      );

      expect(Object.isFrozen(value)).toBe(true);
      expect(Object.isFrozen(value.chat)).toBe(true);
      expect(Object.isFrozen(value.chat.value)).toBe(true);
      expect(Object.isFrozen(value.photo)).toBe(true);
      expect(Object.isFrozen(value.photo?.[0])).toBe(true);
    });

    it("should not share structure with the input document", () => {
      const input = { id: 1, is_bot: false, first_name: "Ada" };
      const { value } = decodeOk(input, "User");

      input.first_name = "Changed";
      expect(value.first_name).toBe("Ada");
    });
  });

  describe("decodeJson", () => {
    it("should parse and decode in one step", () => {
      const result = telegramRegistry.decodeJson('{"file_id":"f1","file_size":2048}', "File");

      expect(result).toEqual({
        ok: true,
        value: { file_id: "f1", file_size: 2048 },
        unknownFields: [],
        unknownEnumValues: [],
      });
    });

    it("should report malformed input with the parser error as cause", () => {
      const result = telegramRegistry.decodeJson('{"file_id": ', "File");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("MALFORMED_INPUT");
      expect(result.error.path).toBe("");
      expect(result.error.cause).toBeInstanceOf(Error);
      expect(result.error.message.startsWith("Malformed input: ")).toBe(true);
    });
  });
});
