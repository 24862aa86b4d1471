/**
 * @fileoverview Integer widths and lossless parsing
 */

import { describe, it, expect } from "vitest";
import { IntegerOutOfRangeError } from "../shared/errors.js";
import { parseDocument, stringifyDocument } from "../shared/wire.js";
import { telegramRegistry } from "../telegram/schema.js";

describe("integers", () => {
  describe("int32", () => {
    const photo = (width: unknown) => ({ file_id: "f1", width, height: 90 });

    it("should accept the bounds", () => {
      const max = telegramRegistry.decode(photo(2147483647), "PhotoSize");
      const min = telegramRegistry.decode(photo(-2147483648), "PhotoSize");

      expect(max.ok && max.value.width).toBe(2147483647);
      expect(min.ok && min.value.width).toBe(-2147483648);
    });

    it("should reject a value one past the maximum", () => {
      const result = telegramRegistry.decode(photo(2147483648), "PhotoSize");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(IntegerOutOfRangeError);
      expect(result.error).toMatchObject({
        code: "INTEGER_OUT_OF_RANGE",
        path: "width",
        value: 2147483648n,
        width: "int32",
      });
      expect(result.error.message).toBe("Integer 2147483648 at width does not fit int32");
    });

    it("should reject a non-integral number as a type mismatch", () => {
      const result = telegramRegistry.decode(photo(1.5), "PhotoSize");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("TYPE_MISMATCH");
      expect(result.error.message).toBe("Type mismatch at width: expected int32, found float");
    });
  });

  describe("int64", () => {
    it("should decode safe integers as bigint", () => {
      const result = telegramRegistry.decode(
        { id: -1001234567890, type: "channel", title: "News" },
        "Chat",
      );

      expect(result.ok && result.value.value.id).toBe(-1001234567890n);
    });

    it("should keep integers beyond 2^53 exact when parsed from text", () => {
      const result = telegramRegistry.decodeJson(
        '{"id": 9007199254740993, "is_bot": false, "first_name": "Big"}',
        "User",
      );

      expect(result.ok && result.value.id).toBe(9007199254740993n);
    });

    it("should accept the maximum and reject one past it", () => {
      const max = telegramRegistry.decodeJson(
        '{"id": 9223372036854775807, "is_bot": false, "first_name": "Max"}',
        "User",
      );
      const over = telegramRegistry.decodeJson(
        '{"id": 9223372036854775808, "is_bot": false, "first_name": "Over"}',
        "User",
      );

      expect(max.ok && max.value.id).toBe(9223372036854775807n);
      expect(over.ok).toBe(false);
      if (over.ok) return;
      expect(over.error).toMatchObject({ code: "INTEGER_OUT_OF_RANGE", path: "id", width: "int64" });
    });

    it("should reject a number that was already rounded past 2^53", () => {
      // JSON.parse turns 9007199254740993 into this value.
      const result = telegramRegistry.decode({ id: 9007199254740992, is_bot: false, first_name: "Big" }, "User");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({ code: "TYPE_MISMATCH", path: "id" });
      expect(result.error.message).toBe("Type mismatch at id: expected int64, found imprecise integer 9007199254740992");
    });

    it("should decode message and update ids as bigint", () => {
      const message = { message_id: 3000000000, date: 1700000000, chat: { id: 1, type: "private", first_name: "A" } };
      const result = telegramRegistry.decode({ update_id: 3000000001, message }, "Update");

      expect(result.ok).toBe(true);
      if (!result.ok || result.value.kind !== "MessageUpdate") return;
      expect(result.value.value.update_id).toBe(3000000001n);
      expect(result.value.value.message.message_id).toBe(3000000000n);
    });

    it("should decode a copied message id as bigint", () => {
      const result = telegramRegistry.decode({ message_id: 2147483648 }, "MessageId");

      expect(result.ok && result.value.message_id).toBe(2147483648n);
    });

    it("should reject an id sent as a string", () => {
      const result = telegramRegistry.decode({ id: "42", is_bot: false, first_name: "Ada" }, "User");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("Type mismatch at id: expected int64, found string");
    });
  });

  describe("time", () => {
    it("should reject negative timestamps", () => {
      const result = telegramRegistry.decode(
        { message_id: 1, date: -1, chat: { id: 1, type: "private", first_name: "A" } },
        "Message",
      );

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({ code: "INTEGER_OUT_OF_RANGE", path: "date", width: "time" });
    });
  });

  describe("float", () => {
    it("should accept integers for float fields", () => {
      const result = telegramRegistry.decode({ longitude: 13, latitude: 52.52 }, "Location");

      expect(result.ok && result.value).toEqual({ longitude: 13, latitude: 52.52 });
    });
  });

  describe("wire", () => {
    it("should parse safe integers as numbers and large ones as bigint", () => {
      expect(parseDocument('{"a": 1, "b": 2.5, "c": 12345678901234567890}')).toEqual({
        a: 1,
        b: 2.5,
        c: 12345678901234567890n,
      });
    });

    it("should stringify bigint without losing precision", () => {
      expect(stringifyDocument({ id: 12345678901234567890n })).toBe('{"id":12345678901234567890}');
    });
  });
});
