/**
 * @fileoverview Encoding decoded values back to documents
 */

import { readFileSync } from "node:fs";
import { describe, it, expect } from "vitest";
import { MissingRequiredFieldError, TypeMismatchError } from "../shared/errors.js";
import { parseDocument } from "../shared/wire.js";
import { telegramFields as t, telegramRegistry } from "../telegram/schema.js";
import type { Message } from "../telegram/types.js";

function fixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf-8");
}

describe("encode", () => {
  it("should round-trip a full message", () => {
    const text = fixture("message.json");
    const result = telegramRegistry.decodeJson(text, "Message");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(telegramRegistry.encode(result.value, "Message")).toEqual(parseDocument(text));
  });

  it("should put preserved unknown fields back in place", () => {
    const text = fixture("message.drift.json");
    const result = telegramRegistry.decodeJson(text, "Message");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const encoded = telegramRegistry.encode(result.value, "Message", { unknownFields: result.unknownFields });
    expect(encoded).toEqual(parseDocument(text));
  });

  it("should put nested unknown fields back under their entity", () => {
    const document = {
      update_id: 5,
      message: {
        message_id: 1,
        date: 10,
        chat: { id: 5, type: "private", first_name: "Bob", has_private_forwards: true },
      },
    };
    const result = telegramRegistry.decode(document, "Update");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.unknownFields.map((f) => f.entityPath)).toEqual(["message.chat"]);
    expect(telegramRegistry.encode(result.value, "Update", { unknownFields: result.unknownFields })).toEqual(
      document,
    );
  });

  it("should drop unknown fields when none are passed", () => {
    const result = telegramRegistry.decode({ id: 1, is_bot: false, first_name: "Ada", is_premium: true }, "User");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(telegramRegistry.encode(result.value, "User")).toEqual({ id: 1, is_bot: false, first_name: "Ada" });
  });

  it("should keep ids beyond the safe range as bigint", () => {
    expect(telegramRegistry.encode({ id: 2n ** 60n, is_bot: false, first_name: "Big" }, "User")).toEqual({
      id: 1152921504606846976n,
      is_bot: false,
      first_name: "Big",
    });
  });

  it("should throw when a required field is missing", () => {
    const value: unknown = { message_id: 1, chat: { kind: "PrivateChat", value: { id: 1n, type: "private", first_name: "A" } } };
    const encode = () => telegramRegistry.encodeAs(value, { descriptor: { kind: "ref", name: "Message" } });

    expect(encode).toThrow(MissingRequiredFieldError);
    expect(encode).toThrow("Missing required field date");
  });

  it("should throw when a variant tag names no member of the group", () => {
    const message: Message = {
      message_id: 1n,
      date: 10,
      chat: { kind: "PrivateChat", value: { id: 1n, type: "private", first_name: "A" } },
    };
    const wrongTag: unknown = { ...message, chat: { kind: "User", value: message.chat.value } };
    const encode = () => telegramRegistry.encodeAs(wrongTag, { descriptor: { kind: "ref", name: "Message" } });

    expect(encode).toThrow(TypeMismatchError);
    expect(encode).toThrow("Type mismatch at chat: expected Chat variant, found object");
  });

  it("should reject a literal value the schema does not allow", () => {
    const chat: unknown = { kind: "PrivateChat", value: { id: 1n, type: "secret", first_name: "A" } };
    const encode = () => telegramRegistry.encodeAs(chat, { descriptor: { kind: "ref", name: "Chat" } });

    expect(encode).toThrow(TypeMismatchError);
    expect(encode).toThrow('Type mismatch at type: expected "private", found "secret"');
  });

  it("should reject an undeclared value of a closed enum", () => {
    const mask: unknown = { point: "nose", x_shift: 0, y_shift: 0, scale: 1 };
    const encode = () => telegramRegistry.encodeAs(mask, { descriptor: { kind: "ref", name: "MaskPosition" } });

    expect(encode).toThrow('Type mismatch at point: expected one of "forehead" | "eyes" | "mouth" | "chin", found "nose"');
  });

  it("should keep undeclared values of an open enum", () => {
    expect(telegramRegistry.encode({ type: "spoiler", offset: 0, length: 4 }, "MessageEntity")).toEqual({
      type: "spoiler",
      offset: 0,
      length: 4,
    });
  });

  it("should match unknown fields of a value decoded under a path", () => {
    const result = telegramRegistry.decode({ id: 1, is_bot: false, first_name: "Ada", is_premium: true }, "User", {
      path: "result",
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.unknownFields).toEqual([
      { path: "result.is_premium", entityPath: "result", key: "is_premium", value: true },
    ]);
    expect(telegramRegistry.encode(result.value, "User", { unknownFields: result.unknownFields, path: "result" })).toEqual(
      { id: 1, is_bot: false, first_name: "Ada", is_premium: true },
    );
  });

  it("should encode each scalar alternative as itself", () => {
    const chatTarget = t.oneOf(t.int64(), t.string());

    expect(telegramRegistry.encodeAs(-1001234567890n, chatTarget)).toBe(-1001234567890);
    expect(telegramRegistry.encodeAs("@news", chatTarget)).toBe("@news");
  });

  it("should reject a value that matches no scalar alternative", () => {
    const value: unknown = true;
    const encode = () => telegramRegistry.encodeAs(value, { descriptor: t.oneOf(t.int64(), t.string()).descriptor });

    expect(encode).toThrow("Type mismatch at <root>: expected int64 | string, found boolean");
  });
});
