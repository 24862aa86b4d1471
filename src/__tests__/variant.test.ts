/**
 * @fileoverview Variant-group resolution by shape
 *
 * Tests cover:
 * - Literal discriminators (Chat, ChatMember)
 * - Exactly-one-action groups (InlineKeyboardButton)
 * - Most-specific-wins (InputMessageContent, Update)
 * - Catch-all members for new upstream kinds
 * - NoMatchingVariant and AmbiguousVariant
 */

import { describe, it, expect } from "vitest";
import { AmbiguousVariantError, NoMatchingVariantError } from "../shared/errors.js";
import { telegramFields as t, telegramRegistry } from "../telegram/schema.js";

const privateChat = { id: 5, type: "private", first_name: "Bob" };
const message = { message_id: 3, date: 1700000000, chat: privateChat, text: "hi" };

describe("variants", () => {
  describe("literal discriminators", () => {
    it("should select the chat member matching the type literal", () => {
      const result = telegramRegistry.decode({ id: -100, type: "supergroup", title: "Test Group" }, "Chat");

      expect(result.ok && result.value).toEqual({
        kind: "SupergroupChat",
        value: { id: -100n, type: "supergroup", title: "Test Group" },
      });
    });

    it("should report no match for an unknown chat type with the present fields sorted", () => {
      const result = telegramRegistry.decode({ type: "secret", title: "Hidden", id: 1 }, "Chat");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(NoMatchingVariantError);
      expect(result.error).toMatchObject({
        code: "NO_MATCHING_VARIANT",
        path: "",
        group: "Chat",
        presentFields: ["id", "title", "type"],
      });
      expect(result.error.message).toBe("No Chat variant matches <root> with fields {id, title, type}");
    });

    it("should select chat members by status", () => {
      const result = telegramRegistry.decode(
        { status: "kicked", user: { id: 9, is_bot: false, first_name: "Eve" }, until_date: 0 },
        "ChatMember",
      );

      expect(result.ok && result.value.kind).toBe("ChatMemberBanned");
    });

    it("should report a variant nested in an entity at its field path", () => {
      const result = telegramRegistry.decode({ message_id: 1, date: 1, chat: { id: 1 } }, "Message");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({ code: "NO_MATCHING_VARIANT", path: "chat", presentFields: ["id"] });
    });
  });

  describe("one action per button", () => {
    it("should select the member by its action field", () => {
      const result = telegramRegistry.decode({ text: "Vote", callback_data: "vote:1" }, "InlineKeyboardButton");

      expect(result.ok && result.value).toEqual({
        kind: "CallbackDataButton",
        value: { text: "Vote", callback_data: "vote:1" },
      });
    });

    it("should report a button with two actions as ambiguous", () => {
      const result = telegramRegistry.decode(
        { text: "Go", url: "https://example.com", callback_data: "x" },
        "InlineKeyboardButton",
      );

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(AmbiguousVariantError);
      expect(result.error).toMatchObject({
        code: "AMBIGUOUS_VARIANT",
        candidates: ["UrlButton", "CallbackDataButton"],
      });
      expect(result.error.message).toBe(
        "Ambiguous InlineKeyboardButton at <root>: matches UrlButton, CallbackDataButton",
      );
    });

    it("should not let a wrongly shaped field make a member a candidate", () => {
      const result = telegramRegistry.decode({ text: "Pay", pay: "yes" }, "InlineKeyboardButton");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({ code: "NO_MATCHING_VARIANT", presentFields: ["pay", "text"] });
    });
  });

  describe("most specific wins", () => {
    it("should prefer venue content over location content", () => {
      const result = telegramRegistry.decode(
        { latitude: 1.5, longitude: 2.5, title: "Cafe", address: "Main St 1" },
        "InputMessageContent",
      );

      expect(result.ok && result.value.kind).toBe("InputVenueMessageContent");
    });

    it("should select location content when venue fields are absent", () => {
      const result = telegramRegistry.decode({ latitude: 1.5, longitude: 2.5 }, "InputMessageContent");

      expect(result.ok && result.value).toEqual({
        kind: "InputLocationMessageContent",
        value: { latitude: 1.5, longitude: 2.5 },
      });
    });

    it("should select the update member for its payload over the catch-all", () => {
      const result = telegramRegistry.decode({ update_id: 10, message }, "Update");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.kind).toBe("MessageUpdate");
      expect(result.unknownFields).toEqual([]);
    });

    it("should fall back to the catch-all for a new update kind and keep its payload", () => {
      const result = telegramRegistry.decode({ update_id: 11, business_message: { x: 1 } }, "Update");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toEqual({ kind: "UnknownUpdate", value: { update_id: 11 } });
      expect(result.unknownFields).toEqual([
        { path: "business_message", entityPath: "", key: "business_message", value: { x: 1 } },
      ]);
    });

    it("should report an update with two payloads as ambiguous", () => {
      const result = telegramRegistry.decode({ update_id: 12, message, edited_message: message }, "Update");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({
        code: "AMBIGUOUS_VARIANT",
        candidates: ["MessageUpdate", "EditedMessageUpdate", "UnknownUpdate"],
      });
    });

    it("should treat a null payload as absent", () => {
      const result = telegramRegistry.decode({ update_id: 13, message: null, edited_message: message }, "Update");

      expect(result.ok && result.value.kind).toBe("EditedMessageUpdate");
      expect(result.ok && result.unknownFields).toEqual([{ path: "message", entityPath: "", key: "message", value: null }]);
    });
  });

  describe("integer range and selection", () => {
    it("should select by shape and then report the out-of-range id", () => {
      const result = telegramRegistry.decodeJson(
        '{"id": 9223372036854775808, "type": "private", "first_name": "A"}',
        "Chat",
      );

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({ code: "INTEGER_OUT_OF_RANGE", path: "id" });
    });
  });

  describe("decodeAs", () => {
    it("should decode a list of variants with indexed paths", () => {
      const result = telegramRegistry.decodeAs(
        [{ update_id: 1, message }, { update_id: 2, poll_answer: { poll_id: "p", user: 7, option_ids: [0] } }],
        t.array(t.ref("Update")),
      );

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({ code: "TYPE_MISMATCH", path: "[1].poll_answer.user" });
    });
  });
});
