/**
 * @fileoverview Request parameters of Bot API methods
 *
 * Tests cover:
 * - Chat targets given as an id or a `@username`
 * - Reply markup resolution in both directions
 * - Closed enums for parse modes and update types
 * - Inline query answers with nested variant content
 */

import { describe, it, expect } from "vitest";
import { stringifyDocument, parseDocument } from "../shared/wire.js";
import {
  decodeMethodParams,
  encodeMethodParams,
  isTelegramMethod,
  methodParamsType,
  METHODS_WITH_PARAMS,
} from "../telegram/methods.js";
import { telegramRegistry } from "../telegram/schema.js";

describe("request parameters", () => {
  describe("chat targets", () => {
    it("should encode a numeric chat id as a JSON number", () => {
      const body = encodeMethodParams("getChat", { chat_id: -1001234567890n });

      expect(stringifyDocument(body)).toBe('{"chat_id":-1001234567890}');
    });

    it("should encode a channel username as a string", () => {
      expect(stringifyDocument(encodeMethodParams("getChat", { chat_id: "@news" }))).toBe('{"chat_id":"@news"}');
    });

    it("should decode either form of chat id", () => {
      const byId = decodeMethodParams("getChatMember", { chat_id: -1001234567890, user_id: 7 });
      const byName = decodeMethodParams("getChatMember", { chat_id: "@news", user_id: 7 });

      expect(byId.ok && byId.value).toEqual({ chat_id: -1001234567890n, user_id: 7n });
      expect(byName.ok && byName.value).toEqual({ chat_id: "@news", user_id: 7n });
    });

    it("should keep chat ids beyond 2^53 exact when parsed from text", () => {
      const document = parseDocument('{"chat_id": -9007199254740993, "message_id": 5}');
      const result = decodeMethodParams("deleteMessage", document);

      expect(result.ok && result.value).toEqual({ chat_id: -9007199254740993n, message_id: 5n });
    });

    it("should reject a chat id of neither kind", () => {
      const result = decodeMethodParams("getChat", { chat_id: true });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({ code: "TYPE_MISMATCH", path: "chat_id" });
      expect(result.error.message).toBe("Type mismatch at chat_id: expected int64 | string, found boolean");
    });

    it("should reject a numeric chat id that was already rounded", () => {
      const result = decodeMethodParams("getChat", { chat_id: -9007199254740992 });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe(
        "Type mismatch at chat_id: expected int64, found imprecise integer -9007199254740992",
      );
    });
  });

  describe("reply markup", () => {
    it("should encode an inline keyboard without variant wrappers", () => {
      const body = encodeMethodParams("sendMessage", {
        chat_id: 5n,
        text: "Vote?",
        parse_mode: "HTML",
        reply_markup: {
          kind: "InlineKeyboardMarkup",
          value: {
            inline_keyboard: [
              [
                { kind: "CallbackDataButton", value: { text: "Yes", callback_data: "vote:yes" } },
                { kind: "UrlButton", value: { text: "Docs", url: "https://example.com/docs" } },
              ],
            ],
          },
        },
      });

      expect(body).toEqual({
        chat_id: 5,
        text: "Vote?",
        parse_mode: "HTML",
        reply_markup: {
          inline_keyboard: [
            [
              { text: "Yes", callback_data: "vote:yes" },
              { text: "Docs", url: "https://example.com/docs" },
            ],
          ],
        },
      });
    });

    it("should resolve a keyboard removal", () => {
      const result = decodeMethodParams("sendMessage", { chat_id: 5, text: "Bye", reply_markup: { remove_keyboard: true } });

      expect(result.ok && result.value).toEqual({
        chat_id: 5n,
        text: "Bye",
        reply_markup: { kind: "ReplyKeyboardRemove", value: { remove_keyboard: true } },
      });
    });

    it("should resolve a forced reply", () => {
      const result = decodeMethodParams("sendPhoto", {
        chat_id: "@news",
        photo: "file-1",
        reply_markup: { force_reply: true, selective: true },
      });

      expect(result.ok && result.value.reply_markup).toEqual({
        kind: "ForceReply",
        value: { force_reply: true, selective: true },
      });
    });

    it("should resolve a reply keyboard", () => {
      const result = decodeMethodParams("sendSticker", {
        chat_id: 5,
        sticker: "sticker-1",
        reply_markup: { keyboard: [[{ text: "Share", request_location: true }]], one_time_keyboard: true },
      });

      expect(result.ok && result.value.reply_markup?.kind).toBe("ReplyKeyboardMarkup");
    });

    it("should only accept an inline keyboard when editing", () => {
      const result = decodeMethodParams("editMessageReplyMarkup", {
        chat_id: 5,
        message_id: 10,
        reply_markup: { remove_keyboard: true },
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({ code: "MISSING_REQUIRED_FIELD", path: "reply_markup.inline_keyboard" });
    });
  });

  describe("enums", () => {
    it("should reject a parse mode in the wrong case", () => {
      const result = decodeMethodParams("sendMessage", { chat_id: 5, text: "*hi*", parse_mode: "markdown" });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({
        code: "TYPE_MISMATCH",
        path: "parse_mode",
        expected: 'one of "Markdown" | "MarkdownV2" | "HTML"',
        actual: '"markdown"',
      });
    });

    it("should decode the update types a bot subscribes to", () => {
      const result = decodeMethodParams("getUpdates", {
        offset: 3000000001,
        timeout: 30,
        allowed_updates: ["message", "callback_query"],
      });

      expect(result.ok && result.value).toEqual({
        offset: 3000000001n,
        timeout: 30,
        allowed_updates: ["message", "callback_query"],
      });
    });

    it("should reject an update type this schema does not know", () => {
      const result = decodeMethodParams("setWebhook", {
        url: "https://example.com/hook",
        allowed_updates: ["message", "business_message"],
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({ code: "TYPE_MISMATCH", path: "allowed_updates[1]" });
    });
  });

  describe("inline query answers", () => {
    const document = {
      inline_query_id: "q1",
      results: [
        {
          type: "article",
          id: "office",
          title: "Office",
          input_message_content: { latitude: 52.5, longitude: 13.4, title: "Office", address: "Main St 1" },
        },
        {
          type: "article",
          id: "greeting",
          title: "Greeting",
          input_message_content: { message_text: "<b>Hi</b>", parse_mode: "HTML" },
        },
      ],
      cache_time: 0,
    };

    it("should pick the most specific message content for each result", () => {
      const result = decodeMethodParams("answerInlineQuery", document);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const contents = result.value.results.map((r) => r.value.input_message_content.kind);
      expect(contents).toEqual(["InputVenueMessageContent", "InputTextMessageContent"]);
    });

    it("should encode back to the same document", () => {
      const result = decodeMethodParams("answerInlineQuery", document);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(encodeMethodParams("answerInlineQuery", result.value)).toEqual(document);
    });

    it("should reject a result of an unknown type", () => {
      const result = decodeMethodParams("answerInlineQuery", {
        inline_query_id: "q1",
        results: [{ type: "photo", id: "p", photo_url: "https://example.com/p.jpg", thumb_url: "x" }],
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({ code: "NO_MATCHING_VARIANT", path: "results[0]" });
    });
  });

  describe("method table", () => {
    it("should only list methods the Bot API has", () => {
      expect(METHODS_WITH_PARAMS.length).toBe(17);
      for (const method of METHODS_WITH_PARAMS) {
        expect(isTelegramMethod(method)).toBe(true);
      }
    });

    it("should only name registered types as parameters", () => {
      for (const method of METHODS_WITH_PARAMS) {
        const { descriptor } = methodParamsType(method);
        expect(descriptor.kind === "ref" && telegramRegistry.has(descriptor.name)).toBe(true);
      }
    });
  });
});
