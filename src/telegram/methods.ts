/**
 * Bot API methods and the type each one returns in `result`.
 */

import type { FieldType } from "../schema/fields.js";
import type { DecodeOptions, DecodeResult, DocumentValue, EncodeOptions } from "../shared/types.js";
import { type ApiResponse, decodeApiResponse, encodeApiResponse } from "./response.js";
import { telegramFields as t, telegramRegistry } from "./schema.js";
import type {
  AnswerInlineQuery,
  Chat,
  ChatInviteLink,
  ChatMember,
  DeleteMessage,
  EditMessageCaption,
  EditMessageReplyMarkup,
  EditMessageText,
  File,
  ForwardMessage,
  GetChat,
  GetChatAdministrators,
  GetChatMember,
  GetChatMembersCount,
  GetUpdates,
  GetUserProfilePhotos,
  Message,
  MessageId,
  Poll,
  SendDocument,
  SendMessage,
  SendPhoto,
  SendSticker,
  SetWebhook,
  StickerSet,
  Update,
  UpdateType,
  User,
  UserProfilePhotos,
  WebhookInfo,
} from "./types.js";

export { UPDATE_TYPES, type UpdateType } from "./types.js";

export interface MethodResults {
  getMe: User;
  getUpdates: readonly Update[];
  getWebhookInfo: WebhookInfo;
  setWebhook: boolean;
  deleteWebhook: boolean;
  sendMessage: Message;
  forwardMessage: Message;
  copyMessage: MessageId;
  sendPhoto: Message;
  sendAudio: Message;
  sendDocument: Message;
  sendVideo: Message;
  sendAnimation: Message;
  sendVoice: Message;
  sendVideoNote: Message;
  sendMediaGroup: readonly Message[];
  sendLocation: Message;
  sendVenue: Message;
  sendContact: Message;
  sendPoll: Message;
  sendSticker: Message;
  sendChatAction: boolean;
  stopPoll: Poll;
  deleteMessage: boolean;
  getUserProfilePhotos: UserProfilePhotos;
  getFile: File;
  getChat: Chat;
  getChatAdministrators: readonly ChatMember[];
  getChatMembersCount: number;
  getChatMember: ChatMember;
  banChatMember: boolean;
  unbanChatMember: boolean;
  restrictChatMember: boolean;
  promoteChatMember: boolean;
  exportChatInviteLink: string;
  createChatInviteLink: ChatInviteLink;
  approveChatJoinRequest: boolean;
  declineChatJoinRequest: boolean;
  setChatTitle: boolean;
  setChatDescription: boolean;
  pinChatMessage: boolean;
  unpinChatMessage: boolean;
  leaveChat: boolean;
  answerCallbackQuery: boolean;
  answerInlineQuery: boolean;
  answerShippingQuery: boolean;
  answerPreCheckoutQuery: boolean;
  getStickerSet: StickerSet;
}

export type TelegramMethod = keyof MethodResults;

const METHOD_RESULTS: { readonly [M in TelegramMethod]: FieldType<MethodResults[M]> } = {
  getMe: t.ref("User"),
  getUpdates: t.array(t.ref("Update")),
  getWebhookInfo: t.ref("WebhookInfo"),
  setWebhook: t.boolean(),
  deleteWebhook: t.boolean(),
  sendMessage: t.ref("Message"),
  forwardMessage: t.ref("Message"),
  copyMessage: t.ref("MessageId"),
  sendPhoto: t.ref("Message"),
  sendAudio: t.ref("Message"),
  sendDocument: t.ref("Message"),
  sendVideo: t.ref("Message"),
  sendAnimation: t.ref("Message"),
  sendVoice: t.ref("Message"),
  sendVideoNote: t.ref("Message"),
  sendMediaGroup: t.array(t.ref("Message")),
  sendLocation: t.ref("Message"),
  sendVenue: t.ref("Message"),
  sendContact: t.ref("Message"),
  sendPoll: t.ref("Message"),
  sendSticker: t.ref("Message"),
  sendChatAction: t.boolean(),
  stopPoll: t.ref("Poll"),
  deleteMessage: t.boolean(),
  getUserProfilePhotos: t.ref("UserProfilePhotos"),
  getFile: t.ref("File"),
  getChat: t.ref("Chat"),
  getChatAdministrators: t.array(t.ref("ChatMember")),
  getChatMembersCount: t.int32(),
  getChatMember: t.ref("ChatMember"),
  banChatMember: t.boolean(),
  unbanChatMember: t.boolean(),
  restrictChatMember: t.boolean(),
  promoteChatMember: t.boolean(),
  exportChatInviteLink: t.string(),
  createChatInviteLink: t.ref("ChatInviteLink"),
  approveChatJoinRequest: t.boolean(),
  declineChatJoinRequest: t.boolean(),
  setChatTitle: t.boolean(),
  setChatDescription: t.boolean(),
  pinChatMessage: t.boolean(),
  unpinChatMessage: t.boolean(),
  leaveChat: t.boolean(),
  answerCallbackQuery: t.boolean(),
  answerInlineQuery: t.boolean(),
  answerShippingQuery: t.boolean(),
  answerPreCheckoutQuery: t.boolean(),
  getStickerSet: t.ref("StickerSet"),
};

export const TELEGRAM_METHODS = Object.freeze(Object.keys(METHOD_RESULTS).filter(isTelegramMethod));

export function isTelegramMethod(name: string): name is TelegramMethod {
  return Object.hasOwn(METHOD_RESULTS, name);
}

export function methodResultType<M extends TelegramMethod>(method: M): FieldType<MethodResults[M]> {
  return METHOD_RESULTS[method];
}

/** Decode the full response envelope of a Bot API call. */
export function decodeMethodResponse<M extends TelegramMethod>(
  method: M,
  document: unknown,
  options?: DecodeOptions,
): DecodeResult<ApiResponse<MethodResults[M]>> {
  return decodeApiResponse(document, methodResultType(method), options);
}

/** Inverse of `decodeMethodResponse`. */
export function encodeMethodResponse<M extends TelegramMethod>(
  method: M,
  response: ApiResponse<MethodResults[M]>,
  options?: EncodeOptions,
): DocumentValue {
  return encodeApiResponse(response, methodResultType(method), options);
}

/** Request parameters of the methods that take any. */
export interface MethodParams {
  getUpdates: GetUpdates;
  setWebhook: SetWebhook;
  sendMessage: SendMessage;
  forwardMessage: ForwardMessage;
  sendPhoto: SendPhoto;
  sendDocument: SendDocument;
  sendSticker: SendSticker;
  getUserProfilePhotos: GetUserProfilePhotos;
  getChat: GetChat;
  getChatAdministrators: GetChatAdministrators;
  getChatMembersCount: GetChatMembersCount;
  getChatMember: GetChatMember;
  editMessageText: EditMessageText;
  editMessageCaption: EditMessageCaption;
  editMessageReplyMarkup: EditMessageReplyMarkup;
  deleteMessage: DeleteMessage;
  answerInlineQuery: AnswerInlineQuery;
}

export type MethodWithParams = keyof MethodParams;

const METHOD_PARAMS: { readonly [M in MethodWithParams]: FieldType<MethodParams[M]> } = {
  getUpdates: t.ref("GetUpdates"),
  setWebhook: t.ref("SetWebhook"),
  sendMessage: t.ref("SendMessage"),
  forwardMessage: t.ref("ForwardMessage"),
  sendPhoto: t.ref("SendPhoto"),
  sendDocument: t.ref("SendDocument"),
  sendSticker: t.ref("SendSticker"),
  getUserProfilePhotos: t.ref("GetUserProfilePhotos"),
  getChat: t.ref("GetChat"),
  getChatAdministrators: t.ref("GetChatAdministrators"),
  getChatMembersCount: t.ref("GetChatMembersCount"),
  getChatMember: t.ref("GetChatMember"),
  editMessageText: t.ref("EditMessageText"),
  editMessageCaption: t.ref("EditMessageCaption"),
  editMessageReplyMarkup: t.ref("EditMessageReplyMarkup"),
  deleteMessage: t.ref("DeleteMessage"),
  answerInlineQuery: t.ref("AnswerInlineQuery"),
};

export const METHODS_WITH_PARAMS = Object.freeze(Object.keys(METHOD_PARAMS).filter(hasMethodParams));

export function hasMethodParams(name: string): name is MethodWithParams {
  return Object.hasOwn(METHOD_PARAMS, name);
}

export function methodParamsType<M extends MethodWithParams>(method: M): FieldType<MethodParams[M]> {
  return METHOD_PARAMS[method];
}

/**
 * Request body for a method call, ready for JSON serialization with
 * `stringifyDocument`.
 * @throws DecodeError when `params` does not match the schema
 */
export function encodeMethodParams<M extends MethodWithParams>(method: M, params: MethodParams[M]): DocumentValue {
  return telegramRegistry.encodeAs(params, methodParamsType(method));
}

/** Decode a recorded request body, e.g. a webhook reply. */
export function decodeMethodParams<M extends MethodWithParams>(
  method: M,
  document: unknown,
  options?: DecodeOptions,
): DecodeResult<MethodParams[M]> {
  return telegramRegistry.decodeAs(document, methodParamsType(method), options);
}

const UPDATE_KIND_TYPES: { readonly [K in Exclude<Update["kind"], "UnknownUpdate">]: UpdateType } = {
  MessageUpdate: "message",
  EditedMessageUpdate: "edited_message",
  ChannelPostUpdate: "channel_post",
  EditedChannelPostUpdate: "edited_channel_post",
  InlineQueryUpdate: "inline_query",
  ChosenInlineResultUpdate: "chosen_inline_result",
  CallbackQueryUpdate: "callback_query",
  ShippingQueryUpdate: "shipping_query",
  PreCheckoutQueryUpdate: "pre_checkout_query",
  PollUpdate: "poll",
  PollAnswerUpdate: "poll_answer",
  MyChatMemberUpdate: "my_chat_member",
  ChatMemberUpdate: "chat_member",
  ChatJoinRequestUpdate: "chat_join_request",
};

/** The update kind of a decoded Update, or undefined for kinds this schema does not model. */
export function updateTypeOf(update: Update): UpdateType | undefined {
  return update.kind === "UnknownUpdate" ? undefined : UPDATE_KIND_TYPES[update.kind];
}
