/**
 * Telegram Bot API types.
 *
 * Field names follow the wire format. Variant groups are tagged unions of
 * `{ kind, value }`; the tag is assigned by shape resolution at decode time
 * and never appears on the wire.
 */

import type { OpenEnum } from "../schema/fields.js";
import type { Variant } from "../shared/types.js";

/** Telegram User object. Ids can exceed 32 bits, hence bigint. */
export interface User {
  id: bigint;
  is_bot: boolean;
  first_name: string;
  last_name?: string;
  username?: string;
  language_code?: string;
}

export interface ChatPhoto {
  small_file_id: string;
  big_file_id: string;
}

export interface PrivateChat {
  id: bigint;
  type: "private";
  username?: string;
  first_name: string;
  last_name?: string;
  photo?: ChatPhoto;
}

export interface GroupChat {
  id: bigint;
  type: "group";
  title: string;
  /** True if the group has 'All Members Are Admins' enabled. */
  all_members_are_administrators?: boolean;
  photo?: ChatPhoto;
}

export interface SupergroupChat {
  id: bigint;
  type: "supergroup";
  title: string;
  username?: string;
  /** Returned only in getChat. */
  pinned_message?: Message;
  sticker_set_name?: string;
  can_set_sticker_set?: boolean;
  invite_link?: string;
  description?: string;
  photo?: ChatPhoto;
}

export interface ChannelChat {
  id: bigint;
  type: "channel";
  title: string;
  username?: string;
  pinned_message?: Message;
  invite_link?: string;
  description?: string;
  photo?: ChatPhoto;
}

export type Chat =
  | Variant<"PrivateChat", PrivateChat>
  | Variant<"GroupChat", GroupChat>
  | Variant<"SupergroupChat", SupergroupChat>
  | Variant<"ChannelChat", ChannelChat>;

export const MESSAGE_ENTITY_KINDS = [
  "mention",
  "hashtag",
  "cashtag",
  "bot_command",
  "url",
  "email",
  "phone_number",
  "bold",
  "italic",
  "underline",
  "strikethrough",
  "code",
  "pre",
  "text_link",
  "text_mention",
] as const;

export type MessageEntityKind = (typeof MESSAGE_ENTITY_KINDS)[number];

/** Offsets and lengths are in UTF-16 code units. */
export interface MessageEntity {
  type: OpenEnum<MessageEntityKind>;
  offset: number;
  length: number;
  /** For "text_link" only. */
  url?: string;
  /** For "text_mention" only. */
  user?: User;
  /** For "pre" only. */
  language?: string;
}

export interface PhotoSize {
  file_id: string;
  file_unique_id?: string;
  width: number;
  height: number;
  file_size?: number;
}

export interface Audio {
  file_id: string;
  duration: number;
  performer?: string;
  title?: string;
  mime_type?: string;
  file_size?: number;
  thumb?: PhotoSize;
}

export interface Document {
  file_id: string;
  thumb?: PhotoSize;
  file_name?: string;
  mime_type?: string;
  file_size?: number;
}

export interface Video {
  file_id: string;
  width: number;
  height: number;
  duration: number;
  thumb?: PhotoSize;
  mime_type?: string;
  file_size?: number;
}

export interface Animation {
  file_id: string;
  width: number;
  height: number;
  duration: number;
  thumb?: PhotoSize;
  file_name?: string;
  mime_type?: string;
  file_size?: number;
}

export interface Voice {
  file_id: string;
  duration: number;
  mime_type?: string;
  file_size?: number;
}

export interface VideoNote {
  file_id: string;
  /** Diameter of the video message. */
  length: number;
  duration: number;
  thumb?: PhotoSize;
  file_size?: number;
}

export interface Contact {
  phone_number: string;
  first_name: string;
  last_name?: string;
  user_id?: bigint;
  vcard?: string;
}

export interface Location {
  longitude: number;
  latitude: number;
}

export interface Venue {
  location: Location;
  title: string;
  address: string;
  foursquare_id?: string;
  foursquare_type?: string;
}

export interface PollOption {
  text: string;
  voter_count: number;
}

export interface Poll {
  id: string;
  question: string;
  options: readonly PollOption[];
  total_voter_count: number;
  is_closed: boolean;
  is_anonymous: boolean;
  type: "regular" | "quiz";
  allows_multiple_answers: boolean;
  correct_option_id?: number;
}

export interface PollAnswer {
  poll_id: string;
  user: User;
  option_ids: readonly number[];
}

export interface File {
  file_id: string;
  file_size?: number;
  /** Use https://api.telegram.org/file/bot<token>/<file_path> to fetch. */
  file_path?: string;
}

export interface UserProfilePhotos {
  total_count: number;
  /** Up to four sizes per photo. */
  photos: readonly (readonly PhotoSize[])[];
}

export interface MaskPosition {
  point: "forehead" | "eyes" | "mouth" | "chin";
  x_shift: number;
  y_shift: number;
  scale: number;
}

export interface Sticker {
  file_id: string;
  width: number;
  height: number;
  is_animated?: boolean;
  thumb?: PhotoSize;
  emoji?: string;
  set_name?: string;
  mask_position?: MaskPosition;
  file_size?: number;
}

export interface StickerSet {
  name: string;
  title: string;
  contains_masks: boolean;
  stickers: readonly Sticker[];
}

export interface KeyboardButton {
  text: string;
  request_contact?: boolean;
  request_location?: boolean;
}

export interface ReplyKeyboardMarkup {
  keyboard: readonly (readonly KeyboardButton[])[];
  resize_keyboard?: boolean;
  one_time_keyboard?: boolean;
  selective?: boolean;
}

export interface ReplyKeyboardRemove {
  remove_keyboard: boolean;
  selective?: boolean;
}

export interface ForceReply {
  force_reply: boolean;
  selective?: boolean;
}

export interface LoginUrl {
  url: string;
  forward_text?: string;
  bot_username?: string;
  request_write_access?: boolean;
}

/** Placeholder, currently holds no information. */
export type CallbackGame = Record<never, never>;

export interface UrlButton {
  text: string;
  url: string;
}

export interface CallbackDataButton {
  text: string;
  /** 1-64 bytes. */
  callback_data: string;
}

export interface SwitchInlineQueryButton {
  text: string;
  switch_inline_query: string;
}

export interface SwitchInlineQueryCurrentChatButton {
  text: string;
  switch_inline_query_current_chat: string;
}

export interface PayButton {
  text: string;
  pay: boolean;
}

export interface CallbackGameButton {
  text: string;
  callback_game: CallbackGame;
}

export interface LoginUrlButton {
  text: string;
  login_url: LoginUrl;
}

/** Exactly one action field may be set on a button. */
export type InlineKeyboardButton =
  | Variant<"UrlButton", UrlButton>
  | Variant<"CallbackDataButton", CallbackDataButton>
  | Variant<"SwitchInlineQueryButton", SwitchInlineQueryButton>
  | Variant<"SwitchInlineQueryCurrentChatButton", SwitchInlineQueryCurrentChatButton>
  | Variant<"PayButton", PayButton>
  | Variant<"CallbackGameButton", CallbackGameButton>
  | Variant<"LoginUrlButton", LoginUrlButton>;

export interface InlineKeyboardMarkup {
  inline_keyboard: readonly (readonly InlineKeyboardButton[])[];
}

export type ReplyMarkup =
  | Variant<"InlineKeyboardMarkup", InlineKeyboardMarkup>
  | Variant<"ReplyKeyboardMarkup", ReplyKeyboardMarkup>
  | Variant<"ReplyKeyboardRemove", ReplyKeyboardRemove>
  | Variant<"ForceReply", ForceReply>;

/** Telegram Message object. */
export interface Message {
  message_id: bigint;
  /** Empty for messages sent to channels. */
  from?: User;
  sender_chat?: Chat;
  date: number;
  chat: Chat;
  forward_from?: User;
  forward_from_chat?: Chat;
  forward_from_message_id?: bigint;
  forward_signature?: string;
  forward_sender_name?: string;
  forward_date?: number;
  /** Will not contain further reply_to_message fields even if it is itself a reply. */
  reply_to_message?: Message;
  edit_date?: number;
  media_group_id?: string;
  author_signature?: string;
  text?: string;
  entities?: readonly MessageEntity[];
  caption_entities?: readonly MessageEntity[];
  audio?: Audio;
  document?: Document;
  animation?: Animation;
  photo?: readonly PhotoSize[];
  sticker?: Sticker;
  video?: Video;
  video_note?: VideoNote;
  voice?: Voice;
  caption?: string;
  contact?: Contact;
  location?: Location;
  venue?: Venue;
  poll?: Poll;
  new_chat_members?: readonly User[];
  left_chat_member?: User;
  new_chat_title?: string;
  new_chat_photo?: readonly PhotoSize[];
  delete_chat_photo?: boolean;
  group_chat_created?: boolean;
  supergroup_chat_created?: boolean;
  channel_chat_created?: boolean;
  migrate_to_chat_id?: bigint;
  migrate_from_chat_id?: bigint;
  pinned_message?: Message;
  connected_website?: string;
  reply_markup?: InlineKeyboardMarkup;
}

export interface MessageId {
  message_id: bigint;
}

export interface CallbackQuery {
  id: string;
  from: User;
  message?: Message;
  inline_message_id?: string;
  chat_instance: string;
  data?: string;
  game_short_name?: string;
}

export interface InlineQuery {
  id: string;
  from: User;
  location?: Location;
  /** Up to 512 characters. */
  query: string;
  offset: string;
}

export interface ChosenInlineResult {
  result_id: string;
  from: User;
  location?: Location;
  inline_message_id?: string;
  query: string;
}

export const PARSE_MODES = ["Markdown", "MarkdownV2", "HTML"] as const;

export type ParseMode = (typeof PARSE_MODES)[number];

export interface InputTextMessageContent {
  message_text: string;
  parse_mode?: ParseMode;
  disable_web_page_preview?: boolean;
}

export interface InputLocationMessageContent {
  latitude: number;
  longitude: number;
  /** Seconds the live location stays updatable, 60-86400. */
  live_period?: number;
}

export interface InputVenueMessageContent {
  latitude: number;
  longitude: number;
  title: string;
  address: string;
  foursquare_id?: string;
  foursquare_type?: string;
}

export interface InputContactMessageContent {
  phone_number: string;
  first_name: string;
  last_name?: string;
  vcard?: string;
}

export type InputMessageContent =
  | Variant<"InputTextMessageContent", InputTextMessageContent>
  | Variant<"InputLocationMessageContent", InputLocationMessageContent>
  | Variant<"InputVenueMessageContent", InputVenueMessageContent>
  | Variant<"InputContactMessageContent", InputContactMessageContent>;

export interface ChatMemberOwner {
  status: "creator";
  user: User;
  is_anonymous?: boolean;
  custom_title?: string;
}

export interface ChatMemberAdministrator {
  status: "administrator";
  user: User;
  can_be_edited?: boolean;
  can_change_info?: boolean;
  can_post_messages?: boolean;
  can_edit_messages?: boolean;
  can_delete_messages?: boolean;
  can_invite_users?: boolean;
  can_restrict_members?: boolean;
  can_pin_messages?: boolean;
  can_promote_members?: boolean;
  custom_title?: string;
}

export interface ChatMemberMember {
  status: "member";
  user: User;
  until_date?: number;
}

export interface ChatMemberRestricted {
  status: "restricted";
  user: User;
  until_date?: number;
  is_member?: boolean;
  can_send_messages?: boolean;
  can_send_media_messages?: boolean;
  can_send_other_messages?: boolean;
  can_add_web_page_previews?: boolean;
}

export interface ChatMemberLeft {
  status: "left";
  user: User;
}

export interface ChatMemberBanned {
  status: "kicked";
  user: User;
  until_date?: number;
}

export type ChatMember =
  | Variant<"ChatMemberOwner", ChatMemberOwner>
  | Variant<"ChatMemberAdministrator", ChatMemberAdministrator>
  | Variant<"ChatMemberMember", ChatMemberMember>
  | Variant<"ChatMemberRestricted", ChatMemberRestricted>
  | Variant<"ChatMemberLeft", ChatMemberLeft>
  | Variant<"ChatMemberBanned", ChatMemberBanned>;

export interface ChatInviteLink {
  invite_link: string;
  creator: User;
  is_primary: boolean;
  is_revoked: boolean;
  expire_date?: number;
  member_limit?: number;
}

export interface ChatMemberUpdated {
  chat: Chat;
  from: User;
  date: number;
  old_chat_member: ChatMember;
  new_chat_member: ChatMember;
  invite_link?: ChatInviteLink;
}

export interface ChatJoinRequest {
  chat: Chat;
  from: User;
  date: number;
  bio?: string;
  invite_link?: ChatInviteLink;
}

export interface ShippingAddress {
  country_code: string;
  state: string;
  city: string;
  street_line1: string;
  street_line2: string;
  post_code: string;
}

export interface ShippingQuery {
  id: string;
  from: User;
  invoice_payload: string;
  shipping_address: ShippingAddress;
}

export interface OrderInfo {
  name?: string;
  phone_number?: string;
  email?: string;
  shipping_address?: ShippingAddress;
}

export interface PreCheckoutQuery {
  id: string;
  from: User;
  /** Three-letter ISO 4217 currency code. */
  currency: string;
  /** In the smallest units of the currency. */
  total_amount: number;
  invoice_payload: string;
  shipping_option_id?: string;
  order_info?: OrderInfo;
}

export interface WebhookInfo {
  url: string;
  has_custom_certificate: boolean;
  pending_update_count: number;
  ip_address?: string;
  last_error_date?: number;
  last_error_message?: string;
  max_connections?: number;
  allowed_updates?: readonly string[];
}

export interface ResponseParameters {
  /** The group has been migrated to a supergroup with this id. */
  migrate_to_chat_id?: bigint;
  /** Seconds left to wait before the request can be repeated. */
  retry_after?: number;
}

/** Body of an `ok: false` response. */
export interface ApiFailureBody {
  ok: boolean;
  error_code: number;
  description: string;
  parameters?: ResponseParameters;
}

export interface MessageUpdate {
  update_id: bigint;
  message: Message;
}

export interface EditedMessageUpdate {
  update_id: bigint;
  edited_message: Message;
}

export interface ChannelPostUpdate {
  update_id: bigint;
  channel_post: Message;
}

export interface EditedChannelPostUpdate {
  update_id: bigint;
  edited_channel_post: Message;
}

export interface InlineQueryUpdate {
  update_id: bigint;
  inline_query: InlineQuery;
}

export interface ChosenInlineResultUpdate {
  update_id: bigint;
  chosen_inline_result: ChosenInlineResult;
}

export interface CallbackQueryUpdate {
  update_id: bigint;
  callback_query: CallbackQuery;
}

export interface ShippingQueryUpdate {
  update_id: bigint;
  shipping_query: ShippingQuery;
}

export interface PreCheckoutQueryUpdate {
  update_id: bigint;
  pre_checkout_query: PreCheckoutQuery;
}

export interface PollUpdate {
  update_id: bigint;
  poll: Poll;
}

export interface PollAnswerUpdate {
  update_id: bigint;
  poll_answer: PollAnswer;
}

export interface MyChatMemberUpdate {
  update_id: bigint;
  my_chat_member: ChatMemberUpdated;
}

export interface ChatMemberUpdate {
  update_id: bigint;
  chat_member: ChatMemberUpdated;
}

export interface ChatJoinRequestUpdate {
  update_id: bigint;
  chat_join_request: ChatJoinRequest;
}

/** An update of a kind this schema does not model yet; its payload lands in unknownFields. */
export interface UnknownUpdate {
  update_id: bigint;
}

/** At most one payload field is present in any given update. */
export type Update =
  | Variant<"MessageUpdate", MessageUpdate>
  | Variant<"EditedMessageUpdate", EditedMessageUpdate>
  | Variant<"ChannelPostUpdate", ChannelPostUpdate>
  | Variant<"EditedChannelPostUpdate", EditedChannelPostUpdate>
  | Variant<"InlineQueryUpdate", InlineQueryUpdate>
  | Variant<"ChosenInlineResultUpdate", ChosenInlineResultUpdate>
  | Variant<"CallbackQueryUpdate", CallbackQueryUpdate>
  | Variant<"ShippingQueryUpdate", ShippingQueryUpdate>
  | Variant<"PreCheckoutQueryUpdate", PreCheckoutQueryUpdate>
  | Variant<"PollUpdate", PollUpdate>
  | Variant<"PollAnswerUpdate", PollAnswerUpdate>
  | Variant<"MyChatMemberUpdate", MyChatMemberUpdate>
  | Variant<"ChatMemberUpdate", ChatMemberUpdate>
  | Variant<"ChatJoinRequestUpdate", ChatJoinRequestUpdate>
  | Variant<"UnknownUpdate", UnknownUpdate>;

/**
 * Update kinds, as accepted by `allowed_updates`. Each names the payload
 * field of the matching Update member.
 */
export const UPDATE_TYPES = [
  "message",
  "edited_message",
  "channel_post",
  "edited_channel_post",
  "inline_query",
  "chosen_inline_result",
  "callback_query",
  "shipping_query",
  "pre_checkout_query",
  "poll",
  "poll_answer",
  "my_chat_member",
  "chat_member",
  "chat_join_request",
] as const;

export type UpdateType = (typeof UPDATE_TYPES)[number];

// ---------------------------------------------------------------------------
// Request parameters
// ---------------------------------------------------------------------------

/** A chat id, or the `@username` of a public channel or supergroup. */
export type ChatTarget = bigint | string;

/** A file_id already on Telegram's servers, or an HTTP URL to fetch. */
export type InputFile = string;

export interface GetUpdates {
  /** First update to return; earlier ones are confirmed and dropped. */
  offset?: bigint;
  limit?: number;
  /** Long polling timeout in seconds. */
  timeout?: number;
  allowed_updates?: readonly UpdateType[];
}

export interface SetWebhook {
  url: string;
  max_connections?: number;
  allowed_updates?: readonly UpdateType[];
}

export interface SendMessage {
  chat_id: ChatTarget;
  text: string;
  parse_mode?: ParseMode;
  disable_web_page_preview?: boolean;
  disable_notification?: boolean;
  reply_to_message_id?: bigint;
  reply_markup?: ReplyMarkup;
}

export interface ForwardMessage {
  chat_id: ChatTarget;
  from_chat_id: ChatTarget;
  message_id: bigint;
  disable_notification?: boolean;
}

export interface SendPhoto {
  chat_id: ChatTarget;
  photo: InputFile;
  caption?: string;
  parse_mode?: ParseMode;
  disable_notification?: boolean;
  reply_to_message_id?: bigint;
  reply_markup?: ReplyMarkup;
}

export interface SendDocument {
  chat_id: ChatTarget;
  document: InputFile;
  caption?: string;
  parse_mode?: ParseMode;
  disable_notification?: boolean;
  reply_to_message_id?: bigint;
  reply_markup?: ReplyMarkup;
}

/** Stickers must be .webp. */
export interface SendSticker {
  chat_id: ChatTarget;
  sticker: InputFile;
  disable_notification?: boolean;
  reply_to_message_id?: bigint;
  reply_markup?: ReplyMarkup;
}

export interface GetUserProfilePhotos {
  user_id: bigint;
  offset?: number;
  limit?: number;
}

export interface GetChat {
  chat_id: ChatTarget;
}

export interface GetChatAdministrators {
  chat_id: ChatTarget;
}

export interface GetChatMembersCount {
  chat_id: ChatTarget;
}

export interface GetChatMember {
  chat_id: ChatTarget;
  user_id: bigint;
}

/** Either chat_id and message_id, or inline_message_id, identify the message. */
export interface EditMessageText {
  chat_id?: ChatTarget;
  message_id?: bigint;
  inline_message_id?: string;
  text: string;
  parse_mode?: ParseMode;
  disable_web_page_preview?: boolean;
  reply_markup?: InlineKeyboardMarkup;
}

export interface EditMessageCaption {
  chat_id?: ChatTarget;
  message_id?: bigint;
  inline_message_id?: string;
  caption?: string;
  parse_mode?: ParseMode;
  reply_markup?: InlineKeyboardMarkup;
}

export interface EditMessageReplyMarkup {
  chat_id?: ChatTarget;
  message_id?: bigint;
  inline_message_id?: string;
  reply_markup?: InlineKeyboardMarkup;
}

export interface DeleteMessage {
  chat_id: ChatTarget;
  message_id: bigint;
}

export interface InlineQueryResultArticle {
  type: "article";
  /** 1-64 bytes, unique per answer. */
  id: string;
  title: string;
  input_message_content: InputMessageContent;
  reply_markup?: InlineKeyboardMarkup;
  url?: string;
  hide_url?: boolean;
  description?: string;
  thumb_url?: string;
  thumb_width?: number;
  thumb_height?: number;
}

/** Tagged by `type` on the wire. */
export type InlineQueryResult = Variant<"InlineQueryResultArticle", InlineQueryResultArticle>;

export interface AnswerInlineQuery {
  inline_query_id: string;
  /** At most 50 results. */
  results: readonly InlineQueryResult[];
  cache_time?: number;
  is_personal?: boolean;
  next_offset?: string;
  switch_pm_text?: string;
  switch_pm_parameter?: string;
}

/** Type name → TypeScript type, for every definition in the Telegram registry. */
export interface TelegramTypes {
  User: User;
  ChatPhoto: ChatPhoto;
  PrivateChat: PrivateChat;
  GroupChat: GroupChat;
  SupergroupChat: SupergroupChat;
  ChannelChat: ChannelChat;
  Chat: Chat;
  MessageEntity: MessageEntity;
  PhotoSize: PhotoSize;
  Audio: Audio;
  Document: Document;
  Video: Video;
  Animation: Animation;
  Voice: Voice;
  VideoNote: VideoNote;
  Contact: Contact;
  Location: Location;
  Venue: Venue;
  PollOption: PollOption;
  Poll: Poll;
  PollAnswer: PollAnswer;
  File: File;
  UserProfilePhotos: UserProfilePhotos;
  MaskPosition: MaskPosition;
  Sticker: Sticker;
  StickerSet: StickerSet;
  KeyboardButton: KeyboardButton;
  ReplyKeyboardMarkup: ReplyKeyboardMarkup;
  ReplyKeyboardRemove: ReplyKeyboardRemove;
  ForceReply: ForceReply;
  LoginUrl: LoginUrl;
  CallbackGame: CallbackGame;
  UrlButton: UrlButton;
  CallbackDataButton: CallbackDataButton;
  SwitchInlineQueryButton: SwitchInlineQueryButton;
  SwitchInlineQueryCurrentChatButton: SwitchInlineQueryCurrentChatButton;
  PayButton: PayButton;
  CallbackGameButton: CallbackGameButton;
  LoginUrlButton: LoginUrlButton;
  InlineKeyboardButton: InlineKeyboardButton;
  InlineKeyboardMarkup: InlineKeyboardMarkup;
  ReplyMarkup: ReplyMarkup;
  Message: Message;
  MessageId: MessageId;
  CallbackQuery: CallbackQuery;
  InlineQuery: InlineQuery;
  ChosenInlineResult: ChosenInlineResult;
  InputTextMessageContent: InputTextMessageContent;
  InputLocationMessageContent: InputLocationMessageContent;
  InputVenueMessageContent: InputVenueMessageContent;
  InputContactMessageContent: InputContactMessageContent;
  InputMessageContent: InputMessageContent;
  ChatMemberOwner: ChatMemberOwner;
  ChatMemberAdministrator: ChatMemberAdministrator;
  ChatMemberMember: ChatMemberMember;
  ChatMemberRestricted: ChatMemberRestricted;
  ChatMemberLeft: ChatMemberLeft;
  ChatMemberBanned: ChatMemberBanned;
  ChatMember: ChatMember;
  ChatInviteLink: ChatInviteLink;
  ChatMemberUpdated: ChatMemberUpdated;
  ChatJoinRequest: ChatJoinRequest;
  ShippingAddress: ShippingAddress;
  ShippingQuery: ShippingQuery;
  OrderInfo: OrderInfo;
  PreCheckoutQuery: PreCheckoutQuery;
  WebhookInfo: WebhookInfo;
  ResponseParameters: ResponseParameters;
  ApiFailureBody: ApiFailureBody;
  MessageUpdate: MessageUpdate;
  EditedMessageUpdate: EditedMessageUpdate;
  ChannelPostUpdate: ChannelPostUpdate;
  EditedChannelPostUpdate: EditedChannelPostUpdate;
  InlineQueryUpdate: InlineQueryUpdate;
  ChosenInlineResultUpdate: ChosenInlineResultUpdate;
  CallbackQueryUpdate: CallbackQueryUpdate;
  ShippingQueryUpdate: ShippingQueryUpdate;
  PreCheckoutQueryUpdate: PreCheckoutQueryUpdate;
  PollUpdate: PollUpdate;
  PollAnswerUpdate: PollAnswerUpdate;
  MyChatMemberUpdate: MyChatMemberUpdate;
  ChatMemberUpdate: ChatMemberUpdate;
  ChatJoinRequestUpdate: ChatJoinRequestUpdate;
  UnknownUpdate: UnknownUpdate;
  Update: Update;
  GetUpdates: GetUpdates;
  SetWebhook: SetWebhook;
  SendMessage: SendMessage;
  ForwardMessage: ForwardMessage;
  SendPhoto: SendPhoto;
  SendDocument: SendDocument;
  SendSticker: SendSticker;
  GetUserProfilePhotos: GetUserProfilePhotos;
  GetChat: GetChat;
  GetChatAdministrators: GetChatAdministrators;
  GetChatMembersCount: GetChatMembersCount;
  GetChatMember: GetChatMember;
  EditMessageText: EditMessageText;
  EditMessageCaption: EditMessageCaption;
  EditMessageReplyMarkup: EditMessageReplyMarkup;
  DeleteMessage: DeleteMessage;
  InlineQueryResultArticle: InlineQueryResultArticle;
  InlineQueryResult: InlineQueryResult;
  AnswerInlineQuery: AnswerInlineQuery;
}

/** Name of any type registered in the Telegram registry. */
export type TelegramTypeName = keyof TelegramTypes;
