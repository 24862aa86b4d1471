/**
 * Telegram Bot API registry.
 *
 * Each `.entity()` call is checked against the matching interface in
 * ./types.ts, so a field added there without a definition here (or with the
 * wrong width or optionality) fails to compile.
 */

import { fieldTypes, optional, required } from "../schema/fields.js";
import { RegistryBuilder } from "../schema/registry.js";
import { MESSAGE_ENTITY_KINDS, PARSE_MODES, UPDATE_TYPES, type TelegramTypes } from "./types.js";

const t = fieldTypes<TelegramTypes>();

const chatPhoto = optional(t.ref("ChatPhoto"));
const thumb = optional(t.ref("PhotoSize"));
const fileSize = optional(t.int32());
const mimeType = optional(t.string());
const user = required(t.ref("User"));
const chat = required(t.ref("Chat"));
const text = required(t.string());
const updateId = required(t.int64());
const parseMode = optional(t.enumOf(PARSE_MODES));
const allowedUpdates = optional(t.array(t.enumOf(UPDATE_TYPES)));
const chatTarget = t.oneOf(t.int64(), t.string());
const chatId = required(chatTarget);
const replyToMessageId = optional(t.int64());
const replyMarkup = optional(t.ref("ReplyMarkup"));
const inlineMarkup = optional(t.ref("InlineKeyboardMarkup"));
const silent = optional(t.boolean());

export const telegramRegistry = new RegistryBuilder<TelegramTypes>()
  .entity("User", {
    id: required(t.int64()),
    is_bot: required(t.boolean()),
    first_name: required(t.string()),
    last_name: optional(t.string()),
    username: optional(t.string()),
    language_code: optional(t.string()),
  })
  .entity("ChatPhoto", {
    small_file_id: required(t.string()),
    big_file_id: required(t.string()),
  })

  // Chats are told apart by their `type` literal.
  .entity("PrivateChat", {
    id: required(t.int64()),
    type: required(t.literal("private")),
    username: optional(t.string()),
    first_name: required(t.string()),
    last_name: optional(t.string()),
    photo: chatPhoto,
  })
  .entity("GroupChat", {
    id: required(t.int64()),
    type: required(t.literal("group")),
    title: required(t.string()),
    all_members_are_administrators: optional(t.boolean()),
    photo: chatPhoto,
  })
  .entity("SupergroupChat", {
    id: required(t.int64()),
    type: required(t.literal("supergroup")),
    title: required(t.string()),
    username: optional(t.string()),
    pinned_message: optional(t.ref("Message")),
    sticker_set_name: optional(t.string()),
    can_set_sticker_set: optional(t.boolean()),
    invite_link: optional(t.string()),
    description: optional(t.string()),
    photo: chatPhoto,
  })
  .entity("ChannelChat", {
    id: required(t.int64()),
    type: required(t.literal("channel")),
    title: required(t.string()),
    username: optional(t.string()),
    pinned_message: optional(t.ref("Message")),
    invite_link: optional(t.string()),
    description: optional(t.string()),
    photo: chatPhoto,
  })
  .variant("Chat", ["PrivateChat", "GroupChat", "SupergroupChat", "ChannelChat"])

  .entity("MessageEntity", {
    type: required(t.openEnum(MESSAGE_ENTITY_KINDS)),
    offset: required(t.int32()),
    length: required(t.int32()),
    url: optional(t.string()),
    user: optional(t.ref("User")),
    language: optional(t.string()),
  })

  .entity("PhotoSize", {
    file_id: required(t.string()),
    file_unique_id: optional(t.string()),
    width: required(t.int32()),
    height: required(t.int32()),
    file_size: fileSize,
  })
  .entity("Audio", {
    file_id: required(t.string()),
    duration: required(t.int32()),
    performer: optional(t.string()),
    title: optional(t.string()),
    mime_type: mimeType,
    file_size: fileSize,
    thumb,
  })
  .entity("Document", {
    file_id: required(t.string()),
    thumb,
    file_name: optional(t.string()),
    mime_type: mimeType,
    file_size: fileSize,
  })
  .entity("Video", {
    file_id: required(t.string()),
    width: required(t.int32()),
    height: required(t.int32()),
    duration: required(t.int32()),
    thumb,
    mime_type: mimeType,
    file_size: fileSize,
  })
  .entity("Animation", {
    file_id: required(t.string()),
    width: required(t.int32()),
    height: required(t.int32()),
    duration: required(t.int32()),
    thumb,
    file_name: optional(t.string()),
    mime_type: mimeType,
    file_size: fileSize,
  })
  .entity("Voice", {
    file_id: required(t.string()),
    duration: required(t.int32()),
    mime_type: mimeType,
    file_size: fileSize,
  })
  .entity("VideoNote", {
    file_id: required(t.string()),
    length: required(t.int32()),
    duration: required(t.int32()),
    thumb,
    file_size: fileSize,
  })
  .entity("Contact", {
    phone_number: required(t.string()),
    first_name: required(t.string()),
    last_name: optional(t.string()),
    user_id: optional(t.int64()),
    vcard: optional(t.string()),
  })
  .entity("Location", {
    longitude: required(t.float()),
    latitude: required(t.float()),
  })
  .entity("Venue", {
    location: required(t.ref("Location")),
    title: required(t.string()),
    address: required(t.string()),
    foursquare_id: optional(t.string()),
    foursquare_type: optional(t.string()),
  })
  .entity("PollOption", {
    text: required(t.string()),
    voter_count: required(t.int32()),
  })
  .entity("Poll", {
    id: required(t.string()),
    question: required(t.string()),
    options: required(t.array(t.ref("PollOption"))),
    total_voter_count: required(t.int32()),
    is_closed: required(t.boolean()),
    is_anonymous: required(t.boolean()),
    type: required(t.enumOf(["regular", "quiz"])),
    allows_multiple_answers: required(t.boolean()),
    correct_option_id: optional(t.int32()),
  })
  .entity("PollAnswer", {
    poll_id: required(t.string()),
    user,
    option_ids: required(t.array(t.int32())),
  })
  .entity("File", {
    file_id: required(t.string()),
    file_size: fileSize,
    file_path: optional(t.string()),
  })
  .entity("UserProfilePhotos", {
    total_count: required(t.int32()),
    photos: required(t.array(t.array(t.ref("PhotoSize")))),
  })
  .entity("MaskPosition", {
    point: required(t.enumOf(["forehead", "eyes", "mouth", "chin"])),
    x_shift: required(t.float()),
    y_shift: required(t.float()),
    scale: required(t.float()),
  })
  .entity("Sticker", {
    file_id: required(t.string()),
    width: required(t.int32()),
    height: required(t.int32()),
    is_animated: optional(t.boolean()),
    thumb,
    emoji: optional(t.string()),
    set_name: optional(t.string()),
    mask_position: optional(t.ref("MaskPosition")),
    file_size: fileSize,
  })
  .entity("StickerSet", {
    name: required(t.string()),
    title: required(t.string()),
    contains_masks: required(t.boolean()),
    stickers: required(t.array(t.ref("Sticker"))),
  })

  // Keyboards
  .entity("KeyboardButton", {
    text,
    request_contact: optional(t.boolean()),
    request_location: optional(t.boolean()),
  })
  .entity("ReplyKeyboardMarkup", {
    keyboard: required(t.array(t.array(t.ref("KeyboardButton")))),
    resize_keyboard: optional(t.boolean()),
    one_time_keyboard: optional(t.boolean()),
    selective: optional(t.boolean()),
  })
  .entity("ReplyKeyboardRemove", {
    remove_keyboard: required(t.boolean()),
    selective: optional(t.boolean()),
  })
  .entity("ForceReply", {
    force_reply: required(t.boolean()),
    selective: optional(t.boolean()),
  })
  .entity("LoginUrl", {
    url: required(t.string()),
    forward_text: optional(t.string()),
    bot_username: optional(t.string()),
    request_write_access: optional(t.boolean()),
  })
  .entity("CallbackGame", {})
  .entity("UrlButton", { text, url: required(t.string()) })
  .entity("CallbackDataButton", { text, callback_data: required(t.string()) })
  .entity("SwitchInlineQueryButton", { text, switch_inline_query: required(t.string()) })
  .entity("SwitchInlineQueryCurrentChatButton", {
    text,
    switch_inline_query_current_chat: required(t.string()),
  })
  .entity("PayButton", { text, pay: required(t.boolean()) })
  .entity("CallbackGameButton", { text, callback_game: required(t.ref("CallbackGame")) })
  .entity("LoginUrlButton", { text, login_url: required(t.ref("LoginUrl")) })
  .variant("InlineKeyboardButton", [
    "UrlButton",
    "CallbackDataButton",
    "SwitchInlineQueryButton",
    "SwitchInlineQueryCurrentChatButton",
    "PayButton",
    "CallbackGameButton",
    "LoginUrlButton",
  ])
  .entity("InlineKeyboardMarkup", {
    inline_keyboard: required(t.array(t.array(t.ref("InlineKeyboardButton")))),
  })
  .variant("ReplyMarkup", ["InlineKeyboardMarkup", "ReplyKeyboardMarkup", "ReplyKeyboardRemove", "ForceReply"])

  .entity("Message", {
    message_id: required(t.int64()),
    from: optional(t.ref("User")),
    sender_chat: optional(t.ref("Chat")),
    date: required(t.time()),
    chat,
    forward_from: optional(t.ref("User")),
    forward_from_chat: optional(t.ref("Chat")),
    forward_from_message_id: optional(t.int64()),
    forward_signature: optional(t.string()),
    forward_sender_name: optional(t.string()),
    forward_date: optional(t.time()),
    reply_to_message: optional(t.ref("Message")),
    edit_date: optional(t.time()),
    media_group_id: optional(t.string()),
    author_signature: optional(t.string()),
    text: optional(t.string()),
    entities: optional(t.array(t.ref("MessageEntity"))),
    caption_entities: optional(t.array(t.ref("MessageEntity"))),
    audio: optional(t.ref("Audio")),
    document: optional(t.ref("Document")),
    animation: optional(t.ref("Animation")),
    photo: optional(t.array(t.ref("PhotoSize"))),
    sticker: optional(t.ref("Sticker")),
    video: optional(t.ref("Video")),
    video_note: optional(t.ref("VideoNote")),
    voice: optional(t.ref("Voice")),
    caption: optional(t.string()),
    contact: optional(t.ref("Contact")),
    location: optional(t.ref("Location")),
    venue: optional(t.ref("Venue")),
    poll: optional(t.ref("Poll")),
    new_chat_members: optional(t.array(t.ref("User"))),
    left_chat_member: optional(t.ref("User")),
    new_chat_title: optional(t.string()),
    new_chat_photo: optional(t.array(t.ref("PhotoSize"))),
    delete_chat_photo: optional(t.boolean()),
    group_chat_created: optional(t.boolean()),
    supergroup_chat_created: optional(t.boolean()),
    channel_chat_created: optional(t.boolean()),
    migrate_to_chat_id: optional(t.int64()),
    migrate_from_chat_id: optional(t.int64()),
    pinned_message: optional(t.ref("Message")),
    connected_website: optional(t.string()),
    reply_markup: optional(t.ref("InlineKeyboardMarkup")),
  })
  .entity("MessageId", { message_id: required(t.int64()) })

  .entity("CallbackQuery", {
    id: required(t.string()),
    from: user,
    message: optional(t.ref("Message")),
    inline_message_id: optional(t.string()),
    chat_instance: required(t.string()),
    data: optional(t.string()),
    game_short_name: optional(t.string()),
  })
  .entity("InlineQuery", {
    id: required(t.string()),
    from: user,
    location: optional(t.ref("Location")),
    query: required(t.string()),
    offset: required(t.string()),
  })
  .entity("ChosenInlineResult", {
    result_id: required(t.string()),
    from: user,
    location: optional(t.ref("Location")),
    inline_message_id: optional(t.string()),
    query: required(t.string()),
  })

  .entity("InputTextMessageContent", {
    message_text: required(t.string()),
    parse_mode: parseMode,
    disable_web_page_preview: optional(t.boolean()),
  })
  .entity("InputLocationMessageContent", {
    latitude: required(t.float()),
    longitude: required(t.float()),
    live_period: optional(t.int32()),
  })
  .entity("InputVenueMessageContent", {
    latitude: required(t.float()),
    longitude: required(t.float()),
    title: required(t.string()),
    address: required(t.string()),
    foursquare_id: optional(t.string()),
    foursquare_type: optional(t.string()),
  })
  .entity("InputContactMessageContent", {
    phone_number: required(t.string()),
    first_name: required(t.string()),
    last_name: optional(t.string()),
    vcard: optional(t.string()),
  })
  .variant("InputMessageContent", [
    "InputTextMessageContent",
    "InputLocationMessageContent",
    "InputVenueMessageContent",
    "InputContactMessageContent",
  ])

  // Chat members are told apart by their `status` literal.
  .entity("ChatMemberOwner", {
    status: required(t.literal("creator")),
    user,
    is_anonymous: optional(t.boolean()),
    custom_title: optional(t.string()),
  })
  .entity("ChatMemberAdministrator", {
    status: required(t.literal("administrator")),
    user,
    can_be_edited: optional(t.boolean()),
    can_change_info: optional(t.boolean()),
    can_post_messages: optional(t.boolean()),
    can_edit_messages: optional(t.boolean()),
    can_delete_messages: optional(t.boolean()),
    can_invite_users: optional(t.boolean()),
    can_restrict_members: optional(t.boolean()),
    can_pin_messages: optional(t.boolean()),
    can_promote_members: optional(t.boolean()),
    custom_title: optional(t.string()),
  })
  .entity("ChatMemberMember", {
    status: required(t.literal("member")),
    user,
    until_date: optional(t.time()),
  })
  .entity("ChatMemberRestricted", {
    status: required(t.literal("restricted")),
    user,
    until_date: optional(t.time()),
    is_member: optional(t.boolean()),
    can_send_messages: optional(t.boolean()),
    can_send_media_messages: optional(t.boolean()),
    can_send_other_messages: optional(t.boolean()),
    can_add_web_page_previews: optional(t.boolean()),
  })
  .entity("ChatMemberLeft", {
    status: required(t.literal("left")),
    user,
  })
  .entity("ChatMemberBanned", {
    status: required(t.literal("kicked")),
    user,
    until_date: optional(t.time()),
  })
  .variant("ChatMember", [
    "ChatMemberOwner",
    "ChatMemberAdministrator",
    "ChatMemberMember",
    "ChatMemberRestricted",
    "ChatMemberLeft",
    "ChatMemberBanned",
  ])
  .entity("ChatInviteLink", {
    invite_link: required(t.string()),
    creator: required(t.ref("User")),
    is_primary: required(t.boolean()),
    is_revoked: required(t.boolean()),
    expire_date: optional(t.time()),
    member_limit: optional(t.int32()),
  })
  .entity("ChatMemberUpdated", {
    chat,
    from: user,
    date: required(t.time()),
    old_chat_member: required(t.ref("ChatMember")),
    new_chat_member: required(t.ref("ChatMember")),
    invite_link: optional(t.ref("ChatInviteLink")),
  })
  .entity("ChatJoinRequest", {
    chat,
    from: user,
    date: required(t.time()),
    bio: optional(t.string()),
    invite_link: optional(t.ref("ChatInviteLink")),
  })

  // Payments
  .entity("ShippingAddress", {
    country_code: required(t.string()),
    state: required(t.string()),
    city: required(t.string()),
    street_line1: required(t.string()),
    street_line2: required(t.string()),
    post_code: required(t.string()),
  })
  .entity("ShippingQuery", {
    id: required(t.string()),
    from: user,
    invoice_payload: required(t.string()),
    shipping_address: required(t.ref("ShippingAddress")),
  })
  .entity("OrderInfo", {
    name: optional(t.string()),
    phone_number: optional(t.string()),
    email: optional(t.string()),
    shipping_address: optional(t.ref("ShippingAddress")),
  })
  .entity("PreCheckoutQuery", {
    id: required(t.string()),
    from: user,
    currency: required(t.string()),
    total_amount: required(t.int32()),
    invoice_payload: required(t.string()),
    shipping_option_id: optional(t.string()),
    order_info: optional(t.ref("OrderInfo")),
  })

  .entity("WebhookInfo", {
    url: required(t.string()),
    has_custom_certificate: required(t.boolean()),
    pending_update_count: required(t.int32()),
    ip_address: optional(t.string()),
    last_error_date: optional(t.time()),
    last_error_message: optional(t.string()),
    max_connections: optional(t.int32()),
    allowed_updates: optional(t.array(t.string())),
  })
  .entity("ResponseParameters", {
    migrate_to_chat_id: optional(t.int64()),
    retry_after: optional(t.int32()),
  })
  .entity("ApiFailureBody", {
    ok: required(t.boolean()),
    error_code: required(t.int32()),
    description: required(t.string()),
    parameters: optional(t.ref("ResponseParameters")),
  })

  // Updates: every member requires update_id plus its payload, so the
  // payload-less UnknownUpdate only wins when no known payload is present.
  .entity("MessageUpdate", { update_id: updateId, message: required(t.ref("Message")) })
  .entity("EditedMessageUpdate", { update_id: updateId, edited_message: required(t.ref("Message")) })
  .entity("ChannelPostUpdate", { update_id: updateId, channel_post: required(t.ref("Message")) })
  .entity("EditedChannelPostUpdate", { update_id: updateId, edited_channel_post: required(t.ref("Message")) })
  .entity("InlineQueryUpdate", { update_id: updateId, inline_query: required(t.ref("InlineQuery")) })
  .entity("ChosenInlineResultUpdate", {
    update_id: updateId,
    chosen_inline_result: required(t.ref("ChosenInlineResult")),
  })
  .entity("CallbackQueryUpdate", { update_id: updateId, callback_query: required(t.ref("CallbackQuery")) })
  .entity("ShippingQueryUpdate", { update_id: updateId, shipping_query: required(t.ref("ShippingQuery")) })
  .entity("PreCheckoutQueryUpdate", {
    update_id: updateId,
    pre_checkout_query: required(t.ref("PreCheckoutQuery")),
  })
  .entity("PollUpdate", { update_id: updateId, poll: required(t.ref("Poll")) })
  .entity("PollAnswerUpdate", { update_id: updateId, poll_answer: required(t.ref("PollAnswer")) })
  .entity("MyChatMemberUpdate", { update_id: updateId, my_chat_member: required(t.ref("ChatMemberUpdated")) })
  .entity("ChatMemberUpdate", { update_id: updateId, chat_member: required(t.ref("ChatMemberUpdated")) })
  .entity("ChatJoinRequestUpdate", {
    update_id: updateId,
    chat_join_request: required(t.ref("ChatJoinRequest")),
  })
  .entity("UnknownUpdate", { update_id: updateId })
  .variant("Update", [
    "MessageUpdate",
    "EditedMessageUpdate",
    "ChannelPostUpdate",
    "EditedChannelPostUpdate",
    "InlineQueryUpdate",
    "ChosenInlineResultUpdate",
    "CallbackQueryUpdate",
    "ShippingQueryUpdate",
    "PreCheckoutQueryUpdate",
    "PollUpdate",
    "PollAnswerUpdate",
    "MyChatMemberUpdate",
    "ChatMemberUpdate",
    "ChatJoinRequestUpdate",
    "UnknownUpdate",
  ])

  // Request parameters. Bots encode these; decoding them serves webhook
  // replies and recorded requests.
  .entity("GetUpdates", {
    offset: optional(t.int64()),
    limit: optional(t.int32()),
    timeout: optional(t.int32()),
    allowed_updates: allowedUpdates,
  })
  .entity("SetWebhook", {
    url: required(t.string()),
    max_connections: optional(t.int32()),
    allowed_updates: allowedUpdates,
  })
  .entity("SendMessage", {
    chat_id: chatId,
    text,
    parse_mode: parseMode,
    disable_web_page_preview: optional(t.boolean()),
    disable_notification: silent,
    reply_to_message_id: replyToMessageId,
    reply_markup: replyMarkup,
  })
  .entity("ForwardMessage", {
    chat_id: chatId,
    from_chat_id: chatId,
    message_id: required(t.int64()),
    disable_notification: silent,
  })
  .entity("SendPhoto", {
    chat_id: chatId,
    photo: required(t.string()),
    caption: optional(t.string()),
    parse_mode: parseMode,
    disable_notification: silent,
    reply_to_message_id: replyToMessageId,
    reply_markup: replyMarkup,
  })
  .entity("SendDocument", {
    chat_id: chatId,
    document: required(t.string()),
    caption: optional(t.string()),
    parse_mode: parseMode,
    disable_notification: silent,
    reply_to_message_id: replyToMessageId,
    reply_markup: replyMarkup,
  })
  .entity("SendSticker", {
    chat_id: chatId,
    sticker: required(t.string()),
    disable_notification: silent,
    reply_to_message_id: replyToMessageId,
    reply_markup: replyMarkup,
  })
  .entity("GetUserProfilePhotos", {
    user_id: required(t.int64()),
    offset: optional(t.int32()),
    limit: optional(t.int32()),
  })
  .entity("GetChat", { chat_id: chatId })
  .entity("GetChatAdministrators", { chat_id: chatId })
  .entity("GetChatMembersCount", { chat_id: chatId })
  .entity("GetChatMember", { chat_id: chatId, user_id: required(t.int64()) })
  .entity("EditMessageText", {
    chat_id: optional(chatTarget),
    message_id: optional(t.int64()),
    inline_message_id: optional(t.string()),
    text,
    parse_mode: parseMode,
    disable_web_page_preview: optional(t.boolean()),
    reply_markup: inlineMarkup,
  })
  .entity("EditMessageCaption", {
    chat_id: optional(chatTarget),
    message_id: optional(t.int64()),
    inline_message_id: optional(t.string()),
    caption: optional(t.string()),
    parse_mode: parseMode,
    reply_markup: inlineMarkup,
  })
  .entity("EditMessageReplyMarkup", {
    chat_id: optional(chatTarget),
    message_id: optional(t.int64()),
    inline_message_id: optional(t.string()),
    reply_markup: inlineMarkup,
  })
  .entity("DeleteMessage", { chat_id: chatId, message_id: required(t.int64()) })
  .entity("InlineQueryResultArticle", {
    type: required(t.literal("article")),
    id: required(t.string()),
    title: required(t.string()),
    input_message_content: required(t.ref("InputMessageContent")),
    reply_markup: inlineMarkup,
    url: optional(t.string()),
    hide_url: optional(t.boolean()),
    description: optional(t.string()),
    thumb_url: optional(t.string()),
    thumb_width: optional(t.int32()),
    thumb_height: optional(t.int32()),
  })
  .variant("InlineQueryResult", ["InlineQueryResultArticle"])
  .entity("AnswerInlineQuery", {
    inline_query_id: required(t.string()),
    results: required(t.array(t.ref("InlineQueryResult"))),
    cache_time: optional(t.int32()),
    is_personal: optional(t.boolean()),
    next_offset: optional(t.string()),
    switch_pm_text: optional(t.string()),
    switch_pm_parameter: optional(t.string()),
  })
  .build();

/** Field type constructors bound to the Telegram type map, for composite roots. */
export const telegramFields = t;
