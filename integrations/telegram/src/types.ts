// Subset of the Bot API objects the bot reads or writes.
// https://core.telegram.org/bots/api#available-types

export type TelegramUser = {
  id: number;
  is_bot?: boolean;
  first_name?: string;
  username?: string;
};

export type TelegramChat = {
  id: number;
  type?: string;
};

export type PhotoSize = {
  file_id: string;
  file_unique_id?: string;
  width?: number;
  height?: number;
  file_size?: number;
};

export type TelegramMessage = {
  message_id: number;
  date?: number;
  chat: TelegramChat;
  from?: TelegramUser;
  text?: string;
  caption?: string;
  photo?: PhotoSize[];
};

export type CallbackQuery = {
  id: string;
  from: TelegramUser;
  message?: TelegramMessage;
  data?: string;
};

export type Update = {
  update_id: number;
  message?: TelegramMessage;
  callback_query?: CallbackQuery;
};

export type InlineKeyboardButton = {
  text: string;
  callback_data: string;
};

export type InlineKeyboardMarkup = {
  inline_keyboard: InlineKeyboardButton[][];
};

export type ReplyKeyboardMarkup = {
  keyboard: { text: string }[][];
  resize_keyboard?: boolean;
};

export type ReplyKeyboardRemove = {
  remove_keyboard: true;
};

export type ReplyMarkup = InlineKeyboardMarkup | ReplyKeyboardMarkup | ReplyKeyboardRemove;

export type SendMessageOptions = {
  reply_markup?: ReplyMarkup;
};

export type SendDocumentInput = {
  fileName: string;
  content: Buffer;
  contentType?: string;
  caption?: string;
};
