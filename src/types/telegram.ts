export type {
  TelegramChat,
  TelegramAudio,
  TelegramMessage,
  TelegramUpdate,
  TelegramApiResponse,
} from '../schemas/telegram.js';
