import { z } from 'zod';

export const TelegramChatSchema = z.object({
  id: z.number().int(),
  title: z.string().optional(),
  username: z.string().optional(),
  type: z.string().optional(),
});

export const TelegramUserSchema = z.object({
  id: z.number().int(),
  username: z.string().optional(),
  first_name: z.string().optional(),
});

export const TelegramAudioSchema = z.object({
  performer: z.string().optional(),
  title: z.string().optional(),
  file_name: z.string().optional(),
});

export const TelegramMessageSchema = z.object({
  message_id: z.number().int(),
  text: z.string().optional(),
  caption: z.string().optional(),
  date: z.number().int().optional(),
  chat: TelegramChatSchema.optional(),
  from: TelegramUserSchema.optional(),
  audio: TelegramAudioSchema.optional(),
});

export const TelegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: TelegramMessageSchema.optional(),
  channel_post: TelegramMessageSchema.optional(),
});

// Envelope returned by every Bot API method.
export const TelegramApiResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  result: z.unknown().optional(),
});

export type TelegramChat = z.infer<typeof TelegramChatSchema>;
export type TelegramAudio = z.infer<typeof TelegramAudioSchema>;
export type TelegramMessage = z.infer<typeof TelegramMessageSchema>;
export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;
export type TelegramApiResponse = z.infer<typeof TelegramApiResponseSchema>;
