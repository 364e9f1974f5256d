import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TelegramService } from '../../services/TelegramService.js';
import { ConfigurationError, TelegramAPIError, ValidationError } from '../../types/errors.js';
import { jsonResponse } from '../utils/mocks.js';

describe('TelegramService', () => {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ ok: true, result: {} }));
  const service = new TelegramService({ botToken: 'test-token', channelId: '-100777' });

  function lastRequest(): { url: string; body: unknown } {
    const call = fetchMock.mock.calls.at(-1);
    if (!call) throw new Error('fetch was not called');
    const [url, init] = call;
    return { url, body: JSON.parse(String(init?.body)) };
  }

  beforeEach(() => {
    fetchMock.mockClear();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('requires a bot token', () => {
    expect(() => new TelegramService({})).toThrow(ConfigurationError);
  });

  describe('sendMessage', () => {
    it('replies to the source message', async () => {
      await service.sendMessage('🎧 Spotify: https://open.spotify.com/track/omt', {
        chatId: '1001',
        replyToMessageId: 42,
      });

      expect(lastRequest()).toEqual({
        url: 'https://api.telegram.org/bottest-token/sendMessage',
        body: {
          chat_id: '1001',
          text: '🎧 Spotify: https://open.spotify.com/track/omt',
          disable_web_page_preview: false,
          reply_parameters: { message_id: 42, allow_sending_without_reply: true },
        },
      });
    });

    it('falls back to the configured channel', async () => {
      await service.sendMessage('hello');

      expect(lastRequest().body).toEqual({
        chat_id: '-100777',
        text: 'hello',
        disable_web_page_preview: false,
      });
    });

    it('rejects empty text without calling the API', async () => {
      await expect(service.sendMessage('   ')).rejects.toBeInstanceOf(ValidationError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('needs a chat to send to', async () => {
      const withoutChannel = new TelegramService({ botToken: 'test-token' });

      await expect(withoutChannel.sendMessage('hello')).rejects.toThrow(
        'Validation Error: A chat_id is required to send a message'
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('returns the API envelope', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true, result: { message_id: 7 } }));

      await expect(service.sendMessage('hello')).resolves.toEqual({ ok: true, result: { message_id: 7 } });
    });
  });

  describe('editMessageCaption', () => {
    it('sends the trimmed caption for the message', async () => {
      await service.editMessageCaption({ messageId: 456, caption: '  Daft Punk - One More Time\n', chatId: '-1001' });

      expect(lastRequest()).toEqual({
        url: 'https://api.telegram.org/bottest-token/editMessageCaption',
        body: { chat_id: '-1001', message_id: 456, caption: 'Daft Punk - One More Time' },
      });
    });

    it('rejects a blank caption', async () => {
      await expect(service.editMessageCaption({ messageId: 1, caption: '\n' })).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });

  describe('API failures', () => {
    it('reports non-200 responses', async () => {
      fetchMock.mockResolvedValueOnce(new Response('oops', { status: 500 }));

      await expect(service.sendMessage('hello')).rejects.toThrow(
        'Telegram API Error: sendMessage request failed: status=500, body=oops'
      );
    });

    it('reports bodies that are not JSON', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

      await expect(service.sendMessage('hello')).rejects.toThrow(
        'Telegram API Error: sendMessage response was not valid JSON'
      );
    });

    it('reports an unexpected envelope', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ result: 1 }));

      await expect(service.sendMessage('hello')).rejects.toThrow(
        'Telegram API Error: sendMessage response had unexpected structure'
      );
    });

    it('surfaces the description of a refused call', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ ok: false, description: 'Bad Request: message is not modified' })
      );

      const error = await service
        .editMessageCaption({ messageId: 456, caption: 'same' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TelegramAPIError);
      expect(error).toHaveProperty(
        'message',
        'Telegram API Error: editMessageCaption failed: Bad Request: message is not modified'
      );
    });
  });
});
