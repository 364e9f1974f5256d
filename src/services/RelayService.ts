import { Logger } from '../utils/logger.js';
import { ErrorHandler } from '../utils/errorHandler.js';
import { MatchValidator } from '../utils/matching.js';
import { buildCaptionWithLink, buildTrackLink, formatReply } from '../utils/reply.js';
import type { CandidateExtractor } from './CandidateExtractor.js';
import type { MatchResolver } from './MatchResolver.js';
import type { ReplyChannel } from './TelegramService.js';
import type {
  MatchingConfig,
  MatchResult,
  RawMessage,
  RelayOutcome,
  SearchCapability,
  TelegramMessage,
  TelegramUpdate,
  TrackCandidate,
} from '../types/index.js';

export interface RelayDependencies {
  extractor: CandidateExtractor;
  resolver: MatchResolver;
  search: SearchCapability | null;
  replies: ReplyChannel | null;
  matching: Pick<MatchingConfig, 'replyOnNoMatch' | 'notFoundMessage'>;
}

type MatchedResult = Extract<MatchResult, { status: 'matched' }>;

export function extractRelevantMessage(
  update: TelegramUpdate
): { message: TelegramMessage; isChannelPost: boolean } | null {
  if (update.channel_post) return { message: update.channel_post, isChannelPost: true };
  if (update.message) return { message: update.message, isChannelPost: false };
  return null;
}

/**
 * Best text to read a track from: caption, then text, then audio metadata.
 */
export function getMessageText(message: TelegramMessage): string | null {
  if (message.caption) return message.caption;
  if (message.text) return message.text;

  const audio = message.audio;
  if (!audio) return null;

  if (audio.performer && audio.title) return `${audio.performer} - ${audio.title}`;
  if (audio.title) return audio.title;
  if (audio.file_name) {
    const stem = audio.file_name.replace(/\.[^./\\]+$/, '').replace(/_/g, ' ').trim();
    return stem || null;
  }
  return null;
}

export function toRawMessage(update: TelegramUpdate): RawMessage | null {
  const source = extractRelevantMessage(update);
  if (!source) return null;

  const text = getMessageText(source.message);
  if (!text) return null;

  const { message } = source;
  return {
    messageId: message.message_id,
    chatId: message.chat ? String(message.chat.id) : undefined,
    sender: message.from?.username ?? message.chat?.username ?? message.chat?.title,
    timestamp: message.date,
    text,
    hasCaption: Boolean(message.caption),
    isChannelPost: source.isChannelPost,
  };
}

/**
 * One webhook update in, at most one reply out. Holds no state between updates.
 */
export class RelayService {
  constructor(private readonly deps: RelayDependencies) {}

  async handleUpdate(update: TelegramUpdate, signal?: AbortSignal): Promise<RelayOutcome> {
    const raw = toRawMessage(update);
    if (!raw) {
      Logger.debug('Update carries no usable message text', { updateId: update.update_id });
      return { status: 'ignored', reason: 'no_message_text' };
    }

    Logger.debug('Received Telegram update', {
      updateId: update.update_id,
      messageId: raw.messageId,
      sender: raw.sender,
    });

    const candidates = this.deps.extractor.extract(raw.text);
    if (candidates.length === 0) {
      Logger.info('No track candidate could be built from the message', { messageId: raw.messageId });
      return { status: 'no_candidates', messageId: raw.messageId };
    }
    this.logCandidates(raw, candidates);

    const { search } = this.deps;
    if (!search) {
      Logger.warn('Spotify search unavailable; skipping lookup', { messageId: raw.messageId });
      return { status: 'ignored', reason: 'search_unavailable' };
    }

    const result = await this.deps.resolver.resolveFirst(candidates, search, signal);
    if (!result) {
      return { status: 'no_candidates', messageId: raw.messageId };
    }

    if (result.status === 'matched') {
      Logger.info(
        `🎯 Spotify match found: ${result.entry.artist} - ${result.entry.title} (${buildTrackLink(result.entry) || '<no url>'})`,
        { detail: MatchValidator.explainMatch(result.candidate, result.entry, result.confidence) }
      );
      const delivery = await this.deliverMatch(raw, result);
      return { status: 'replied', messageId: raw.messageId, result, delivery };
    }

    Logger.info(`No confident match for: ${result.candidate.title}`, {
      messageId: raw.messageId,
      reason: result.reason,
      bestConfidence: result.bestConfidence,
    });
    const replied = await this.deliverNotFound(raw, result);
    return { status: 'no_match', messageId: raw.messageId, result, replied };
  }

  private logCandidates(raw: RawMessage, candidates: TrackCandidate[]): void {
    for (const candidate of candidates) {
      Logger.info(`Track candidate: ${candidate.artist ?? '<unknown artist>'} - ${candidate.title}`, {
        messageId: raw.messageId,
        featuring: candidate.featuring,
      });
    }
  }

  private async deliverMatch(raw: RawMessage, result: MatchedResult): Promise<'caption' | 'message' | 'none'> {
    const { replies } = this.deps;
    if (!replies) {
      Logger.warn('Telegram client unavailable; reply not delivered', { messageId: raw.messageId });
      return 'none';
    }

    try {
      if (raw.isChannelPost && raw.hasCaption) {
        const caption = buildCaptionWithLink(raw.text, result.entry);
        if (caption === null) {
          Logger.warn('Matched track has no link to post', { trackId: result.entry.id });
          return 'none';
        }
        if (caption === raw.text) {
          Logger.info('Caption already contains the Spotify link', { messageId: raw.messageId });
          return 'none';
        }

        await replies.editMessageCaption({ messageId: raw.messageId, caption, chatId: raw.chatId });
        Logger.info('Updated Telegram caption with Spotify link', { messageId: raw.messageId });
        return 'caption';
      }

      const text = formatReply(result, this.deps.matching);
      if (!text) {
        Logger.warn('Matched track has no link to post', { trackId: result.entry.id });
        return 'none';
      }

      await replies.sendMessage(text, { chatId: raw.chatId, replyToMessageId: raw.messageId });
      Logger.info('Replied with Spotify link', { messageId: raw.messageId });
      return 'message';
    } catch (error) {
      Logger.error('Failed to deliver Telegram reply', {
        messageId: raw.messageId,
        ...ErrorHandler.describe(error),
      });
      return 'none';
    }
  }

  private async deliverNotFound(raw: RawMessage, result: MatchResult): Promise<boolean> {
    const text = formatReply(result, this.deps.matching);
    const { replies } = this.deps;
    if (!text || !replies) return false;

    try {
      await replies.sendMessage(text, { chatId: raw.chatId, replyToMessageId: raw.messageId });
      return true;
    } catch (error) {
      Logger.error('Failed to deliver not-found reply', {
        messageId: raw.messageId,
        ...ErrorHandler.describe(error),
      });
      return false;
    }
  }
}
