import type { CatalogEntry, MatchingConfig, MatchResult } from '../types/index.js';

export const LINK_PREFIX = '🎧 Spotify: ';
const TRACK_URL_BASE = 'https://open.spotify.com/track/';

export function buildTrackLink(entry: Pick<CatalogEntry, 'id' | 'url'>): string {
  if (entry.url) return entry.url;
  if (entry.id) return `${TRACK_URL_BASE}${entry.id}`;
  return '';
}

/**
 * Appends the track link to an existing caption. Returns null when there is no link
 * to add, and the caption untouched when it already carries the link.
 */
export function buildCaptionWithLink(
  existing: string,
  entry: Pick<CatalogEntry, 'id' | 'url'>
): string | null {
  const link = buildTrackLink(entry);
  if (!link) return null;
  if (existing.includes(link)) return existing;

  const base = existing.trimEnd();
  return base ? `${base}\n${LINK_PREFIX}${link}` : `${LINK_PREFIX}${link}`;
}

export function formatReply(
  result: MatchResult,
  config: Pick<MatchingConfig, 'replyOnNoMatch' | 'notFoundMessage'>
): string | null {
  if (result.status === 'matched') {
    const link = buildTrackLink(result.entry);
    return link ? `${LINK_PREFIX}${link}` : null;
  }
  return config.replyOnNoMatch ? config.notFoundMessage : null;
}
