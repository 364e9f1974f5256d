// Test fixtures - catalog entries and Telegram payloads

import type { CatalogEntry, SpotifyTrack, TelegramUpdate } from '../../types/index.js';

export function catalogEntry(overrides: Partial<CatalogEntry> & Pick<CatalogEntry, 'title' | 'artist'>): CatalogEntry {
  const id = overrides.id ?? overrides.title.toLowerCase().replace(/[^a-z0-9]+/g, '');
  return {
    id,
    artists: overrides.artist.split(', '),
    url: `https://open.spotify.com/track/${id}`,
    popularity: 50,
    durationMs: 180000,
    ...overrides,
  };
}

export const catalogFixtures = {
  oneMoreTime: catalogEntry({
    id: 'omt',
    title: 'One More Time',
    artist: 'Daft Punk',
    popularity: 80,
  }),
  oneMoreTimeLive: catalogEntry({
    id: 'omtlive',
    title: 'One More Time (Live)',
    artist: 'Daft Punk',
    popularity: 90,
  }),
  unrelated: catalogEntry({
    id: 'zzz',
    title: 'Quizzical Boxy Jigs',
    artist: 'Vex Wyld',
    popularity: 99,
  }),
};

export function spotifyTrack(overrides: Partial<SpotifyTrack> & Pick<SpotifyTrack, 'id' | 'name'>): SpotifyTrack {
  return {
    uri: `spotify:track:${overrides.id}`,
    popularity: 60,
    artists: [{ id: 'artist-1', name: 'Daft Punk' }],
    album: { id: 'album-1', name: 'Discovery' },
    duration_ms: 320000,
    external_urls: { spotify: `https://open.spotify.com/track/${overrides.id}` },
    ...overrides,
  };
}

export const telegramFixtures = {
  channelPostWithCaption: {
    update_id: 123,
    channel_post: {
      message_id: 456,
      caption: 'Daft Punk - One More Time',
      chat: { id: -1001234567890, title: 'Music is life', type: 'channel' },
    },
  } satisfies TelegramUpdate,
  privateText: {
    update_id: 124,
    message: {
      message_id: 42,
      text: 'Daft Punk - One More Time',
      chat: { id: 1001, type: 'private' },
    },
  } satisfies TelegramUpdate,
  blankText: {
    update_id: 125,
    message: {
      message_id: 3,
      text: '   ',
      chat: { id: 2, type: 'private' },
    },
  } satisfies TelegramUpdate,
  noMessage: { update_id: 126 } satisfies TelegramUpdate,
};
