export interface RawMessage {
  messageId: number;
  chatId?: string;
  sender?: string;
  timestamp?: number;
  text: string;
  hasCaption: boolean;
  isChannelPost: boolean;
}

export interface TrackCandidate {
  artist?: string;
  title: string;
  featuring?: string;
  /** Line of the message the candidate was read from. */
  rawSpan: string;
}

export interface CatalogEntry {
  id: string;
  title: string;
  /** Display credit, every artist joined with ", ". */
  artist: string;
  artists: string[];
  album?: string;
  url: string;
  popularity: number;
  durationMs: number;
  uri?: string;
}

export interface SearchQuery {
  artist?: string;
  title: string;
  featuring?: string;
}

export interface SearchCapability {
  query(query: SearchQuery, signal?: AbortSignal): Promise<CatalogEntry[]>;
}

export type NoMatchReason = 'no_results' | 'low_confidence' | 'remote_unavailable';

export type MatchResult =
  | {
      status: 'matched';
      candidate: TrackCandidate;
      entry: CatalogEntry;
      confidence: number;
    }
  | {
      status: 'no_match';
      candidate: TrackCandidate;
      reason: NoMatchReason;
      bestConfidence?: number;
    };

export interface SpotifyTrack {
  id: string;
  name: string;
  uri: string;
  popularity: number;
  artists: Array<{
    id: string;
    name: string;
  }>;
  album: {
    id: string;
    name: string;
  };
  duration_ms: number;
  external_urls: {
    spotify: string;
  };
}

export type RelayOutcome =
  | { status: 'ignored'; reason: string }
  | { status: 'no_candidates'; messageId: number }
  | { status: 'no_match'; messageId: number; result: MatchResult; replied: boolean }
  | { status: 'replied'; messageId: number; result: MatchResult; delivery: 'caption' | 'message' | 'none' };
