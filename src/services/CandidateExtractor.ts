import type { MatchingConfig, TrackCandidate } from '../types/index.js';

// Whitespace, symbols (emoji included), dashes, quotes and sentence punctuation.
// Brackets are excluded so "(Live)" keeps its closing paren.
const EDGE_CHAR = String.raw`[\s\p{Z}\p{S}\p{Pd}\p{Pi}\p{Pf}\p{Cf}"'.,;:!?*_#@•·…\\/\uFE0F]`;
const EDGE_PATTERN = new RegExp(`^${EDGE_CHAR}+|${EDGE_CHAR}+$`, 'gu');

const DASHES = '\\-\u2010\u2011\u2012\u2013\u2014\u2015';
const SPACED_DASH = new RegExp(`\\s+[${DASHES}]+\\s+`, 'u');
const TIGHT_DASH = new RegExp(`(?<=\\S)[${DASHES}](?=\\S)`, 'u');
const BY_MARKER = /\s+by\s+/iu;
// Needs text before it: a line that opens with the marker is a title, not a credit
const FEAT_MARKER = /(?:\s[([]?|[([])(?:featuring|feat\.|ft\.)\s+(.+?)[)\]]?$/iu;
const URL_PATTERN = /https?:\/\/\S+/giu;

type Delimiter = { kind: 'dash' | 'by'; index: number; length: number };

export function trimEdges(text: string): string {
  return text.replace(EDGE_PATTERN, '');
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/gu, ' ').trim();
}

function findDelimiter(line: string): Delimiter | null {
  for (const [kind, pattern] of [
    ['dash', SPACED_DASH],
    ['dash', TIGHT_DASH],
    ['by', BY_MARKER],
  ] as const) {
    const match = pattern.exec(line);
    if (match) {
      return { kind, index: match.index, length: match[0].length };
    }
  }
  return null;
}

function splitFeaturing(segment: string): { main: string; featuring?: string } {
  const match = FEAT_MARKER.exec(segment);
  if (!match || !trimEdges(segment.slice(0, match.index))) return { main: segment };

  const featuring = trimEdges(match[1] ?? '');
  return {
    main: segment.slice(0, match.index),
    featuring: featuring || undefined,
  };
}

function joinCredits(...credits: Array<string | undefined>): string | undefined {
  const present = credits.filter((credit): credit is string => Boolean(credit));
  return present.length > 0 ? present.join(', ') : undefined;
}

/**
 * Turns chat text into ordered (artist, title) guesses.
 *
 * Lines that carry a delimiter (`Artist - Title`, `Artist-Title`, `Title by Artist`,
 * `Title ft. Guest`) each become a candidate. A message with no such line becomes one
 * candidate holding the whole text as its title.
 */
export class CandidateExtractor {
  constructor(private readonly config: Pick<MatchingConfig, 'maxCandidates'>) {}

  extract(text: string): TrackCandidate[] {
    if (!text.trim()) return [];

    const lines = text.split(/\r?\n/u).map((line) => collapseWhitespace(line.replace(URL_PATTERN, ' ')));
    const spans = lines.filter((line) => line && CandidateExtractor.hasMarker(line));

    if (spans.length === 0) {
      const rawSpan = collapseWhitespace(lines.join(' '));
      const title = trimEdges(rawSpan);
      return title ? [{ title, rawSpan }] : [];
    }

    const candidates: TrackCandidate[] = [];
    const seen = new Set<string>();

    for (const span of spans) {
      const readings = [CandidateExtractor.splitSpan(span)];
      // "Stand by Me" is as likely a title as "title by artist"
      if (findDelimiter(span)?.kind === 'by') {
        readings.push(CandidateExtractor.titleOnly(span));
      }

      for (const candidate of readings) {
        if (!candidate) continue;

        const key = `${candidate.artist?.toLowerCase() ?? ''}\u0000${candidate.title.toLowerCase()}`;
        if (seen.has(key)) continue;
        seen.add(key);

        candidates.push(candidate);
        if (candidates.length >= this.config.maxCandidates) return candidates;
      }
    }

    return candidates;
  }

  static hasMarker(line: string): boolean {
    if (findDelimiter(line) !== null) return true;
    const match = FEAT_MARKER.exec(line);
    return match !== null && trimEdges(line.slice(0, match.index)) !== '';
  }

  /**
   * The whole line as a title, keeping only a trailing featured credit.
   */
  static titleOnly(span: string): TrackCandidate | null {
    const { main, featuring } = splitFeaturing(span);
    const title = trimEdges(main);
    if (!title) return null;

    const candidate: TrackCandidate = { title, rawSpan: span };
    if (featuring) candidate.featuring = featuring;
    return candidate;
  }

  /**
   * Splits one line on its first delimiter. Returns null when no title survives trimming.
   */
  static splitSpan(span: string): TrackCandidate | null {
    const delimiter = findDelimiter(span);

    let artistPart = '';
    let titlePart = span;
    if (delimiter) {
      const before = span.slice(0, delimiter.index);
      const after = span.slice(delimiter.index + delimiter.length);
      [artistPart, titlePart] = delimiter.kind === 'dash' ? [before, after] : [after, before];
    }

    const title = splitFeaturing(titlePart);
    const artist = splitFeaturing(artistPart);

    const cleanTitle = trimEdges(title.main);
    if (!cleanTitle) return null;

    const cleanArtist = trimEdges(artist.main);
    const featuring = joinCredits(artist.featuring, title.featuring);

    const candidate: TrackCandidate = { title: cleanTitle, rawSpan: span };
    if (cleanArtist) candidate.artist = cleanArtist;
    if (featuring) candidate.featuring = featuring;
    return candidate;
  }
}
