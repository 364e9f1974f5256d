import stringSimilarity from 'string-similarity';
import type { CatalogEntry, TrackCandidate } from '../types/index.js';

const TITLE_WEIGHT = 0.6;
const ARTIST_WEIGHT = 0.4;

export class TextNormalizer {
  /**
   * Case and punctuation folding used before any comparison. Letters and digits of any
   * script survive; accents do not.
   */
  static normalize(text: string): string {
    return text
      .normalize('NFD')
      .replace(/\p{M}/gu, '')
      .toLowerCase()
      .replace(/&/g, ' and ')
      .replace(/[^\p{L}\p{N}]+/gu, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }
}

export class SongMatcher {
  /**
   * Dice coefficient over character bigrams of the normalized strings: 1 for identical
   * text, 0 when nothing is shared.
   */
  static similarity(a: string, b: string): number {
    const left = TextNormalizer.normalize(a);
    const right = TextNormalizer.normalize(b);
    if (!left || !right) return left === right ? 1 : 0;
    return stringSimilarity.compareTwoStrings(left, right);
  }

  static computeConfidence(candidate: TrackCandidate, entry: CatalogEntry): number {
    const titleScore = SongMatcher.similarity(candidate.title, entry.title);
    const credit = SongMatcher.creditOf(candidate);

    if (!credit) {
      // Free text may carry the artist inside the title, in either order
      return Math.max(
        titleScore,
        SongMatcher.similarity(candidate.title, `${entry.artist} ${entry.title}`),
        SongMatcher.similarity(candidate.title, `${entry.title} ${entry.artist}`)
      );
    }

    return TITLE_WEIGHT * titleScore + ARTIST_WEIGHT * SongMatcher.artistScore(credit, entry);
  }

  private static creditOf(candidate: TrackCandidate): string | undefined {
    if (candidate.artist && candidate.featuring) {
      return `${candidate.artist}, ${candidate.featuring}`;
    }
    return candidate.artist ?? candidate.featuring;
  }

  private static artistScore(credit: string, entry: CatalogEntry): number {
    const names = entry.artists.length > 0 ? entry.artists : [entry.artist];
    return Math.max(
      SongMatcher.similarity(credit, entry.artist),
      ...names.map((name) => SongMatcher.similarity(credit, name))
    );
  }
}

export class MatchValidator {
  static explainMatch(candidate: TrackCandidate, entry: CatalogEntry, confidence: number): string {
    const reasons: string[] = [];

    const titleSim = SongMatcher.similarity(candidate.title, entry.title);
    if (titleSim > 0.8) reasons.push('exact title match');
    else if (titleSim > 0.6) reasons.push('good title match');
    else if (titleSim > 0.3) reasons.push('partial title match');

    if (candidate.artist) {
      const artistSim = SongMatcher.similarity(candidate.artist, entry.artists[0] ?? entry.artist);
      if (artistSim > 0.8) reasons.push('exact artist match');
      else if (artistSim > 0.6) reasons.push('good artist match');
      else if (artistSim > 0.3) reasons.push('partial artist match');
    }

    const detail = reasons.length > 0 ? reasons.join(', ') : 'weak match';
    return `Confidence: ${(confidence * 100).toFixed(1)}% (${detail})`;
  }
}
