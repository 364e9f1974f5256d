import { Logger } from '../utils/logger.js';
import { ErrorHandler } from '../utils/errorHandler.js';
import { SongMatcher } from '../utils/matching.js';
import { RateLimitedError, RemoteUnavailableError } from '../types/errors.js';
import type {
  CatalogEntry,
  MatchingConfig,
  MatchResult,
  SearchCapability,
  TrackCandidate,
} from '../types/index.js';

type Settled = { ok: true; value: MatchResult } | { ok: false; error: unknown };

/**
 * Picks the single best catalog entry for a candidate.
 *
 * Scoring is deterministic: highest confidence wins, then higher popularity, then
 * whichever entry the catalog listed first. Retries are left to whoever provides the
 * search capability.
 */
export class MatchResolver {
  constructor(private readonly config: Pick<MatchingConfig, 'confidenceThreshold'>) {}

  select(candidate: TrackCandidate, entries: readonly CatalogEntry[]): MatchResult {
    let best: { entry: CatalogEntry; confidence: number } | null = null;

    for (const entry of entries) {
      const confidence = SongMatcher.computeConfidence(candidate, entry);
      if (
        best === null ||
        confidence > best.confidence ||
        (confidence === best.confidence && entry.popularity > best.entry.popularity)
      ) {
        best = { entry, confidence };
      }
    }

    if (best === null) {
      return { status: 'no_match', candidate, reason: 'no_results' };
    }

    if (best.confidence < this.config.confidenceThreshold) {
      return {
        status: 'no_match',
        candidate,
        reason: 'low_confidence',
        bestConfidence: best.confidence,
      };
    }

    return { status: 'matched', candidate, entry: best.entry, confidence: best.confidence };
  }

  async resolve(
    candidate: TrackCandidate,
    search: SearchCapability,
    signal?: AbortSignal
  ): Promise<MatchResult> {
    let entries: CatalogEntry[];

    try {
      entries = await search.query(
        { artist: candidate.artist, title: candidate.title, featuring: candidate.featuring },
        signal
      );
    } catch (error) {
      if (error instanceof RateLimitedError || ErrorHandler.isAbort(error)) {
        throw error;
      }

      const unavailable =
        error instanceof RemoteUnavailableError
          ? error
          : new RemoteUnavailableError('Catalog search failed unexpectedly', {
              cause: ErrorHandler.describe(error),
            });

      Logger.warn('Catalog search unavailable, treating as no match', {
        title: candidate.title,
        artist: candidate.artist,
        ...ErrorHandler.describe(unavailable),
      });
      return { status: 'no_match', candidate, reason: 'remote_unavailable' };
    }

    const result = this.select(candidate, entries);

    if (result.status === 'no_match' && result.reason === 'low_confidence') {
      Logger.info('Best catalog entry below confidence threshold', {
        title: candidate.title,
        artist: candidate.artist,
        bestConfidence: result.bestConfidence,
        threshold: this.config.confidenceThreshold,
      });
    } else {
      Logger.debug('Candidate resolved', {
        title: candidate.title,
        status: result.status,
        results: entries.length,
      });
    }

    return result;
  }

  /**
   * Resolves every candidate concurrently and returns the first match in candidate order.
   * Queries still in flight once the answer is known are aborted.
   */
  async resolveFirst(
    candidates: readonly TrackCandidate[],
    search: SearchCapability,
    signal?: AbortSignal
  ): Promise<MatchResult | null> {
    if (candidates.length === 0) return null;

    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) onAbort();
    else signal?.addEventListener('abort', onAbort, { once: true });

    const pending: Array<Promise<Settled>> = candidates.map((candidate) =>
      this.resolve(candidate, search, controller.signal).then(
        (value): Settled => ({ ok: true, value }),
        (error: unknown): Settled => ({ ok: false, error })
      )
    );

    try {
      let firstMiss: MatchResult | null = null;

      for (const next of pending) {
        const settled = await next;
        if (!settled.ok) throw settled.error;
        if (settled.value.status === 'matched') return settled.value;
        if (!firstMiss) firstMiss = settled.value;
      }

      return firstMiss;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      controller.abort();
    }
  }
}
