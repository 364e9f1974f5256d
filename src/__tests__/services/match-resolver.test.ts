import { describe, it, expect } from 'vitest';
import { MatchResolver } from '../../services/MatchResolver.js';
import { RateLimitedError, RemoteUnavailableError } from '../../types/errors.js';
import type { CatalogEntry, TrackCandidate } from '../../types/index.js';
import { catalogEntry, catalogFixtures } from '../utils/fixtures.js';
import { InMemorySearch, hangingAnswer } from '../utils/mocks.js';

const oneMoreTime: TrackCandidate = {
  artist: 'Daft Punk',
  title: 'One More Time',
  rawSpan: 'Daft Punk - One More Time',
};

function delayed(entries: CatalogEntry[], ms: number) {
  return () => new Promise<CatalogEntry[]>((resolve) => setTimeout(() => resolve(entries), ms));
}

describe('MatchResolver', () => {
  const resolver = new MatchResolver({ confidenceThreshold: 0.6 });

  describe('select', () => {
    it('prefers the exact match over a more popular variant', () => {
      const result = resolver.select(oneMoreTime, [catalogFixtures.oneMoreTime, catalogFixtures.oneMoreTimeLive]);

      expect(result.status).toBe('matched');
      if (result.status !== 'matched') return;
      expect(result.entry.id).toBe('omt');
      expect(result.confidence).toBeCloseTo(1, 10);
    });

    it('scores the live variant below the exact title', () => {
      const result = resolver.select(oneMoreTime, [catalogFixtures.oneMoreTimeLive]);

      expect(result.status).toBe('matched');
      if (result.status !== 'matched') return;
      expect(result.confidence).toBeCloseTo(0.9, 10);
    });

    it('returns no match when every entry scores below the threshold', () => {
      const result = resolver.select(oneMoreTime, [catalogFixtures.unrelated, catalogFixtures.unrelated]);

      expect(result).toEqual({
        status: 'no_match',
        candidate: oneMoreTime,
        reason: 'low_confidence',
        bestConfidence: 0,
      });
    });

    it('applies the configured threshold', () => {
      const strict = new MatchResolver({ confidenceThreshold: 0.95 });
      const lenient = new MatchResolver({ confidenceThreshold: 0.85 });

      expect(strict.select(oneMoreTime, [catalogFixtures.oneMoreTimeLive]).status).toBe('no_match');
      expect(lenient.select(oneMoreTime, [catalogFixtures.oneMoreTimeLive]).status).toBe('matched');
    });

    it('reports no results for an empty catalog answer', () => {
      expect(resolver.select(oneMoreTime, [])).toEqual({
        status: 'no_match',
        candidate: oneMoreTime,
        reason: 'no_results',
      });
    });

    it('breaks score ties by popularity', () => {
      const quiet = catalogEntry({ id: 'quiet', title: 'One More Time', artist: 'Daft Punk', popularity: 40 });
      const loud = catalogEntry({ id: 'loud', title: 'One More Time', artist: 'Daft Punk', popularity: 70 });

      const result = resolver.select(oneMoreTime, [quiet, loud]);

      expect(result.status === 'matched' && result.entry.id).toBe('loud');
    });

    it('breaks remaining ties by catalog order', () => {
      const first = catalogEntry({ id: 'first', title: 'One More Time', artist: 'Daft Punk', popularity: 70 });
      const second = catalogEntry({ id: 'second', title: 'One More Time', artist: 'Daft Punk', popularity: 70 });

      const result = resolver.select(oneMoreTime, [first, second]);
      expect(result.status === 'matched' && result.entry.id).toBe('first');
    });

    it('is deterministic across calls', () => {
      const entries = [catalogFixtures.oneMoreTimeLive, catalogFixtures.unrelated, catalogFixtures.oneMoreTime];

      expect(resolver.select(oneMoreTime, entries)).toEqual(resolver.select(oneMoreTime, entries));
    });

    it('matches free text that names both artist and title', () => {
      const candidate: TrackCandidate = { title: 'daft punk one more time', rawSpan: 'daft punk one more time' };

      const result = resolver.select(candidate, [catalogFixtures.unrelated, catalogFixtures.oneMoreTime]);

      expect(result.status === 'matched' && result.entry.id).toBe('omt');
    });
  });

  describe('resolve', () => {
    it('queries the catalog with the candidate fields', async () => {
      const search = new InMemorySearch({ 'One More Time': [catalogFixtures.oneMoreTime] });

      const result = await resolver.resolve(oneMoreTime, search);

      expect(result.status).toBe('matched');
      expect(search.calls).toEqual([{ artist: 'Daft Punk', title: 'One More Time', featuring: undefined }]);
    });

    it('turns an unavailable catalog into no match', async () => {
      const search = new InMemorySearch({ 'One More Time': new RemoteUnavailableError('boom') });

      await expect(resolver.resolve(oneMoreTime, search)).resolves.toEqual({
        status: 'no_match',
        candidate: oneMoreTime,
        reason: 'remote_unavailable',
      });
    });

    it('treats unexpected search failures as unavailable', async () => {
      const search = new InMemorySearch({ 'One More Time': new Error('socket hang up') });

      const result = await resolver.resolve(oneMoreTime, search);

      expect(result).toMatchObject({ status: 'no_match', reason: 'remote_unavailable' });
    });

    it('propagates rate limiting as a retryable error', async () => {
      const search = new InMemorySearch({ 'One More Time': new RateLimitedError('slow down', 7) });

      const error = await resolver.resolve(oneMoreTime, search).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error).toMatchObject({ retryable: true, retryAfterSeconds: 7 });
    });

    it('stops waiting once the signal aborts', async () => {
      const search = new InMemorySearch({ 'One More Time': hangingAnswer() });
      const controller = new AbortController();

      const pending = resolver.resolve(oneMoreTime, search, controller.signal);
      controller.abort();

      await expect(pending).rejects.toHaveProperty('name', 'AbortError');
    });
  });

  describe('resolveFirst', () => {
    const aroundTheWorld: TrackCandidate = {
      artist: 'Daft Punk',
      title: 'Around the World',
      rawSpan: 'Daft Punk - Around the World',
    };
    const aroundEntry = catalogEntry({ id: 'atw', title: 'Around the World', artist: 'Daft Punk' });

    it('returns null without candidates', async () => {
      await expect(resolver.resolveFirst([], new InMemorySearch())).resolves.toBeNull();
    });

    it('skips candidates without a match', async () => {
      const search = new InMemorySearch({ 'Around the World': [aroundEntry] });

      const result = await resolver.resolveFirst([oneMoreTime, aroundTheWorld], search);

      expect(result?.status === 'matched' && result.entry.id).toBe('atw');
      expect(search.calls).toHaveLength(2);
    });

    it('uses candidate order rather than completion order', async () => {
      const search = new InMemorySearch({
        'One More Time': delayed([catalogFixtures.oneMoreTime], 20),
        'Around the World': [aroundEntry],
      });

      const result = await resolver.resolveFirst([oneMoreTime, aroundTheWorld], search);

      expect(result?.status === 'matched' && result.entry.id).toBe('omt');
    });

    it('returns the first miss when nothing matches', async () => {
      const search = new InMemorySearch({ 'One More Time': [catalogFixtures.unrelated] });

      const result = await resolver.resolveFirst([oneMoreTime, aroundTheWorld], search);

      expect(result).toMatchObject({ status: 'no_match', reason: 'low_confidence', candidate: oneMoreTime });
    });

    it('aborts queries that are no longer needed', async () => {
      let laterSignal: AbortSignal | undefined;
      const search = new InMemorySearch({
        'One More Time': [catalogFixtures.oneMoreTime],
        'Around the World': (_query, signal) => {
          laterSignal = signal;
          return hangingAnswer()(_query, signal);
        },
      });

      const result = await resolver.resolveFirst([oneMoreTime, aroundTheWorld], search);

      expect(result?.status).toBe('matched');
      expect(laterSignal?.aborted).toBe(true);
    });

    it('rethrows rate limiting hit before any match', async () => {
      const search = new InMemorySearch({ 'One More Time': new RateLimitedError('slow down') });

      await expect(resolver.resolveFirst([oneMoreTime, aroundTheWorld], search)).rejects.toBeInstanceOf(
        RateLimitedError
      );
    });

    it('ignores rate limiting on candidates after the match', async () => {
      const search = new InMemorySearch({
        'One More Time': [catalogFixtures.oneMoreTime],
        'Around the World': new RateLimitedError('slow down'),
      });

      const result = await resolver.resolveFirst([oneMoreTime, aroundTheWorld], search);

      expect(result?.status).toBe('matched');
    });

    it('cancels everything when the caller aborts', async () => {
      const search = new InMemorySearch({
        'One More Time': hangingAnswer(),
        'Around the World': hangingAnswer(),
      });
      const controller = new AbortController();

      const pending = resolver.resolveFirst([oneMoreTime, aroundTheWorld], search, controller.signal);
      controller.abort();

      await expect(pending).rejects.toHaveProperty('name', 'AbortError');
    });
  });
});
