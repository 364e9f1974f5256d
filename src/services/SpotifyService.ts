import { setTimeout as sleep } from 'node:timers/promises';
import SpotifyWebApi from 'spotify-web-api-node';
import Bottleneck from 'bottleneck';
import { RateLimitedError, RemoteUnavailableError, ConfigurationError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import { raceAbort } from '../utils/abort.js';
import { buildTrackLink } from '../utils/reply.js';
import type {
  CatalogEntry,
  RateLimitConfig,
  SearchCapability,
  SearchQuery,
  SpotifyConfig,
  SpotifyTrack,
} from '../types/index.js';

const TOKEN_EXPIRY_MARGIN_SECONDS = 60;

/**
 * The slice of spotify-web-api-node this service talks to.
 */
export interface SpotifyApiClient {
  clientCredentialsGrant(): Promise<{ body: { access_token: string; expires_in: number } }>;
  setAccessToken(accessToken: string): void;
  searchTracks(
    query: string,
    options?: { limit?: number; offset?: number; market?: string }
  ): Promise<{ body: { tracks?: { items: SpotifyTrack[] } } }>;
}

interface ApiFailure {
  statusCode?: number;
  code?: string;
  headers?: Record<string, string | undefined>;
  message?: string;
}

function asApiFailure(error: unknown): ApiFailure {
  if (!error || typeof error !== 'object') return {};
  const failure: ApiFailure = {};
  if ('statusCode' in error && typeof error.statusCode === 'number') failure.statusCode = error.statusCode;
  if ('code' in error && typeof error.code === 'string') failure.code = error.code;
  if ('message' in error && typeof error.message === 'string') failure.message = error.message;
  if ('headers' in error && error.headers && typeof error.headers === 'object') {
    failure.headers = Object.fromEntries(
      Object.entries(error.headers).map(([key, value]) => [
        key.toLowerCase(),
        typeof value === 'string' ? value : undefined,
      ])
    );
  }
  return failure;
}

function quote(value: string): string {
  return `"${value.replace(/"/g, '')}"`;
}

export function buildSearchQuery(query: SearchQuery): string {
  if (query.artist) {
    return `track:${quote(query.title)} artist:${quote(query.artist)}`;
  }
  return query.featuring ? `${query.title} ${query.featuring}` : query.title;
}

/**
 * Spotify track search authenticated with the client-credentials flow.
 */
export class SpotifyService implements SearchCapability {
  private api: SpotifyApiClient;
  private limiter: Bottleneck;
  private lastRefresh = 0;
  private expiresIn = 0;
  private tokenRequest: Promise<void> | null = null;

  constructor(
    private readonly config: SpotifyConfig,
    rateLimit: RateLimitConfig,
    api?: SpotifyApiClient
  ) {
    if (!api && (!config.clientId || !config.clientSecret)) {
      throw new ConfigurationError('Spotify client credentials are required to search the catalog');
    }

    this.api =
      api ??
      new SpotifyWebApi({
        clientId: config.clientId,
        clientSecret: config.clientSecret,
      });
    this.limiter = new Bottleneck(rateLimit);
  }

  async query(query: SearchQuery, signal?: AbortSignal): Promise<CatalogEntry[]> {
    signal?.throwIfAborted();
    await raceAbort(this.ensureAccessToken(), signal);

    let tracks = await this.search(buildSearchQuery(query), signal);

    // Fielded queries are strict; retry loosely before giving up
    if (!tracks.length && query.artist) {
      tracks = await this.search(`${query.artist} ${query.title}`, signal);
    }

    Logger.debug('Spotify search completed', { title: query.title, results: tracks.length });
    return tracks.map((track) => this.convertSpotifyTrack(track));
  }

  private async ensureAccessToken(): Promise<void> {
    const now = Math.floor(Date.now() / 1000);
    if (now - this.lastRefresh < this.expiresIn - TOKEN_EXPIRY_MARGIN_SECONDS) {
      return;
    }

    // Concurrent candidate queries share one grant
    if (!this.tokenRequest) {
      this.tokenRequest = this.requestToken().finally(() => {
        this.tokenRequest = null;
      });
    }
    return this.tokenRequest;
  }

  private async requestToken(): Promise<void> {
    try {
      const data = await this.limiter.schedule(() => this.api.clientCredentialsGrant());
      this.api.setAccessToken(data.body.access_token);
      this.lastRefresh = Math.floor(Date.now() / 1000);
      this.expiresIn = data.body.expires_in || 3600;
      Logger.debug('Spotify access token refreshed successfully');
    } catch (error) {
      const failure = asApiFailure(error);
      if (failure.statusCode === 429) {
        throw this.rateLimited(failure, 'token request');
      }
      throw new RemoteUnavailableError(
        `Failed to obtain access token: ${failure.message ?? 'Unknown error'}`,
        { statusCode: failure.statusCode }
      );
    }
  }

  private async search(q: string, signal?: AbortSignal): Promise<SpotifyTrack[]> {
    const response = await this.withRetry(
      () =>
        this.limiter.schedule(() =>
          this.api.searchTracks(q, {
            limit: this.config.searchLimit,
            ...(this.config.market ? { market: this.config.market } : {}),
          })
        ),
      signal
    );
    return response.body.tracks?.items ?? [];
  }

  private async withRetry<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const maxRetries = this.config.maxRetries;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      signal?.throwIfAborted();

      try {
        return await raceAbort(operation(), signal);
      } catch (error) {
        if (signal?.aborted) throw error;
        const failure = asApiFailure(error);

        if (failure.statusCode === 429) {
          throw this.rateLimited(failure, 'search');
        }

        const isRetryable = this.isRetryableError(failure);
        if (attempt === maxRetries - 1 || !isRetryable) {
          throw new RemoteUnavailableError(failure.message ?? 'Unknown error', {
            attempt,
            isRetryable,
            statusCode: failure.statusCode,
          });
        }

        Logger.debug('Retrying Spotify request', { attempt, statusCode: failure.statusCode });
        await sleep(this.config.retryDelayMs * Math.pow(2, attempt), undefined, { signal });
      }
    }

    throw new RemoteUnavailableError('Maximum retries exceeded');
  }

  private isRetryableError(failure: ApiFailure): boolean {
    return (
      failure.code === 'ECONNRESET' ||
      failure.code === 'ETIMEDOUT' ||
      failure.statusCode === 502 ||
      failure.statusCode === 503 ||
      failure.statusCode === 504
    );
  }

  private rateLimited(failure: ApiFailure, operation: string): RateLimitedError {
    const header = failure.headers?.['retry-after'];
    const retryAfter = header !== undefined ? parseInt(header, 10) : NaN;
    return new RateLimitedError(
      `Spotify throttled the ${operation}`,
      Number.isFinite(retryAfter) ? retryAfter : undefined
    );
  }

  private convertSpotifyTrack(track: SpotifyTrack): CatalogEntry {
    const artists = track.artists.map((artist) => artist.name);
    return {
      id: track.id,
      title: track.name,
      artist: artists.join(', '),
      artists,
      album: track.album.name,
      url: buildTrackLink({ id: track.id, url: track.external_urls.spotify }),
      popularity: track.popularity,
      durationMs: track.duration_ms,
      uri: track.uri,
    };
  }
}
