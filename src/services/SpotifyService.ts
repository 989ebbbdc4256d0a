import SpotifyWebApi from 'spotify-web-api-node';
import Bottleneck from 'bottleneck';
import { config } from '../config/index.js';
import { AuthenticationError, ConfigurationError, TransientApiError } from '../types/errors.js';
import { classifySpotifyError } from '../utils/spotifyErrors.js';
import { Logger } from '../utils/logger.js';
import type {
  CatalogArtist,
  AudioFeatures,
  CatalogClient,
  CatalogTrack,
} from '../types/index.js';

/**
 * Catalog client backed by the Spotify Web API using the client credentials
 * flow. Every request goes through one Bottleneck limiter and a timeout;
 * failures are rethrown as AppErrors so callers can apply the retry policy.
 */
export class SpotifyService implements CatalogClient {
  private api: SpotifyWebApi;
  private limiter: Bottleneck;
  private lastRefresh = 0;
  private expiresIn = 0;

  constructor() {
    if (!config.spotify.clientId || !config.spotify.clientSecret) {
      throw new ConfigurationError('Spotify client id and secret are required');
    }

    this.api = new SpotifyWebApi({
      clientId: config.spotify.clientId,
      clientSecret: config.spotify.clientSecret,
    });

    this.limiter = new Bottleneck(config.rateLimit.spotify);
  }

  private async ensureAccessToken(force = false): Promise<void> {
    const now = Math.floor(Date.now() / 1000);

    if (!force && now - this.lastRefresh < this.expiresIn - 60) {
      return;
    }

    try {
      const data = await this.limiter.schedule(() =>
        this.withTimeout(this.api.clientCredentialsGrant(), 'clientCredentialsGrant')
      );
      this.api.setAccessToken(data.body.access_token);
      this.lastRefresh = now;
      this.expiresIn = data.body.expires_in || 3600;
      Logger.debug('Spotify access token refreshed successfully');
    } catch (error) {
      const classified = classifySpotifyError(error, 'clientCredentialsGrant');
      // The token endpoint answers 400 invalid_client for bad credentials.
      if (classified.statusCode === 400 || classified.statusCode === 401) {
        throw new AuthenticationError('Spotify rejected the client credentials', {
          cause: classified.message,
        });
      }
      throw classified;
    }
  }

  private withTimeout<T>(promise: Promise<T>, operation: string): Promise<T> {
    const timeoutMs = config.spotify.requestTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new TransientApiError(`${operation} timed out after ${timeoutMs}ms`, { operation })),
        timeoutMs
      );
    });

    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
  }

  private async send<T>(operation: string, request: () => Promise<{ body: T }>): Promise<T> {
    try {
      const response = await this.limiter.schedule(() => this.withTimeout(request(), operation));
      return response.body;
    } catch (error) {
      throw classifySpotifyError(error, operation);
    }
  }

  private async call<T>(operation: string, request: () => Promise<{ body: T }>): Promise<T> {
    await this.ensureAccessToken();

    try {
      return await this.send(operation, request);
    } catch (error) {
      if (!(error instanceof AuthenticationError)) {
        throw error;
      }

      // Token expired or was revoked mid-run: fetch a new one once.
      Logger.info('Spotify token rejected, re-authenticating', { operation });
      await this.ensureAccessToken(true);
      return this.send(operation, request);
    }
  }

  async searchTracks(query: string, market: string): Promise<CatalogTrack[]> {
    const body = await this.call('searchTracks', () =>
      this.api.searchTracks(query, { market, limit: 1 })
    );

    return (body.tracks?.items ?? []).map((track) => this.convertSpotifyTrack(track));
  }

  async getAudioFeatures(ids: string[]): Promise<Array<AudioFeatures | null>> {
    const body = await this.call('getAudioFeaturesForTracks', () =>
      this.api.getAudioFeaturesForTracks(ids)
    );

    return body.audio_features.map((features: SpotifyApi.AudioFeaturesObject | null) =>
      features ? this.convertAudioFeatures(features) : null
    );
  }

  async getTracks(ids: string[]): Promise<Array<CatalogTrack | null>> {
    const body = await this.call('getTracks', () => this.api.getTracks(ids));

    return body.tracks.map((track: SpotifyApi.TrackObjectFull | null) =>
      track ? this.convertSpotifyTrack(track) : null
    );
  }

  async getArtists(ids: string[]): Promise<Array<CatalogArtist | null>> {
    const body = await this.call('getArtists', () => this.api.getArtists(ids));

    return body.artists.map((artist: SpotifyApi.ArtistObjectFull | null) =>
      artist
        ? { id: artist.id, popularity: artist.popularity, genres: [...artist.genres] }
        : null
    );
  }

  private convertSpotifyTrack(track: SpotifyApi.TrackObjectFull): CatalogTrack {
    return {
      id: track.id,
      name: track.name,
      artists: track.artists.map((artist) => ({
        id: artist.id,
        name: artist.name,
      })),
    };
  }

  private convertAudioFeatures(features: SpotifyApi.AudioFeaturesObject): AudioFeatures {
    return {
      danceability: features.danceability,
      energy: features.energy,
      key: features.key,
      loudness: features.loudness,
      mode: features.mode,
      speechiness: features.speechiness,
      acousticness: features.acousticness,
      instrumentalness: features.instrumentalness,
      liveness: features.liveness,
      valence: features.valence,
      tempo: features.tempo,
      duration_ms: features.duration_ms,
      time_signature: features.time_signature,
    };
  }
}
