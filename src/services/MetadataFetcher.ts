import { AuthenticationError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import { chunk, unique } from '../utils/batching.js';
import type { RetryPolicy } from '../utils/retry.js';
import type { BatchConfig } from '../types/config.js';
import type {
  ArtistInfo,
  AudioFeatures,
  CatalogClient,
  MetadataOptions,
  TrackMetadata,
} from '../types/index.js';

export interface FetchStats {
  requests: number;
  failedChunks: number;
  missingFeatures: number;
  missingArtists: number;
}

/**
 * Fetches audio features and artist details for resolved track ids in
 * batches no larger than the endpoint limits. Every requested id appears in
 * the result, with null fields where the catalog had nothing or a batch
 * failed after retries.
 */
export class MetadataFetcher {
  private stats: FetchStats = { requests: 0, failedChunks: 0, missingFeatures: 0, missingArtists: 0 };

  constructor(
    private readonly client: CatalogClient,
    private readonly retryPolicy: RetryPolicy,
    private readonly batch: BatchConfig
  ) {}

  async fetch(trackIds: readonly string[], options: MetadataOptions): Promise<Map<string, TrackMetadata>> {
    this.stats = { requests: 0, failedChunks: 0, missingFeatures: 0, missingArtists: 0 };

    const ids = unique(trackIds);
    const metadata = new Map<string, TrackMetadata>(
      ids.map((trackId) => [trackId, { trackId, features: null, artist: null }])
    );

    if (!ids.length || (!options.audioFeatures && !options.artistInfo)) {
      return metadata;
    }

    if (options.audioFeatures) {
      const features = await this.fetchAudioFeatures(ids);
      for (const [trackId, entry] of metadata) {
        entry.features = features.get(trackId) ?? null;
        if (!entry.features) this.stats.missingFeatures++;
      }
    }

    if (options.artistInfo) {
      const artists = await this.fetchArtistInfo(ids);
      for (const [trackId, entry] of metadata) {
        entry.artist = artists.get(trackId) ?? null;
        if (!entry.artist) this.stats.missingArtists++;
      }
    }

    Logger.info(`Fetched metadata for ${ids.length} tracks`, { ...this.stats });
    return metadata;
  }

  getStats(): FetchStats {
    return { ...this.stats };
  }

  /**
   * Runs one request per chunk. A chunk that still fails after retries is
   * logged and left out of the result.
   */
  private async fetchInChunks<T>(
    ids: readonly string[],
    size: number,
    label: string,
    request: (chunkIds: string[]) => Promise<Array<T | null>>
  ): Promise<Map<string, T>> {
    const results = new Map<string, T>();
    const chunks = chunk(ids, size);

    for (const [index, chunkIds] of chunks.entries()) {
      try {
        this.stats.requests++;
        const records = await this.retryPolicy.execute(() => request(chunkIds), `${label} batch ${index + 1}`);

        chunkIds.forEach((id, position) => {
          const record = records[position];
          if (record) results.set(id, record);
        });
      } catch (error) {
        if (error instanceof AuthenticationError) {
          throw error;
        }

        this.stats.failedChunks++;
        Logger.warn(`Failed to fetch ${label} batch ${index + 1}/${chunks.length}`, {
          ids: chunkIds.length,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return results;
  }

  private async fetchAudioFeatures(ids: readonly string[]): Promise<Map<string, AudioFeatures>> {
    Logger.info(`Fetching audio features for ${ids.length} tracks`);

    return this.fetchInChunks(ids, this.batch.audioFeatures, 'audio features', (chunkIds) =>
      this.client.getAudioFeatures(chunkIds)
    );
  }

  private async fetchArtistInfo(trackIds: readonly string[]): Promise<Map<string, ArtistInfo>> {
    Logger.info(`Resolving primary artists for ${trackIds.length} tracks`);

    const tracks = await this.fetchInChunks(trackIds, this.batch.tracks, 'tracks', (chunkIds) =>
      this.client.getTracks(chunkIds)
    );

    const artistByTrack = new Map<string, string>();
    for (const [trackId, track] of tracks) {
      const artistId = track.artists[0]?.id;
      if (artistId) artistByTrack.set(trackId, artistId);
    }

    const artistIds = unique(artistByTrack.values());
    Logger.info(`Fetching details for ${artistIds.length} artists`);

    const artists = await this.fetchInChunks(artistIds, this.batch.artists, 'artists', (chunkIds) =>
      this.client.getArtists(chunkIds)
    );

    const info = new Map<string, ArtistInfo>();
    for (const [trackId, artistId] of artistByTrack) {
      const artist = artists.get(artistId);
      if (artist) {
        info.set(trackId, { artistId, popularity: artist.popularity, genres: artist.genres });
      }
    }
    return info;
  }
}
