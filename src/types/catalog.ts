export interface CatalogArtistRef {
  id: string;
  name: string;
}

export interface CatalogTrack {
  id: string;
  name: string;
  artists: CatalogArtistRef[];
}

export const AUDIO_FEATURE_FIELDS = [
  'danceability',
  'energy',
  'key',
  'loudness',
  'mode',
  'speechiness',
  'acousticness',
  'instrumentalness',
  'liveness',
  'valence',
  'tempo',
  'duration_ms',
  'time_signature',
] as const;

export type AudioFeatureField = (typeof AUDIO_FEATURE_FIELDS)[number];

export type AudioFeatures = Record<AudioFeatureField, number>;

export interface CatalogArtist {
  id: string;
  popularity: number;
  genres: string[];
}

export interface ArtistInfo {
  artistId: string;
  popularity: number;
  genres: string[];
}

export interface TrackMetadata {
  trackId: string;
  features: AudioFeatures | null;
  artist: ArtistInfo | null;
}

export interface MetadataOptions {
  audioFeatures: boolean;
  artistInfo: boolean;
}

/**
 * The catalog endpoints the pipeline depends on. Batch methods return one
 * entry per requested id, in request order, with null for ids the catalog
 * could not resolve.
 */
export interface CatalogClient {
  searchTracks(query: string, market: string): Promise<CatalogTrack[]>;
  getAudioFeatures(ids: string[]): Promise<Array<AudioFeatures | null>>;
  getTracks(ids: string[]): Promise<Array<CatalogTrack | null>>;
  getArtists(ids: string[]): Promise<Array<CatalogArtist | null>>;
}
