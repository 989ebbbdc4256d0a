import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SpotifyService } from '../../services/SpotifyService.js';
import { AuthenticationError, RateLimitedError, SpotifyAPIError, TransientApiError } from '../../types/errors.js';

const mockApi = vi.hoisted(() => ({
  clientCredentialsGrant: vi.fn(),
  setAccessToken: vi.fn(),
  searchTracks: vi.fn(),
  getAudioFeaturesForTracks: vi.fn(),
  getTracks: vi.fn(),
  getArtists: vi.fn(),
}));

vi.mock('spotify-web-api-node', () => ({
  default: vi.fn(function () {
    return mockApi;
  }),
}));

function webapiError(statusCode: number, headers: Record<string, string> = {}) {
  return Object.assign(new Error(`Request failed with ${statusCode}`), { statusCode, headers });
}

function searchBody(...ids: string[]) {
  return {
    body: {
      tracks: {
        items: ids.map((id) => ({ id, name: `Track ${id}`, artists: [{ id: 'a1', name: 'Artist One' }] })),
      },
    },
  };
}

describe('SpotifyService', () => {
  beforeEach(() => {
    for (const fn of Object.values(mockApi)) {
      fn.mockReset();
    }
    mockApi.clientCredentialsGrant.mockResolvedValue({
      body: { access_token: 'test-token', expires_in: 3600, token_type: 'bearer' },
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('searches with a single result in the given market', async () => {
    mockApi.searchTracks.mockResolvedValue(searchBody('t1'));
    const service = new SpotifyService();

    const tracks = await service.searchTracks('artist:A track:X', 'SE');

    expect(mockApi.setAccessToken).toHaveBeenCalledWith('test-token');
    expect(mockApi.searchTracks).toHaveBeenCalledWith('artist:A track:X', { market: 'SE', limit: 1 });
    expect(tracks).toEqual([{ id: 't1', name: 'Track t1', artists: [{ id: 'a1', name: 'Artist One' }] }]);
  });

  it('returns no candidates for an empty search', async () => {
    mockApi.searchTracks.mockResolvedValue({ body: { tracks: { items: [] } } });

    await expect(new SpotifyService().searchTracks('artist:A track:X', 'GB')).resolves.toEqual([]);
  });

  it('reuses the access token until it expires', async () => {
    mockApi.searchTracks.mockResolvedValue(searchBody('t1'));
    const service = new SpotifyService();

    await service.searchTracks('artist:A track:X', 'GB');
    await service.searchTracks('artist:B track:Y', 'GB');

    expect(mockApi.clientCredentialsGrant).toHaveBeenCalledTimes(1);
  });

  it('re-authenticates once when a request is rejected with 401', async () => {
    mockApi.searchTracks.mockRejectedValueOnce(webapiError(401)).mockResolvedValueOnce(searchBody('t1'));
    const service = new SpotifyService();

    const tracks = await service.searchTracks('artist:A track:X', 'GB');

    expect(mockApi.clientCredentialsGrant).toHaveBeenCalledTimes(2);
    expect(mockApi.searchTracks).toHaveBeenCalledTimes(2);
    expect(tracks.map((track) => track.id)).toEqual(['t1']);
  });

  it('raises an authentication error when the credentials are rejected', async () => {
    mockApi.clientCredentialsGrant.mockRejectedValue(webapiError(400));

    await expect(new SpotifyService().searchTracks('artist:A track:X', 'GB')).rejects.toBeInstanceOf(
      AuthenticationError
    );
    expect(mockApi.searchTracks).not.toHaveBeenCalled();
  });

  it('turns 429 responses into rate-limit errors with the retry-after delay', async () => {
    mockApi.searchTracks.mockRejectedValue(webapiError(429, { 'retry-after': '2' }));

    const error = await new SpotifyService().searchTracks('artist:A track:X', 'GB').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ retryAfterMs: 2000 });
  });

  it('keeps other client errors as non-retryable API errors', async () => {
    mockApi.searchTracks.mockRejectedValue(webapiError(404));

    const error = await new SpotifyService().searchTracks('artist:A track:X', 'GB').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SpotifyAPIError);
    expect(error).toMatchObject({ statusCode: 404 });
  });

  it('treats network errors without a response as transient', async () => {
    mockApi.searchTracks.mockRejectedValue(Object.assign(new Error('connect ENETUNREACH'), { code: 'ENETUNREACH' }));

    const error = await new SpotifyService().searchTracks('artist:A track:X', 'GB').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientApiError);
  });

  it('fails a request that exceeds the timeout with a transient error', async () => {
    vi.useFakeTimers();
    mockApi.searchTracks.mockReturnValue(new Promise(() => {}));
    const service = new SpotifyService();

    const pending = service.searchTracks('artist:A track:X', 'GB').catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(30_001);
    const error = await pending;

    expect(error).toBeInstanceOf(TransientApiError);
    expect(error).toMatchObject({ message: 'Transient API Error: searchTracks timed out after 30000ms' });
    expect(vi.getTimerCount()).toBe(0);
  });

  it('clears the timeout once a request settles', async () => {
    vi.useFakeTimers();
    mockApi.searchTracks.mockResolvedValue(searchBody('t1'));
    const service = new SpotifyService();

    const pending = service.searchTracks('artist:A track:X', 'GB');
    await vi.advanceTimersByTimeAsync(10);
    const tracks = await pending;

    expect(tracks.map((track) => track.id)).toEqual(['t1']);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('keeps audio feature positions and nulls for unknown tracks', async () => {
    mockApi.getAudioFeaturesForTracks.mockResolvedValue({
      body: {
        audio_features: [
          {
            id: 't1',
            type: 'audio_features',
            danceability: 0.7,
            energy: 0.8,
            key: 5,
            loudness: -6.5,
            mode: 0,
            speechiness: 0.04,
            acousticness: 0.2,
            instrumentalness: 0.001,
            liveness: 0.1,
            valence: 0.3,
            tempo: 128,
            duration_ms: 215000,
            time_signature: 4,
          },
          null,
        ],
      },
    });

    const features = await new SpotifyService().getAudioFeatures(['t1', 'missing']);

    expect(features).toEqual([
      {
        danceability: 0.7,
        energy: 0.8,
        key: 5,
        loudness: -6.5,
        mode: 0,
        speechiness: 0.04,
        acousticness: 0.2,
        instrumentalness: 0.001,
        liveness: 0.1,
        valence: 0.3,
        tempo: 128,
        duration_ms: 215000,
        time_signature: 4,
      },
      null,
    ]);
  });

  it('maps artists to popularity and genres', async () => {
    mockApi.getArtists.mockResolvedValue({
      body: { artists: [{ id: 'a1', name: 'Artist One', popularity: 64, genres: ['dream pop'] }, null] },
    });

    await expect(new SpotifyService().getArtists(['a1', 'gone'])).resolves.toEqual([
      { id: 'a1', popularity: 64, genres: ['dream pop'] },
      null,
    ]);
  });
});
