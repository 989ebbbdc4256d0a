import dayjs from 'dayjs';
import { AuthenticationError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import { lookupKeyId } from '../utils/lookupKeys.js';
import type { RetryPolicy } from '../utils/retry.js';
import type { ResumeLedger } from './ResumeLedger.js';
import type {
  CatalogClient,
  LookupKey,
  MatchStatus,
  ResolutionStats,
  ResolvedMatch,
} from '../types/index.js';

const PROGRESS_INTERVAL = 100;

export function buildSearchQuery(key: LookupKey): string {
  return `artist:${key.artistName} track:${key.trackName}`;
}

/**
 * Maps lookup keys to catalog track ids. The first search candidate is taken
 * as the match; no scoring is applied.
 */
export class IdentifierResolver {
  constructor(
    private readonly client: CatalogClient,
    private readonly retryPolicy: RetryPolicy,
    private readonly market: string
  ) {}

  /**
   * Searches for a single key. Exhausted retries and non-retryable API
   * errors yield a null match with status `error`; authentication failures
   * are rethrown.
   */
  async resolveKey(key: LookupKey): Promise<ResolvedMatch> {
    const query = buildSearchQuery(key);

    try {
      const candidates = await this.retryPolicy.execute(
        () => this.client.searchTracks(query, this.market),
        `search ${query}`
      );

      const [first] = candidates;
      if (!first) {
        Logger.debug(`No match for ${key.artistName} - ${key.trackName}`);
        return this.nullMatch(key, 'not_found');
      }

      return {
        ...key,
        trackId: first.id,
        matchedTrackName: first.name,
        matchedArtistName: first.artists[0]?.name ?? null,
        status: 'matched',
        resolvedAt: dayjs().toISOString(),
      };
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw error;
      }

      Logger.warn(`Lookup failed for ${key.artistName} - ${key.trackName}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return this.nullMatch(key, 'error');
    }
  }

  /**
   * Resolves every key in order, reusing ledger entries and appending each
   * new resolution before moving on. A key already in the ledger is never
   * searched again, whatever its status.
   */
  async resolveAll(
    keys: readonly LookupKey[],
    ledger: ResumeLedger,
    label = 'history'
  ): Promise<{ matches: Map<string, ResolvedMatch>; stats: ResolutionStats }> {
    const matches = new Map<string, ResolvedMatch>();
    const stats: ResolutionStats = { total: keys.length, reused: 0, found: 0, notFound: 0, errors: 0 };

    const pending = keys.filter((key) => {
      const existing = ledger.get(key);
      if (existing) {
        matches.set(lookupKeyId(key), existing);
        stats.reused++;
        this.count(stats, existing.status);
        return false;
      }
      return true;
    });

    Logger.info(`Searching the catalog for ${pending.length} of ${keys.length} tracks for ${label}`, {
      reused: stats.reused,
    });

    for (const [index, key] of pending.entries()) {
      const match = await this.resolveKey(key);
      await ledger.append(match);
      matches.set(lookupKeyId(key), match);
      this.count(stats, match.status);

      if ((index + 1) % PROGRESS_INTERVAL === 0) {
        Logger.info(`Searched ${index + 1}/${pending.length} tracks for ${label}`);
      }
    }

    Logger.info(
      `Searched all tracks for ${label}. ${stats.found} were found, ${stats.notFound} are missing, ${stats.errors} threw errors`
    );

    return { matches, stats };
  }

  private count(stats: ResolutionStats, status: MatchStatus): void {
    if (status === 'matched') stats.found++;
    else if (status === 'not_found') stats.notFound++;
    else stats.errors++;
  }

  private nullMatch(key: LookupKey, status: Exclude<MatchStatus, 'matched'>): ResolvedMatch {
    return {
      ...key,
      trackId: null,
      matchedTrackName: null,
      matchedArtistName: null,
      status,
      resolvedAt: dayjs().toISOString(),
    };
  }
}
