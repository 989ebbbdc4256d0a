import type { ListeningEvent, LookupKey } from '../types/index.js';

export function lookupKeyId(key: LookupKey): string {
  return JSON.stringify([key.artistName, key.trackName]);
}

/**
 * Distinct (artist, track) pairs in first-seen order. Matching is exact:
 * differently cased or spelled pairs are separate keys.
 */
export function extractLookupKeys(events: readonly ListeningEvent[]): LookupKey[] {
  const seen = new Set<string>();
  const keys: LookupKey[] = [];

  for (const event of events) {
    const key = { artistName: event.artistName, trackName: event.trackName };
    const id = lookupKeyId(key);
    if (!seen.has(id)) {
      seen.add(id);
      keys.push(key);
    }
  }

  return keys;
}
