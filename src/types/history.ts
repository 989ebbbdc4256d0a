export interface ListeningEvent {
  personId: string | null;
  endTime: string;
  artistName: string;
  trackName: string;
  msPlayed: number;
}

/** An (artist, track) pair exactly as it appears in the export. */
export interface LookupKey {
  artistName: string;
  trackName: string;
}

export type MatchStatus = 'matched' | 'not_found' | 'error';

export interface ResolvedMatch extends LookupKey {
  trackId: string | null;
  matchedTrackName: string | null;
  matchedArtistName: string | null;
  status: MatchStatus;
  resolvedAt: string;
}

export interface HistoryGroup {
  personId: string | null;
  files: string[];
}

export interface ResolutionStats {
  total: number;
  reused: number;
  found: number;
  notFound: number;
  errors: number;
}
