import { join } from 'path';
import { AUDIO_FEATURE_FIELDS } from '../types/catalog.js';
import { lookupKeyId } from '../utils/lookupKeys.js';
import { Logger } from '../utils/logger.js';
import type { Storage } from '../utils/storage.js';
import type {
  ArtistInfo,
  AudioFeatures,
  ListeningEvent,
  MetadataOptions,
  ResolvedMatch,
  TrackMetadata,
} from '../types/index.js';

export const MISSING_VALUE = 'NA';

export interface OutputRecord {
  event: ListeningEvent;
  match: ResolvedMatch;
  features: AudioFeatures | null;
  artist: ArtistInfo | null;
}

export interface OutputOptions extends MetadataOptions {
  includePersonId: boolean;
}

type Cell = string | number | null;

export function outputFileName(personId: string | null): string {
  return personId ? `${personId}-rehydrated.tsv` : 'rehydrated.tsv';
}

export function outputPath(outputDir: string, personId: string | null): string {
  return join(outputDir, outputFileName(personId));
}

/**
 * Joins listening events with their resolved match and metadata. One record
 * per event, in the original order.
 */
export function assemble(
  events: readonly ListeningEvent[],
  matches: ReadonlyMap<string, ResolvedMatch>,
  metadata: ReadonlyMap<string, TrackMetadata>
): OutputRecord[] {
  return events.map((event) => {
    const match = matches.get(lookupKeyId(event));
    if (!match) {
      throw new Error(`No resolution for ${event.artistName} - ${event.trackName}`);
    }

    const trackMetadata = match.trackId ? metadata.get(match.trackId) : undefined;
    return {
      event,
      match,
      features: trackMetadata?.features ?? null,
      artist: trackMetadata?.artist ?? null,
    };
  });
}

export function columns(options: OutputOptions): string[] {
  return [
    'endTime',
    'artistName',
    'trackName',
    'msPlayed',
    ...(options.includePersonId ? ['personId'] : []),
    'trackId',
    'matchedTrackName',
    'matchedArtistName',
    ...(options.audioFeatures ? AUDIO_FEATURE_FIELDS : []),
    ...(options.artistInfo ? ['artistId', 'artistPopularity', 'artistGenres'] : []),
  ];
}

function formatCell(value: Cell): string {
  if (value === null) return MISSING_VALUE;
  return String(value).replace(/[\t\r\n]+/g, ' ');
}

function row(record: OutputRecord, options: OutputOptions): Cell[] {
  const { event, match, features, artist } = record;

  return [
    event.endTime,
    event.artistName,
    event.trackName,
    event.msPlayed,
    ...(options.includePersonId ? [event.personId] : []),
    match.trackId,
    match.matchedTrackName,
    match.matchedArtistName,
    ...(options.audioFeatures
      ? AUDIO_FEATURE_FIELDS.map((field) => (features ? features[field] : null))
      : []),
    ...(options.artistInfo
      ? [artist?.artistId ?? null, artist?.popularity ?? null, artist ? artist.genres.join(',') : null]
      : []),
  ];
}

export function toTsv(records: readonly OutputRecord[], options: OutputOptions): string {
  const lines = [columns(options).join('\t')];
  for (const record of records) {
    lines.push(row(record, options).map(formatCell).join('\t'));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Writes a person's records. The file is written under a temporary name and
 * renamed, so an existing output file is always complete.
 */
export async function writeOutput(
  storage: Storage,
  outputDir: string,
  personId: string | null,
  records: readonly OutputRecord[],
  options: OutputOptions
): Promise<string> {
  const path = outputPath(outputDir, personId);
  const partialPath = `${path}.partial`;

  await storage.ensureDir(outputDir);
  await storage.writeText(partialPath, toTsv(records, options));
  await storage.rename(partialPath, path);

  Logger.info(`Rehydrated data for ${personId ?? 'unlabelled history'} saved to ${path}`, {
    rows: records.length,
  });
  return path;
}
