import { Command } from 'commander';
import { config, printConfigSummary, validateEnvironment } from '../config/index.js';
import { ConfigurationError } from '../types/errors.js';
import { IdentifierResolver } from '../services/IdentifierResolver.js';
import { MetadataFetcher } from '../services/MetadataFetcher.js';
import { RehydrationService } from '../services/RehydrationService.js';
import { SpotifyService } from '../services/SpotifyService.js';
import { FileStorage } from '../utils/storage.js';
import { Logger } from '../utils/logger.js';
import { RetryPolicy } from '../utils/retry.js';
import type { CLIOptions } from '../types/index.js';

interface LookupOptions {
  market?: string;
  features?: boolean;
  artistInfo?: boolean;
  verbose?: boolean;
}

function requireCredentials(): void {
  const missing = validateEnvironment();
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`, {
      missingVars: missing,
    });
  }
}

async function runRehydration(options: CLIOptions): Promise<void> {
  if (options.verbose) {
    Logger.setLevel('debug');
    printConfigSummary();
  }
  requireCredentials();

  const service = new RehydrationService(
    new FileStorage(),
    new SpotifyService(),
    new RetryPolicy(config.retry),
    {
      inputDir: options.input ?? config.paths.input,
      outputDir: options.output ?? config.paths.output,
      tempDir: options.temp ?? config.paths.temp,
      market: options.market ?? config.spotify.market,
      batch: config.batch,
      audioFeatures: options.features ?? true,
      artistInfo: options.artistInfo ?? false,
    }
  );

  const summary = await service.run();
  if (summary.failed > 0) {
    process.exitCode = 1;
  }
}

async function lookupTrack(artistName: string, trackName: string, options: LookupOptions): Promise<void> {
  if (options.verbose) {
    Logger.setLevel('debug');
  }
  requireCredentials();

  const client = new SpotifyService();
  const retryPolicy = new RetryPolicy(config.retry);
  const resolver = new IdentifierResolver(client, retryPolicy, options.market ?? config.spotify.market);
  const match = await resolver.resolveKey({ artistName, trackName });

  const result: Record<string, unknown> = {
    trackId: match.trackId,
    returnedTrack: match.matchedTrackName,
    returnedArtist: match.matchedArtistName,
    status: match.status,
  };

  if (match.trackId && (options.features || options.artistInfo)) {
    const fetcher = new MetadataFetcher(client, retryPolicy, config.batch);
    const metadata = (await fetcher.fetch([match.trackId], {
      audioFeatures: options.features ?? false,
      artistInfo: options.artistInfo ?? false,
    })).get(match.trackId);

    if (options.features) result.audioFeatures = metadata?.features ?? null;
    if (options.artistInfo) result.artist = metadata?.artist ?? null;
  }

  console.log(JSON.stringify(result, null, 2));
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('rehydrate')
    .description('Rebuild track ids and audio features for exported streaming history')
    .version('1.0.0');

  program
    .command('run', { isDefault: true })
    .description('Rehydrate every person in the input folder, resuming from saved ledgers')
    .option('-i, --input <dir>', 'folder with [person_]StreamingHistory<N>.json files')
    .option('-o, --output <dir>', 'folder for <person>-rehydrated.tsv files')
    .option('-t, --temp <dir>', 'folder for resume ledgers')
    .option('-m, --market <code>', 'catalog market for searches')
    .option('--no-features', 'skip the audio features pass')
    .option('--artist-info', 'fetch artist popularity and genres')
    .option('-v, --verbose', 'enable debug logging')
    .action(async (options: CLIOptions) => {
      await runRehydration(options);
    });

  program
    .command('lookup')
    .description('Look up a single track and print the match as JSON')
    .argument('<artist>', 'artist name')
    .argument('<track>', 'track name')
    .option('-m, --market <code>', 'catalog market for the search')
    .option('--features', 'include audio features')
    .option('--artist-info', 'include artist popularity and genres')
    .option('-v, --verbose', 'enable debug logging')
    .action(async (artist: string, track: string, options: LookupOptions) => {
      await lookupTrack(artist, track, options);
    });

  return program;
}
