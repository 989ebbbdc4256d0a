import dayjs from 'dayjs';
import { EventLoader, groupName } from './EventLoader.js';
import { IdentifierResolver } from './IdentifierResolver.js';
import { MetadataFetcher } from './MetadataFetcher.js';
import { ResumeLedger } from './ResumeLedger.js';
import { assemble, outputPath, writeOutput } from './OutputAssembler.js';
import { ConfigurationError, MalformedInputError } from '../types/errors.js';
import { extractLookupKeys, lookupKeyId } from '../utils/lookupKeys.js';
import { unique } from '../utils/batching.js';
import { Logger } from '../utils/logger.js';
import type { RetryPolicy } from '../utils/retry.js';
import type { Storage } from '../utils/storage.js';
import type { BatchConfig } from '../types/config.js';
import type { CatalogClient, HistoryGroup, MetadataOptions } from '../types/index.js';

export interface RehydrationOptions extends MetadataOptions {
  inputDir: string;
  outputDir: string;
  tempDir: string;
  market: string;
  batch: BatchConfig;
}

export type PersonStatus = 'completed' | 'skipped' | 'failed';

export interface PersonOutcome {
  person: string;
  status: PersonStatus;
  events: number;
  keys: number;
  searched: number;
  unresolved: number;
  failedBatches: number;
  error?: string;
}

export interface RunSummary {
  persons: PersonOutcome[];
  completed: number;
  skipped: number;
  failed: number;
  unresolvedKeys: number;
}

/**
 * Runs load → dedupe → resolve → fetch → write for each person in the input
 * folder, one person at a time.
 */
export class RehydrationService {
  private loader: EventLoader;
  private resolver: IdentifierResolver;
  private fetcher: MetadataFetcher;

  constructor(
    private readonly storage: Storage,
    client: CatalogClient,
    retryPolicy: RetryPolicy,
    private readonly options: RehydrationOptions
  ) {
    this.loader = new EventLoader(storage, options.inputDir);
    this.resolver = new IdentifierResolver(client, retryPolicy, options.market);
    this.fetcher = new MetadataFetcher(client, retryPolicy, options.batch);
  }

  async run(): Promise<RunSummary> {
    const startedAt = dayjs();

    if (!(await this.storage.exists(this.options.inputDir))) {
      throw new ConfigurationError(`Input directory ${this.options.inputDir} does not exist`);
    }

    const groups = await this.loader.listGroups();

    if (!groups.length) {
      Logger.warn(`No streaming history files found in ${this.options.inputDir}`);
    }

    await this.storage.ensureDir(this.options.tempDir);
    await this.storage.ensureDir(this.options.outputDir);

    const persons: PersonOutcome[] = [];
    for (const [index, group] of groups.entries()) {
      Logger.info(`${index + 1} of ${groups.length}: ${groupName(group.personId)}`);
      persons.push(await this.processGroup(group));
    }

    const summary: RunSummary = {
      persons,
      completed: persons.filter((p) => p.status === 'completed').length,
      skipped: persons.filter((p) => p.status === 'skipped').length,
      failed: persons.filter((p) => p.status === 'failed').length,
      unresolvedKeys: persons.reduce((total, p) => total + p.unresolved, 0),
    };

    this.logSummary(summary, dayjs().diff(startedAt, 'second'));
    return summary;
  }

  private async processGroup(group: HistoryGroup): Promise<PersonOutcome> {
    const person = groupName(group.personId);
    const outcome: PersonOutcome = { person, status: 'completed', events: 0, keys: 0, searched: 0, unresolved: 0, failedBatches: 0 };
    const target = outputPath(this.options.outputDir, group.personId);

    if (await this.storage.exists(target)) {
      Logger.warn(`Output file for ${person} already exists. Skipping.`, { path: target });
      return { ...outcome, status: 'skipped' };
    }

    try {
      const events = await this.loader.loadGroup(group);
      const keys = extractLookupKeys(events);
      outcome.events = events.length;
      outcome.keys = keys.length;

      const ledger = ResumeLedger.forPerson(this.storage, this.options.tempDir, group.personId);
      await ledger.load();

      const { matches, stats } = await this.resolver.resolveAll(keys, ledger, person);
      outcome.searched = stats.total - stats.reused;
      outcome.unresolved = stats.notFound + stats.errors;

      const trackIds = unique(
        keys.flatMap((key) => {
          const trackId = matches.get(lookupKeyId(key))?.trackId;
          return trackId ? [trackId] : [];
        })
      );
      const metadata = await this.fetcher.fetch(trackIds, this.options);
      outcome.failedBatches = this.fetcher.getStats().failedChunks;

      const records = assemble(events, matches, metadata);
      await writeOutput(this.storage, this.options.outputDir, group.personId, records, {
        audioFeatures: this.options.audioFeatures,
        artistInfo: this.options.artistInfo,
        includePersonId: group.personId !== null,
      });

      Logger.info(`Finished ${person}`, { events: events.length, keys: keys.length });
      return outcome;
    } catch (error) {
      if (!(error instanceof MalformedInputError)) {
        throw error;
      }

      Logger.error(`Skipping ${person}: ${error.message}`, { context: error.context });
      return { ...outcome, status: 'failed', error: error.message };
    }
  }

  private logSummary(summary: RunSummary, seconds: number): void {
    Logger.info('📊 Rehydration complete', {
      completed: summary.completed,
      skipped: summary.skipped,
      failed: summary.failed,
      unresolvedKeys: summary.unresolvedKeys,
      durationSeconds: seconds,
    });

    for (const outcome of summary.persons) {
      if (outcome.unresolved > 0) {
        Logger.warn(`${outcome.person}: ${outcome.unresolved} of ${outcome.keys} tracks have no catalog match`);
      }
      if (outcome.failedBatches > 0) {
        Logger.warn(`${outcome.person}: ${outcome.failedBatches} metadata batches failed, their fields are NA`);
      }
    }
  }
}
