import { join } from 'path';
import { z } from 'zod';
import { MalformedInputError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import type { Storage } from '../utils/storage.js';
import type { HistoryGroup, ListeningEvent } from '../types/index.js';

export const UNLABELLED_GROUP = 'unlabelled';

const StreamingRecordSchema = z.object({
  endTime: z.string().regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}$/, 'expected "YYYY-MM-DD HH:MM"'),
  artistName: z.string(),
  trackName: z.string(),
  msPlayed: z.number().int().nonnegative(),
});

const StreamingHistoryFileSchema = z.array(StreamingRecordSchema);

export function groupName(personId: string | null): string {
  return personId ?? UNLABELLED_GROUP;
}

/** Person id from `person1_StreamingHistory0.json`, or null without a prefix. */
export function personIdFromFileName(fileName: string): string | null {
  const separator = fileName.indexOf('_');
  return separator > 0 ? fileName.slice(0, separator) : null;
}

function fileIndex(fileName: string): number {
  const match = fileName.match(/(\d+)\.json$/i);
  return match ? parseInt(match[1], 10) : Number.MAX_SAFE_INTEGER;
}

function compareFiles(a: string, b: string): number {
  return fileIndex(a) - fileIndex(b) || a.localeCompare(b);
}

function compareGroups(a: HistoryGroup, b: HistoryGroup): number {
  const byName = groupName(a.personId).localeCompare(groupName(b.personId));
  if (byName !== 0) return byName;
  return a.personId === null ? -1 : b.personId === null ? 1 : 0;
}

/**
 * Reads streaming-history exports from a folder, one group per filename
 * prefix. Grouping looks only at names so that finished persons can be
 * skipped without touching their files.
 */
export class EventLoader {
  constructor(
    private readonly storage: Storage,
    private readonly inputDir: string
  ) {}

  async listGroups(): Promise<HistoryGroup[]> {
    const files = (await this.storage.list(this.inputDir)).filter((file) =>
      file.toLowerCase().endsWith('.json')
    );

    // Keyed by person id: a person literally named "unlabelled" stays apart
    // from the files without a prefix.
    const groups = new Map<string | null, HistoryGroup>();
    for (const file of files) {
      const personId = personIdFromFileName(file);
      const group = groups.get(personId) ?? { personId, files: [] };
      group.files.push(file);
      groups.set(personId, group);
    }

    const result = [...groups.values()]
      .map((group) => ({ ...group, files: [...group.files].sort(compareFiles) }))
      .sort(compareGroups);

    Logger.debug(`Found ${files.length} history files in ${result.length} groups`, {
      groups: result.map((group) => groupName(group.personId)),
    });

    return result;
  }

  async loadGroup(group: HistoryGroup): Promise<ListeningEvent[]> {
    const events: ListeningEvent[] = [];

    for (const file of group.files) {
      const records = await this.readFile(file);
      for (const record of records) {
        events.push({ personId: group.personId, ...record });
      }
    }

    Logger.info(`Read ${events.length} listening events for ${groupName(group.personId)}`, {
      files: group.files.length,
    });

    return events;
  }

  /** Loads every group, keyed by person id. Throws on the first malformed file. */
  async load(): Promise<Map<string | null, ListeningEvent[]>> {
    const histories = new Map<string | null, ListeningEvent[]>();

    for (const group of await this.listGroups()) {
      histories.set(group.personId, await this.loadGroup(group));
    }

    return histories;
  }

  private async readFile(file: string): Promise<z.infer<typeof StreamingHistoryFileSchema>> {
    const path = join(this.inputDir, file);
    const text = await this.storage.readText(path);

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new MalformedInputError(`${file} is not valid JSON`, {
        file,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const result = StreamingHistoryFileSchema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      const [recordIndex, field] = issue.path;
      const location =
        typeof recordIndex === 'number'
          ? `record ${recordIndex}${field !== undefined ? ` field "${String(field)}"` : ''}`
          : 'top level';
      throw new MalformedInputError(`${file}: ${location}: ${issue.message}`, {
        file,
        issues: result.error.issues.length,
      });
    }

    return result.data;
  }
}
