import { join } from 'path';
import { z } from 'zod';
import { Logger } from '../utils/logger.js';
import { lookupKeyId } from '../utils/lookupKeys.js';
import type { Storage } from '../utils/storage.js';
import type { LookupKey, ResolvedMatch } from '../types/index.js';

const ResolvedMatchSchema = z.object({
  artistName: z.string(),
  trackName: z.string(),
  trackId: z.string().nullable(),
  matchedTrackName: z.string().nullable(),
  matchedArtistName: z.string().nullable(),
  status: z.enum(['matched', 'not_found', 'error']),
  resolvedAt: z.string(),
});

export function ledgerFileName(personId: string | null): string {
  return personId ? `${personId}_matched.jsonl` : 'matched.jsonl';
}

/**
 * Append-only record of resolved lookup keys for one person, stored as JSON
 * lines. Each resolution is written before the next key is searched, so an
 * interrupted run can pick up where it stopped.
 */
export class ResumeLedger {
  private entries = new Map<string, ResolvedMatch>();
  private loaded = false;
  private needsNewline = false;

  constructor(
    private readonly storage: Storage,
    readonly path: string
  ) {}

  static forPerson(storage: Storage, tempDir: string, personId: string | null): ResumeLedger {
    return new ResumeLedger(storage, join(tempDir, ledgerFileName(personId)));
  }

  async load(): Promise<number> {
    this.entries.clear();
    this.loaded = true;
    this.needsNewline = false;

    if (!(await this.storage.exists(this.path))) {
      Logger.debug(`No ledger at ${this.path}, starting fresh`);
      return 0;
    }

    const content = await this.storage.readText(this.path);
    this.needsNewline = content.length > 0 && !content.endsWith('\n');

    const lines = content.split('\n');
    let skipped = 0;

    for (const [index, line] of lines.entries()) {
      if (!line.trim()) continue;

      const parsed = this.parseLine(line);
      if (!parsed) {
        // A run killed mid-write leaves a truncated final line.
        skipped++;
        Logger.warn(`Ignoring unreadable ledger line ${index + 1} in ${this.path}`);
        continue;
      }

      // Later lines supersede earlier ones for the same key.
      this.entries.set(lookupKeyId(parsed), parsed);
    }

    Logger.info(`Loaded ${this.entries.size} resolved keys from ${this.path}`, { skipped });
    return this.entries.size;
  }

  private parseLine(line: string): ResolvedMatch | null {
    try {
      const result = ResolvedMatchSchema.safeParse(JSON.parse(line));
      return result.success ? result.data : null;
    } catch {
      return null;
    }
  }

  get(key: LookupKey): ResolvedMatch | undefined {
    return this.entries.get(lookupKeyId(key));
  }

  get size(): number {
    return this.entries.size;
  }

  async append(match: ResolvedMatch): Promise<void> {
    if (!this.loaded) {
      throw new Error(`Ledger ${this.path} must be loaded before appending`);
    }

    const prefix = this.needsNewline ? '\n' : '';
    await this.storage.appendText(this.path, `${prefix}${JSON.stringify(match)}\n`);
    this.needsNewline = false;
    this.entries.set(lookupKeyId(match), match);
  }
}
