/**
 * Domain reputation tables
 *
 * StaticReputationTable holds an in-memory mapping (tests, embedding callers).
 * FileReputationTable reads a JSON object `{ "<domain or suffix>": <0..1> }` and
 * re-reads it whenever the file's modification time changes, so the table can be
 * edited while the process runs.
 */

import { readFileSync, statSync } from 'node:fs';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { IReputationTable } from './interfaces/IReputationTable.js';
import { createChildLogger } from '../../utils/logger.js';
import { ReputationTableError, errorMessage } from '../../types/errors.js';

export const reputationEntriesSchema = z.record(
  z.string().min(1),
  z.number().min(0, 'reputation must be >= 0').max(1, 'reputation must be <= 1')
);

export type ReputationEntries = z.infer<typeof reputationEntriesSchema>;

function toMap(entries: ReputationEntries): Map<string, number> {
  return new Map(Object.entries(entries).map(([key, value]) => [key.toLowerCase(), value]));
}

/**
 * Validate raw table content
 *
 * @throws ReputationTableError when a key or value is out of shape
 */
export function parseReputationEntries(source: string, raw: unknown): Map<string, number> {
  const parsed = reputationEntriesSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ReputationTableError(source, `${where}${issue?.message ?? 'invalid content'}`);
  }
  return toMap(parsed.data);
}

export class StaticReputationTable implements IReputationTable {
  private readonly entries: Map<string, number>;

  constructor(entries: ReputationEntries) {
    this.entries = parseReputationEntries('static', entries);
  }

  lookup(key: string): number | undefined {
    return this.entries.get(key.toLowerCase());
  }
}

export class FileReputationTable implements IReputationTable {
  private entries: Map<string, number> = new Map();
  private loadedMtimeMs: number | null = null;
  private readonly log: Logger;

  constructor(private readonly filePath: string) {
    this.log = createChildLogger({ component: 'FileReputationTable' });
  }

  lookup(key: string): number | undefined {
    this.refresh();
    return this.entries.get(key.toLowerCase());
  }

  /**
   * Read and validate the file now.
   *
   * @throws ReputationTableError when the file is unreadable or invalid
   */
  load(): void {
    let mtimeMs: number;
    let raw: unknown;
    try {
      mtimeMs = statSync(this.filePath).mtimeMs;
      raw = JSON.parse(readFileSync(this.filePath, 'utf8'));
    } catch (error) {
      throw new ReputationTableError(this.filePath, errorMessage(error));
    }
    this.entries = parseReputationEntries(this.filePath, raw);
    this.loadedMtimeMs = mtimeMs;
    this.log.debug({ file: this.filePath, entries: this.entries.size }, 'Domain reputation table loaded');
  }

  /**
   * Reload when the modification time differs from the loaded one.
   * A failed reload keeps the previous entries.
   */
  private refresh(): void {
    let mtimeMs: number;
    try {
      mtimeMs = statSync(this.filePath).mtimeMs;
    } catch (error) {
      if (this.loadedMtimeMs !== -1) {
        this.log.warn({ file: this.filePath, error: errorMessage(error) }, 'Domain reputation table unreadable');
        // Remember the failure so the warning is logged once until the file reappears
        this.loadedMtimeMs = -1;
      }
      return;
    }
    if (mtimeMs === this.loadedMtimeMs) {
      return;
    }

    try {
      this.load();
    } catch (error) {
      this.log.warn({ file: this.filePath, error: errorMessage(error) }, 'Domain reputation reload failed');
      this.loadedMtimeMs = mtimeMs;
    }
  }
}
