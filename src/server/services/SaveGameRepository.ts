/**
 * SaveGameRepository - named saved games
 *
 * Stores game snapshots under user-chosen names. Names are unique ignoring
 * case and are looked up the same way, so "Evening" and "evening" refer to
 * the same save.
 */

import { z } from 'zod';
import type { GameSnapshot } from '../../shared/engine';
import { InvalidSaveNameError, SaveNameTakenError, SaveNotFoundError } from '../../shared/errors';
import { SaveNameSchema } from '../../shared/validation/schemas';
import { logger } from '../utils/logger';

// ────────────────────────────────────────────────────────────────────────────
// Types
// ────────────────────────────────────────────────────────────────────────────

/**
 * A stored game. The snapshot is returned unvalidated; `deserializeGame`
 * checks it when the game is rebuilt.
 */
export interface SavedGame {
  name: string;
  /** ISO-8601 time the save was written. */
  savedAt: string;
  snapshot: unknown;
}

export const SavedGameSchema = z.object({
  name: z.string().min(1),
  savedAt: z.string(),
  snapshot: z.unknown(),
});

export interface SaveGameRepository {
  /** Fails with SAVE_NAME_TAKEN when a save with the same name (any case) exists. */
  save(name: string, snapshot: GameSnapshot): Promise<SavedGame>;
  load(name: string): Promise<SavedGame>;
  /** Save names, sorted. */
  list(): Promise<string[]>;
  delete(name: string): Promise<void>;
  exists(name: string): Promise<boolean>;
}

// ────────────────────────────────────────────────────────────────────────────
// Helpers
// ────────────────────────────────────────────────────────────────────────────

/** Trims and validates a save name. */
export function normalizeSaveName(name: string): string {
  const parsed = SaveNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new InvalidSaveNameError(name, parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}

export function findSaveName(names: readonly string[], name: string): string | undefined {
  const wanted = name.toLowerCase();
  return names.find((candidate) => candidate.toLowerCase() === wanted);
}

/** Validates the envelope of a stored save; throws a ZodError when malformed. */
export function parseSavedGame(raw: unknown): SavedGame {
  const parsed = SavedGameSchema.parse(raw);
  return { name: parsed.name, savedAt: parsed.savedAt, snapshot: parsed.snapshot };
}

export function sortSaveNames(names: string[]): string[] {
  return names.sort((a, b) => a.localeCompare(b));
}

// ────────────────────────────────────────────────────────────────────────────
// In-memory implementation
// ────────────────────────────────────────────────────────────────────────────

/**
 * Keeps saves for the lifetime of the process. Snapshots are copied through
 * JSON on the way in and out, like the file repository.
 */
export class InMemorySaveGameRepository implements SaveGameRepository {
  private readonly saves = new Map<string, string>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async save(name: string, snapshot: GameSnapshot): Promise<SavedGame> {
    const saveName = normalizeSaveName(name);
    const existing = findSaveName([...this.saves.keys()], saveName);
    if (existing !== undefined) {
      throw new SaveNameTakenError(saveName, existing);
    }
    const record: SavedGame = { name: saveName, savedAt: this.now().toISOString(), snapshot };
    this.saves.set(saveName, JSON.stringify(record));
    logger.info('Game saved', { saveName, store: 'memory' });
    return this.copy(record);
  }

  async load(name: string): Promise<SavedGame> {
    const saveName = normalizeSaveName(name);
    const key = findSaveName([...this.saves.keys()], saveName);
    const stored = key === undefined ? undefined : this.saves.get(key);
    if (stored === undefined) {
      throw new SaveNotFoundError(saveName);
    }
    logger.info('Game loaded', { saveName: key, store: 'memory' });
    return parseSavedGame(JSON.parse(stored));
  }

  async list(): Promise<string[]> {
    return sortSaveNames([...this.saves.keys()]);
  }

  async delete(name: string): Promise<void> {
    const saveName = normalizeSaveName(name);
    const key = findSaveName([...this.saves.keys()], saveName);
    if (key === undefined) {
      throw new SaveNotFoundError(saveName);
    }
    this.saves.delete(key);
    logger.info('Saved game deleted', { saveName: key, store: 'memory' });
  }

  async exists(name: string): Promise<boolean> {
    return findSaveName([...this.saves.keys()], normalizeSaveName(name)) !== undefined;
  }

  private copy(record: SavedGame): SavedGame {
    return parseSavedGame(JSON.parse(JSON.stringify(record)));
  }
}
