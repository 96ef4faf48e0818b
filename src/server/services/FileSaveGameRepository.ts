import fs from 'fs/promises';
import path from 'path';
import type { GameSnapshot } from '../../shared/engine';
import {
  CorruptSaveError,
  GameErrorCode,
  PersistenceError,
  SaveNameTakenError,
  SaveNotFoundError,
} from '../../shared/errors';
import { config } from '../config';
import { logger } from '../utils/logger';
import {
  findSaveName,
  normalizeSaveName,
  parseSavedGame,
  sortSaveNames,
} from './SaveGameRepository';
import type { SaveGameRepository, SavedGame } from './SaveGameRepository';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * One `<name>.json` file per save in the configured saves directory. The
 * directory is created on the first write.
 */
export class FileSaveGameRepository implements SaveGameRepository {
  constructor(
    private readonly directory: string = config.saves.directory,
    private readonly extension: string = config.saves.extension,
    private readonly now: () => Date = () => new Date()
  ) {}

  async save(name: string, snapshot: GameSnapshot): Promise<SavedGame> {
    const saveName = normalizeSaveName(name);
    const existing = findSaveName(await this.list(), saveName);
    if (existing !== undefined) {
      throw new SaveNameTakenError(saveName, existing);
    }

    const record: SavedGame = { name: saveName, savedAt: this.now().toISOString(), snapshot };
    await this.io('save', saveName, async () => {
      await fs.mkdir(this.directory, { recursive: true });
      // 'wx' fails instead of overwriting if another writer got there first.
      await fs.writeFile(this.fileFor(saveName), JSON.stringify(record, null, 2), { flag: 'wx' });
    });
    logger.info('Game saved', { saveName, file: this.fileFor(saveName) });
    return record;
  }

  async load(name: string): Promise<SavedGame> {
    const saveName = await this.resolve(name);
    const contents = await this.io('load', saveName, () => fs.readFile(this.fileFor(saveName), 'utf8'));

    let record: SavedGame;
    try {
      record = parseSavedGame(JSON.parse(contents));
    } catch (error) {
      logger.error('Saved game is unreadable', { saveName, error });
      throw new CorruptSaveError(saveName, error instanceof Error ? error.message : String(error));
    }
    logger.info('Game loaded', { saveName });
    return record;
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw this.ioFailure('list', undefined, error);
    }
    return sortSaveNames(
      entries
        .filter((entry) => entry.endsWith(this.extension))
        .map((entry) => entry.slice(0, -this.extension.length))
    );
  }

  async delete(name: string): Promise<void> {
    const saveName = await this.resolve(name);
    await this.io('delete', saveName, () => fs.unlink(this.fileFor(saveName)));
    logger.info('Saved game deleted', { saveName });
  }

  async exists(name: string): Promise<boolean> {
    return findSaveName(await this.list(), normalizeSaveName(name)) !== undefined;
  }

  /** Stored name of an existing save, matched ignoring case. */
  private async resolve(name: string): Promise<string> {
    const saveName = normalizeSaveName(name);
    const stored = findSaveName(await this.list(), saveName);
    if (stored === undefined) {
      throw new SaveNotFoundError(saveName);
    }
    return stored;
  }

  private fileFor(saveName: string): string {
    return path.join(this.directory, `${saveName}${this.extension}`);
  }

  private async io<T>(operation: string, saveName: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT' && operation !== 'save') {
        throw new SaveNotFoundError(saveName);
      }
      if (isErrnoException(error) && error.code === 'EEXIST') {
        throw new SaveNameTakenError(saveName, saveName);
      }
      throw this.ioFailure(operation, saveName, error);
    }
  }

  private ioFailure(operation: string, saveName: string | undefined, error: unknown): PersistenceError {
    if (error instanceof PersistenceError) {
      return error;
    }
    logger.error('Saved game storage failed', { operation, saveName, directory: this.directory, error });
    return new PersistenceError(
      GameErrorCode.SAVE_IO_FAILED,
      `Could not ${operation} saved games: ${error instanceof Error ? error.message : String(error)}`,
      { operation, saveName, directory: this.directory }
    );
  }
}
