import type { GameSaveStore } from './saveStore.js';
import type { GameSaveData, Logger } from './types.js';

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
}

export const createRecordingLogger = () => {
  const entries: LogEntry[] = [];
  const logger: Logger = {
    debug: (message) => entries.push({ level: 'debug', message }),
    info: (message) => entries.push({ level: 'info', message }),
    warn: (message) => entries.push({ level: 'warn', message }),
    error: (message) => entries.push({ level: 'error', message })
  };

  return { logger, entries };
};

interface PendingWrite {
  slot: string;
  data: GameSaveData;
  signal: AbortSignal | undefined;
  resolve: () => void;
  reject: (error: unknown) => void;
}

/** Save store whose writes stay pending until the test settles them. */
export class DeferredSaveStore implements GameSaveStore {
  readonly saves = new Map<string, GameSaveData>();
  readonly pending: PendingWrite[] = [];

  async load(slot: string): Promise<GameSaveData | undefined> {
    return this.saves.get(slot);
  }

  save(slot: string, data: GameSaveData, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.pending.push({
        slot,
        data,
        signal,
        resolve: () => {
          this.saves.set(slot, data);
          resolve();
        },
        reject
      });
    });
  }

  async delete(slot: string): Promise<void> {
    this.saves.delete(slot);
  }

  async list(): Promise<string[]> {
    return [...this.saves.keys()];
  }
}
