import type { GameSaveData } from './types.js';

export interface GameSaveStore {
  load(slot: string): Promise<GameSaveData | undefined>;
  /** Implementations should stop and reject once `signal` aborts. */
  save(slot: string, data: GameSaveData, signal?: AbortSignal): Promise<void>;
  delete(slot: string): Promise<void>;
  list(): Promise<string[]>;
}
