import { setTimeout as delay } from 'node:timers/promises';
import type { GameSaveStore } from './saveStore.js';
import type { GameSaveData } from './types.js';

export interface InMemoryGameSaveStoreOptions {
  /** Simulated write latency. */
  writeDelayMs?: number;
}

export class InMemoryGameSaveStore implements GameSaveStore {
  private readonly saves = new Map<string, GameSaveData>();
  private readonly writeDelayMs: number;

  constructor(options: InMemoryGameSaveStoreOptions = {}) {
    this.writeDelayMs = options.writeDelayMs ?? 0;
  }

  async load(slot: string): Promise<GameSaveData | undefined> {
    return this.saves.get(slot);
  }

  async save(slot: string, data: GameSaveData, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (this.writeDelayMs > 0) {
      await delay(this.writeDelayMs, undefined, { signal });
    }
    this.saves.set(slot, data);
  }

  async delete(slot: string): Promise<void> {
    this.saves.delete(slot);
  }

  async list(): Promise<string[]> {
    return [...this.saves.keys()];
  }
}
