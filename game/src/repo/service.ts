import { config, type GameConfig } from '../config.js';
import { GameRepo, type GameRepoOptions } from './gameRepo.js';
import { InMemoryGameSaveStore } from './memorySaveStore.js';
import type { GameSaveStore } from './saveStore.js';
import { fromSaveData } from './serializers.js';

type SessionOptions = Omit<GameRepoOptions, 'initialState'> & { config?: GameConfig };

const withConfigDefaults = (options: SessionOptions): GameRepoOptions => {
  const { config: sessionConfig = config, ...rest } = options;

  return {
    ...rest,
    saveStore:
      rest.saveStore ?? new InMemoryGameSaveStore({ writeDelayMs: sessionConfig.saveDelayMs }),
    saveSlot: rest.saveSlot ?? sessionConfig.saveSlot,
    guardEndedSession: rest.guardEndedSession ?? sessionConfig.guardEndedSession
  };
};

export const createGameRepo = (options: SessionOptions = {}): GameRepo =>
  new GameRepo(withConfigDefaults(options));

export const restoreGameRepo = async (
  store: GameSaveStore,
  slot: string,
  options: Omit<SessionOptions, 'saveStore'> = {}
): Promise<GameRepo> => {
  const saved = await store.load(slot);
  if (!saved) {
    throw new Error(`Save slot ${slot} was not found`);
  }

  return new GameRepo({
    ...withConfigDefaults({ ...options, saveStore: store, saveSlot: options.saveSlot ?? slot }),
    initialState: fromSaveData(saved)
  });
};
