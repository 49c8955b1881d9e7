export { AutoProp } from './autoProp.js';
export type { AutoPropListener, IAutoProp } from './autoProp.js';
export { EventHub } from './eventHub.js';
export type { EventSubjects } from './eventHub.js';
export { GameRepo } from './gameRepo.js';
export type { GameRepoOptions, IGameRepo } from './gameRepo.js';
export { InMemoryGameSaveStore } from './memorySaveStore.js';
export type { InMemoryGameSaveStoreOptions } from './memorySaveStore.js';
export type { GameSaveStore } from './saveStore.js';
export { fromSaveData, toSaveData } from './serializers.js';
export { createGameRepo, restoreGameRepo } from './service.js';
export type {
  Coin,
  EqualityComparer,
  GameEventMap,
  GameEventName,
  GameOverReason,
  GameRepoState,
  GameSaveData,
  Logger,
  SaveOutcome,
  SaveTask,
  Unsubscribe
} from './types.js';
