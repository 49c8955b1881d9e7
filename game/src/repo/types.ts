import type { GameOverReason, GameSaveData } from '@coin-runner/shared';
import type { Matrix3, Vector3 } from 'three';

export type { GameOverReason, GameSaveData };

export type Unsubscribe = () => void;

export type EqualityComparer<T> = (current: T, next: T) => boolean;

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/** A collectible as the repository sees it; only the id is ever read. */
export interface Coin {
  readonly id: string;
}

export interface GameRepoState {
  isMouseCaptured: boolean;
  playerGlobalPosition: Vector3;
  cameraBasis: Matrix3;
  numCoinsCollected: number;
  numCoinsAtStart: number;
}

export type GameEventMap = {
  jumped: [];
  coinCollected: [coin: Coin];
  jumpshroomUsed: [];
  gameEnded: [reason: GameOverReason];
  gameSaveRequested: [];
  gameSaveCompleted: [data: GameSaveData];
  gameSaveFailed: [error: Error];
};

export type GameEventName = keyof GameEventMap;

export type SaveOutcome =
  | { status: 'completed'; data: GameSaveData }
  | { status: 'cancelled' }
  | { status: 'failed'; error: Error };

export interface SaveTask {
  readonly slot: string;
  /** Settles once the write finishes, fails or is cancelled. Never rejects. */
  readonly done: Promise<SaveOutcome>;
  cancel(): void;
}
