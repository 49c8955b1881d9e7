import { Subject } from 'rxjs';
import { Matrix3, Vector3 } from 'three';
import { AutoProp, type IAutoProp } from './autoProp.js';
import { EventHub } from './eventHub.js';
import { InMemoryGameSaveStore } from './memorySaveStore.js';
import type { GameSaveStore } from './saveStore.js';
import { toSaveData } from './serializers.js';
import type {
  Coin,
  GameEventMap,
  GameOverReason,
  GameRepoState,
  Logger,
  SaveOutcome,
  SaveTask,
  Unsubscribe
} from './types.js';

export interface IGameRepo {
  readonly isMouseCaptured: IAutoProp<boolean>;
  readonly playerGlobalPosition: IAutoProp<Vector3>;
  readonly cameraBasis: IAutoProp<Matrix3>;
  readonly numCoinsCollected: IAutoProp<number>;
  /** Total number of coins the world started with. */
  readonly numCoinsAtStart: IAutoProp<number>;
  /** Camera forward vector in world space (the basis' negated z column). */
  readonly globalCameraDirection: Vector3;
  readonly coinsBeingCollected: number;
  readonly hasGameEnded: boolean;

  on<K extends keyof GameEventMap>(
    event: K,
    listener: (...args: GameEventMap[K]) => void
  ): Unsubscribe;

  setPlayerGlobalPosition(position: Vector3): void;
  setCameraBasis(basis: Matrix3): void;
  /** A coin pickup animation has started. */
  startCoinCollection(coin: Coin): void;
  /** A coin pickup animation has finished. */
  onFinishCoinCollection(coin: Coin): void;
  onNumCoinsAtStart(numCoinsAtStart: number): void;
  onJumpshroomUsed(): void;
  jump(): void;
  startSaving(): SaveTask;
  cancelSaving(): void;
  onGameEnded(reason: GameOverReason): void;
  /** Releases the mouse. */
  pause(): void;
  /** Recaptures the mouse. */
  resume(): void;
  restartSession(): void;
  snapshot(): GameRepoState;
  dispose(): void;
}

export interface GameRepoOptions {
  initialState?: Partial<GameRepoState>;
  saveStore?: GameSaveStore;
  saveSlot?: string;
  /** Ignore gameplay calls once the game has ended. */
  guardEndedSession?: boolean;
  logger?: Logger;
  now?: () => number;
}

interface ActiveSave {
  controller: AbortController;
  resolve: (outcome: SaveOutcome) => void;
}

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Session state that isn't tied to a particular view: mouse capture, player and
 * camera placement, coin progress, and the gameplay events other systems react to.
 *
 * Every call runs to completion synchronously and notifies subscribers inside the
 * caller's stack. A listener that calls back into the repo sees intermediate
 * state, e.g. a `coinCollected` listener runs before the pickup has finished.
 */
export class GameRepo implements IGameRepo {
  private readonly _isMouseCaptured: AutoProp<boolean>;
  private readonly _playerGlobalPosition: AutoProp<Vector3>;
  private readonly _cameraBasis: AutoProp<Matrix3>;
  private readonly _numCoinsCollected: AutoProp<number>;
  private readonly _numCoinsAtStart: AutoProp<number>;

  private readonly events = new EventHub<GameEventMap>({
    jumped: new Subject(),
    coinCollected: new Subject(),
    jumpshroomUsed: new Subject(),
    gameEnded: new Subject(),
    gameSaveRequested: new Subject(),
    gameSaveCompleted: new Subject(),
    gameSaveFailed: new Subject()
  });

  private readonly saveStore: GameSaveStore;
  private readonly saveSlot: string;
  private readonly guardEndedSession: boolean;
  private readonly logger: Logger;
  private readonly now: () => number;

  private _coinsBeingCollected = 0;
  private gameEnded = false;
  private activeSave: ActiveSave | null = null;
  private disposed = false;

  constructor(options: GameRepoOptions = {}) {
    const initial = options.initialState ?? {};

    this._isMouseCaptured = new AutoProp(initial.isMouseCaptured ?? false);
    this._playerGlobalPosition = new AutoProp(
      initial.playerGlobalPosition?.clone() ?? new Vector3(),
      (current, next) => current.equals(next)
    );
    this._cameraBasis = new AutoProp(
      initial.cameraBasis?.clone() ?? new Matrix3(),
      (current, next) => current.equals(next)
    );
    this._numCoinsCollected = new AutoProp(initial.numCoinsCollected ?? 0);
    this._numCoinsAtStart = new AutoProp(initial.numCoinsAtStart ?? 0);

    this.saveStore = options.saveStore ?? new InMemoryGameSaveStore();
    this.saveSlot = options.saveSlot ?? 'default';
    this.guardEndedSession = options.guardEndedSession ?? false;
    this.logger = options.logger ?? console;
    this.now = options.now ?? Date.now;
  }

  get isMouseCaptured(): IAutoProp<boolean> {
    return this._isMouseCaptured;
  }

  get playerGlobalPosition(): IAutoProp<Vector3> {
    return this._playerGlobalPosition;
  }

  get cameraBasis(): IAutoProp<Matrix3> {
    return this._cameraBasis;
  }

  get numCoinsCollected(): IAutoProp<number> {
    return this._numCoinsCollected;
  }

  get numCoinsAtStart(): IAutoProp<number> {
    return this._numCoinsAtStart;
  }

  get globalCameraDirection(): Vector3 {
    return new Vector3().setFromMatrix3Column(this._cameraBasis.value, 2).negate();
  }

  get coinsBeingCollected(): number {
    return this._coinsBeingCollected;
  }

  get hasGameEnded(): boolean {
    return this.gameEnded;
  }

  on<K extends keyof GameEventMap>(
    event: K,
    listener: (...args: GameEventMap[K]) => void
  ): Unsubscribe {
    return this.events.on(event, listener);
  }

  setPlayerGlobalPosition(position: Vector3): void {
    this._playerGlobalPosition.onNext(position.clone());
  }

  setCameraBasis(basis: Matrix3): void {
    this._cameraBasis.onNext(basis.clone());
  }

  startCoinCollection(coin: Coin): void {
    if (this.isIgnoredAfterEnd('startCoinCollection')) {
      return;
    }

    this._coinsBeingCollected++;
    this._numCoinsCollected.onNext(this._numCoinsCollected.value + 1);
    this.events.emit('coinCollected', coin);
  }

  onFinishCoinCollection(coin: Coin): void {
    if (this.isIgnoredAfterEnd('onFinishCoinCollection')) {
      return;
    }

    if (this._coinsBeingCollected === 0) {
      this.logger.warn(`Coin ${coin.id} finished collecting without a matching start; ignoring`);
      return;
    }

    this._coinsBeingCollected--;

    if (
      this._coinsBeingCollected === 0 &&
      this._numCoinsCollected.value >= this._numCoinsAtStart.value
    ) {
      this.onGameEnded('player_won');
    }
  }

  onNumCoinsAtStart(numCoinsAtStart: number): void {
    this._numCoinsAtStart.onNext(numCoinsAtStart);
  }

  onJumpshroomUsed(): void {
    if (this.isIgnoredAfterEnd('onJumpshroomUsed')) {
      return;
    }

    this.events.emit('jumpshroomUsed');
  }

  jump(): void {
    if (this.isIgnoredAfterEnd('jump')) {
      return;
    }

    this.events.emit('jumped');
  }

  startSaving(): SaveTask {
    const slot = this.saveSlot;

    if (this.disposed) {
      return {
        slot,
        done: Promise.resolve<SaveOutcome>({ status: 'cancelled' }),
        cancel: () => undefined
      };
    }

    this.cancelSaving();

    const controller = new AbortController();
    const done = new Promise<SaveOutcome>((resolve) => {
      this.activeSave = { controller, resolve };
    });

    // Registered before the emit so a listener can cancel or dispose.
    this.events.emit('gameSaveRequested');
    if (!controller.signal.aborted) {
      void this.writeSave(controller, slot);
    }

    return {
      slot,
      done,
      cancel: () => {
        if (this.activeSave?.controller === controller) {
          this.cancelSaving();
        }
      }
    };
  }

  cancelSaving(): void {
    const save = this.activeSave;
    if (!save) {
      return;
    }

    this.activeSave = null;
    save.controller.abort();
    save.resolve({ status: 'cancelled' });
  }

  onGameEnded(reason: GameOverReason): void {
    if (this.isIgnoredAfterEnd('onGameEnded')) {
      return;
    }

    this.gameEnded = true;
    this._isMouseCaptured.onNext(false);
    this.logger.info(`Game ended: ${reason}`);
    this.events.emit('gameEnded', reason);
  }

  pause(): void {
    this._isMouseCaptured.onNext(false);
  }

  resume(): void {
    if (this.isIgnoredAfterEnd('resume')) {
      return;
    }

    this._isMouseCaptured.onNext(true);
  }

  restartSession(): void {
    this.reset();
    this.gameEnded = false;
  }

  snapshot(): GameRepoState {
    return {
      isMouseCaptured: this._isMouseCaptured.value,
      playerGlobalPosition: this._playerGlobalPosition.value.clone(),
      cameraBasis: this._cameraBasis.value.clone(),
      numCoinsCollected: this._numCoinsCollected.value,
      numCoinsAtStart: this._numCoinsAtStart.value
    };
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }

    this.disposed = true;
    this.cancelSaving();

    this._isMouseCaptured.dispose();
    this._playerGlobalPosition.dispose();
    this._cameraBasis.dispose();
    this._numCoinsCollected.dispose();
    this._numCoinsAtStart.dispose();
    this.events.dispose();
  }

  private reset(): void {
    this._numCoinsCollected.onNext(0);
    this._coinsBeingCollected = 0;
  }

  private async writeSave(
    controller: AbortController,
    slot: string
  ): Promise<void> {
    try {
      // Runs before the first await, so the snapshot is taken when the save is requested.
      const data = toSaveData(this.snapshot(), this.now());
      await this.saveStore.save(slot, data, controller.signal);
      this.finishSave(controller, { status: 'completed', data });
    } catch (error) {
      this.finishSave(controller, { status: 'failed', error: toError(error) });
    }
  }

  private finishSave(controller: AbortController, outcome: SaveOutcome): void {
    const save = this.activeSave;
    if (!save || save.controller !== controller) {
      return;
    }

    this.activeSave = null;
    save.resolve(outcome);

    if (outcome.status === 'completed') {
      this.logger.info(`Game saved to slot ${this.saveSlot}`);
      this.events.emit('gameSaveCompleted', outcome.data);
    } else if (outcome.status === 'failed') {
      this.logger.error(`Saving to slot ${this.saveSlot} failed`, outcome.error);
      this.events.emit('gameSaveFailed', outcome.error);
    }
  }

  private isIgnoredAfterEnd(operation: string): boolean {
    if (!this.guardEndedSession || !this.gameEnded) {
      return false;
    }

    this.logger.warn(`Ignoring ${operation} after the game ended`);
    return true;
  }
}
