import { GameSaveDataSchema, SAVE_DATA_VERSION } from '@coin-runner/shared';
import { Matrix3, Vector3 } from 'three';
import type { GameRepoState, GameSaveData } from './types.js';

export const toSaveData = (state: GameRepoState, savedAt: number): GameSaveData => {
  const { x, y, z } = state.playerGlobalPosition;
  const e = state.cameraBasis.elements;

  return GameSaveDataSchema.parse({
    version: SAVE_DATA_VERSION,
    savedAt,
    numCoinsCollected: state.numCoinsCollected,
    numCoinsAtStart: state.numCoinsAtStart,
    playerGlobalPosition: [x, y, z],
    cameraBasis: [e[0], e[1], e[2], e[3], e[4], e[5], e[6], e[7], e[8]]
  });
};

// A restored session starts paused; the view recaptures the mouse on resume.
export const fromSaveData = (input: unknown): GameRepoState => {
  const data = GameSaveDataSchema.parse(input);

  return {
    isMouseCaptured: false,
    playerGlobalPosition: new Vector3().fromArray(data.playerGlobalPosition),
    cameraBasis: new Matrix3().fromArray(data.cameraBasis),
    numCoinsCollected: data.numCoinsCollected,
    numCoinsAtStart: data.numCoinsAtStart
  };
};
