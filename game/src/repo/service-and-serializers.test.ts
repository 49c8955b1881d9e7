import test from 'node:test';
import assert from 'node:assert/strict';
import { setImmediate as nextTurn } from 'node:timers/promises';
import { Matrix3, Vector3 } from 'three';

import { InMemoryGameSaveStore } from './memorySaveStore.js';
import { fromSaveData, toSaveData } from './serializers.js';
import { createGameRepo, restoreGameRepo } from './service.js';
import { createRecordingLogger } from './testHelpers.js';

const testConfig = { saveSlot: 'config-slot', saveDelayMs: 0, guardEndedSession: true };

test('toSaveData flattens vectors and the column-major basis', () => {
  const data = toSaveData(
    {
      isMouseCaptured: true,
      playerGlobalPosition: new Vector3(1.5, -2, 3),
      cameraBasis: new Matrix3().set(1, 2, 3, 4, 5, 6, 7, 8, 9),
      numCoinsCollected: 4,
      numCoinsAtStart: 6
    },
    42
  );

  assert.deepEqual(data, {
    version: 1,
    savedAt: 42,
    numCoinsCollected: 4,
    numCoinsAtStart: 6,
    playerGlobalPosition: [1.5, -2, 3],
    cameraBasis: [1, 4, 7, 2, 5, 8, 3, 6, 9]
  });
});

test('fromSaveData rebuilds three.js values and starts with the mouse released', () => {
  const state = fromSaveData({
    version: 1,
    savedAt: 42,
    numCoinsCollected: 4,
    numCoinsAtStart: 6,
    playerGlobalPosition: [1.5, -2, 3],
    cameraBasis: [1, 4, 7, 2, 5, 8, 3, 6, 9]
  });

  assert.equal(state.isMouseCaptured, false);
  assert.ok(state.playerGlobalPosition.equals(new Vector3(1.5, -2, 3)));
  assert.ok(state.cameraBasis.equals(new Matrix3().set(1, 2, 3, 4, 5, 6, 7, 8, 9)));
  assert.equal(state.numCoinsCollected, 4);
  assert.equal(state.numCoinsAtStart, 6);
});

test('fromSaveData rejects data from another save version', () => {
  assert.throws(
    () =>
      fromSaveData({
        version: 2,
        savedAt: 42,
        numCoinsCollected: 0,
        numCoinsAtStart: 0,
        playerGlobalPosition: [0, 0, 0],
        cameraBasis: [1, 0, 0, 0, 1, 0, 0, 0, 1]
      }),
    { name: 'ZodError' }
  );
});

test('fromSaveData rejects a truncated basis', () => {
  assert.throws(
    () =>
      fromSaveData({
        version: 1,
        savedAt: 42,
        numCoinsCollected: 0,
        numCoinsAtStart: 0,
        playerGlobalPosition: [0, 0, 0],
        cameraBasis: [1, 0, 0]
      }),
    { name: 'ZodError' }
  );
});

test('createGameRepo applies configured slot and guard', async () => {
  const { logger, entries } = createRecordingLogger();
  const repo = createGameRepo({ config: testConfig, logger });

  repo.onGameEnded('exited');
  repo.jump();
  const task = repo.startSaving();
  await task.done;

  assert.equal(task.slot, 'config-slot');
  assert.deepEqual(
    entries.map((entry) => entry.message),
    [
      'Game ended: exited',
      'Ignoring jump after the game ended',
      'Game saved to slot config-slot'
    ]
  );
});

test('createGameRepo passes the configured save delay to its store', async () => {
  const repo = createGameRepo({
    config: { saveSlot: 'slow-slot', saveDelayMs: 20, guardEndedSession: false },
    logger: createRecordingLogger().logger
  });
  let completions = 0;
  repo.on('gameSaveCompleted', () => completions++);

  const task = repo.startSaving();
  await nextTurn();
  assert.equal(completions, 0);

  const outcome = await task.done;
  assert.equal(outcome.status, 'completed');
  assert.equal(completions, 1);
});

test('explicit options win over configuration', () => {
  const repo = createGameRepo({
    config: testConfig,
    saveSlot: 'explicit',
    guardEndedSession: false,
    logger: createRecordingLogger().logger
  });
  let jumps = 0;
  repo.on('jumped', () => jumps++);

  repo.onGameEnded('exited');
  repo.jump();

  assert.equal(repo.startSaving().slot, 'explicit');
  assert.equal(jumps, 1);
});

test('restoreGameRepo seeds a new session from the saved slot', async () => {
  const store = new InMemoryGameSaveStore();
  const logger = createRecordingLogger().logger;
  const original = createGameRepo({ config: testConfig, saveStore: store, saveSlot: 'slot-7', logger });
  original.onNumCoinsAtStart(3);
  original.startCoinCollection({ id: 'a' });
  original.onFinishCoinCollection({ id: 'a' });
  original.setPlayerGlobalPosition(new Vector3(4, 0, -2));
  original.resume();
  await original.startSaving().done;
  original.dispose();

  const restored = await restoreGameRepo(store, 'slot-7', { config: testConfig, logger });

  assert.equal(restored.numCoinsCollected.value, 1);
  assert.equal(restored.numCoinsAtStart.value, 3);
  assert.equal(restored.coinsBeingCollected, 0);
  assert.equal(restored.isMouseCaptured.value, false);
  assert.deepEqual(restored.playerGlobalPosition.value.toArray(), [4, 0, -2]);
  assert.equal(restored.startSaving().slot, 'slot-7');
});

test('restoreGameRepo throws when the slot is empty', async () => {
  const store = new InMemoryGameSaveStore();

  await assert.rejects(
    restoreGameRepo(store, 'missing', { config: testConfig }),
    /Save slot missing was not found/
  );
});
