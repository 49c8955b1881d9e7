import dotenv from 'dotenv';

dotenv.config();

export interface GameConfig {
  saveSlot: string;
  saveDelayMs: number;
  guardEndedSession: boolean;
}

type Env = Record<string, string | undefined>;

const invalid = (key: string): Error => new Error(`Invalid value for environment variable: ${key}`);

const getNonNegativeInt = (value: string | undefined, key: string, fallback: number): number => {
  if (value === undefined || value === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw invalid(key);
  }
  return parsed;
};

const getBoolean = (value: string | undefined, key: string, fallback: boolean): boolean => {
  if (value === undefined || value === '') {
    return fallback;
  }

  if (value === 'true') {
    return true;
  }
  if (value === 'false') {
    return false;
  }
  throw invalid(key);
};

const getSlot = (value: string | undefined, key: string): string => {
  if (value === undefined) {
    return 'default';
  }

  const slot = value.trim();
  if (!slot) {
    throw invalid(key);
  }
  return slot;
};

export const loadConfig = (env: Env = process.env): GameConfig => ({
  saveSlot: getSlot(env.GAME_SAVE_SLOT, 'GAME_SAVE_SLOT'),
  saveDelayMs: getNonNegativeInt(env.GAME_SAVE_DELAY_MS, 'GAME_SAVE_DELAY_MS', 0),
  guardEndedSession: getBoolean(env.GAME_GUARD_ENDED_SESSION, 'GAME_GUARD_ENDED_SESSION', false)
});

export const config = loadConfig();
