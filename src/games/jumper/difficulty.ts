/**
 * Lane Jumper - Difficulty progression
 *
 * Every speedUpIntervalMs the stream gets one step faster and denser.
 * The level is complete after speedUpsPerLevel steps; surviving is all
 * it takes.
 */

import type { GameConfig } from './config';

export interface DifficultyState {
  level: number;
  speed: number;
  spawnRate: number;
  speedUpsElapsed: number;
  lastSpeedUpAt: number;
}

export type DifficultyStatus = 'running' | 'speed-up' | 'level-complete';

type DifficultyConfig = Pick<
  GameConfig,
  'initialSpawnRate' | 'levelSpawnBonus' | 'spawnIncrease' | 'maxSpawnRate' | 'speedUpIntervalMs' | 'speedUpsPerLevel'
>;

export function createDifficulty(level: number, now: number, config: DifficultyConfig): DifficultyState {
  return {
    level,
    speed: level,
    spawnRate: Math.min(config.maxSpawnRate, config.initialSpawnRate + config.levelSpawnBonus * (level - 1)),
    speedUpsElapsed: 0,
    lastSpeedUpAt: now,
  };
}

export function advanceDifficulty(state: DifficultyState, now: number, config: DifficultyConfig): DifficultyStatus {
  if (now - state.lastSpeedUpAt < config.speedUpIntervalMs) return 'running';

  state.speed += 1;
  state.spawnRate = Math.min(config.maxSpawnRate, state.spawnRate + config.spawnIncrease);
  state.speedUpsElapsed += 1;
  state.lastSpeedUpAt = now;

  return state.speedUpsElapsed >= config.speedUpsPerLevel ? 'level-complete' : 'speed-up';
}
