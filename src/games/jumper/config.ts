/**
 * Lane Jumper - Tunables
 *
 * Startup constants only; a session takes a partial override
 * (CLI flags, tests) merged over DEFAULT_CONFIG.
 */

import { DEFAULT_SAMPLE_RATE } from '../../audio/synth';

export interface GameConfig {
  /** Tick period (ms) */
  tickMs: number;
  /** Added to vertical velocity every tick */
  gravity: number;
  initialSpawnRate: number;
  /** Extra starting spawn rate per level above the first */
  levelSpawnBonus: number;
  spawnIncrease: number;
  maxSpawnRate: number;
  speedUpIntervalMs: number;
  /** Speed-ups that complete a level */
  speedUpsPerLevel: number;
  levelCount: number;
  /** Hold time for completion / game-over / victory banners (ms) */
  bannerPauseMs: number;
  backgroundTrackSeconds: number;
  sampleRate: number;
  /** Make jump and hit cues block the loop */
  blockingCues: boolean;
}

export const DEFAULT_CONFIG: Readonly<GameConfig> = Object.freeze({
  tickMs: 50,
  gravity: 1,
  initialSpawnRate: 0.2,
  levelSpawnBonus: 0.1,
  spawnIncrease: 0.05,
  maxSpawnRate: 1.0,
  speedUpIntervalMs: 10_000,
  speedUpsPerLevel: 3,
  levelCount: 3,
  bannerPauseMs: 3000,
  backgroundTrackSeconds: 30,
  sampleRate: DEFAULT_SAMPLE_RATE,
  blockingCues: false,
});

export function resolveConfig(overrides: Partial<GameConfig> = {}): GameConfig {
  const config: GameConfig = { ...DEFAULT_CONFIG, ...overrides };

  if (!Number.isInteger(config.levelCount) || config.levelCount < 1) {
    throw new RangeError(`levelCount must be a positive integer, got ${config.levelCount}`);
  }
  if (config.tickMs <= 0) {
    throw new RangeError(`tickMs must be positive, got ${config.tickMs}`);
  }
  if (!Number.isInteger(config.speedUpsPerLevel) || config.speedUpsPerLevel < 1) {
    throw new RangeError(`speedUpsPerLevel must be a positive integer, got ${config.speedUpsPerLevel}`);
  }
  if (config.speedUpIntervalMs < 0) {
    throw new RangeError(`speedUpIntervalMs must not be negative, got ${config.speedUpIntervalMs}`);
  }
  if (config.spawnIncrease < 0) {
    throw new RangeError(`spawnIncrease must not be negative, got ${config.spawnIncrease}`);
  }
  if (config.maxSpawnRate <= 0 || config.maxSpawnRate > 1) {
    throw new RangeError(`maxSpawnRate must be within (0, 1], got ${config.maxSpawnRate}`);
  }
  if (!Number.isInteger(config.sampleRate) || config.sampleRate <= 0) {
    throw new RangeError(`sampleRate must be a positive integer, got ${config.sampleRate}`);
  }
  if (config.initialSpawnRate < 0 || config.initialSpawnRate > config.maxSpawnRate) {
    throw new RangeError(`initialSpawnRate must be within [0, ${config.maxSpawnRate}]`);
  }
  return config;
}
