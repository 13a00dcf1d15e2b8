/**
 * Lane Jumper - Frame scheduler
 *
 * Fixed-tick loop for one level. Within a tick the order is fixed:
 * difficulty, input, gravity, obstacles and collisions, render, throttle.
 * Collisions must see the player position from the same tick.
 */

import type { CueBank } from '../../audio/cues';
import type { PlaybackDispatcher } from '../../audio/playback';
import type { RandomSource } from '../shared/random';
import type { Surface } from '../terminal';
import type { Clock } from './clock';
import type { GameConfig } from './config';
import { type DifficultyState, advanceDifficulty, createDifficulty } from './difficulty';
import type { InputSource } from './input';
import { type ObstacleStream, type Obstacle, createObstacleStream, tickObstacles } from './obstacles';
import {
  type JumpResult,
  type PlayerState,
  type Playfield,
  advanceGravity,
  applyInput,
  createPlayerState,
  createPlayfield,
} from './physics';
import { renderBanner, renderFrame } from './render';

// ============================================================================
// Types
// ============================================================================

export type LevelOutcome = 'completed' | 'game-over' | 'quit';

export interface LevelResult {
  completed: boolean;
  livesRemaining: number;
  reason: LevelOutcome;
}

/** Observable moments inside a level */
export type LevelEvent =
  | { type: 'speed-up'; at: number; speed: number; spawnRate: number; speedUpsElapsed: number }
  | { type: 'jump'; at: number; jump: Exclude<JumpResult, 'none'> }
  | { type: 'collision'; at: number; obstacle: Obstacle; livesRemaining: number };

export interface TickSnapshot {
  tick: number;
  at: number;
  player: Readonly<PlayerState>;
  obstacles: readonly Obstacle[];
  difficulty: Readonly<DifficultyState>;
  lives: number;
}

export interface LevelDeps {
  config: GameConfig;
  clock: Clock;
  input: InputSource;
  surface: Surface;
  audio: PlaybackDispatcher;
  cues: CueBank;
  random: RandomSource;
  /** Checked at the top of every tick; true ends the level as a quit */
  shouldStop?: () => boolean;
  onEvent?: (event: LevelEvent) => void;
  /** Called after each rendered tick with a copy of the tick's state */
  onTick?: (snapshot: TickSnapshot) => void;
}

interface LevelState {
  level: number;
  lives: number;
  field: Playfield;
  player: PlayerState;
  stream: ObstacleStream;
  difficulty: DifficultyState;
}

// ============================================================================
// Loop
// ============================================================================

async function showBanner(deps: LevelDeps, message: string): Promise<void> {
  deps.surface.write(renderBanner(deps.surface.cols, deps.surface.rows, message));
  await deps.clock.sleep(deps.config.bannerPauseMs);
}

function render(state: LevelState, deps: LevelDeps): void {
  deps.surface.write(renderFrame({
    field: state.field,
    player: state.player,
    obstacles: state.stream.obstacles,
    status: {
      level: state.level,
      levelCount: deps.config.levelCount,
      speed: state.difficulty.speed,
      spawnRate: state.difficulty.spawnRate,
      lives: state.lives,
    },
  }));
}

/**
 * Run one level to completion, game over or quit.
 * The playfield takes the surface size at level start and keeps it.
 */
export async function runLevel(level: number, startingLives: number, deps: LevelDeps): Promise<LevelResult> {
  const { config, clock, input, audio, cues, random } = deps;

  const field = createPlayfield(deps.surface.cols, deps.surface.rows, config.gravity);
  const state: LevelState = {
    level,
    lives: startingLives,
    field,
    player: createPlayerState(field),
    stream: createObstacleStream(),
    difficulty: createDifficulty(level, clock.now(), config),
  };

  for (let tick = 0; ; tick++) {
    const tickStart = clock.now();

    if (deps.shouldStop?.()) {
      return { completed: false, livesRemaining: state.lives, reason: 'quit' };
    }

    // Difficulty
    const status = advanceDifficulty(state.difficulty, tickStart, config);
    if (status !== 'running') {
      deps.onEvent?.({
        type: 'speed-up',
        at: tickStart,
        speed: state.difficulty.speed,
        spawnRate: state.difficulty.spawnRate,
        speedUpsElapsed: state.difficulty.speedUpsElapsed,
      });
    }
    if (status === 'level-complete') {
      await audio.playBlocking(cues.win);
      await showBanner(deps, `Level ${level} Complete!`);
      return { completed: true, livesRemaining: state.lives, reason: 'completed' };
    }

    // Input
    const command = input.poll();
    if (command === 'quit') {
      return { completed: false, livesRemaining: state.lives, reason: 'quit' };
    }
    const jump = applyInput(state.player, command, field);
    if (jump !== 'none') {
      deps.onEvent?.({ type: 'jump', at: tickStart, jump });
      await audio.playCue(cues.jump);
    }

    // Gravity
    advanceGravity(state.player, field);

    // Obstacles
    const collisions = tickObstacles(state.stream, {
      spawnRate: state.difficulty.spawnRate,
      speed: state.difficulty.speed,
      width: field.width,
      height: field.height,
      player: state.player,
      random,
    });

    for (const collision of collisions) {
      await audio.playCue(cues.hit);
      if (state.lives > 0) {
        state.lives -= 1;
        deps.onEvent?.({ type: 'collision', at: tickStart, obstacle: collision.obstacle, livesRemaining: state.lives });
        continue;
      }
      deps.onEvent?.({ type: 'collision', at: tickStart, obstacle: collision.obstacle, livesRemaining: 0 });
      await audio.playBlocking(cues.fail);
      await showBanner(deps, 'GAME OVER');
      return { completed: false, livesRemaining: 0, reason: 'game-over' };
    }

    // Render
    render(state, deps);
    deps.onTick?.({
      tick,
      at: tickStart,
      player: { ...state.player },
      obstacles: state.stream.obstacles.map(obstacle => ({ ...obstacle })),
      difficulty: { ...state.difficulty },
      lives: state.lives,
    });

    // Throttle
    const elapsed = clock.now() - tickStart;
    if (elapsed < config.tickMs) {
      await clock.sleep(config.tickMs - elapsed);
    }
  }
}
