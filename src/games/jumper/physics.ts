/**
 * Lane Jumper - Playfield and player physics
 *
 * Integer physics on the text grid: the marker slides along the lane,
 * jumps (twice at most before landing) and falls back under gravity.
 */

// ============================================================================
// Types
// ============================================================================

export type Command = 'left' | 'right' | 'jump' | 'quit' | 'none';
export type MoveCommand = Exclude<Command, 'quit'>;

/** Which jump an input produced, if any */
export type JumpResult = 'first' | 'second' | 'none';

export interface JumpVelocities {
  first: number;
  second: number;
}

export interface Playfield {
  width: number;
  height: number;
  /** Row the player stands on */
  groundY: number;
  /** Highest row the player may reach */
  topBound: number;
  playHeight: number;
  gravity: number;
  jump: JumpVelocities;
}

export interface PlayerState {
  laneX: number;
  heightY: number;
  verticalVelocity: number;
  onGround: boolean;
  jumpsUsed: number; // 0..2
}

// ============================================================================
// Playfield
// ============================================================================

export const MIN_PLAYFIELD_WIDTH = 20;
export const MIN_PLAYFIELD_HEIGHT = 8;

/** Peak height of each jump as a fraction of the play height */
const FIRST_JUMP_PEAK = 0.18;
const SECOND_JUMP_PEAK = 0.36;

export class TerminalTooSmallError extends Error {
  constructor(
    readonly required: { cols: number; rows: number },
    readonly actual: { cols: number; rows: number },
  ) {
    super(`Terminal too small: need ${required.cols}×${required.rows}, have ${actual.cols}×${actual.rows}`);
    this.name = 'TerminalTooSmallError';
  }
}

export function assertPlayfieldFits(cols: number, rows: number): void {
  if (cols < MIN_PLAYFIELD_WIDTH || rows < MIN_PLAYFIELD_HEIGHT) {
    throw new TerminalTooSmallError(
      { cols: MIN_PLAYFIELD_WIDTH, rows: MIN_PLAYFIELD_HEIGHT },
      { cols, rows },
    );
  }
}

/**
 * Launch velocities for a jump that peaks at the given height:
 * v = -round(sqrt(2 * g * h))
 */
export function deriveJumpVelocities(gravity: number, playHeight: number): JumpVelocities {
  return {
    first: -Math.round(Math.sqrt(2 * gravity * FIRST_JUMP_PEAK * playHeight)),
    second: -Math.round(Math.sqrt(2 * gravity * SECOND_JUMP_PEAK * playHeight)),
  };
}

export function createPlayfield(width: number, height: number, gravity: number): Playfield {
  assertPlayfieldFits(width, height);
  const groundY = height - 2;
  const topBound = 1;
  const playHeight = groundY - topBound;
  return {
    width,
    height,
    groundY,
    topBound,
    playHeight,
    gravity,
    jump: deriveJumpVelocities(gravity, playHeight),
  };
}

// ============================================================================
// Player
// ============================================================================

export function createPlayerState(field: Playfield): PlayerState {
  return {
    laneX: Math.floor(field.width / 4),
    heightY: field.groundY,
    verticalVelocity: 0,
    onGround: true,
    jumpsUsed: 0,
  };
}

export function applyInput(player: PlayerState, command: MoveCommand, field: Playfield): JumpResult {
  switch (command) {
    case 'left':
      player.laneX = Math.max(1, player.laneX - 1);
      return 'none';
    case 'right':
      player.laneX = Math.min(field.width - 2, player.laneX + 1);
      return 'none';
    case 'jump':
      if (player.onGround) {
        player.verticalVelocity = field.jump.first;
        player.onGround = false;
        player.jumpsUsed = 1;
        return 'first';
      }
      if (player.jumpsUsed === 1) {
        player.verticalVelocity = field.jump.second;
        player.jumpsUsed = 2;
        return 'second';
      }
      return 'none';
    case 'none':
      return 'none';
  }
}

/**
 * One tick of gravity. Runs after input every tick.
 */
export function advanceGravity(player: PlayerState, field: Playfield): void {
  player.heightY += player.verticalVelocity;
  player.verticalVelocity += field.gravity;

  if (player.heightY >= field.groundY) {
    player.heightY = field.groundY;
    player.verticalVelocity = 0;
    player.onGround = true;
    player.jumpsUsed = 0;
  }
  if (player.heightY < field.topBound) {
    player.heightY = field.topBound;
    player.verticalVelocity = 0;
  }
}
