/**
 * Lane Jumper - Rendering
 *
 * Builds whole-frame ANSI strings; the loop writes one per tick.
 * Grid coordinates are 0-based (row, col); escape sequences are 1-based.
 */

import { ANSI_RESET as RESET } from '../../themes';
import { getCurrentBannerColor, getCurrentThemeColor } from '../utils';
import type { Obstacle } from './obstacles';
import type { PlayerState, Playfield } from './physics';

export const PLAYER_GLYPH = '^';
export const OBSTACLE_GLYPH = '-';

const PLAYER_COLOR = '\x1b[94m';
const OBSTACLE_COLOR = '\x1b[91m';
const STATUS_COLOR = '\x1b[97m';
const CLEAR = '\x1b[2J\x1b[H';

export interface StatusLine {
  level: number;
  levelCount: number;
  speed: number;
  spawnRate: number;
  lives: number;
}

export interface FrameView {
  field: Pick<Playfield, 'width' | 'height'>;
  player: Pick<PlayerState, 'laneX' | 'heightY'>;
  obstacles: readonly Obstacle[];
  status: StatusLine;
}

/** Cursor move to a 0-based grid cell */
export function moveTo(row: number, col: number): string {
  return `\x1b[${row + 1};${col + 1}H`;
}

export function formatStatus(status: StatusLine): string {
  return `Lvl:${status.level}/${status.levelCount} Spd:${status.speed} Spawn:${status.spawnRate.toFixed(2)} Life:${status.lives}`;
}

export function renderBorder(width: number, height: number, color: string): string {
  let output = `${moveTo(0, 0)}${color}┌${'─'.repeat(width - 2)}┐`;
  for (let row = 1; row < height - 1; row++) {
    output += `${moveTo(row, 0)}│${moveTo(row, width - 1)}│`;
  }
  output += `${moveTo(height - 1, 0)}└${'─'.repeat(width - 2)}┘${RESET}`;
  return output;
}

export function renderFrame(view: FrameView): string {
  const { field, player, obstacles, status } = view;

  let output = CLEAR;
  output += renderBorder(field.width, field.height, getCurrentThemeColor());
  output += `${moveTo(player.heightY, player.laneX)}${PLAYER_COLOR}${PLAYER_GLYPH}${RESET}`;

  for (const obstacle of obstacles) {
    output += `${moveTo(obstacle.row, obstacle.col)}${OBSTACLE_COLOR}${OBSTACLE_GLYPH}${RESET}`;
  }

  // Status sits on the top border, clipped to stay inside the corners
  const text = formatStatus(status).slice(0, Math.max(0, field.width - 4));
  output += `${moveTo(0, 2)}${STATUS_COLOR}${text}${RESET}`;

  return output;
}

/**
 * Full-screen message centered on the surface
 */
export function renderBanner(cols: number, rows: number, message: string): string {
  const row = Math.floor(rows / 2);
  const col = Math.max(0, Math.floor((cols - message.length) / 2));
  return `${CLEAR}${moveTo(row, col)}${getCurrentBannerColor()}${message}${RESET}`;
}
