/**
 * Lane Jumper - Obstacle stream
 *
 * Obstacles enter at the right edge on a per-tick coin flip, slide left
 * by the current speed, and vanish off the left edge or on impact.
 */

import { type RandomSource, randomInt } from '../shared/random';
import type { PlayerState } from './physics';

export interface Obstacle {
  row: number;
  col: number;
}

export interface ObstacleStream {
  obstacles: Obstacle[];
}

export interface CollisionEvent {
  obstacle: Obstacle;
}

export interface ObstacleTick {
  spawnRate: number;
  speed: number;
  width: number;
  height: number;
  player: Pick<PlayerState, 'laneX' | 'heightY'>;
  random: RandomSource;
}

export function createObstacleStream(): ObstacleStream {
  return { obstacles: [] };
}

/**
 * Spawn, advance, prune, then collide against the player's position
 * for this tick. Colliding obstacles are removed and reported.
 */
export function tickObstacles(stream: ObstacleStream, tick: ObstacleTick): CollisionEvent[] {
  const { width, height, speed, player, random } = tick;

  if (random() < tick.spawnRate) {
    stream.obstacles.push({ row: randomInt(random, 1, height - 2), col: width - 2 });
  }

  for (const obstacle of stream.obstacles) {
    obstacle.col -= speed;
  }

  const collisions: CollisionEvent[] = [];
  const retained: Obstacle[] = [];
  for (const obstacle of stream.obstacles) {
    if (obstacle.col <= 0) continue;
    if (obstacle.col === player.laneX && obstacle.row === player.heightY) {
      collisions.push({ obstacle });
      continue;
    }
    retained.push(obstacle);
  }
  stream.obstacles = retained;

  return collisions;
}
