/**
 * Lane Jumper - Key queue
 *
 * Key events arrive asynchronously from the terminal; the loop polls at
 * most one command per tick and never waits for one.
 */

import type { Command } from './physics';

/** Buffered keys beyond this are dropped */
const MAX_QUEUED_COMMANDS = 16;

export interface InputSource {
  poll(): Command;
}

export interface KeyQueue extends InputSource {
  push(key: string): void;
  clear(): void;
  readonly size: number;
}

export function keyToCommand(key: string): Command {
  switch (key) {
    case 'ArrowLeft':
    case 'a':
    case 'A':
      return 'left';
    case 'ArrowRight':
    case 'd':
    case 'D':
      return 'right';
    case ' ':
    case 'ArrowUp':
    case 'w':
    case 'W':
      return 'jump';
    case 'q':
    case 'Q':
    case 'Escape':
      return 'quit';
    default:
      return 'none';
  }
}

export function createKeyQueue(): KeyQueue {
  const queue: Command[] = [];
  return {
    push: (key) => {
      const command = keyToCommand(key);
      if (command === 'none') return;
      // Quit always gets through, even behind a full queue
      if (command === 'quit') {
        queue.length = 0;
        queue.push(command);
        return;
      }
      if (queue.length < MAX_QUEUED_COMMANDS) queue.push(command);
    },
    poll: () => queue.shift() ?? 'none',
    clear: () => {
      queue.length = 0;
    },
    get size() { return queue.length; },
  };
}
