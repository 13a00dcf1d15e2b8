import { describe, it, expect } from 'vitest';
import { createKeyQueue, keyToCommand } from './input';

describe('keyToCommand', () => {
  it.each([
    ['ArrowLeft', 'left'],
    ['a', 'left'],
    ['A', 'left'],
    ['ArrowRight', 'right'],
    ['d', 'right'],
    ['D', 'right'],
    [' ', 'jump'],
    ['ArrowUp', 'jump'],
    ['w', 'jump'],
    ['q', 'quit'],
    ['Q', 'quit'],
    ['Escape', 'quit'],
    ['ArrowDown', 'none'],
    ['Enter', 'none'],
    ['x', 'none'],
  ])('maps %j to %s', (key, command) => {
    expect(keyToCommand(key)).toBe(command);
  });
});

describe('createKeyQueue', () => {
  it('returns none when nothing is queued', () => {
    expect(createKeyQueue().poll()).toBe('none');
  });

  it('hands out one command per poll in arrival order', () => {
    const queue = createKeyQueue();
    queue.push('a');
    queue.push(' ');
    queue.push('d');

    expect(queue.poll()).toBe('left');
    expect(queue.poll()).toBe('jump');
    expect(queue.poll()).toBe('right');
    expect(queue.poll()).toBe('none');
  });

  it('ignores unmapped keys', () => {
    const queue = createKeyQueue();
    queue.push('x');
    queue.push('Enter');
    expect(queue.size).toBe(0);
  });

  it('drops keys once full', () => {
    const queue = createKeyQueue();
    for (let i = 0; i < 20; i++) queue.push('a');
    expect(queue.size).toBe(16);
  });

  it('lets quit jump the queue', () => {
    const queue = createKeyQueue();
    for (let i = 0; i < 16; i++) queue.push('d');
    queue.push('q');

    expect(queue.size).toBe(1);
    expect(queue.poll()).toBe('quit');
  });

  it('clears pending commands', () => {
    const queue = createKeyQueue();
    queue.push('a');
    queue.clear();
    expect(queue.poll()).toBe('none');
  });
});
