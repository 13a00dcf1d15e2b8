import { afterEach, describe, it, expect } from 'vitest';
import { getThemeColors } from '../../themes';
import { getCurrentThemeColor, setTheme } from '../utils';
import { formatStatus, moveTo, renderBanner, renderBorder, renderFrame } from './render';

const status = { level: 1, levelCount: 3, speed: 1, spawnRate: 0.2, lives: 1 };

afterEach(() => {
  setTheme('cyan');
});

describe('moveTo', () => {
  it('converts grid cells to 1-based cursor moves', () => {
    expect(moveTo(0, 0)).toBe('\x1b[1;1H');
    expect(moveTo(13, 10)).toBe('\x1b[14;11H');
  });
});

describe('formatStatus', () => {
  it('shows level, speed, spawn rate and lives', () => {
    expect(formatStatus(status)).toBe('Lvl:1/3 Spd:1 Spawn:0.20 Life:1');
    expect(formatStatus({ level: 3, levelCount: 3, speed: 6, spawnRate: 0.55, lives: 4 }))
      .toBe('Lvl:3/3 Spd:6 Spawn:0.55 Life:4');
  });
});

describe('renderBorder', () => {
  it('draws box corners and sides', () => {
    expect(renderBorder(4, 3, 'C')).toBe(
      '\x1b[1;1HC┌──┐' +
      '\x1b[2;1H│\x1b[2;4H│' +
      '\x1b[3;1H└──┘\x1b[0m',
    );
  });
});

describe('renderFrame', () => {
  const field = { width: 40, height: 15 };

  it('draws border, player, obstacles and status in order', () => {
    const frame = renderFrame({
      field,
      player: { laneX: 10, heightY: 13 },
      obstacles: [{ row: 4, col: 30 }],
      status,
    });

    expect(frame).toBe(
      '\x1b[2J\x1b[H' +
      renderBorder(40, 15, getCurrentThemeColor()) +
      '\x1b[14;11H\x1b[94m^\x1b[0m' +
      '\x1b[5;31H\x1b[91m-\x1b[0m' +
      '\x1b[1;3H\x1b[97mLvl:1/3 Spd:1 Spawn:0.20 Life:1\x1b[0m',
    );
  });

  it('clips the status line inside the top corners', () => {
    const frame = renderFrame({ field: { width: 20, height: 8 }, player: { laneX: 5, heightY: 6 }, obstacles: [], status });
    expect(frame.endsWith('\x1b[1;3H\x1b[97mLvl:1/3 Spd:1 Sp\x1b[0m')).toBe(true);
  });

  it('uses the theme color for the border', () => {
    setTheme('amber');
    const frame = renderFrame({ field, player: { laneX: 10, heightY: 13 }, obstacles: [], status });
    expect(frame.startsWith(`\x1b[2J\x1b[H\x1b[1;1H${getThemeColors('amber').accent}┌`)).toBe(true);
  });
});

describe('renderBanner', () => {
  it('centers the message', () => {
    expect(renderBanner(40, 15, 'GAME OVER')).toBe(
      `\x1b[2J\x1b[H\x1b[8;16H${getThemeColors('cyan').banner}GAME OVER\x1b[0m`,
    );
  });

  it('starts at the left edge when the message is wider than the surface', () => {
    const message = 'CONGRATULATIONS! YOU WON!';
    expect(renderBanner(20, 8, message)).toBe(
      `\x1b[2J\x1b[H\x1b[5;1H${getThemeColors('cyan').banner}${message}\x1b[0m`,
    );
  });
});
