import { afterEach, describe, it, expect, vi } from 'vitest';
import { createRecordingTerminal } from './jumper/testHarness';
import {
  enterAlternateBuffer,
  exitAlternateBuffer,
  getCurrentBannerColor,
  getCurrentThemeColor,
  getTheme,
  isInAlternateBuffer,
  setTheme,
} from './utils';

afterEach(() => {
  setTheme('cyan');
  vi.restoreAllMocks();
});

describe('theme', () => {
  it('defaults to cyan', () => {
    expect(getTheme()).toBe('cyan');
    expect(getCurrentThemeColor()).toBe('\x1b[96m');
    expect(getCurrentBannerColor()).toBe('\x1b[1;96m');
  });

  it('switches colors with the theme', () => {
    setTheme('green');
    expect(getCurrentThemeColor()).toBe('\x1b[92m');
    expect(getCurrentBannerColor()).toBe('\x1b[1;92m');
  });
});

describe('alternate buffer', () => {
  it('enters and exits once', () => {
    const terminal = createRecordingTerminal(40, 15);

    expect(enterAlternateBuffer(terminal, 'test')).toBe(true);
    expect(isInAlternateBuffer(terminal)).toBe(true);
    expect(exitAlternateBuffer(terminal, 'test')).toBe(true);
    expect(isInAlternateBuffer(terminal)).toBe(false);
    expect(terminal.frames).toEqual(['\x1b[?1049h', '\x1b[?25l', '\x1b[2J\x1b[H', '\x1b[?1049l', '\x1b[?25h']);
  });

  it('warns instead of entering twice', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const terminal = createRecordingTerminal(40, 15);

    enterAlternateBuffer(terminal, 'first');
    expect(enterAlternateBuffer(terminal, 'second')).toBe(false);
    expect(warn).toHaveBeenCalledWith('[AlternateBuffer] Already in buffer (entered by: first), requested by: second');
    expect(terminal.frames).toHaveLength(3);
  });

  it('warns on exit without entry', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const terminal = createRecordingTerminal(40, 15);

    expect(exitAlternateBuffer(terminal, 'stray')).toBe(false);
    expect(warn).toHaveBeenCalledWith('[AlternateBuffer] Not in alternate buffer, exit requested by: stray');
    expect(terminal.frames).toEqual([]);
  });
});
