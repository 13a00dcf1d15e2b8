/**
 * lane-jumper
 *
 * Terminal side-scroller for xterm.js and CLI
 *
 * Usage:
 * 1. Set the theme: setTheme('cyan')
 * 2. Run the game: runJumperGame(terminal, { sink })
 * 3. Await controller.finished for the session result
 */

// Re-export utilities
export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
} from './utils';

export type { PhosphorMode } from './utils';
export type { GameTerminal, Surface, TerminalKeyEvent, Disposable } from './terminal';

export {
  runJumperGame,
  runSession,
  runLevel,
  resolveConfig,
  DEFAULT_CONFIG,
  VICTORY_MESSAGE,
  TerminalTooSmallError,
  MIN_PLAYFIELD_WIDTH,
  MIN_PLAYFIELD_HEIGHT,
} from './jumper';

export type {
  JumperController,
  JumperOptions,
  GameConfig,
  SessionResult,
  SessionState,
  LevelResult,
  LevelEvent,
  LevelOutcome,
} from './jumper';
