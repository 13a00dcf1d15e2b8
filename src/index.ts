/**
 * lane-jumper
 *
 * Terminal side-scrolling jump-and-dodge game for xterm.js and CLI.
 *
 * Library usage (xterm.js):
 *   import { runJumperGame, setTheme } from 'lane-jumper';
 *   setTheme('amber');
 *   const controller = runJumperGame(terminal);
 *   const result = await controller.finished;
 *
 * CLI usage:
 *   npx lane-jumper
 */

export {
  // Game
  runJumperGame,
  runSession,
  runLevel,
  resolveConfig,
  DEFAULT_CONFIG,
  VICTORY_MESSAGE,
  TerminalTooSmallError,
  MIN_PLAYFIELD_WIDTH,
  MIN_PLAYFIELD_HEIGHT,
  type JumperController,
  type JumperOptions,
  type GameConfig,
  type SessionResult,
  type SessionState,
  type LevelResult,
  type LevelEvent,
  type LevelOutcome,

  // Theme utilities
  setTheme,
  getTheme,
  getCurrentThemeColor,
  type PhosphorMode,

  // Terminal buffer management
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  type GameTerminal,
  type Surface,
  type TerminalKeyEvent,
  type Disposable,
} from './games';

export {
  // Audio synthesis
  synthesizeSquareTone,
  synthesizeSineTone,
  synthesizeSilence,
  synthesizeSequence,
  synthesizeBackgroundTrack,
  concatTones,
  DEFAULT_SAMPLE_RATE,
  type ToneBuffer,
  type Note,
} from './audio/synth';

export { createCueBank, JUMP_CUE, HIT_CUE, WIN_FANFARE, FAIL_MOTIF, type CueBank } from './audio/cues';
export {
  createPlaybackDispatcher,
  type AudioSink,
  type PlaybackHandle,
  type PlaybackDispatcher,
  type PlaybackDispatcherOptions,
} from './audio/playback';
export { createSilentSink, createProcessSink, AudioUnavailableError } from './audio/sink';
export { encodeWav } from './audio/wav';
