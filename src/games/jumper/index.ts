/**
 * Lane Jumper
 *
 * Side-scrolling dodge game: hop over incoming obstacles (double jump
 * allowed) and survive three speed-ups per level across three levels.
 * All sound is square-wave PCM synthesized on the fly.
 */

import { createCueBank } from '../../audio/cues';
import { type AudioSink, createPlaybackDispatcher } from '../../audio/playback';
import { createSilentSink } from '../../audio/sink';
import { type RandomSource, defaultRandom } from '../shared/random';
import type { GameTerminal } from '../terminal';
import { enterAlternateBuffer, exitAlternateBuffer } from '../utils';
import { type Clock, systemClock } from './clock';
import { type GameConfig, resolveConfig } from './config';
import { createKeyQueue } from './input';
import { assertPlayfieldFits } from './physics';
import { type SessionResult, runSession } from './session';

/**
 * Lane Jumper Game Controller
 */
export interface JumperController {
  stop: () => void;
  readonly isRunning: boolean;
  /** Settles when the session ends; rejects on TerminalTooSmallError */
  readonly finished: Promise<SessionResult>;
  /** Whether sound survived the session */
  readonly audioAvailable: boolean;
  readonly audioError: unknown;
}

export interface JumperOptions {
  /** Defaults to silence; the CLI passes a process sink */
  sink?: AudioSink;
  config?: Partial<GameConfig>;
  clock?: Clock;
  random?: RandomSource;
}

export function runJumperGame(terminal: GameTerminal, options: JumperOptions = {}): JumperController {
  const config = resolveConfig(options.config);
  const audio = createPlaybackDispatcher({
    sink: options.sink ?? createSilentSink(),
    blockingCues: config.blockingCues,
  });
  const input = createKeyQueue();

  let running = true;

  async function play(): Promise<SessionResult> {
    try {
      assertPlayfieldFits(terminal.cols, terminal.rows);
    } catch (error) {
      running = false;
      throw error;
    }

    enterAlternateBuffer(terminal, 'jumper');
    const keyListener = terminal.onKey(({ domEvent }) => {
      if (!running) return;
      domEvent.preventDefault?.();
      domEvent.stopPropagation?.();
      input.push(domEvent.key);
    });

    try {
      return await runSession({
        config,
        clock: options.clock ?? systemClock,
        input,
        surface: terminal,
        audio,
        cues: createCueBank(config.sampleRate),
        random: options.random ?? defaultRandom,
        shouldStop: () => !running,
      });
    } finally {
      running = false;
      keyListener.dispose();
      exitAlternateBuffer(terminal, 'jumper');
    }
  }

  const finished = play();

  return {
    stop: () => {
      running = false;
      // The loop only notices at its next tick; the music stops now
      audio.stopBackground();
    },
    get isRunning() { return running; },
    finished,
    get audioAvailable() { return audio.available; },
    get audioError() { return audio.lastError; },
  };
}

export { DEFAULT_CONFIG, resolveConfig, type GameConfig } from './config';
export { runSession, VICTORY_MESSAGE, type SessionResult, type SessionState } from './session';
export { runLevel, type LevelResult, type LevelEvent, type LevelOutcome } from './loop';
export { TerminalTooSmallError, MIN_PLAYFIELD_WIDTH, MIN_PLAYFIELD_HEIGHT } from './physics';
