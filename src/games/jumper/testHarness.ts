/**
 * In-process stand-ins for the terminal, keyboard and audio device,
 * shared by the loop, session and controller tests.
 */

import type { AudioSink, PlaybackHandle } from '../../audio/playback';
import type { ToneBuffer } from '../../audio/synth';
import type { Disposable, GameTerminal, TerminalKeyEvent } from '../terminal';
import type { InputSource } from './input';
import type { Command } from './physics';

export interface RecordingSink extends AudioSink {
  readonly played: ToneBuffer[];
  readonly stopped: ToneBuffer[];
}

export function createRecordingSink(): RecordingSink {
  const played: ToneBuffer[] = [];
  const stopped: ToneBuffer[] = [];
  return {
    played,
    stopped,
    play: (buffer): PlaybackHandle => {
      played.push(buffer);
      return { finished: Promise.resolve(), stop: () => { stopped.push(buffer); } };
    },
  };
}

export interface RecordingTerminal extends GameTerminal {
  readonly frames: string[];
  press(key: string): void;
  readonly listenerCount: number;
}

export function createRecordingTerminal(cols: number, rows: number): RecordingTerminal {
  const frames: string[] = [];
  const listeners: ((event: TerminalKeyEvent) => void)[] = [];
  return {
    cols,
    rows,
    frames,
    write: (data) => {
      frames.push(data);
    },
    onKey: (listener): Disposable => {
      listeners.push(listener);
      return {
        dispose: () => {
          const idx = listeners.indexOf(listener);
          if (idx !== -1) listeners.splice(idx, 1);
        },
      };
    },
    press: (key) => {
      for (const listener of [...listeners]) listener({ key, domEvent: { key } });
    },
    get listenerCount() { return listeners.length; },
  };
}

export interface ScriptedInput extends InputSource {
  readonly polls: number;
}

/**
 * Returns commands keyed by poll index (0-based); 'none' elsewhere
 */
export function createScriptedInput(script: Record<number, Command> = {}): ScriptedInput {
  let polls = 0;
  return {
    poll: () => script[polls++] ?? 'none',
    get polls() { return polls; },
  };
}
