/**
 * Playback dispatcher
 *
 * Hands immutable tone buffers to an audio sink, either waiting for them
 * to finish (stingers) or firing and forgetting (cues, background track).
 * Sound is cosmetic: the first sink failure switches playback off for the
 * rest of the session and the game carries on silently.
 */

import type { ToneBuffer } from './synth';

// ============================================================================
// Sink contract
// ============================================================================

export interface PlaybackHandle {
  /** Settles when playback ends or is stopped; rejects if the device fails */
  readonly finished: Promise<void>;
  stop(): void;
}

export interface AudioSink {
  play(buffer: ToneBuffer): PlaybackHandle;
}

// ============================================================================
// Dispatcher
// ============================================================================

export interface PlaybackDispatcherOptions {
  sink: AudioSink;
  /** Make jump/hit cues wait for playback like stingers do */
  blockingCues?: boolean;
}

export interface PlaybackDispatcher {
  /** Suspend the caller until the buffer has played. Never rejects. */
  playBlocking(buffer: ToneBuffer): Promise<void>;
  /** Start playback and return immediately */
  playAsync(buffer: ToneBuffer): void;
  /** Short gameplay cue, blocking only when configured so */
  playCue(buffer: ToneBuffer): Promise<void>;
  /** Replace the current background track */
  startBackground(buffer: ToneBuffer): void;
  stopBackground(): void;
  readonly available: boolean;
  readonly failures: number;
  readonly lastError: unknown;
}

export function createPlaybackDispatcher(options: PlaybackDispatcherOptions): PlaybackDispatcher {
  const { sink } = options;
  const blockingCues = options.blockingCues ?? false;

  let available = true;
  let failures = 0;
  let lastError: unknown = undefined;
  let background: PlaybackHandle | null = null;

  function fail(error: unknown): void {
    failures++;
    if (available) {
      available = false;
      lastError = error;
    }
  }

  function submit(buffer: ToneBuffer): PlaybackHandle | null {
    if (!available) return null;
    try {
      return sink.play(buffer);
    } catch (error) {
      fail(error);
      return null;
    }
  }

  function playAsync(buffer: ToneBuffer): PlaybackHandle | null {
    const handle = submit(buffer);
    if (handle) {
      void handle.finished.catch(fail);
    }
    return handle;
  }

  async function playBlocking(buffer: ToneBuffer): Promise<void> {
    const handle = submit(buffer);
    if (!handle) return;
    try {
      await handle.finished;
    } catch (error) {
      fail(error);
    }
  }

  function stopBackground(): void {
    if (!background) return;
    const previous = background;
    background = null;
    try {
      previous.stop();
    } catch (error) {
      fail(error);
    }
  }

  return {
    playBlocking,
    playAsync: (buffer) => {
      playAsync(buffer);
    },
    playCue: (buffer) => {
      if (blockingCues) return playBlocking(buffer);
      playAsync(buffer);
      return Promise.resolve();
    },
    startBackground: (buffer) => {
      stopBackground();
      background = playAsync(buffer);
    },
    stopBackground,
    get available() { return available; },
    get failures() { return failures; },
    get lastError() { return lastError; },
  };
}
