/**
 * Audio sinks
 *
 * The process sink hands a WAV to the platform's command-line player,
 * one child process per buffer. Where no player is known the sink
 * throws on play and the dispatcher falls back to silence.
 */

import { spawn, type ChildProcess } from 'child_process';
import { rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { AudioSink, PlaybackHandle } from './playback';
import type { ToneBuffer } from './synth';
import { encodeWav } from './wav';

export class AudioUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AudioUnavailableError';
  }
}

/**
 * Sink that plays nothing and finishes immediately
 */
export function createSilentSink(): AudioSink {
  return {
    play: () => ({ finished: Promise.resolve(), stop: () => {} }),
  };
}

export interface ProcessSink extends AudioSink {
  /** Players still running */
  readonly liveCount: number;
  /** Kill every running player and remove its temp file, synchronously */
  stopAll(): void;
}

interface LivePlayer {
  stop(): void;
}

/**
 * Wrap a spawned player in a PlaybackHandle. A stop() resolves the handle;
 * a non-zero exit or spawn error rejects it.
 */
function watchPlayer(
  child: ChildProcess,
  command: string,
  live: Set<LivePlayer>,
  cleanup: () => void = () => {},
): PlaybackHandle {
  let stopped = false;
  let cleaned = false;

  function release(): void {
    live.delete(entry);
    if (cleaned) return;
    cleaned = true;
    cleanup();
  }

  function stop(): void {
    if (stopped) return;
    stopped = true;
    child.kill();
  }

  const entry: LivePlayer = {
    stop: () => {
      stop();
      release();
    },
  };
  live.add(entry);

  const finished = new Promise<void>((resolve, reject) => {
    child.once('error', (error) => {
      release();
      reject(new AudioUnavailableError(`${command}: ${error.message}`));
    });
    child.once('close', (code) => {
      release();
      if (stopped || code === 0) resolve();
      else reject(new AudioUnavailableError(`${command} exited with code ${code}`));
    });
  });

  return { finished, stop };
}

let tempCounter = 0;

export function createProcessSink(platform: NodeJS.Platform = process.platform): ProcessSink {
  const live = new Set<LivePlayer>();

  function play(buffer: ToneBuffer): PlaybackHandle {
    if (platform === 'linux') {
      const child = spawn('aplay', ['-q', '-'], { stdio: ['pipe', 'ignore', 'ignore'] });
      const handle = watchPlayer(child, 'aplay', live);
      // EPIPE when aplay dies early; the close handler reports the failure
      child.stdin?.once('error', () => child.kill());
      child.stdin?.end(encodeWav(buffer));
      return handle;
    }

    if (platform === 'darwin') {
      // afplay cannot read stdin
      const file = join(tmpdir(), `lane-jumper-${process.pid}-${tempCounter++}.wav`);
      writeFileSync(file, encodeWav(buffer));
      const child = spawn('afplay', [file], { stdio: 'ignore' });
      return watchPlayer(child, 'afplay', live, () => rmSync(file, { force: true }));
    }

    throw new AudioUnavailableError(`No audio player known for platform "${platform}"`);
  }

  return {
    play,
    get liveCount() { return live.size; },
    stopAll: () => {
      for (const player of [...live]) player.stop();
    },
  };
}
