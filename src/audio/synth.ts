/**
 * Tone synthesis
 *
 * Turns (frequency, duration) pairs into signed 16-bit mono PCM and
 * composes the randomized per-level background track. Everything here is
 * pure computation; nothing touches an audio device.
 */

import { type RandomSource, defaultRandom, pick } from '../games/shared/random';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_SAMPLE_RATE = 44100;

/** Fraction of full scale used for every generated waveform */
export const TONE_AMPLITUDE = 0.3;

const INT16_MAX = 32767;

/** C major, C4..B4 */
export const DIATONIC_NOTES: readonly number[] = [261.63, 293.66, 329.63, 349.23, 392.0, 440.0, 493.88];

/** Note lengths the background track chooses from (ms) */
export const NOTE_DURATIONS_MS: readonly number[] = [125, 250, 375, 500];

/** Per-level pitch raise: level n plays at 1 + 0.1*(n-1) times the base pitch */
const LEVEL_PITCH_STEP = 0.1;

// ============================================================================
// ToneBuffer
// ============================================================================

/**
 * Immutable PCM buffer. Samples are readable one at a time or as a copy;
 * the backing store is never handed out.
 */
export interface ToneBuffer {
  readonly sampleRate: number;
  readonly length: number;
  readonly durationMs: number;
  sampleAt(index: number): number;
  toArray(): number[];
  /** Little-endian 16-bit PCM bytes */
  toPcm16(): Uint8Array;
}

const storage = new WeakMap<ToneBuffer, Int16Array>();

function wrap(samples: Int16Array, sampleRate: number): ToneBuffer {
  const buffer: ToneBuffer = {
    sampleRate,
    length: samples.length,
    durationMs: (samples.length / sampleRate) * 1000,
    sampleAt: (index) => samples[index] ?? 0,
    toArray: () => Array.from(samples),
    toPcm16: () => {
      const bytes = new Uint8Array(samples.length * 2);
      const view = new DataView(bytes.buffer);
      for (let i = 0; i < samples.length; i++) {
        view.setInt16(i * 2, samples[i], true);
      }
      return bytes;
    },
  };
  storage.set(buffer, samples);
  return Object.freeze(buffer);
}

function samplesOf(buffer: ToneBuffer): Int16Array {
  const samples = storage.get(buffer);
  if (samples) return samples;
  // Buffers built outside this module: copy through the public reader
  return Int16Array.from(buffer.toArray());
}

/**
 * Build a buffer from raw sample values (copied, clamped to int16)
 */
export function toneBufferFrom(values: ArrayLike<number>, sampleRate: number): ToneBuffer {
  return wrap(Int16Array.from(values, v => Math.max(-INT16_MAX - 1, Math.min(INT16_MAX, Math.round(v)))), sampleRate);
}

function sampleCount(durationMs: number, sampleRate: number): number {
  return Math.max(0, Math.round((durationMs / 1000) * sampleRate));
}

// ============================================================================
// Waveforms
// ============================================================================

function synthesize(
  shape: (phase: number) => number,
  frequencyHz: number,
  durationMs: number,
  sampleRate: number,
): ToneBuffer {
  const count = sampleCount(durationMs, sampleRate);
  const samples = new Int16Array(count);
  const scale = TONE_AMPLITUDE * INT16_MAX;
  for (let i = 0; i < count; i++) {
    const phase = 2 * Math.PI * frequencyHz * (i / sampleRate);
    samples[i] = Math.round(shape(phase) * scale);
  }
  return wrap(samples, sampleRate);
}

/**
 * Square wave: the sign of a sine at the given frequency, at 30% amplitude.
 * Used for every cue, stinger and the background track.
 */
export function synthesizeSquareTone(
  frequencyHz: number,
  durationMs: number,
  sampleRate: number = DEFAULT_SAMPLE_RATE,
): ToneBuffer {
  return synthesize(phase => Math.sign(Math.sin(phase)), frequencyHz, durationMs, sampleRate);
}

/**
 * Plain sine at 30% amplitude
 */
export function synthesizeSineTone(
  frequencyHz: number,
  durationMs: number,
  sampleRate: number = DEFAULT_SAMPLE_RATE,
): ToneBuffer {
  return synthesize(Math.sin, frequencyHz, durationMs, sampleRate);
}

export function synthesizeSilence(durationMs: number, sampleRate: number = DEFAULT_SAMPLE_RATE): ToneBuffer {
  return wrap(new Int16Array(sampleCount(durationMs, sampleRate)), sampleRate);
}

// ============================================================================
// Composition
// ============================================================================

/**
 * Join buffers end to end. All parts must share one sample rate.
 */
export function concatTones(parts: readonly ToneBuffer[], sampleRate: number = DEFAULT_SAMPLE_RATE): ToneBuffer {
  let total = 0;
  for (const part of parts) {
    if (part.sampleRate !== sampleRate) {
      throw new RangeError(`Sample rate mismatch: expected ${sampleRate}, got ${part.sampleRate}`);
    }
    total += part.length;
  }

  const samples = new Int16Array(total);
  let offset = 0;
  for (const part of parts) {
    samples.set(samplesOf(part), offset);
    offset += part.length;
  }
  return wrap(samples, sampleRate);
}

export interface Note {
  frequencyHz: number;
  durationMs: number;
}

/**
 * Square-wave notes separated by silent gaps (no gap after the last note)
 */
export function synthesizeSequence(
  notes: readonly Note[],
  gapMs: number,
  sampleRate: number = DEFAULT_SAMPLE_RATE,
): ToneBuffer {
  const parts: ToneBuffer[] = [];
  notes.forEach((note, i) => {
    parts.push(synthesizeSquareTone(note.frequencyHz, note.durationMs, sampleRate));
    if (gapMs > 0 && i < notes.length - 1) {
      parts.push(synthesizeSilence(gapMs, sampleRate));
    }
  });
  return concatTones(parts, sampleRate);
}

/**
 * Random diatonic melody of exactly targetSeconds * sampleRate samples.
 * Higher levels play proportionally higher.
 */
export function synthesizeBackgroundTrack(
  level: number,
  targetSeconds: number,
  sampleRate: number = DEFAULT_SAMPLE_RATE,
  random: RandomSource = defaultRandom,
): ToneBuffer {
  if (!Number.isInteger(level) || level < 1) {
    throw new RangeError(`Level must be a positive integer, got ${level}`);
  }

  const target = Math.round(targetSeconds * sampleRate);
  const pitch = 1 + LEVEL_PITCH_STEP * (level - 1);
  const samples = new Int16Array(target);

  let filled = 0;
  while (filled < target) {
    const frequency = pick(random, DIATONIC_NOTES) * pitch;
    const duration = pick(random, NOTE_DURATIONS_MS);
    const note = samplesOf(synthesizeSquareTone(frequency, duration, sampleRate));
    const take = Math.min(note.length, target - filled);
    if (take === 0) break;
    samples.set(note.subarray(0, take), filled);
    filled += take;
  }

  return wrap(samples, sampleRate);
}
