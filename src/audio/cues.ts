/**
 * Precomputed one-shot sounds
 *
 * Short cues (jump, hit) and the longer stingers that gate a screen
 * transition (win fanfare, fail motif). Built once per session.
 */

import { type Note, type ToneBuffer, DEFAULT_SAMPLE_RATE, synthesizeSequence, synthesizeSquareTone } from './synth';

export const JUMP_CUE: Note = { frequencyHz: 700, durationMs: 50 };
export const HIT_CUE: Note = { frequencyHz: 300, durationMs: 50 };

/** Rising fanfare, each step +50% */
export const WIN_FANFARE: readonly Note[] = [
  { frequencyHz: 500, durationMs: 100 },
  { frequencyHz: 750, durationMs: 100 },
  { frequencyHz: 1125, durationMs: 100 },
];
const WIN_GAP_MS = 50;

/** "Wah wah waaah", each step roughly -33% */
export const FAIL_MOTIF: readonly Note[] = [
  { frequencyHz: 450, durationMs: 660 },
  { frequencyHz: 300, durationMs: 660 },
  { frequencyHz: 200, durationMs: 1000 },
];
const FAIL_GAP_MS = 100;

export interface CueBank {
  readonly jump: ToneBuffer;
  readonly hit: ToneBuffer;
  readonly win: ToneBuffer;
  readonly fail: ToneBuffer;
}

export function createCueBank(sampleRate: number = DEFAULT_SAMPLE_RATE): CueBank {
  return {
    jump: synthesizeSquareTone(JUMP_CUE.frequencyHz, JUMP_CUE.durationMs, sampleRate),
    hit: synthesizeSquareTone(HIT_CUE.frequencyHz, HIT_CUE.durationMs, sampleRate),
    win: synthesizeSequence(WIN_FANFARE, WIN_GAP_MS, sampleRate),
    fail: synthesizeSequence(FAIL_MOTIF, FAIL_GAP_MS, sampleRate),
  };
}
