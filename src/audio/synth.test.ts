import { describe, it, expect } from 'vitest';
import {
  concatTones,
  synthesizeBackgroundTrack,
  synthesizeSequence,
  synthesizeSilence,
  synthesizeSineTone,
  synthesizeSquareTone,
  toneBufferFrom,
  DEFAULT_SAMPLE_RATE,
} from './synth';
import { sequenceRandom } from '../games/shared/random';

const PEAK = 9830; // round(0.3 * 32767)

describe('synthesizeSquareTone', () => {
  it('produces round(duration * rate) samples', () => {
    expect(synthesizeSquareTone(700, 50, 44100).length).toBe(2205);
    expect(synthesizeSquareTone(300, 10, 44100).length).toBe(441);
    expect(synthesizeSquareTone(100, 1.5, 1000).length).toBe(2);
  });

  it('defaults to 44.1 kHz', () => {
    const tone = synthesizeSquareTone(700, 100);
    expect(tone.sampleRate).toBe(DEFAULT_SAMPLE_RATE);
    expect(tone.length).toBe(4410);
    expect(tone.durationMs).toBe(100);
  });

  it('only emits zero or the 30% peak', () => {
    const tone = synthesizeSquareTone(700, 50, 44100);
    const levels = new Set(tone.toArray());
    for (const value of levels) {
      expect([-PEAK, 0, PEAK]).toContain(value);
    }
  });

  it('follows the sign of the underlying sine', () => {
    // 700 Hz at 44.1 kHz: half period is 31.5 samples
    const tone = synthesizeSquareTone(700, 50, 44100);
    expect(tone.sampleAt(0)).toBe(0);
    expect(tone.sampleAt(1)).toBe(PEAK);
    expect(tone.sampleAt(31)).toBe(PEAK);
    expect(tone.sampleAt(32)).toBe(-PEAK);
  });

  it('squares off where a sine would be near zero', () => {
    expect(synthesizeSquareTone(1000, 1, 4000).toArray()).toEqual([0, PEAK, PEAK, -PEAK]);
  });

  it('returns an empty buffer for zero duration', () => {
    expect(synthesizeSquareTone(440, 0, 44100).length).toBe(0);
  });
});

describe('synthesizeSineTone', () => {
  it('scales a sine to 30% of full amplitude', () => {
    expect(synthesizeSineTone(1000, 1, 4000).toArray()).toEqual([0, PEAK, 0, -PEAK]);
  });
});

describe('ToneBuffer', () => {
  it('cannot be changed through copies it hands out', () => {
    const tone = synthesizeSquareTone(700, 50, 44100);
    const copy = tone.toArray();
    copy[1] = 5;
    expect(tone.sampleAt(1)).toBe(PEAK);
    expect(Object.isFrozen(tone)).toBe(true);
  });

  it('reads out of range as silence', () => {
    const tone = synthesizeSilence(1, 1000);
    expect(tone.sampleAt(5)).toBe(0);
  });

  it('encodes little-endian 16-bit PCM', () => {
    const tone = toneBufferFrom([PEAK, -PEAK], 1000);
    expect(Array.from(tone.toPcm16())).toEqual([0x66, 0x26, 0x9a, 0xd9]);
  });

  it('clamps raw values to the int16 range', () => {
    expect(toneBufferFrom([40000, -40000, 1.6], 1000).toArray()).toEqual([32767, -32768, 2]);
  });
});

describe('concatTones', () => {
  it('joins buffers in order', () => {
    const a = toneBufferFrom([1, 2], 1000);
    const b = toneBufferFrom([3], 1000);
    expect(concatTones([a, b], 1000).toArray()).toEqual([1, 2, 3]);
  });

  it('rejects mixed sample rates', () => {
    const a = toneBufferFrom([1], 1000);
    const b = toneBufferFrom([2], 2000);
    expect(() => concatTones([a, b], 1000)).toThrow(RangeError);
  });
});

describe('synthesizeSequence', () => {
  it('puts silent gaps between notes only', () => {
    const notes = [
      { frequencyHz: 500, durationMs: 100 },
      { frequencyHz: 750, durationMs: 100 },
      { frequencyHz: 1125, durationMs: 100 },
    ];
    const seq = synthesizeSequence(notes, 50, 1000);
    expect(seq.length).toBe(400);
    expect(seq.toArray().slice(100, 150).every(v => v === 0)).toBe(true);
    expect(seq.toArray().slice(150, 250)).toEqual(synthesizeSquareTone(750, 100, 1000).toArray());
  });
});

describe('synthesizeBackgroundTrack', () => {
  it('is exactly target seconds long', () => {
    expect(synthesizeBackgroundTrack(1, 2, 8000).length).toBe(16000);
    expect(synthesizeBackgroundTrack(3, 1, 8000).length).toBe(8000);
  });

  it('truncates the last note to hit the target', () => {
    // 0.999 picks the last note (B4) and the longest duration (500 ms = 4000 samples)
    const track = synthesizeBackgroundTrack(1, 0.3, 8000, () => 0.999);
    expect(track.length).toBe(2400);
    expect(track.toArray()).toEqual(synthesizeSquareTone(493.88, 500, 8000).toArray().slice(0, 2400));
  });

  it('raises pitch by 10% per level', () => {
    // 0 picks C4 and the shortest duration (125 ms = 1000 samples)
    const track = synthesizeBackgroundTrack(2, 1, 8000, () => 0);
    expect(track.toArray().slice(0, 1000)).toEqual(synthesizeSquareTone(261.63 * 1.1, 125, 8000).toArray());
  });

  it('draws a note and a duration per step', () => {
    // note index 4 (G4), duration index 1 (250 ms), then C4 / 125 ms
    const random = sequenceRandom([4.5 / 7, 1.5 / 4], 0);
    const track = synthesizeBackgroundTrack(1, 0.5, 8000, random);
    expect(track.toArray().slice(0, 2000)).toEqual(synthesizeSquareTone(392.0, 250, 8000).toArray());
    expect(track.toArray().slice(2000, 3000)).toEqual(synthesizeSquareTone(261.63, 125, 8000).toArray());
  });

  it('rejects levels below 1', () => {
    expect(() => synthesizeBackgroundTrack(0, 1, 8000)).toThrow(RangeError);
    expect(() => synthesizeBackgroundTrack(1.5, 1, 8000)).toThrow(RangeError);
  });
});
