import { describe, it, expect } from 'vitest';
import { encodeWav, WAV_HEADER_BYTES } from './wav';
import { synthesizeSilence, toneBufferFrom } from './synth';

function ascii(bytes: Uint8Array, start: number, length: number): string {
  return String.fromCharCode(...bytes.slice(start, start + length));
}

describe('encodeWav', () => {
  it('writes a mono 16-bit PCM header', () => {
    const wav = encodeWav(synthesizeSilence(10, 1000));
    const view = new DataView(wav.buffer);

    expect(wav.length).toBe(WAV_HEADER_BYTES + 20);
    expect(ascii(wav, 0, 4)).toBe('RIFF');
    expect(view.getUint32(4, true)).toBe(56);
    expect(ascii(wav, 8, 4)).toBe('WAVE');
    expect(ascii(wav, 12, 4)).toBe('fmt ');
    expect(view.getUint16(20, true)).toBe(1);
    expect(view.getUint16(22, true)).toBe(1);
    expect(view.getUint32(24, true)).toBe(1000);
    expect(view.getUint32(28, true)).toBe(2000);
    expect(view.getUint16(32, true)).toBe(2);
    expect(view.getUint16(34, true)).toBe(16);
    expect(ascii(wav, 36, 4)).toBe('data');
    expect(view.getUint32(40, true)).toBe(20);
  });

  it('appends the samples after the header', () => {
    const wav = encodeWav(toneBufferFrom([1, -1], 8000));
    expect(Array.from(wav.slice(WAV_HEADER_BYTES))).toEqual([0x01, 0x00, 0xff, 0xff]);
  });
});
