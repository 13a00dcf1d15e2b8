/**
 * WAV container for PCM tone buffers (mono, 16-bit, little-endian)
 */

import type { ToneBuffer } from './synth';

export const WAV_HEADER_BYTES = 44;

const CHANNELS = 1;
const BITS_PER_SAMPLE = 16;

function writeAscii(view: DataView, offset: number, text: string): void {
  for (let i = 0; i < text.length; i++) {
    view.setUint8(offset + i, text.charCodeAt(i));
  }
}

export function encodeWav(buffer: ToneBuffer): Uint8Array {
  const pcm = buffer.toPcm16();
  const blockAlign = CHANNELS * (BITS_PER_SAMPLE / 8);
  const out = new Uint8Array(WAV_HEADER_BYTES + pcm.length);
  const view = new DataView(out.buffer);

  writeAscii(view, 0, 'RIFF');
  view.setUint32(4, 36 + pcm.length, true);
  writeAscii(view, 8, 'WAVE');
  writeAscii(view, 12, 'fmt ');
  view.setUint32(16, 16, true);           // fmt chunk size
  view.setUint16(20, 1, true);            // PCM
  view.setUint16(22, CHANNELS, true);
  view.setUint32(24, buffer.sampleRate, true);
  view.setUint32(28, buffer.sampleRate * blockAlign, true);
  view.setUint16(32, blockAlign, true);
  view.setUint16(34, BITS_PER_SAMPLE, true);
  writeAscii(view, 36, 'data');
  view.setUint32(40, pcm.length, true);

  out.set(pcm, WAV_HEADER_BYTES);
  return out;
}
