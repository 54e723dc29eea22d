/**
 * RIFF/WAVE container for 8-bit unsigned mono PCM.
 *
 * Layout (little-endian):
 *   0x00 "RIFF" <riff size> "WAVE"
 *   0x0C "fmt " 16, format 1, channels 1, rate, byte rate, align 1, bits 8
 *   0x24 "data" <data size> <samples> [pad]
 *
 * Chunks of odd length are followed by one pad byte, counted in the RIFF
 * size but not in the chunk's own size.
 */
import type { PcmSink } from './types';
import { writeFileAtomic } from './atomicWrite';

export const WAV_HEADER_SIZE = 44;
const PCM_FORMAT = 1;
const CHANNELS = 1;
const BITS_PER_SAMPLE = 8;

function writeAscii(view: DataView, offset: number, s: string): void {
  for (let i = 0; i < s.length; i++) view.setUint8(offset + i, s.charCodeAt(i));
}

export function readAscii(bytes: Uint8Array, offset: number, length: number): string {
  let s = '';
  for (let i = 0; i < length; i++) s += String.fromCharCode(bytes[offset + i]);
  return s;
}

/** 44-byte header for a file holding `dataSize` samples and nothing else. */
export function encodeWavHeader(dataSize: number, sampleRate: number): Uint8Array {
  const header = new Uint8Array(WAV_HEADER_SIZE);
  const view = new DataView(header.buffer);
  const padded = dataSize + (dataSize & 1);
  const blockAlign = CHANNELS * (BITS_PER_SAMPLE / 8);

  writeAscii(view, 0, 'RIFF');
  view.setUint32(4, WAV_HEADER_SIZE - 8 + padded, true);
  writeAscii(view, 8, 'WAVE');
  writeAscii(view, 12, 'fmt ');
  view.setUint32(16, 16, true);
  view.setUint16(20, PCM_FORMAT, true);
  view.setUint16(22, CHANNELS, true);
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, sampleRate * blockAlign, true);
  view.setUint16(32, blockAlign, true);
  view.setUint16(34, BITS_PER_SAMPLE, true);
  writeAscii(view, 36, 'data');
  view.setUint32(40, dataSize, true);
  return header;
}

/** Complete in-memory WAV file. */
export function encodeWav(samples: Uint8Array, sampleRate: number): Uint8Array {
  const pad = samples.length & 1;
  const out = new Uint8Array(WAV_HEADER_SIZE + samples.length + pad);
  out.set(encodeWavHeader(samples.length, sampleRate), 0);
  out.set(samples, WAV_HEADER_SIZE);
  return out;
}

// ---------------------------------------------------------------------------
// Chunk walking
// ---------------------------------------------------------------------------

export interface RiffChunk {
  id: string;
  /** Offset of the chunk's payload (after id + size). */
  offset: number;
  size: number;
}

/** List the top-level chunks of a RIFF/WAVE file. Throws if it is not one. */
export function listChunks(bytes: Uint8Array): RiffChunk[] {
  if (bytes.length < 12 || readAscii(bytes, 0, 4) !== 'RIFF' || readAscii(bytes, 8, 4) !== 'WAVE') {
    throw new Error('Not a RIFF/WAVE file');
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const chunks: RiffChunk[] = [];
  let pos = 12;
  while (pos + 8 <= bytes.length) {
    const id = readAscii(bytes, pos, 4);
    const size = view.getUint32(pos + 4, true);
    if (pos + 8 + size > bytes.length) {
      throw new Error(`Chunk '${id}' at ${pos} runs past end of file`);
    }
    chunks.push({ id, offset: pos + 8, size });
    pos += 8 + size + (size & 1);
  }
  return chunks;
}

// ---------------------------------------------------------------------------
// File sink
// ---------------------------------------------------------------------------

/**
 * PCM sink that buffers the signal and writes it as a WAV file on `finish`.
 * The file appears at its final path only once it is complete.
 */
export class WavFileSink implements PcmSink {
  private readonly chunks: Uint8Array[] = [];
  private length = 0;

  constructor(readonly sampleRate: number) {}

  get sampleCount(): number {
    return this.length;
  }

  write(samples: Uint8Array): void {
    this.chunks.push(samples);
    this.length += samples.length;
  }

  finish(path: string): void {
    const parts = [encodeWavHeader(this.length, this.sampleRate), ...this.chunks];
    if (this.length & 1) parts.push(new Uint8Array(1));
    writeFileAtomic(path, parts);
  }
}
