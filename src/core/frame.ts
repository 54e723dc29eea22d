/**
 * Byte framing for the cassette loader.
 *
 * Each byte goes out as: start bit, 8 data bits MSB first, one parity bit.
 * There is no stop bit; the next frame's start bit follows immediately.
 */
import type { Bit, Byte, EncodingConfig, PulseSet } from './types';
import { FRAME_BITS, Parity } from './types';
import { getPulses } from './pulse';

/** Count of 1 bits in an 8-bit value. */
export function popcount8(byte: Byte): number {
  let p = 0;
  for (let bit = 7; bit >= 0; bit--) p += (byte >> bit) & 1;
  return p;
}

/**
 * Parity bit that makes (data ones + parity) odd in odd mode, even in even
 * mode.
 */
export function parityBit(ones: number, parity: Parity): Bit {
  const even = ones % 2 === 0;
  if (parity === Parity.ODD) return even ? 1 : 0;
  return even ? 0 : 1;
}

function assertByte(byte: Byte): void {
  if (!Number.isInteger(byte) || byte < 0 || byte > 0xFF) {
    throw new Error(`Frame value out of byte range: ${byte}`);
  }
}

/** The 10 wire bits for one byte. */
export function frameBits(byte: Byte, config: EncodingConfig): Bit[] {
  assertByte(byte);
  const bits: Bit[] = [config.startBit];
  let p = 0;
  for (let bit = 7; bit >= 0; bit--) {
    const b: Bit = (byte >> bit) & 1 ? 1 : 0;
    bits.push(b);
    p += b;
  }
  bits.push(parityBit(p, config.parity));
  return bits;
}

/** Render one byte's frame as concatenated pulses. */
export function encodeFrame(
  byte: Byte,
  config: EncodingConfig,
  pulses: PulseSet = getPulses(config),
): Uint8Array {
  const bits = frameBits(byte, config);
  let length = 0;
  for (const b of bits) length += b ? pulses.one.length : pulses.zero.length;

  const out = new Uint8Array(length);
  let offset = 0;
  for (const b of bits) {
    const pulse = b ? pulses.one : pulses.zero;
    out.set(pulse, offset);
    offset += pulse.length;
  }
  return out;
}

/** Length in samples of `byte`'s frame, without rendering it. */
export function frameLength(byte: Byte, config: EncodingConfig, pulses: PulseSet = getPulses(config)): number {
  assertByte(byte);
  const ones = popcount8(byte) + config.startBit + parityBit(popcount8(byte), config.parity);
  return ones * pulses.one.length + (FRAME_BITS - ones) * pulses.zero.length;
}
