/**
 * Tape signal assembly: leader, one frame per byte, trailer.
 *
 *   | leader (1-tone carrier) | frame × bytes | 0 0 0 |
 *
 * Samples are written to the sink strictly in order; the receiver decodes a
 * continuous signal, so nothing may be reordered or skipped.
 */
import type { EncodingConfig, PcmSink, PulseSet } from './types';
import { TRAILER_PULSES } from './types';
import { getPulses } from './pulse';
import { encodeFrame, frameLength } from './frame';

/**
 * Number of 1-tone pulses in the leader.
 * Pulses-per-second is truncated before scaling, so the leader runs slightly
 * short of `leaderSeconds`; receivers are tuned to that length.
 */
export function leaderPulseCount(config: EncodingConfig, pulses: PulseSet = getPulses(config)): number {
  return Math.floor(config.sampleRate / pulses.one.length) * config.leaderSeconds;
}

/** Write the complete signal for `bytes` to `sink`. */
export function assembleStream(bytes: Uint8Array, config: EncodingConfig, sink: PcmSink): void {
  const pulses = getPulses(config);

  const leader = leaderPulseCount(config, pulses);
  for (let i = 0; i < leader; i++) sink.write(pulses.one);

  for (const byte of bytes) sink.write(encodeFrame(byte, config, pulses));

  for (let i = 0; i < TRAILER_PULSES; i++) sink.write(pulses.zero);
}

/** Total samples `assembleStream` will produce for `bytes`. */
export function sampleCount(bytes: Uint8Array, config: EncodingConfig): number {
  const pulses = getPulses(config);
  let total = leaderPulseCount(config, pulses) * pulses.one.length;
  for (const byte of bytes) total += frameLength(byte, config, pulses);
  total += TRAILER_PULSES * pulses.zero.length;
  return total;
}

/** Sink that writes into a preallocated buffer. */
export class BufferSink implements PcmSink {
  readonly samples: Uint8Array;
  offset = 0;

  constructor(length: number) {
    this.samples = new Uint8Array(length);
  }

  write(samples: Uint8Array): void {
    if (this.offset + samples.length > this.samples.length) {
      throw new Error(`BufferSink overflow (${this.samples.length} samples)`);
    }
    this.samples.set(samples, this.offset);
    this.offset += samples.length;
  }
}

/** Render the complete signal for `bytes` into memory. */
export function renderSamples(bytes: Uint8Array, config: EncodingConfig): Uint8Array {
  const sink = new BufferSink(sampleCount(bytes, config));
  assembleStream(bytes, config, sink);
  return sink.samples;
}
