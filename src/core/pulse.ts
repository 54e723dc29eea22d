/**
 * Single-cycle square wave generation.
 *
 * Every bit on the tape is exactly one cycle of its tone: a low half followed
 * by a high half, each `floor(sampleRate / frequency / 2)` samples long.
 */
import type { EncodingConfig, PulseSet } from './types';

/** Samples in one half-cycle of `frequency` at `sampleRate`. */
export function halfCycleSamples(frequency: number, sampleRate: number): number {
  return Math.floor(sampleRate / frequency / 2);
}

/**
 * Generate one square-wave cycle.
 * Throws when the frequency is too high for the sample rate to hold even a
 * single sample per half-cycle.
 */
export function generatePulse(
  frequency: number,
  sampleRate: number,
  amplitude: number,
  center: number,
): Uint8Array {
  const n = halfCycleSamples(frequency, sampleRate);
  if (!(n > 0)) {
    throw new Error(`${frequency} Hz has no half-cycle at ${sampleRate} Hz sample rate`);
  }
  const half = Math.floor(amplitude / 2);
  const pulse = new Uint8Array(n * 2);
  pulse.fill(center - half, 0, n);
  pulse.fill(center + half, n);
  return pulse;
}

const cache = new WeakMap<EncodingConfig, PulseSet>();

/**
 * The one/zero pulses for a configuration, generated on first use and reused
 * for every bit afterwards. Callers must not write into the returned arrays.
 */
export function getPulses(config: EncodingConfig): PulseSet {
  let pulses = cache.get(config);
  if (!pulses) {
    pulses = Object.freeze({
      one: generatePulse(config.oneFrequency, config.sampleRate, config.amplitude, config.center),
      zero: generatePulse(config.zeroFrequency, config.sampleRate, config.amplitude, config.center),
    });
    cache.set(config, pulses);
  }
  return pulses;
}
