/**
 * Encoding configuration: defaults merged with overrides, validated once,
 * then frozen and passed explicitly to every stage.
 */
import type { EncodeError, EncodingConfig } from './types';
import { ErrorKind, Parity } from './types';
import { DEFAULT_CONFIG, MAX_LEADER_SECONDS, MAX_LEVEL } from './constants';
import { halfCycleSamples } from './pulse';

export interface ConfigResult {
  config: EncodingConfig | null;
  errors: EncodeError[];
}

function isPositiveInt(v: number): boolean {
  return Number.isInteger(v) && v > 0;
}

function inRange(v: number, min: number, max: number): boolean {
  return Number.isInteger(v) && v >= min && v <= max;
}

export function validateConfig(config: EncodingConfig): EncodeError[] {
  const messages: string[] = [];

  if (!isPositiveInt(config.sampleRate)) messages.push(`sample rate must be a positive integer, got ${config.sampleRate}`);
  if (!isPositiveInt(config.oneFrequency)) messages.push(`bit 1 frequency must be a positive integer, got ${config.oneFrequency}`);
  if (!isPositiveInt(config.zeroFrequency)) messages.push(`bit 0 frequency must be a positive integer, got ${config.zeroFrequency}`);
  if (!inRange(config.amplitude, 0, MAX_LEVEL)) messages.push(`amplitude must be 0..${MAX_LEVEL}, got ${config.amplitude}`);
  if (!inRange(config.center, 0, MAX_LEVEL)) messages.push(`center must be 0..${MAX_LEVEL}, got ${config.center}`);
  if (!inRange(config.leaderSeconds, 0, MAX_LEADER_SECONDS)) {
    messages.push(`leader must be 0..${MAX_LEADER_SECONDS} seconds, got ${config.leaderSeconds}`);
  }
  if (config.startBit !== 0 && config.startBit !== 1) messages.push(`start bit must be 0 or 1, got ${String(config.startBit)}`);
  if (config.parity !== Parity.ODD && config.parity !== Parity.EVEN) {
    messages.push(`parity must be '${Parity.ODD}' or '${Parity.EVEN}', got '${String(config.parity)}'`);
  }

  // Levels and pulse shapes only make sense once the basics hold
  if (messages.length === 0) {
    const half = Math.floor(config.amplitude / 2);
    if (config.center - half < 0 || config.center + half > MAX_LEVEL) {
      messages.push(`amplitude ${config.amplitude} around center ${config.center} leaves the 0..${MAX_LEVEL} sample range`);
    }

    const oneHalf = halfCycleSamples(config.oneFrequency, config.sampleRate);
    const zeroHalf = halfCycleSamples(config.zeroFrequency, config.sampleRate);
    if (oneHalf === 0) messages.push(`bit 1 frequency ${config.oneFrequency} Hz is too high for ${config.sampleRate} Hz sample rate`);
    if (zeroHalf === 0) messages.push(`bit 0 frequency ${config.zeroFrequency} Hz is too high for ${config.sampleRate} Hz sample rate`);
    if (oneHalf > 0 && oneHalf === zeroHalf) {
      messages.push(`bit 1 and bit 0 tones render to the same ${oneHalf * 2}-sample cycle at ${config.sampleRate} Hz`);
    }
  }

  return messages.map(message => ({ kind: ErrorKind.CONFIG, message }));
}

/**
 * Build a frozen configuration from the defaults and `overrides`.
 * Returns `config: null` with the reasons when validation fails.
 */
export function createConfig(overrides: Partial<EncodingConfig> = {}): ConfigResult {
  const merged: EncodingConfig = { ...DEFAULT_CONFIG, ...overrides };
  const errors = validateConfig(merged);
  if (errors.length > 0) return { config: null, errors };
  return { config: Object.freeze(merged), errors };
}
