import type { EncodingConfig } from './types';
import { Parity } from './types';

// Defaults target the COSMAC ELF II Full Basic Math cassette loader
export const DEFAULT_CONFIG: EncodingConfig = Object.freeze<EncodingConfig>({
  sampleRate: 22050,
  oneFrequency: 2400,
  zeroFrequency: 800,
  amplitude: 225,
  center: 128,
  leaderSeconds: 14,
  startBit: 0,
  parity: Parity.ODD,
});

// Tone frequencies offered by the front end (Hz)
export const TONE_CHOICES: readonly number[] = [
  300, 500, 600, 800, 1000, 1200, 2000, 2400, 4800, 9600,
];

// Sample rates offered by the front end (Hz)
export const SAMPLE_RATE_CHOICES: readonly number[] = [
  4800, 9600, 11025, 22050, 44100, 48000,
];

export const MAX_LEADER_SECONDS = 60;
export const MAX_LEVEL = 255;
