import { describe, it, expect } from 'vitest';
import { createConfig } from './config';
import { DEFAULT_CONFIG } from './constants';
import type { EncodingConfig } from './types';

describe('createConfig', () => {
  it('starts from the cassette loader defaults', () => {
    const { config, errors } = createConfig();
    expect(errors).toHaveLength(0);
    expect(config).toEqual({
      sampleRate: 22050,
      oneFrequency: 2400,
      zeroFrequency: 800,
      amplitude: 225,
      center: 128,
      leaderSeconds: 14,
      startBit: 0,
      parity: 'odd',
    });
  });

  it('returns a frozen copy with overrides applied', () => {
    const { config } = createConfig({ leaderSeconds: 1, parity: 'even' });
    expect(config?.leaderSeconds).toBe(1);
    expect(config?.parity).toBe('even');
    expect(Object.isFrozen(config)).toBe(true);
    expect(DEFAULT_CONFIG.leaderSeconds).toBe(14);
  });

  it('rejects a tone too high for the sample rate', () => {
    const { config, errors } = createConfig({ oneFrequency: 9600, sampleRate: 4800 });
    expect(config).toBeNull();
    expect(errors).toEqual([
      { kind: 'config', message: 'bit 1 frequency 9600 Hz is too high for 4800 Hz sample rate' },
    ]);
  });

  it('rejects tones that render to the same cycle', () => {
    const { errors } = createConfig({ oneFrequency: 2400, zeroFrequency: 2000, sampleRate: 4800 });
    expect(errors.map(e => e.message)).toEqual([
      'bit 1 and bit 0 tones render to the same 2-sample cycle at 4800 Hz',
    ]);
  });

  it('rejects levels outside the 8-bit range', () => {
    expect(createConfig({ amplitude: 300 }).errors.map(e => e.message)).toEqual([
      'amplitude must be 0..255, got 300',
    ]);
    expect(createConfig({ center: 10 }).errors.map(e => e.message)).toEqual([
      'amplitude 225 around center 10 leaves the 0..255 sample range',
    ]);
  });

  it('rejects leader lengths outside 0..60 whole seconds', () => {
    expect(createConfig({ leaderSeconds: 61 }).errors.map(e => e.message)).toEqual([
      'leader must be 0..60 seconds, got 61',
    ]);
    expect(createConfig({ leaderSeconds: 1.5 }).config).toBeNull();
    expect(createConfig({ leaderSeconds: 0 }).config).not.toBeNull();
  });

  it('rejects non-positive rates and frequencies', () => {
    const { errors } = createConfig({ sampleRate: 0, zeroFrequency: -800 });
    expect(errors.map(e => e.message)).toEqual([
      'sample rate must be a positive integer, got 0',
      'bit 0 frequency must be a positive integer, got -800',
    ]);
  });

  it('rejects an unknown parity mode', () => {
    const overrides: Partial<EncodingConfig> = JSON.parse('{"parity":"none"}');
    expect(createConfig(overrides).errors.map(e => e.message)).toEqual([
      "parity must be 'odd' or 'even', got 'none'",
    ]);
  });
});
