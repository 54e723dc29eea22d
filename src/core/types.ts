// A single binary digit on the wire
export type Bit = 0 | 1;

// 8-bit unsigned sample / data value (stored as standard JS number, 0..255)
export type Byte = number;

export const BYTE_MASK = 0xFF;
export const WORD16_MASK = 0xFFFF;

// Size header is offset so an empty program still sends 0x0100
export const SIZE_HEADER_OFFSET = 0x100;

// Raw zero pulses sent after the terminator frame
export const TRAILER_PULSES = 3;

// start + 8 data + parity
export const FRAME_BITS = 10;

export const Parity = {
  ODD: 'odd',
  EVEN: 'even',
} as const;
export type Parity = typeof Parity[keyof typeof Parity];

export interface EncodingConfig {
  readonly sampleRate: number;
  readonly oneFrequency: number;
  readonly zeroFrequency: number;
  readonly amplitude: number;
  readonly center: number;
  readonly leaderSeconds: number;
  readonly startBit: Bit;
  readonly parity: Parity;
}

export const ErrorKind = {
  INPUT: 'input',
  VALIDATION: 'validation',
  CONFIG: 'config',
  OUTPUT: 'output',
} as const;
export type ErrorKind = typeof ErrorKind[keyof typeof ErrorKind];

export interface EncodeError {
  kind: ErrorKind;
  message: string;
  line?: number;
}

/** One labeled source line, ready for serialization. */
export interface SourceRecord {
  line: number;
  label: number;
  /** Left-trimmed body with the trailing carriage return, as UTF-8. */
  body: Uint8Array;
}

/** The two single-cycle waveforms every bit is rendered from. */
export interface PulseSet {
  readonly one: Uint8Array;
  readonly zero: Uint8Array;
}

/** Destination for rendered 8-bit unsigned PCM samples, written in order. */
export interface PcmSink {
  write(samples: Uint8Array): void;
}
