/**
 * Per-file pipeline: read source → record stream → tape signal → WAV → tags.
 *
 * Failures come back in `errors`; a failed file never leaves output behind.
 */
import { existsSync, readFileSync, unlinkSync } from 'fs';
import type { EncodeError, EncodingConfig, SourceRecord } from './types';
import { ErrorKind } from './types';
import { buildRecordStream } from './records';
import type { RecordOptions } from './records';
import { assembleStream } from './stream';
import { WavFileSink } from './wav';
import { tagWavFile, titleFor } from './tags';

export interface EncodeFileResult {
  source: string;
  target: string;
  errors: EncodeError[];
  records: SourceRecord[];
  /** Size header value (data length + 0x100). */
  header: number;
  /** Frames on the tape: header, records and terminator. */
  frames: number;
  samples: number;
  /** Signal length in seconds. */
  duration: number;
}

export interface EncodeOptions extends RecordOptions {
  /** Tag step run on the finished WAV; `tagWavFile` unless replaced. */
  tag?: (path: string, title: string) => void;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Read a source file as strict UTF-8. */
export function readSource(path: string): { text: string | null; errors: EncodeError[] } {
  let raw: Uint8Array;
  try {
    raw = readFileSync(path);
  } catch (err) {
    return { text: null, errors: [{ kind: ErrorKind.INPUT, message: `cannot read file: ${describe(err)}` }] };
  }
  try {
    return { text: new TextDecoder('utf-8', { fatal: true }).decode(raw), errors: [] };
  } catch {
    return { text: null, errors: [{ kind: ErrorKind.INPUT, message: 'file is not valid UTF-8 text' }] };
  }
}

/** Encode `text` into a tagged WAV at `target`. */
export function encodeText(
  text: string,
  target: string,
  config: EncodingConfig,
  options: EncodeOptions = {},
): Omit<EncodeFileResult, 'source'> {
  const stream = buildRecordStream(text, options);
  const result = {
    target,
    errors: stream.errors,
    records: stream.records,
    header: stream.header,
    frames: stream.bytes.length,
    samples: 0,
    duration: 0,
  };
  if (stream.errors.length > 0) return result;

  const sink = new WavFileSink(config.sampleRate);
  assembleStream(stream.bytes, config, sink);
  result.samples = sink.sampleCount;
  result.duration = sink.sampleCount / config.sampleRate;

  try {
    sink.finish(target);
  } catch (err) {
    result.errors.push({ kind: ErrorKind.OUTPUT, message: `cannot write ${target}: ${describe(err)}` });
    return result;
  }

  try {
    (options.tag ?? tagWavFile)(target, titleFor(target));
  } catch (err) {
    if (existsSync(target)) unlinkSync(target);
    result.errors.push({ kind: ErrorKind.OUTPUT, message: `cannot tag ${target}: ${describe(err)}` });
  }
  return result;
}

/** Encode the source file at `source` into a tagged WAV at `target`. */
export function encodeFile(
  source: string,
  target: string,
  config: EncodingConfig,
  options: EncodeOptions = {},
): EncodeFileResult {
  const { text, errors } = readSource(source);
  if (text === null) {
    return { source, target, errors, records: [], header: 0, frames: 0, samples: 0, duration: 0 };
  }
  return { source, ...encodeText(text, target, config, options) };
}
