/**
 * BASIC source → length-prefixed byte stream.
 *
 * Wire layout:
 *   [size hi, size lo]                     size = data length + 0x100
 *   per line: [label hi, label lo, ...body]  body = UTF-8(text + '\r')
 *   [0x00]                                 terminator, not counted in size
 *
 * Lines that do not begin with a decimal digit run are dropped.
 */
import type { EncodeError, SourceRecord } from './types';
import { BYTE_MASK, ErrorKind, SIZE_HEADER_OFFSET, WORD16_MASK } from './types';

export interface RecordOptions {
  /** Keep the low 16 bits of labels above 65535 instead of rejecting them. */
  truncateLabels?: boolean;
}

export interface RecordStream {
  /** Complete stream: size header, records, terminator. Empty on error. */
  bytes: Uint8Array;
  records: SourceRecord[];
  /** Label + body bytes, excluding header and terminator. */
  dataLength: number;
  /** Value carried in the size header. */
  header: number;
  errors: EncodeError[];
}

const LINE_BREAK = /\r\n|\r|\n/;
const LEADING_LABEL = /^(\p{Nd}+)(.*)$/su;
const DECIMAL_DIGIT = /^\p{Nd}$/u;
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export interface LabeledLine {
  line: number;
  /** Digit run exactly as written; may exceed 16 bits. */
  digits: string;
  text: string;
}

/**
 * Value of one decimal digit from any script. Nd code points come in
 * contiguous runs of whole 0..9 blocks.
 */
function digitValue(ch: string): number {
  const cp = ch.codePointAt(0) ?? 0;
  let start = cp;
  while (start > 0 && DECIMAL_DIGIT.test(String.fromCodePoint(start - 1))) start--;
  return (cp - start) % 10;
}

/** ASCII form of a digit run, e.g. '١٠' → '10'. */
export function asciiDigits(digits: string): string {
  return Array.from(digits, digitValue).join('');
}

/** Split source into lines and keep the ones that start with a label. */
export function splitLabeledLines(source: string): LabeledLine[] {
  const out: LabeledLine[] = [];
  const lines = source.split(LINE_BREAK);
  for (let i = 0; i < lines.length; i++) {
    const m = LEADING_LABEL.exec(lines[i]);
    if (!m) continue;
    out.push({ line: i + 1, digits: m[1], text: m[2].trimStart() });
  }
  return out;
}

const encoder = new TextEncoder();

/**
 * Parse source into records. Problems are collected per line; records are
 * only returned for lines that encoded cleanly.
 */
export function parseRecords(
  source: string,
  options: RecordOptions = {},
): { records: SourceRecord[]; errors: EncodeError[] } {
  const records: SourceRecord[] = [];
  const errors: EncodeError[] = [];

  for (const { line, digits, text } of splitLabeledLines(source)) {
    const wide = BigInt(asciiDigits(digits));
    let label: number;
    if (wide <= BigInt(WORD16_MASK)) {
      label = Number(wide);
    } else if (options.truncateLabels) {
      label = Number(wide & BigInt(WORD16_MASK));
    } else {
      errors.push({ kind: ErrorKind.VALIDATION, line, message: `line number ${digits} does not fit in 16 bits` });
      continue;
    }

    const body = `${text}\r`;
    if (LONE_SURROGATE.test(body)) {
      errors.push({ kind: ErrorKind.INPUT, line, message: 'text cannot be encoded as UTF-8 (unpaired surrogate)' });
      continue;
    }

    records.push({ line, label, body: encoder.encode(body) });
  }

  return { records, errors };
}

/** Serialize records: size header, label + body per record, terminator. */
export function serializeRecords(records: SourceRecord[]): { bytes: Uint8Array; dataLength: number; header: number } {
  let dataLength = 0;
  for (const r of records) dataLength += 2 + r.body.length;
  const header = dataLength + SIZE_HEADER_OFFSET;
  if (header > WORD16_MASK) {
    throw new Error(`Size header ${header} exceeds 16 bits`);
  }

  const bytes = new Uint8Array(2 + dataLength + 1);
  let i = 0;
  bytes[i++] = (header >> 8) & BYTE_MASK;
  bytes[i++] = header & BYTE_MASK;
  for (const r of records) {
    bytes[i++] = (r.label >> 8) & BYTE_MASK;
    bytes[i++] = r.label & BYTE_MASK;
    bytes.set(r.body, i);
    i += r.body.length;
  }
  bytes[i] = 0; // terminator

  return { bytes, dataLength, header };
}

/**
 * Build the complete byte stream for a source text.
 * Any error leaves `bytes` empty so nothing half-valid reaches the encoder.
 */
export function buildRecordStream(source: string, options: RecordOptions = {}): RecordStream {
  const { records, errors } = parseRecords(source, options);

  let dataLength = 0;
  for (const r of records) dataLength += 2 + r.body.length;
  const header = dataLength + SIZE_HEADER_OFFSET;
  if (header > WORD16_MASK) {
    errors.push({
      kind: ErrorKind.VALIDATION,
      message: `program is ${dataLength} bytes; the size header holds at most ${WORD16_MASK - SIZE_HEADER_OFFSET}`,
    });
  }

  if (errors.length > 0) {
    return { bytes: new Uint8Array(0), records, dataLength, header, errors };
  }

  return { ...serializeRecords(records), records, errors };
}
