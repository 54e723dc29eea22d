import { describe, it, expect } from 'vitest';
import { asciiDigits, buildRecordStream, parseRecords, splitLabeledLines } from './records';

const ascii = (s: string) => Array.from(s, c => c.charCodeAt(0));
const text = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

// ---------------------------------------------------------------------------
// Line splitting
// ---------------------------------------------------------------------------

describe('splitLabeledLines', () => {
  it('keeps only lines that start with digits', () => {
    const lines = splitLabeledLines('REM header\n10 PRINT\n  20 INDENTED\n\n30END');
    expect(lines).toEqual([
      { line: 2, digits: '10', text: 'PRINT' },
      { line: 5, digits: '30', text: 'END' },
    ]);
  });

  it('treats CRLF and bare CR as line breaks', () => {
    const lines = splitLabeledLines('10 A\r\n20 B\r30 C\n');
    expect(lines.map(l => l.text)).toEqual(['A', 'B', 'C']);
    expect(lines.map(l => l.line)).toEqual([1, 2, 3]);
  });

  it('accepts decimal digits from any script', () => {
    const lines = splitLabeledLines('\u0661\u0660 PRINT\n\uFF12\uFF10 END');
    expect(lines).toEqual([
      { line: 1, digits: '\u0661\u0660', text: 'PRINT' },
      { line: 2, digits: '\uFF12\uFF10', text: 'END' },
    ]);
  });

  it('keeps duplicate and out-of-order labels as written', () => {
    const lines = splitLabeledLines('20 B\n10 A\n10 A');
    expect(lines.map(l => l.digits)).toEqual(['20', '10', '10']);
  });
});

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

describe('asciiDigits', () => {
  it('maps each digit to its value', () => {
    expect(asciiDigits('0123456789')).toBe('0123456789');
    expect(asciiDigits('\u0660\u0665\u0669')).toBe('059');
    expect(asciiDigits('\u{1D7CF}\u{1D7D0}')).toBe('12');
    expect(asciiDigits('\u{1D7D8}\u{1D7E1}')).toBe('09');
  });
});

describe('parseRecords', () => {
  it('reads labels written in other scripts', () => {
    const { records, errors } = parseRecords('\u0661\u0660 PRINT\n\uFF12\uFF10 END');
    expect(errors).toHaveLength(0);
    expect(records.map(r => r.label)).toEqual([10, 20]);
    expect(text(records[0].body)).toBe('PRINT\r');
  });

  it('left-trims the body and appends a carriage return', () => {
    const { records, errors } = parseRecords('30    GOTO 10  ');
    expect(errors).toHaveLength(0);
    expect(records[0].label).toBe(30);
    expect(text(records[0].body)).toBe('GOTO 10  \r');
  });

  it('gives a bare line number an empty body', () => {
    const { records } = parseRecords('40');
    expect(Array.from(records[0].body)).toEqual([0x0D]);
  });

  it('encodes the body as UTF-8', () => {
    const { records } = parseRecords('10 PRINT "é"');
    expect(records[0].body).toHaveLength(11);
    expect(Array.from(records[0].body.subarray(7, 9))).toEqual([0xC3, 0xA9]);
  });

  it('rejects a label above 16 bits', () => {
    const { records, errors } = parseRecords('10 OK\n65536 TOO BIG');
    expect(records).toHaveLength(1);
    expect(errors).toEqual([
      { kind: 'validation', line: 2, message: 'line number 65536 does not fit in 16 bits' },
    ]);
  });

  it('keeps the low 16 bits when truncation is requested', () => {
    const { records, errors } = parseRecords(
      '65546 A\n123456789012345678901234567890 B',
      { truncateLabels: true },
    );
    expect(errors).toHaveLength(0);
    expect(records.map(r => r.label)).toEqual([10, 2770]);
  });

  it('reports text that cannot be encoded', () => {
    const { records, errors } = parseRecords('10 A\uD800');
    expect(records).toHaveLength(0);
    expect(errors).toEqual([
      { kind: 'input', line: 1, message: 'text cannot be encoded as UTF-8 (unpaired surrogate)' },
    ]);
  });

  it('accepts surrogate pairs', () => {
    const { records, errors } = parseRecords('10 \u{1F4FC}');
    expect(errors).toHaveLength(0);
    expect(records[0].body).toHaveLength(5);
  });
});

// ---------------------------------------------------------------------------
// Byte stream
// ---------------------------------------------------------------------------

describe('buildRecordStream', () => {
  it('serializes a two-line program', () => {
    const stream = buildRecordStream('10 PRINT "HI"\n20 END');
    expect(stream.errors).toHaveLength(0);
    expect(stream.dataLength).toBe(19);
    expect(stream.header).toBe(275);
    expect(Array.from(stream.bytes)).toEqual([
      0x01, 0x13,
      0x00, 0x0A, ...ascii('PRINT "HI"\r'),
      0x00, 0x14, ...ascii('END\r'),
      0x00,
    ]);
  });

  it('header is data length + 256 and excludes the terminator', () => {
    const source = '10 A\nskip me\n20 BB\n30 CCC\n';
    const stream = buildRecordStream(source);
    const n = (2 + 2) + (2 + 3) + (2 + 4);
    expect(stream.dataLength).toBe(n);
    expect((stream.bytes[0] << 8) | stream.bytes[1]).toBe(n + 256);
    expect(stream.bytes).toHaveLength(2 + n + 1);
    expect(stream.bytes[stream.bytes.length - 1]).toBe(0);
  });

  it('unlabeled lines contribute nothing', () => {
    const a = buildRecordStream('10 A\n20 B');
    const b = buildRecordStream('hello\n10 A\n\n  x\n20 B\nworld');
    expect(Array.from(b.bytes)).toEqual(Array.from(a.bytes));
  });

  it('produces only the header and terminator for empty input', () => {
    for (const source of ['', 'no labels here\n\n']) {
      const stream = buildRecordStream(source);
      expect(stream.records).toHaveLength(0);
      expect(Array.from(stream.bytes)).toEqual([0x01, 0x00, 0x00]);
    }
  });

  it('encodes labels big-endian', () => {
    const stream = buildRecordStream('65535 X\n258 Y');
    expect(Array.from(stream.bytes.subarray(2, 4))).toEqual([0xFF, 0xFF]);
    expect(Array.from(stream.bytes.subarray(6, 8))).toEqual([0x01, 0x02]);
  });

  it('accepts a program that fills the size header exactly', () => {
    // 2 label bytes + 65276 text bytes + CR = 65279 = 0xFFFF - 0x100
    const stream = buildRecordStream(`10 ${'A'.repeat(65276)}`);
    expect(stream.errors).toHaveLength(0);
    expect(stream.header).toBe(0xFFFF);
    expect(Array.from(stream.bytes.subarray(0, 2))).toEqual([0xFF, 0xFF]);
  });

  it('rejects a program too large for the size header', () => {
    const stream = buildRecordStream(`10 ${'A'.repeat(65300)}`);
    expect(stream.bytes).toHaveLength(0);
    expect(stream.errors).toEqual([
      { kind: 'validation', message: 'program is 65303 bytes; the size header holds at most 65279' },
    ]);
  });

  it('returns no bytes when any line fails', () => {
    const stream = buildRecordStream('10 A\n99999 B\n20 C');
    expect(stream.bytes).toHaveLength(0);
    expect(stream.errors).toHaveLength(1);
    expect(stream.errors[0].line).toBe(2);
  });
});
