/**
 * Artist / album / title tags for WAV files, stored in a LIST/INFO chunk
 * (IART, IPRD, INAM) appended after the audio.
 */
import { readFileSync } from 'fs';
import { basename, extname } from 'path';
import { listChunks, readAscii } from './wav';
import { writeFileAtomic } from './atomicWrite';

export interface WavTags {
  artist?: string;
  album?: string;
  title?: string;
}

const INFO_FIELDS: readonly [keyof WavTags, string][] = [
  ['artist', 'IART'],
  ['album', 'IPRD'],
  ['title', 'INAM'],
];

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

/** Tag title for an output file: its base name without extension. */
export function titleFor(path: string): string {
  return basename(path, extname(path));
}

/** Complete LIST chunk (header included, padded to even length). */
export function buildInfoChunk(tags: WavTags): Uint8Array {
  const entries: { id: string; data: Uint8Array }[] = [];
  for (const [field, id] of INFO_FIELDS) {
    const value = tags[field];
    if (value === undefined) continue;
    const text = encoder.encode(value);
    const data = new Uint8Array(text.length + 1); // NUL-terminated
    data.set(text);
    entries.push({ id, data });
  }

  let listSize = 4; // "INFO"
  for (const e of entries) listSize += 8 + e.data.length + (e.data.length & 1);

  const out = new Uint8Array(8 + listSize);
  const view = new DataView(out.buffer);
  const ascii = (offset: number, s: string) => {
    for (let i = 0; i < s.length; i++) out[offset + i] = s.charCodeAt(i);
  };

  ascii(0, 'LIST');
  view.setUint32(4, listSize, true);
  ascii(8, 'INFO');
  let pos = 12;
  for (const e of entries) {
    ascii(pos, e.id);
    view.setUint32(pos + 4, e.data.length, true);
    out.set(e.data, pos + 8);
    pos += 8 + e.data.length + (e.data.length & 1);
  }
  return out;
}

function isInfoList(bytes: Uint8Array, chunk: { id: string; offset: number; size: number }): boolean {
  return chunk.id === 'LIST' && chunk.size >= 4 && readAscii(bytes, chunk.offset, 4) === 'INFO';
}

/**
 * Replace any INFO list in a WAV image with `tags`.
 * Other chunks are kept in their original order.
 */
export function applyTags(bytes: Uint8Array, tags: WavTags): Uint8Array {
  const parts: Uint8Array[] = [bytes.subarray(0, 12)];
  for (const chunk of listChunks(bytes)) {
    if (isInfoList(bytes, chunk)) continue;
    const end = Math.min(chunk.offset + chunk.size + (chunk.size & 1), bytes.length);
    parts.push(bytes.subarray(chunk.offset - 8, end));
  }
  parts.push(buildInfoChunk(tags));

  let total = 0;
  for (const p of parts) total += p.length;
  const out = new Uint8Array(total);
  let pos = 0;
  for (const p of parts) {
    out.set(p, pos);
    pos += p.length;
  }
  new DataView(out.buffer).setUint32(4, total - 8, true);
  return out;
}

/** Read INFO tags back out of a WAV image. */
export function readWavTags(bytes: Uint8Array): WavTags {
  const tags: WavTags = {};
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  for (const chunk of listChunks(bytes)) {
    if (!isInfoList(bytes, chunk)) continue;
    let pos = chunk.offset + 4;
    const end = chunk.offset + chunk.size;
    while (pos + 8 <= end) {
      const id = readAscii(bytes, pos, 4);
      const size = view.getUint32(pos + 4, true);
      let data = bytes.subarray(pos + 8, pos + 8 + size);
      const nul = data.indexOf(0);
      if (nul >= 0) data = data.subarray(0, nul);
      const field = INFO_FIELDS.find(([, fid]) => fid === id);
      if (field) tags[field[0]] = decoder.decode(data);
      pos += 8 + size + (size & 1);
    }
  }
  return tags;
}

/** Set artist, album and title of the WAV at `path` to `title`. */
export function tagWavFile(path: string, title: string): void {
  const bytes = new Uint8Array(readFileSync(path));
  writeFileAtomic(path, [applyTags(bytes, { artist: title, album: title, title })]);
}
